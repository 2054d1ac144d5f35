/** [10/04/2025 | ...], day first */
const BRACKETED_DATE = /\[(\d{2})\/(\d{2})\/(\d{4}).*?\|/;

/** 2025-04-10 12:34:56 or 2025-04-10T12:34:56 */
const ISO_DATETIME = /(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})/;

/** 2025-04-10 on its own */
const ISO_DATE = /(?<!\d)(\d{4})-(\d{2})-(\d{2})(?!\d)/;

const UUID = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i;

const SESSION_ID = /session id[:\s]\s*(\d+)/i;

/**
 * Build a UTC instant, rejecting out-of-range calendar values
 */
function toUtcIso(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): string | undefined {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }

  return date.toISOString();
}

/**
 * Find and parse the first recognizable date/time token in a line.
 * Values without a zone are read as UTC.
 * @returns ISO-8601 string, or undefined when nothing parseable is present
 */
export function extractTimestamp(line: string): string | undefined {
  const bracketed = line.match(BRACKETED_DATE);
  if (bracketed) {
    return toUtcIso(Number(bracketed[3]), Number(bracketed[2]), Number(bracketed[1]));
  }

  const dateTime = line.match(ISO_DATETIME);
  if (dateTime) {
    const [, year, month, day, hours, minutes, seconds] = dateTime.map(Number);
    return toUtcIso(year, month, day, hours, minutes, seconds);
  }

  const date = line.match(ISO_DATE);
  if (date) {
    return toUtcIso(Number(date[1]), Number(date[2]), Number(date[3]));
  }

  return undefined;
}

export function extractSessionUuid(line: string): string | undefined {
  return line.match(UUID)?.[0];
}

export function extractSessionId(line: string): string | undefined {
  return line.match(SESSION_ID)?.[1];
}
