import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { SEVERITIES, escapeMarkup, truncate } from "@log-categorizer/shared";
import type { Severity, SummaryRecord } from "@log-categorizer/shared";
import { compareSummaryRecords } from "./aggregator.js";
import { parseCsv } from "./reports/csv.js";

export type ChartRow = Pick<SummaryRecord, "label" | "count" | "severity">;

export const DEFAULT_TOP = 12;

const WIDTH = 800;
const HEIGHT = 480;
const BAR_COLOR = "#4e79a7";
const LINE_COLOR = "#e15759";
const PALETTE = [
  "#4e79a7", "#f28e2b", "#e15759", "#76b7b2", "#59a14f", "#edc948",
  "#b07aa1", "#ff9da7", "#9c755f", "#bab0ac",
];

/** Pie labels below this share are left out */
const MIN_LABELLED_SHARE = 3;

function num(value: number): string {
  return Number(value.toFixed(2)).toString();
}

function chartLabel(label: string): string {
  return escapeMarkup(truncate(label, 24));
}

function svgDocument(title: string, body: string[]): string {
  return (
    [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif" font-size="12">`,
      `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
      `<text class="title" x="${WIDTH / 2}" y="24" text-anchor="middle" font-size="16">${escapeMarkup(title)}</text>`,
      ...body,
      "</svg>",
    ].join("\n") + "\n"
  );
}

function emptyChart(title: string): string {
  return svgDocument(title, [
    `<text x="${WIDTH / 2}" y="${HEIGHT / 2}" text-anchor="middle">No data</text>`,
  ]);
}

export function selectTop<T>(rows: readonly T[], top: number): T[] {
  return rows.slice(0, Math.max(0, top));
}

/**
 * Vertical bars with rotated category labels; shared by the bar and Pareto views
 */
function verticalBars(
  rows: readonly ChartRow[],
  area: { left: number; top: number; width: number; height: number }
): string[] {
  const body: string[] = [];
  const max = Math.max(1, ...rows.map((row) => row.count));
  const slot = area.width / rows.length;
  const barWidth = slot * 0.7;
  const baseline = area.top + area.height;

  body.push(`<line x1="${area.left}" y1="${baseline}" x2="${area.left + area.width}" y2="${baseline}" stroke="#333"/>`);
  body.push(`<line x1="${area.left}" y1="${area.top}" x2="${area.left}" y2="${baseline}" stroke="#333"/>`);

  rows.forEach((row, i) => {
    const height = (row.count / max) * area.height;
    const x = area.left + i * slot + (slot - barWidth) / 2;
    const y = baseline - height;
    const center = x + barWidth / 2;
    body.push(
      `<rect class="bar" x="${num(x)}" y="${num(y)}" width="${num(barWidth)}" height="${num(height)}" fill="${BAR_COLOR}"/>`
    );
    body.push(`<text x="${num(center)}" y="${num(y - 4)}" text-anchor="middle">${row.count}</text>`);
    body.push(
      `<text x="${num(center)}" y="${baseline + 14}" text-anchor="end" transform="rotate(-45 ${num(center)} ${baseline + 14})">${chartLabel(row.label)}</text>`
    );
  });

  return body;
}

export function renderBarChart(rows: readonly ChartRow[], top: number = DEFAULT_TOP): string {
  const data = selectTop(rows, top);
  const title = `Top ${data.length} errors by count`;
  if (data.length === 0) {
    return emptyChart(title);
  }

  return svgDocument(title, [
    ...verticalBars(data, { left: 60, top: 40, width: 720, height: 300 }),
    `<text x="16" y="190" text-anchor="middle" transform="rotate(-90 16 190)">Occurrences</text>`,
  ]);
}

/**
 * Horizontal bars, largest at the top
 */
export function renderHorizontalBarChart(rows: readonly ChartRow[], top: number = DEFAULT_TOP): string {
  const data = selectTop(rows, top);
  const title = `Top ${data.length} errors (horizontal)`;
  if (data.length === 0) {
    return emptyChart(title);
  }

  const left = 200;
  const plotTop = 40;
  const plotWidth = 540;
  const plotHeight = 400;
  const max = Math.max(1, ...data.map((row) => row.count));
  const slot = plotHeight / data.length;
  const barHeight = slot * 0.7;

  const body: string[] = [
    `<line x1="${left}" y1="${plotTop}" x2="${left}" y2="${plotTop + plotHeight}" stroke="#333"/>`,
  ];

  data.forEach((row, i) => {
    const width = (row.count / max) * plotWidth;
    const y = plotTop + i * slot + (slot - barHeight) / 2;
    const middle = y + barHeight / 2 + 4;
    body.push(
      `<rect class="bar" x="${left}" y="${num(y)}" width="${num(width)}" height="${num(barHeight)}" fill="${BAR_COLOR}"/>`
    );
    body.push(`<text x="${left - 6}" y="${num(middle)}" text-anchor="end">${chartLabel(row.label)}</text>`);
    body.push(`<text x="${num(left + width + 4)}" y="${num(middle)}">${row.count}</text>`);
  });

  body.push(`<text x="${left + plotWidth / 2}" y="${HEIGHT - 12}" text-anchor="middle">Occurrences</text>`);
  return svgDocument(title, body);
}

export interface PieSlice {
  label: string;
  count: number;
  /** Percentage of the total across all slices */
  share: number;
}

/**
 * Top N slices plus an "Others" slice for the remaining count
 */
export function pieSlices(rows: readonly ChartRow[], top: number = DEFAULT_TOP): PieSlice[] {
  const data = selectTop(rows, top);
  const slices = data.map((row) => ({ label: row.label, count: row.count }));
  const other = rows.slice(data.length).reduce((sum, row) => sum + row.count, 0);
  if (other > 0) {
    slices.push({ label: "Others", count: other });
  }

  const total = slices.reduce((sum, slice) => sum + slice.count, 0);
  return slices.map((slice) => ({
    ...slice,
    share: total === 0 ? 0 : (100 * slice.count) / total,
  }));
}

export function renderPieChart(rows: readonly ChartRow[], top: number = DEFAULT_TOP): string {
  const slices = pieSlices(rows, top);
  const title = `Distribution (%): top ${Math.min(top, rows.length)} + Others`;
  if (slices.length === 0) {
    return emptyChart(title);
  }

  const cx = 260;
  const cy = 250;
  const radius = 180;
  const body: string[] = [];
  let angle = -Math.PI / 2;

  slices.forEach((slice, i) => {
    const color = PALETTE[i % PALETTE.length];
    const sweep = (slice.share / 100) * 2 * Math.PI;

    if (slices.length === 1) {
      body.push(`<circle class="slice" cx="${cx}" cy="${cy}" r="${radius}" fill="${color}"/>`);
    } else {
      const x1 = cx + radius * Math.cos(angle);
      const y1 = cy + radius * Math.sin(angle);
      const x2 = cx + radius * Math.cos(angle + sweep);
      const y2 = cy + radius * Math.sin(angle + sweep);
      const largeArc = sweep > Math.PI ? 1 : 0;
      body.push(
        `<path class="slice" d="M ${cx} ${cy} L ${num(x1)} ${num(y1)} A ${radius} ${radius} 0 ${largeArc} 1 ${num(x2)} ${num(y2)} Z" fill="${color}"/>`
      );
    }

    if (slice.share >= MIN_LABELLED_SHARE) {
      const mid = angle + sweep / 2;
      const lx = cx + radius * 0.65 * Math.cos(mid);
      const ly = cy + radius * 0.65 * Math.sin(mid);
      body.push(`<text x="${num(lx)}" y="${num(ly)}" text-anchor="middle" fill="#ffffff">${slice.share.toFixed(1)}%</text>`);
    }

    const legendY = 60 + i * 22;
    body.push(`<rect x="500" y="${legendY - 11}" width="14" height="14" fill="${color}"/>`);
    body.push(`<text x="520" y="${legendY}">${chartLabel(slice.label)} (${slice.count})</text>`);

    angle += sweep;
  });

  return svgDocument(title, body);
}

export interface ParetoPoint {
  label: string;
  count: number;
  /** Cumulative percentage of the grand total, all rows included */
  cumulative: number;
}

export function paretoSeries(rows: readonly ChartRow[], top: number = DEFAULT_TOP): ParetoPoint[] {
  const total = rows.reduce((sum, row) => sum + row.count, 0) || 1;
  let running = 0;
  return selectTop(rows, top).map((row) => {
    running += row.count;
    return { label: row.label, count: row.count, cumulative: (100 * running) / total };
  });
}

export function renderParetoChart(rows: readonly ChartRow[], top: number = DEFAULT_TOP): string {
  const series = paretoSeries(rows, top);
  const title = `Pareto: top ${series.length} errors`;
  if (series.length === 0) {
    return emptyChart(title);
  }

  const area = { left: 60, top: 40, width: 680, height: 300 };
  const body = verticalBars(series, area);
  const slot = area.width / series.length;
  const baseline = area.top + area.height;
  // Right axis spans 0-110 %
  const points = series.map((point, i) => {
    const x = area.left + i * slot + slot / 2;
    const y = baseline - (point.cumulative / 110) * area.height;
    return { x, y, point };
  });

  body.push(
    `<line x1="${area.left + area.width}" y1="${area.top}" x2="${area.left + area.width}" y2="${baseline}" stroke="#333"/>`
  );
  body.push(
    `<polyline fill="none" stroke="${LINE_COLOR}" stroke-width="2" points="${points.map((p) => `${num(p.x)},${num(p.y)}`).join(" ")}"/>`
  );
  for (const { x, y, point } of points) {
    body.push(`<circle class="point" cx="${num(x)}" cy="${num(y)}" r="4" fill="${LINE_COLOR}"/>`);
    body.push(`<text x="${num(x)}" y="${num(y - 8)}" text-anchor="middle" fill="${LINE_COLOR}">${point.cumulative.toFixed(1)}%</text>`);
  }
  body.push(`<text x="16" y="190" text-anchor="middle" transform="rotate(-90 16 190)">Occurrences</text>`);
  body.push(`<text x="784" y="190" text-anchor="middle" transform="rotate(90 784 190)">Cumulative (%)</text>`);

  return svgDocument(title, body);
}

export interface SeverityTotal {
  severity: Severity | "Unset";
  count: number;
}

/**
 * Occurrence totals of the top N rows per severity, highest severity first.
 * Empty when none of those rows carries a severity.
 */
export function severityTotals(rows: readonly ChartRow[], top: number = DEFAULT_TOP): SeverityTotal[] {
  const data = selectTop(rows, top);
  if (!data.some((row) => row.severity)) {
    return [];
  }

  const order: (Severity | "Unset")[] = ["High", "Medium", "Low", "Unset"];
  const totals = new Map<Severity | "Unset", number>();
  for (const row of data) {
    const key = row.severity ?? "Unset";
    totals.set(key, (totals.get(key) ?? 0) + row.count);
  }

  return order
    .filter((severity) => totals.has(severity))
    .map((severity) => ({ severity, count: totals.get(severity) ?? 0 }));
}

export function renderSeverityChart(rows: readonly ChartRow[], top: number = DEFAULT_TOP): string | undefined {
  const totals = severityTotals(rows, top);
  if (totals.length === 0) {
    return undefined;
  }

  const asRows: ChartRow[] = totals.map((total) => ({ label: total.severity, count: total.count }));
  return svgDocument(`Occurrences by severity (top ${Math.min(top, rows.length)} errors)`, [
    ...verticalBars(asRows, { left: 60, top: 40, width: 720, height: 300 }),
    `<text x="${WIDTH / 2}" y="${HEIGHT - 12}" text-anchor="middle">Severity</text>`,
  ]);
}

/**
 * Render every chart view into a directory
 * @returns paths of the files written
 */
export async function writeCharts(
  rows: readonly ChartRow[],
  outputDir: string,
  top: number = DEFAULT_TOP
): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const charts: [string, string | undefined][] = [
    ["bar_top.svg", renderBarChart(rows, top)],
    ["barh_top.svg", renderHorizontalBarChart(rows, top)],
    ["pie_distribution.svg", renderPieChart(rows, top)],
    ["pareto_top.svg", renderParetoChart(rows, top)],
    ["bar_by_severity.svg", renderSeverityChart(rows, top)],
  ];

  const written: string[] = [];
  for (const [filename, svg] of charts) {
    if (svg === undefined) {
      continue;
    }
    const path = join(outputDir, filename);
    await writeFile(path, svg, "utf-8");
    written.push(path);
  }
  return written;
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

/**
 * Read chart rows back from a summary CSV written by an earlier run.
 * Rows without a label or with a non-integer count are skipped.
 */
export function parseSummaryCsv(text: string): ChartRow[] {
  const [header, ...records] = parseCsv(text);
  if (!header) {
    return [];
  }

  const columns = header.map((name) => name.trim());
  const labelIndex = columns.includes("label") ? columns.indexOf("label") : columns.indexOf("error_name");
  const countIndex = columns.indexOf("count");
  const severityIndex = columns.indexOf("severity");
  if (labelIndex < 0 || countIndex < 0) {
    return [];
  }

  const rows: ChartRow[] = [];
  for (const record of records) {
    const label = (record[labelIndex] ?? "").trim();
    const count = (record[countIndex] ?? "").trim();
    if (!label || !/^\d+$/.test(count)) {
      continue;
    }

    const row: ChartRow = { label, count: Number(count) };
    const severity = severityIndex >= 0 ? (record[severityIndex] ?? "").trim() : "";
    if (isSeverity(severity)) {
      row.severity = severity;
    }
    rows.push(row);
  }

  return rows.sort(compareSummaryRecords);
}
