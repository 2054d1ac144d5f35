/**
 * Entity map for markup escaping
 */
const MARKUP_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

/**
 * Escape text for inclusion in HTML or SVG markup
 */
export function escapeMarkup(input: string): string {
  return input.replace(/[&<>"']/g, (char) => MARKUP_ENTITIES[char] ?? char);
}

/**
 * Escape a value for a Markdown table cell
 */
export function escapeMarkdownCell(input: string): string {
  return input.replace(/\\/g, "\\\\").replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

/**
 * Validate that an uploaded filename is safe (no path traversal)
 * @returns true if the filename is safe
 */
export function isValidFilename(filename: string): boolean {
  // Reject empty filenames
  if (!filename || filename.trim() === "") {
    return false;
  }

  // Reject path traversal attempts
  if (filename.includes("..") || filename.includes("/") || filename.includes("\\")) {
    return false;
  }

  // Reject hidden files
  if (filename.startsWith(".")) {
    return false;
  }

  const allowedExtensions = [".log", ".txt"];
  const dot = filename.lastIndexOf(".");
  if (dot < 0) {
    return false;
  }
  return allowedExtensions.includes(filename.toLowerCase().substring(dot));
}

/**
 * Truncate content to a maximum length with ellipsis
 */
export function truncate(content: string, maxLength: number): string {
  if (content.length <= maxLength) {
    return content;
  }
  return content.substring(0, maxLength - 3) + "...";
}
