export interface PageRange {
  start: number;
  end: number;
}

const PAGE_RANGE = /^(\d+)(?:\s*[-–]\s*(\d+))?$/;

/**
 * Read a page reference such as "12", "12-14" or "12–14".
 * Returns null for anything else (free text, reversed ranges, page 0).
 */
export function parsePageRef(text: string | null): PageRange | null {
  if (text === null) return null;
  const match = PAGE_RANGE.exec(text.trim());
  if (!match) return null;
  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);
  if (start < 1 || end < start) return null;
  return { start, end };
}

/** "p. 12", "pp. 12-14", the raw text when it is not a page range, or "". */
export function formatPageRef(text: string | null): string {
  const range = parsePageRef(text);
  if (!range) return text?.trim() ?? "";
  return range.start === range.end
    ? `p. ${range.start}`
    : `pp. ${range.start}-${range.end}`;
}
