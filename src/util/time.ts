/**
 * Parse a date string to ISO (UTC). Accepts various formats.
 */
export function toISOString(dateStr: string | Date | null | undefined): string | null {
  if (!dateStr) return null;
  if (dateStr instanceof Date) {
    if (isNaN(dateStr.getTime())) return null;
    return dateStr.toISOString();
  }
  const d = new Date(dateStr);
  if (isNaN(d.getTime())) return null;
  return d.toISOString();
}

/**
 * Unix timestamps (seconds), as returned by the Reddit, HN and Stack Exchange APIs.
 */
export function fromEpochSeconds(seconds: number | null | undefined): string | null {
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds)) {
    return null;
  }
  return toISOString(new Date(seconds * 1000));
}

/**
 * Get current ISO timestamp (UTC).
 */
export function nowISO(): string {
  return new Date().toISOString();
}
