const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Epoch milliseconds of a feed/sheet date string, or null when unparseable.
 * Dates without a zone are read as UTC.
 */
export function parsePublished(value: string | null | undefined): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  const dateOnly = /^\d{4}-\d{2}-\d{2}$/.test(trimmed);
  const direct = Date.parse(dateOnly ? `${trimmed}T00:00:00Z` : trimmed);
  if (!Number.isNaN(direct)) return direct;

  const isoDay = trimmed.match(/^(\d{4}-\d{2}-\d{2})/);
  if (isoDay) {
    const day = Date.parse(`${isoDay[1]}T00:00:00Z`);
    if (!Number.isNaN(day)) return day;
  }
  return null;
}

export function isWithinDays(timestampMs: number | null, days: number, nowMs: number): boolean {
  if (timestampMs === null) return false;
  return nowMs - timestampMs <= days * DAY_MS;
}

/**
 * Compact UTC stamp, e.g. 20240502T101500Z
 */
export function utcStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
}
