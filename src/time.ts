/** First day the APOD archive has an entry for. */
export const APOD_FIRST_DATE = '1995-06-16';

const YMD_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function utcYMD(d: Date): string {
  const y = d.getUTCFullYear();
  const m = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${dd}`;
}

/** True for a real calendar day written as YYYY-MM-DD (rejects 2023-02-30). */
export function isCalendarDate(value: string): boolean {
  const match = YMD_RE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return utcYMD(parsed) === value;
}
