const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function getISODate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function isValidDateStr(str: string): boolean {
  const m = DATE_RE.exec(str);
  if (!m) return false;
  const d = new Date(`${str}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && getISODate(d) === str;
}

/** Parses YYYY-MM-DD as midnight UTC. */
export function parseDateYMD(str: string): Date {
  if (!isValidDateStr(str)) {
    throw new Error(`Invalid date "${str}", expected YYYY-MM-DD`);
  }
  return new Date(`${str}T00:00:00Z`);
}

export function addDays(d: Date, n: number): Date {
  const copy = new Date(d);
  copy.setUTCDate(copy.getUTCDate() + n);
  return copy;
}

/** "2024-06-12" -> "2024-06" */
export function monthKey(date: string): string {
  return date.slice(0, 7);
}

/** Inclusive list of dates between two YYYY-MM-DD strings. */
export function dateRange(startDate: string, endDate: string): string[] {
  const end = parseDateYMD(endDate);
  const dates: string[] = [];
  for (let current = parseDateYMD(startDate); current <= end; current = addDays(current, 1)) {
    dates.push(getISODate(current));
  }
  return dates;
}
