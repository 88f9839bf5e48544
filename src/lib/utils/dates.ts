/**
 * Calendar-date helpers. Dates are ISO strings (YYYY-MM-DD) in UTC so that
 * lexical order equals chronological order.
 */

const DAY_MS = 86_400_000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseIsoDate(date: string): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

export function addDays(date: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(date).getTime() + days * DAY_MS));
}

function isWeekend(date: string): boolean {
  const weekday = parseIsoDate(date).getUTCDay();
  return weekday === 0 || weekday === 6;
}

/** Step back `count` weekdays from `date`. Exchange holidays count as business days. */
export function subtractBusinessDays(date: string, count: number): string {
  let current = date;
  let remaining = count;
  while (remaining > 0) {
    current = addDays(current, -1);
    if (!isWeekend(current)) remaining--;
  }
  return current;
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseIsoDate(to).getTime() - parseIsoDate(from).getTime()) / DAY_MS);
}

export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(parseIsoDate(value).getTime());
}

export function today(): string {
  return toIsoDate(new Date());
}
