/**
 * Date helpers, all in UTC.
 * Stays are counted in nights: UTC calendar days between check-in and check-out.
 */

const DAY_MS = 86_400_000;

function pad2(n: number) {
  return n < 10 ? `0${n}` : String(n);
}

export function toUtcMidnight(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Day bucket (UTC): "YYYY-MM-DD" */
export function dayBucket(d: Date): string {
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
}

/** Whole nights between two dates; 0 or negative when check-out is not after check-in. */
export function nightsBetween(checkIn: Date, checkOut: Date): number {
  return Math.round((toUtcMidnight(checkOut).getTime() - toUtcMidnight(checkIn).getTime()) / DAY_MS);
}
