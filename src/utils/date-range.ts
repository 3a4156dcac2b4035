import type { DateRange } from '../types/stores';

/**
 * Local calendar day containing `now`.
 */
export function dayRange(now: Date): DateRange {
  const from = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const to = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
  return { from, to };
}

/**
 * Local Monday-to-Monday week containing `now`.
 */
export function weekRange(now: Date): DateRange {
  // getDay(): Sunday is 0, counted as the seventh day
  const sinceMonday = (now.getDay() + 6) % 7;
  const from = new Date(now.getFullYear(), now.getMonth(), now.getDate() - sinceMonday);
  const to = new Date(now.getFullYear(), now.getMonth(), now.getDate() - sinceMonday + 7);
  return { from, to };
}
