// ============================================
// CAPITOL - Calendar Helpers
// ============================================

import type { SimDate } from '../models/types.js';

export const MONTHS_PER_YEAR = 12;

export function nextMonth(date: SimDate): SimDate {
  return date.month === MONTHS_PER_YEAR
    ? { year: date.year + 1, month: 1 }
    : { year: date.year, month: date.month + 1 };
}

/** Whole months from `from` to `to`; negative when `to` is earlier */
export function monthsBetween(from: SimDate, to: SimDate): number {
  return (to.year - from.year) * MONTHS_PER_YEAR + (to.month - from.month);
}

export function formatDate(date: SimDate): string {
  return `${date.year}-${String(date.month).padStart(2, '0')}`;
}
