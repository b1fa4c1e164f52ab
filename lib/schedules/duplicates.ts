/**
 * Week identity by weekday overlap: two records are the same week when they share
 * at least MIN_SHARED_WEEKDAYS day labels. Dates are not compared.
 */

import type { ScheduleRecord, Weekday } from './types';

export const MIN_SHARED_WEEKDAYS = 5;

export function weekdaysOf(record: ScheduleRecord): Set<Weekday> {
  return new Set(record.entries.map((e) => e.day));
}

export function sharedWeekdays(a: ScheduleRecord, b: ScheduleRecord): Weekday[] {
  const other = weekdaysOf(b);
  return Array.from(weekdaysOf(a)).filter((d) => other.has(d));
}

/** First stored record that counts as the same week, or null. */
export function findDuplicateWeek(
  candidate: ScheduleRecord,
  history: readonly ScheduleRecord[]
): ScheduleRecord | null {
  if (candidate.entries.length === 0) return null;
  for (const existing of history) {
    if (sharedWeekdays(candidate, existing).length >= MIN_SHARED_WEEKDAYS) return existing;
  }
  return null;
}

export function isDuplicateWeek(candidate: ScheduleRecord, history: readonly ScheduleRecord[]): boolean {
  return findDuplicateWeek(candidate, history) !== null;
}
