/**
 * Clock and weekday parsing for shift text as the model transcribes it.
 * Accepts "9", "9:00", "09:00", "9am", "9:00 AM", "9.30pm", "17:30", "noon", "midnight".
 * Ranges: "9-5", "9:00 AM to 5:00 PM", "09:00 – 17:30", "9am until 1pm".
 */

import type { Weekday } from './types';

const FULL_DAY_NAMES: Record<string, Weekday> = {
  monday: 'Mon',
  tuesday: 'Tue',
  wednesday: 'Wed',
  thursday: 'Thu',
  friday: 'Fri',
  saturday: 'Sat',
  sunday: 'Sun',
};

const DAY_ALIASES: Record<string, Weekday> = {
  weds: 'Wed',
  thur: 'Thu',
  thurs: 'Thu',
  tues: 'Tue',
};

export type ClockTime = {
  minutes: number; // 0..1440 ("24:00" closes the day)
  hasMeridiem: boolean;
  bare: boolean; // "9", "12": no minutes, no meridiem, no leading zero
};

export type TimeRange = {
  start: number;
  end: number;
};

const CLOCK_RE = /^(\d{1,2})(?:\s*[:.]\s*(\d{2}))?\s*(a\.?m\.?|p\.?m\.?)?$/i;
const RANGE_SPLIT_RE = /\s*(?:-|–|—|\bto\b|\buntil\b|\btill\b)\s*/i;

/** "Monday", "mon", "MON.", "Thurs 10/14" → "Mon"/"Thu"; null if not a weekday. */
export function normalizeWeekday(raw: unknown): Weekday | null {
  if (typeof raw !== 'string') return null;
  const word = raw.trim().toLowerCase().match(/[a-z]+/)?.[0];
  if (!word || word.length < 3) return null;
  if (DAY_ALIASES[word]) return DAY_ALIASES[word];
  for (const [full, label] of Object.entries(FULL_DAY_NAMES)) {
    if (full.startsWith(word)) return label;
  }
  return null;
}

export function parseClock(raw: string): ClockTime | null {
  const v = raw.trim().toLowerCase();
  if (v === 'noon') return { minutes: 12 * 60, hasMeridiem: true, bare: false };
  if (v === 'midnight') return { minutes: 0, hasMeridiem: true, bare: false };

  const m = v.match(CLOCK_RE);
  if (!m) return null;
  let hh = Number(m[1]);
  const mm = m[2] != null ? Number(m[2]) : 0;
  const ap = m[3]?.replace(/\./g, '');
  if (mm > 59) return null;

  if (ap) {
    if (hh < 1 || hh > 12) return null;
    if (ap === 'am') {
      if (hh === 12) hh = 0;
    } else if (hh !== 12) {
      hh += 12;
    }
    return { minutes: hh * 60 + mm, hasMeridiem: true, bare: false };
  }

  if (hh > 24 || (hh === 24 && mm > 0)) return null;
  const bare = m[2] == null && !m[1].startsWith('0') && hh >= 1 && hh <= 12;
  return { minutes: hh * 60 + mm, hasMeridiem: false, bare };
}

/**
 * Parse "start - end". Bare hours are read so that a day shift ends after it starts:
 * "9-5" → 09:00-17:00, "1-9pm" → 13:00-21:00. Clock times ("02:00", "5:30") are taken
 * as written, so "10:00-02:00" still ends before it starts; the caller decides what a
 * negative duration means.
 */
export function parseTimeRange(raw: string): TimeRange | null {
  const parts = raw.trim().split(RANGE_SPLIT_RE).filter((p) => p.length > 0);
  if (parts.length !== 2) return null;
  const start = parseClock(parts[0]);
  const end = parseClock(parts[1]);
  if (!start || !end) return null;
  return resolveRange(start, end);
}

export function resolveRange(start: ClockTime, end: ClockTime): TimeRange {
  let s = start.minutes;
  let e = end.minutes;
  if (end.bare && e <= s && e < 12 * 60 && e + 12 * 60 > s) e += 12 * 60;
  if (start.bare && end.hasMeridiem && s < 12 * 60 && s + 12 * 60 <= e) s += 12 * 60;
  return { start: s, end: e };
}

export function formatClock(minutes: number): string {
  if (minutes === 24 * 60) return '24:00';
  const h = Math.floor(minutes / 60) % 24;
  const m = minutes % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

export function roundHours(hours: number): number {
  return Math.round(hours * 100) / 100;
}
