/**
 * Maps the model's structured reply into ScheduleRecord.
 * Reading the image (and its many time formats) is the model's job; this file only
 * checks the shape, normalizes days/times and computes hours.
 */

import { ParseError } from './errors';
import { formatClock, normalizeWeekday, parseClock, parseTimeRange, resolveRange, roundHours, type TimeRange } from './time';
import type { ParseAnomaly, ScheduleAnalysis, ScheduleRecord, ShiftEntry, Weekday } from './types';

const OFF_DAY_RE = /^(off|rest|day off|none|n\/a|x|-+|—)?$/i;

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function str(v: unknown): string {
  return typeof v === 'string' ? v.trim() : '';
}

/** The model wraps JSON in prose more often than not: take first "{" to last "}". */
export function extractJsonObject(text: string): JsonObject {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new ParseError('Could not find JSON in the model response');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (e) {
    throw new ParseError(`Model response is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, {
      cause: e,
    });
  }
  if (!isObject(parsed)) throw new ParseError('Model response JSON is not an object');
  return parsed;
}

function readRange(item: JsonObject): TimeRange | 'off' | null {
  const start = str(item.start);
  const end = str(item.end);
  if (start || end) {
    if (OFF_DAY_RE.test(start) && OFF_DAY_RE.test(end)) return 'off';
    const s = parseClock(start);
    const e = parseClock(end);
    return s && e ? resolveRange(s, e) : null;
  }
  const hours = str(item.hours) || str(item.time) || str(item.shift);
  if (OFF_DAY_RE.test(hours)) return 'off';
  return parseTimeRange(hours);
}

export type ScheduleBuildOptions = {
  createdAt: string;
  summary?: string;
};

/** Build a record from an already-decoded extraction object. Throws ParseError. */
export function scheduleFromExtraction(raw: unknown, options: ScheduleBuildOptions): ScheduleRecord {
  if (!isObject(raw)) throw new ParseError('Schedule data is not an object');

  const employeeName = str(raw.employee_name) || str(raw.employeeName);
  if (!employeeName) throw new ParseError('Could not find employee name in schedule');

  const items = Array.isArray(raw.schedule) ? raw.schedule : Array.isArray(raw.entries) ? raw.entries : null;
  if (!items) throw new ParseError('No schedule entries found');

  const entries: ShiftEntry[] = [];
  const anomalies: ParseAnomaly[] = [];
  const seen = new Set<Weekday>();
  let totalMinutes = 0;

  for (const item of items) {
    if (!isObject(item)) continue;
    const day = normalizeWeekday(item.day);
    if (!day) {
      anomalies.push({ day: null, code: 'UNKNOWN_DAY', message: `Unrecognized day "${String(item.day ?? '')}"` });
      continue;
    }
    const range = readRange(item);
    if (range === 'off') continue;
    if (!range) {
      anomalies.push({ day, code: 'UNPARSED_TIME', message: `Could not read shift time for ${day}` });
      continue;
    }
    if (seen.has(day)) {
      anomalies.push({ day, code: 'DUPLICATE_DAY', message: `${day} appears more than once` });
    }
    seen.add(day);

    const minutes = range.end - range.start;
    if (minutes < 0) {
      anomalies.push({
        day,
        code: 'NEGATIVE_DURATION',
        message: `${day} ends (${formatClock(range.end)}) before it starts (${formatClock(range.start)}); counted as 0 hours`,
      });
    }
    const worked = Math.max(0, minutes);
    totalMinutes += worked;
    const location = str(item.location);
    entries.push({
      day,
      start: formatClock(range.start),
      end: formatClock(range.end),
      ...(location ? { location } : {}),
      hours: roundHours(worked / 60),
    });
  }

  if (entries.length === 0) throw new ParseError('No schedule entries found');

  return {
    employeeName,
    entries,
    // Summed in minutes so per-entry rounding does not drift the total.
    totalHours: roundHours(totalMinutes / 60),
    summary: options.summary ?? '',
    createdAt: options.createdAt,
    anomalies,
  };
}

/** Parse the extraction reply. Throws ParseError when it cannot be mapped. */
export function parseScheduleOrThrow(rawAiText: string, options: ScheduleBuildOptions): ScheduleRecord {
  return scheduleFromExtraction(extractJsonObject(rawAiText), options);
}

function readNumber(v: unknown): number | null {
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Parse the analysis reply: { total_hours, summary }. */
export function parseAnalysisOrThrow(rawAiText: string): ScheduleAnalysis {
  const obj = extractJsonObject(rawAiText);
  const summary = str(obj.summary);
  if (!summary) throw new ParseError('Analysis response has no summary');
  return { totalHours: readNumber(obj.total_hours ?? obj.totalHours), summary };
}
