/**
 * Schedule scanner domain types.
 * One ScheduleRecord = one uploaded week for one employee.
 */

export const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type ShiftEntry = {
  day: Weekday;
  start: string; // "09:00"
  end: string; // "17:30"
  location?: string;
  hours: number;
};

export type ParseAnomalyCode = 'NEGATIVE_DURATION' | 'UNPARSED_TIME' | 'UNKNOWN_DAY' | 'DUPLICATE_DAY';

export type ParseAnomaly = {
  day: Weekday | null;
  code: ParseAnomalyCode;
  message: string;
};

export type ScheduleRecord = {
  employeeName: string;
  entries: ShiftEntry[];
  totalHours: number;
  summary: string;
  createdAt: string; // ISO
  anomalies: ParseAnomaly[];
};

export type ScheduleAnalysis = {
  /** Model's own total; null when it did not give a number. */
  totalHours: number | null;
  summary: string;
};

/** On-disk shape of one archive file. */
export type StoredScheduleFile = {
  record: ScheduleRecord;
  rawSchedule: unknown;
  analysis: ScheduleAnalysis;
  processedAt: string; // YYYYMMDD_HHMMSS
};

export type SavedSchedule = {
  fileName: string;
  relativePath: string; // from the working directory, '/'-separated
  absolutePath: string;
};

export type ScheduleImage = {
  data: Buffer;
  mediaType: 'image/png' | 'image/jpeg';
};
