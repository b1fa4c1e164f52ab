/**
 * Archive export for administrators: one workbook per employee.
 * Sheets: Schedule (one row per shift), Weeks (one row per stored record).
 */

import * as XLSX from 'xlsx';
import type { ScheduleRecord } from './types';

export const SCHEDULE_SHEET = 'Schedule';
export const WEEKS_SHEET = 'Weeks';

export const SCHEDULE_HEADER = ['Processed At', 'Day', 'Start', 'End', 'Hours', 'Location'];
export const WEEKS_HEADER = ['Processed At', 'Days', 'Total Hours', 'Summary', 'Anomalies'];

export function scheduleRows(records: readonly ScheduleRecord[]): (string | number)[][] {
  const aoa: (string | number)[][] = [SCHEDULE_HEADER];
  for (const r of records) {
    for (const e of r.entries) {
      aoa.push([r.createdAt, e.day, e.start, e.end, e.hours, e.location ?? '']);
    }
  }
  return aoa;
}

export function weekRows(records: readonly ScheduleRecord[]): (string | number)[][] {
  const aoa: (string | number)[][] = [WEEKS_HEADER];
  for (const r of records) {
    aoa.push([
      r.createdAt,
      r.entries.map((e) => e.day).join(', '),
      r.totalHours,
      r.summary,
      r.anomalies.map((a) => a.message).join('; '),
    ]);
  }
  return aoa;
}

export function buildArchiveWorkbook(records: readonly ScheduleRecord[]): Buffer {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(scheduleRows(records)), SCHEDULE_SHEET);
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(weekRows(records)), WEEKS_SHEET);
  const out: unknown = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('xlsx did not return a buffer');
  return out;
}

export function exportFileName(sanitizedEmployee: string): string {
  return `${sanitizedEmployee}_schedules.xlsx`;
}
