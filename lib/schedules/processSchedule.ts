/**
 * Upload flow: validate image → extract (model) → parse → duplicate check → analyze (model) → save.
 * Linear, no retries. Every ScheduleError ends here as a user-facing outcome.
 */

import type { ScannerConfig } from './config';
import { findDuplicateWeek } from './duplicates';
import { DuplicateWeekError, ScheduleError, type ScheduleErrorCode } from './errors';
import type { ScheduleModelClient } from './modelClient';
import { extractJsonObject, parseAnalysisOrThrow, scheduleFromExtraction } from './parse';
import type { ScheduleArchive } from './storage';
import type { SavedSchedule, ScheduleAnalysis, ScheduleRecord } from './types';
import { validateScheduleImage, type ScheduleUpload } from './upload';

export type ProcessDeps = {
  config: Pick<ScannerConfig, 'maxUploadBytes'>;
  client: ScheduleModelClient;
  archive: ScheduleArchive;
  now?: () => Date;
};

export type ProcessOutcome =
  | { status: 'saved'; record: ScheduleRecord; analysis: ScheduleAnalysis; saved: SavedSchedule }
  | { status: 'duplicate'; employeeName: string; existing: ScheduleRecord; message: string }
  | { status: 'failed'; code: ScheduleErrorCode | 'INTERNAL'; message: string };

export async function processScheduleUpload(
  upload: ScheduleUpload | null,
  deps: ProcessDeps
): Promise<ProcessOutcome> {
  const now = deps.now ?? (() => new Date());
  try {
    const image = validateScheduleImage(upload, deps.config.maxUploadBytes);

    const extraction = await deps.client.extractSchedule(image);
    const rawSchedule = extractJsonObject(extraction);
    const parsed = scheduleFromExtraction(rawSchedule, { createdAt: now().toISOString() });
    if (parsed.anomalies.length > 0) {
      console.warn('[schedules] Parse anomalies', parsed.employeeName, parsed.anomalies.map((a) => a.code));
    }

    const history = await deps.archive.loadHistory(parsed.employeeName);
    const existing = findDuplicateWeek(parsed, history);
    if (existing) throw new DuplicateWeekError(existing);

    const analysis = parseAnalysisOrThrow(
      await deps.client.analyzeSchedule({ employee_name: parsed.employeeName, schedule: parsed.entries })
    );
    if (analysis.totalHours != null && Math.abs(analysis.totalHours - parsed.totalHours) > 0.01) {
      console.info('[schedules] Model total differs from computed total', {
        employee: parsed.employeeName,
        model: analysis.totalHours,
        computed: parsed.totalHours,
      });
    }

    const record: ScheduleRecord = { ...parsed, summary: analysis.summary };
    const saved = await deps.archive.append(record.employeeName, record, { rawSchedule, analysis });
    console.info('[schedules] Saved', { employee: record.employeeName, file: saved.relativePath, totalHours: record.totalHours });
    return { status: 'saved', record, analysis, saved };
  } catch (e) {
    if (e instanceof DuplicateWeekError) {
      console.info('[schedules] Duplicate week rejected', e.existing.employeeName, e.existing.createdAt);
      return { status: 'duplicate', employeeName: e.existing.employeeName, existing: e.existing, message: e.message };
    }
    if (e instanceof ScheduleError) {
      console.warn('[schedules]', e.code, e.message);
      return { status: 'failed', code: e.code, message: e.message };
    }
    console.error('[schedules] Unexpected error', e);
    return { status: 'failed', code: 'INTERNAL', message: 'Unexpected error while processing the schedule' };
  }
}
