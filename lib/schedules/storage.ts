/**
 * Filesystem archive for processed schedules.
 * Path: {storageRoot}/{sanitized}/{sanitized}_schedule_{YYYYMMDD_HHMMSS}[_N].json
 * One record per file. Files are created exclusively and never overwritten.
 */

import { mkdir, readdir, readFile, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { ParseError, StorageError } from './errors';
import { scheduleFromExtraction } from './parse';
import {
  WEEKDAYS,
  type ParseAnomaly,
  type SavedSchedule,
  type ScheduleAnalysis,
  type ScheduleRecord,
  type ShiftEntry,
  type StoredScheduleFile,
  type Weekday,
} from './types';

export interface ScheduleArchive {
  loadHistory(employee: string): Promise<ScheduleRecord[]>;
  append(
    employee: string,
    record: ScheduleRecord,
    details?: { rawSchedule?: unknown; analysis?: ScheduleAnalysis }
  ): Promise<SavedSchedule>;
}

/** Same-second writes get _2, _3, ... up to this many files. */
const MAX_FILES_PER_SECOND = 100;

const FILE_NAME_RE = /_schedule_(\d{8}_\d{6})(?:_(\d+))?\.json$/i;

export function sanitizeEmployeeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

/** Local time as YYYYMMDD_HHMMSS. */
export function fileTimestamp(d: Date): string {
  const y = d.getFullYear();
  const mo = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  const hh = String(d.getHours()).padStart(2, '0');
  const mm = String(d.getMinutes()).padStart(2, '0');
  const ss = String(d.getSeconds()).padStart(2, '0');
  return `${y}${mo}${day}_${hh}${mm}${ss}`;
}

export function parseFileTimestamp(stamp: string): Date | null {
  const m = stamp.match(/^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/);
  if (!m) return null;
  const [, y, mo, d, hh, mm, ss] = m.map(Number);
  const date = new Date(y, mo - 1, d, hh, mm, ss);
  return Number.isNaN(date.getTime()) ? null : date;
}

function archiveSortKey(fileName: string): [string, number] {
  const m = fileName.match(FILE_NAME_RE);
  if (!m) return ['99999999_999999', 0];
  return [m[1], m[2] ? Number(m[2]) : 1];
}

/** Ascending by filename timestamp, then by same-second suffix. */
export function compareArchiveFileNames(a: string, b: string): number {
  const [ta, na] = archiveSortKey(a);
  const [tb, nb] = archiveSortKey(b);
  if (ta !== tb) return ta < tb ? -1 : 1;
  if (na !== nb) return na - nb;
  return a < b ? -1 : a > b ? 1 : 0;
}

function errnoCode(e: unknown): string | undefined {
  const err = e as NodeJS.ErrnoException;
  return typeof err?.code === 'string' ? err.code : undefined;
}

function describeFsError(action: string, e: unknown): string {
  const code = errnoCode(e);
  if (code === 'EACCES' || code === 'EPERM') return `${action}: permission denied`;
  if (code === 'ENOSPC') return `${action}: disk is full`;
  return `${action}: ${e instanceof Error ? e.message : String(e)}`;
}

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isWeekday(v: unknown): v is Weekday {
  return WEEKDAYS.some((d) => d === v);
}

function readEntry(v: unknown): ShiftEntry | null {
  if (!isObject(v)) return null;
  const { day, start, end, location, hours } = v;
  if (!isWeekday(day) || typeof start !== 'string' || typeof end !== 'string' || typeof hours !== 'number') {
    return null;
  }
  return { day, start, end, ...(typeof location === 'string' ? { location } : {}), hours };
}

function readAnomaly(v: unknown): ParseAnomaly | null {
  if (!isObject(v)) return null;
  const { day, code, message } = v;
  if (typeof message !== 'string') return null;
  if (code !== 'NEGATIVE_DURATION' && code !== 'UNPARSED_TIME' && code !== 'UNKNOWN_DAY' && code !== 'DUPLICATE_DAY') {
    return null;
  }
  return { day: isWeekday(day) ? day : null, code, message };
}

function readRecord(v: unknown): ScheduleRecord | null {
  if (!isObject(v)) return null;
  const { employeeName, entries, totalHours, summary, createdAt, anomalies } = v;
  if (typeof employeeName !== 'string' || typeof totalHours !== 'number') return null;
  if (typeof summary !== 'string' || typeof createdAt !== 'string' || !Array.isArray(entries)) return null;
  const parsedEntries = entries.map(readEntry);
  const validEntries = parsedEntries.filter((e): e is ShiftEntry => e !== null);
  if (validEntries.length !== parsedEntries.length) return null;
  const validAnomalies = Array.isArray(anomalies)
    ? anomalies.map(readAnomaly).filter((a): a is ParseAnomaly => a !== null)
    : [];
  return { employeeName, entries: validEntries, totalHours, summary, createdAt, anomalies: validAnomalies };
}

/** Files written by the earlier scanner: { raw_schedule, analysis, processed_at }. */
function readLegacyRecord(data: JsonObject): ScheduleRecord | null {
  const { raw_schedule: rawSchedule, processed_at: processedAt, analysis } = data;
  if (!isObject(rawSchedule)) return null;
  const stamp = typeof processedAt === 'string' ? parseFileTimestamp(processedAt) : null;
  const legacySummary = isObject(analysis) ? analysis.summary : undefined;
  const summary = typeof legacySummary === 'string' ? legacySummary : '';
  try {
    return scheduleFromExtraction(rawSchedule, {
      createdAt: (stamp ?? new Date(0)).toISOString(),
      summary,
    });
  } catch (e) {
    if (e instanceof ParseError) return null;
    throw e;
  }
}

export function recordFromStoredJson(data: unknown): ScheduleRecord | null {
  if (!isObject(data)) return null;
  if ('record' in data) return readRecord(data.record);
  return readLegacyRecord(data);
}

/** Drops whatever a failed write left on disk. */
async function removePartialFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (e) {
    if (errnoCode(e) !== 'ENOENT') {
      console.warn('[schedules/storage] Could not remove partial file', filePath, e instanceof Error ? e.message : e);
    }
  }
}

export function createFileScheduleArchive(
  storageRoot: string,
  options: { now?: () => Date; cwd?: string } = {}
): ScheduleArchive {
  const now = options.now ?? (() => new Date());
  const cwd = options.cwd ?? process.cwd();

  function employeeDir(employee: string): { safe: string; dir: string } {
    const safe = sanitizeEmployeeName(employee);
    if (!safe) throw new StorageError(`Employee name "${employee}" has no usable characters for a folder name`);
    return { safe, dir: path.join(storageRoot, safe) };
  }

  async function loadHistory(employee: string): Promise<ScheduleRecord[]> {
    const { dir } = employeeDir(employee);
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return [];
      throw new StorageError(describeFsError(`Could not read ${dir}`, e), { cause: e });
    }

    const files = names.filter((n) => n.toLowerCase().endsWith('.json')).sort(compareArchiveFileNames);
    const records: ScheduleRecord[] = [];
    for (const fileName of files) {
      const filePath = path.join(dir, fileName);
      let raw: string;
      try {
        raw = await readFile(filePath, 'utf8');
      } catch (e) {
        throw new StorageError(describeFsError(`Could not read ${filePath}`, e), { cause: e });
      }
      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch (e) {
        console.warn('[schedules/storage] Skipping unreadable JSON', filePath, e instanceof Error ? e.message : e);
        continue;
      }
      const record = recordFromStoredJson(data);
      if (!record) {
        console.warn('[schedules/storage] Skipping file that is not a schedule record', filePath);
        continue;
      }
      records.push(record);
    }
    return records;
  }

  async function append(
    employee: string,
    record: ScheduleRecord,
    details: { rawSchedule?: unknown; analysis?: ScheduleAnalysis } = {}
  ): Promise<SavedSchedule> {
    const { safe, dir } = employeeDir(employee);
    try {
      await mkdir(dir, { recursive: true });
    } catch (e) {
      throw new StorageError(describeFsError(`Could not create ${dir}`, e), { cause: e });
    }

    const processedAt = fileTimestamp(now());
    const stored: StoredScheduleFile = {
      record,
      rawSchedule: details.rawSchedule ?? null,
      analysis: details.analysis ?? { totalHours: null, summary: record.summary },
      processedAt,
    };
    const body = JSON.stringify(stored, null, 2);

    for (let n = 1; n <= MAX_FILES_PER_SECOND; n++) {
      const fileName = `${safe}_schedule_${processedAt}${n === 1 ? '' : `_${n}`}.json`;
      const absolutePath = path.join(dir, fileName);
      try {
        await writeFile(absolutePath, body, { encoding: 'utf8', flag: 'wx' });
      } catch (e) {
        if (errnoCode(e) === 'EEXIST') continue;
        await removePartialFile(absolutePath);
        throw new StorageError(describeFsError(`Could not save ${fileName}`, e), { cause: e });
      }
      return {
        fileName,
        absolutePath,
        relativePath: path.relative(cwd, absolutePath).split(path.sep).join('/'),
      };
    }
    throw new StorageError(`Could not save schedule: ${MAX_FILES_PER_SECOND} files already written at ${processedAt}`);
  }

  return { loadHistory, append };
}
