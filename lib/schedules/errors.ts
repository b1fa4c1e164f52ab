/**
 * Error taxonomy for the schedule upload flow.
 * All of these are caught by the orchestrator and surfaced as a user-visible message.
 */

import type { ScheduleRecord } from './types';

export type UploadErrorCode =
  | 'UPLOAD_MISSING'
  | 'UPLOAD_EMPTY'
  | 'UPLOAD_UNSUPPORTED_TYPE'
  | 'UPLOAD_TOO_LARGE';

export type ScheduleErrorCode =
  | UploadErrorCode
  | 'EXTERNAL_SERVICE_ERROR'
  | 'PARSE_ERROR'
  | 'DUPLICATE_WEEK'
  | 'STORAGE_ERROR'
  | 'CONFIG_ERROR';

export class ScheduleError extends Error {
  constructor(
    public readonly code: ScheduleErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ScheduleError';
  }
}

export class UploadError extends ScheduleError {
  constructor(code: UploadErrorCode, message: string) {
    super(code, message);
    this.name = 'UploadError';
  }
}

export class ExternalServiceError extends ScheduleError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('EXTERNAL_SERVICE_ERROR', message, options);
    this.name = 'ExternalServiceError';
  }
}

export class ParseError extends ScheduleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE_ERROR', message, options);
    this.name = 'ParseError';
  }
}

/** Guarded rejection, not a failure: the week is already on file. */
export class DuplicateWeekError extends ScheduleError {
  constructor(public readonly existing: ScheduleRecord) {
    super(
      'DUPLICATE_WEEK',
      'A schedule for this week has already been processed. If you need to update it, please contact your administrator.'
    );
    this.name = 'DuplicateWeekError';
  }
}

export class StorageError extends ScheduleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_ERROR', message, options);
    this.name = 'StorageError';
  }
}

export class ConfigError extends ScheduleError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}

const STATUS_BY_CODE: Record<ScheduleErrorCode | 'INTERNAL', number> = {
  UPLOAD_MISSING: 400,
  UPLOAD_EMPTY: 400,
  UPLOAD_UNSUPPORTED_TYPE: 415,
  UPLOAD_TOO_LARGE: 413,
  EXTERNAL_SERVICE_ERROR: 502,
  PARSE_ERROR: 422,
  DUPLICATE_WEEK: 409,
  STORAGE_ERROR: 500,
  CONFIG_ERROR: 500,
  INTERNAL: 500,
};

export function scheduleErrorStatus(code: ScheduleErrorCode | 'INTERNAL'): number {
  return STATUS_BY_CODE[code];
}
