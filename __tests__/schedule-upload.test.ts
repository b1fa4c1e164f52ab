/**
 * Upload checks and the code → HTTP status table the routes answer with.
 */

import { scheduleErrorStatus, UploadError } from '@/lib/schedules/errors';
import { validateScheduleImage } from '@/lib/schedules/upload';

const ONE_MB = 1024 * 1024;
const pixels = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

describe('validateScheduleImage', () => {
  it('accepts PNG and JPEG by content type', () => {
    expect(validateScheduleImage({ name: 'week.png', type: 'image/png', data: pixels }, ONE_MB)).toEqual({
      data: pixels,
      mediaType: 'image/png',
    });
    expect(validateScheduleImage({ name: 'week.jpeg', type: 'image/jpeg', data: pixels }, ONE_MB).mediaType).toBe(
      'image/jpeg'
    );
  });

  it('treats image/jpg as JPEG', () => {
    expect(validateScheduleImage({ name: 'week.jpg', type: 'image/jpg', data: pixels }, ONE_MB).mediaType).toBe(
      'image/jpeg'
    );
  });

  it('falls back to the extension when the browser sends no useful type', () => {
    expect(validateScheduleImage({ name: 'Week.PNG', type: '', data: pixels }, ONE_MB).mediaType).toBe('image/png');
    expect(
      validateScheduleImage({ name: 'week.jpeg', type: 'application/octet-stream', data: pixels }, ONE_MB).mediaType
    ).toBe('image/jpeg');
  });

  it('rejects other types even with an image extension', () => {
    expect(() => validateScheduleImage({ name: 'week.png', type: 'image/gif', data: pixels }, ONE_MB)).toThrow(
      new UploadError('UPLOAD_UNSUPPORTED_TYPE', 'Only .png, .jpg and .jpeg images are supported')
    );
    expect(() => validateScheduleImage({ name: 'week.txt', type: '', data: pixels }, ONE_MB)).toThrow(UploadError);
  });

  it('rejects a missing upload', () => {
    expect(() => validateScheduleImage(null, ONE_MB)).toThrow(
      new UploadError('UPLOAD_MISSING', 'Choose an image file to upload')
    );
  });

  it('rejects an empty file', () => {
    let caught: unknown;
    try {
      validateScheduleImage({ name: 'week.png', type: 'image/png', data: Buffer.alloc(0) }, ONE_MB);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UploadError);
    expect(caught).toMatchObject({ code: 'UPLOAD_EMPTY', message: 'File is empty' });
  });

  it('rejects a file over the limit and accepts one at it', () => {
    expect(() =>
      validateScheduleImage({ name: 'week.png', type: 'image/png', data: Buffer.alloc(ONE_MB + 1) }, ONE_MB)
    ).toThrow(new UploadError('UPLOAD_TOO_LARGE', 'Image is larger than 1 MB'));
    expect(
      validateScheduleImage({ name: 'week.png', type: 'image/png', data: Buffer.alloc(ONE_MB) }, ONE_MB).mediaType
    ).toBe('image/png');
  });
});

describe('scheduleErrorStatus', () => {
  it('maps each error code to its HTTP status', () => {
    expect(scheduleErrorStatus('UPLOAD_MISSING')).toBe(400);
    expect(scheduleErrorStatus('UPLOAD_EMPTY')).toBe(400);
    expect(scheduleErrorStatus('UPLOAD_UNSUPPORTED_TYPE')).toBe(415);
    expect(scheduleErrorStatus('UPLOAD_TOO_LARGE')).toBe(413);
    expect(scheduleErrorStatus('EXTERNAL_SERVICE_ERROR')).toBe(502);
    expect(scheduleErrorStatus('PARSE_ERROR')).toBe(422);
    expect(scheduleErrorStatus('DUPLICATE_WEEK')).toBe(409);
    expect(scheduleErrorStatus('STORAGE_ERROR')).toBe(500);
    expect(scheduleErrorStatus('CONFIG_ERROR')).toBe(500);
    expect(scheduleErrorStatus('INTERNAL')).toBe(500);
  });
});
