import { UploadError } from './errors';
import type { ScheduleImage } from './types';

export const ACCEPTED_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg'] as const;

export type ScheduleUpload = {
  name: string;
  type: string;
  data: Buffer;
};

function mediaTypeOf(name: string, type: string): ScheduleImage['mediaType'] | null {
  const t = type.toLowerCase();
  if (t === 'image/png') return 'image/png';
  if (t === 'image/jpeg' || t === 'image/jpg') return 'image/jpeg';
  // Some browsers send an empty or generic type; fall back to the extension.
  const n = name.toLowerCase();
  if (t === '' || t === 'application/octet-stream') {
    if (n.endsWith('.png')) return 'image/png';
    if (n.endsWith('.jpg') || n.endsWith('.jpeg')) return 'image/jpeg';
  }
  return null;
}

/** PNG/JPEG only, non-empty, at most maxBytes. Throws UploadError. */
export function validateScheduleImage(upload: ScheduleUpload | null, maxBytes: number): ScheduleImage {
  if (!upload) throw new UploadError('UPLOAD_MISSING', 'Choose an image file to upload');
  const mediaType = mediaTypeOf(upload.name, upload.type);
  if (!mediaType) {
    throw new UploadError('UPLOAD_UNSUPPORTED_TYPE', 'Only .png, .jpg and .jpeg images are supported');
  }
  if (upload.data.length === 0) throw new UploadError('UPLOAD_EMPTY', 'File is empty');
  if (upload.data.length > maxBytes) {
    throw new UploadError('UPLOAD_TOO_LARGE', `Image is larger than ${Math.round(maxBytes / (1024 * 1024))} MB`);
  }
  return { data: upload.data, mediaType };
}
