/**
 * POST /api/schedules
 * Multipart: file (.png/.jpg/.jpeg). Scans the schedule, rejects a week already on file,
 * saves the record under the employee's folder.
 * 201 saved · 409 duplicate week · 4xx/5xx failed (body carries code + message).
 */

import { NextRequest, NextResponse } from 'next/server';
import { ConfigError, scheduleErrorStatus } from '@/lib/schedules/errors';
import { processScheduleUpload, type ProcessDeps } from '@/lib/schedules/processSchedule';
import { getScheduleDeps } from '@/lib/schedules/server';
import type { ScheduleUpload } from '@/lib/schedules/upload';

export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  let deps: ProcessDeps;
  try {
    deps = getScheduleDeps();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error('[schedules]', e.message);
      return NextResponse.json({ status: 'failed', code: e.code, message: 'Scanner is not configured' }, { status: 500 });
    }
    throw e;
  }

  let upload: ScheduleUpload | null = null;
  try {
    const formData = await request.formData();
    const file = formData.get('file');
    if (file instanceof Blob) {
      upload = {
        name: file instanceof File ? file.name : '',
        type: file.type,
        data: Buffer.from(await file.arrayBuffer()),
      };
    }
  } catch {
    return NextResponse.json(
      { status: 'failed', code: 'UPLOAD_MISSING', message: 'Invalid form data' },
      { status: 400 }
    );
  }

  const outcome = await processScheduleUpload(upload, deps);
  if (outcome.status === 'saved') return NextResponse.json(outcome, { status: 201 });
  if (outcome.status === 'duplicate') return NextResponse.json(outcome, { status: 409 });
  return NextResponse.json(outcome, { status: scheduleErrorStatus(outcome.code) });
}
