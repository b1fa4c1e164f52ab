'use client';

import { useCallback, useEffect, useState } from 'react';
import { Button } from '@/components/ui/Button';
import { Card } from '@/components/ui/Card';
import { Notice } from '@/components/ui/Notice';
import { ShiftTable } from '@/components/scanner/ShiftTable';
import type { ProcessOutcome } from '@/lib/schedules/processSchedule';
import { ACCEPTED_IMAGE_EXTENSIONS } from '@/lib/schedules/upload';

type FailedOutcome = Extract<ProcessOutcome, { status: 'failed' }>;

function isOutcome(v: unknown): v is ProcessOutcome {
  if (typeof v !== 'object' || v === null || !('status' in v)) return false;
  return v.status === 'saved' || v.status === 'duplicate' || v.status === 'failed';
}

export function ScheduleScannerClient({ maxUploadMb }: { maxUploadMb: number }) {
  const [file, setFile] = useState<File | null>(null);
  const [previewUrl, setPreviewUrl] = useState<string | null>(null);
  const [processing, setProcessing] = useState(false);
  const [outcome, setOutcome] = useState<ProcessOutcome | null>(null);

  useEffect(() => {
    if (!file) {
      setPreviewUrl(null);
      return;
    }
    const url = URL.createObjectURL(file);
    setPreviewUrl(url);
    return () => URL.revokeObjectURL(url);
  }, [file]);

  const processSchedule = useCallback(async () => {
    if (!file) return;
    setProcessing(true);
    setOutcome(null);
    const form = new FormData();
    form.append('file', file);
    try {
      const res = await fetch('/api/schedules', { method: 'POST', body: form });
      const data: unknown = await res.json().catch(() => null);
      if (isOutcome(data)) {
        setOutcome(data);
      } else {
        const failed: FailedOutcome = {
          status: 'failed',
          code: 'INTERNAL',
          message: res.statusText || 'Failed to process the image. Please try again.',
        };
        setOutcome(failed);
      }
    } catch {
      setOutcome({ status: 'failed', code: 'INTERNAL', message: 'Request failed. Please try again.' });
    }
    setProcessing(false);
  }, [file]);

  return (
    <div className="mx-auto min-w-0 max-w-4xl space-y-6 p-4 md:p-6">
      <header>
        <h1 className="text-lg font-semibold text-slate-900">Employee Schedule Scanner</h1>
        <p className="mt-1 text-sm text-slate-600">
          Upload an image of an employee schedule to extract and process the information.
        </p>
      </header>

      <Card title="Schedule image">
        <div className="flex min-w-0 flex-wrap items-center gap-4">
          <label className="flex min-w-0 cursor-pointer items-center gap-2 rounded-lg border border-slate-300 bg-white px-4 py-2 text-sm font-medium text-slate-700 hover:bg-slate-50">
            <input
              type="file"
              accept={ACCEPTED_IMAGE_EXTENSIONS.join(',')}
              className="sr-only"
              onChange={(e) => {
                setFile(e.target.files?.[0] ?? null);
                setOutcome(null);
              }}
            />
            {file ? file.name : 'Choose an image file'}
          </label>
          <span className="min-w-0 text-[11px] text-slate-500">PNG or JPEG, up to {maxUploadMb} MB.</span>
          <Button onClick={processSchedule} disabled={!file} busy={processing}>
            {processing ? 'Processing image…' : 'Process Schedule'}
          </Button>
        </div>
        {previewUrl && (
          // eslint-disable-next-line @next/next/no-img-element -- local object URL preview
          <img src={previewUrl} alt="Uploaded schedule" className="mt-4 max-h-80 rounded border border-slate-200" />
        )}
      </Card>

      {outcome?.status === 'failed' && <Notice tone="error">{outcome.message}</Notice>}

      {outcome?.status === 'duplicate' && (
        <div className="space-y-3">
          <Notice tone="error">A schedule for this week has already been processed!</Notice>
          <Notice tone="warning">
            If you need to update this week&apos;s schedule, please contact your administrator.
          </Notice>
          <Card title={`Week on file for ${outcome.employeeName}`}>
            <p className="text-[11px] text-slate-500">
              Processed {new Date(outcome.existing.createdAt).toLocaleString(undefined, { dateStyle: 'short', timeStyle: 'short' })}
              {' · '}
              {outcome.existing.totalHours} hrs
            </p>
            {outcome.existing.summary && <p className="mt-2 text-sm text-slate-700">{outcome.existing.summary}</p>}
          </Card>
        </div>
      )}

      {outcome?.status === 'saved' && (
        <div className="space-y-4">
          <Card title={`Schedule table · ${outcome.record.employeeName}`}>
            <ShiftTable entries={outcome.record.entries} />
            {outcome.record.anomalies.length > 0 && (
              <ul className="mt-3 list-disc space-y-0.5 ps-5 text-[11px] text-amber-800">
                {outcome.record.anomalies.map((a, i) => (
                  <li key={i}>{a.message}</li>
                ))}
              </ul>
            )}
          </Card>
          <Card>
            <p className="text-center text-xl font-semibold text-slate-900">
              Total Hours Worked: <span style={{ color: 'var(--accent)' }}>{outcome.record.totalHours}</span> hrs
            </p>
            <p className="mt-4 text-sm text-slate-700">
              <span className="font-semibold">Schedule Summary:</span> {outcome.record.summary}
            </p>
          </Card>
          <Notice tone="success">
            Data saved to: <span dir="ltr">{outcome.saved.relativePath}</span>
            {' · '}
            <a
              className="underline"
              href={`/api/schedules/${encodeURIComponent(outcome.record.employeeName)}/export`}
            >
              Download archive (.xlsx)
            </a>
          </Notice>
        </div>
      )}
    </div>
  );
}
