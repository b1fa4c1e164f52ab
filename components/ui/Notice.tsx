import type { ReactNode } from 'react';

export type NoticeTone = 'success' | 'warning' | 'error';

const TONES: Record<NoticeTone, string> = {
  success: 'border-emerald-200 bg-emerald-50 text-emerald-900',
  warning: 'border-amber-200 bg-amber-100 text-amber-900',
  error: 'border-red-200 bg-red-50 text-red-900',
};

export function Notice({ tone, children }: { tone: NoticeTone; children: ReactNode }) {
  return (
    <div role={tone === 'error' ? 'alert' : 'status'} className={`rounded-xl border p-3 md:p-4 ${TONES[tone]}`}>
      <div className="text-sm font-medium leading-6">{children}</div>
    </div>
  );
}
