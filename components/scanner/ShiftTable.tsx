import type { ShiftEntry } from '@/lib/schedules/types';

const COLUMNS: { key: keyof ShiftEntry; label: string; align?: 'right' }[] = [
  { key: 'day', label: 'Day' },
  { key: 'start', label: 'Start' },
  { key: 'end', label: 'End' },
  { key: 'hours', label: 'Hours', align: 'right' },
  { key: 'location', label: 'Location' },
];

export function ShiftTable({ entries }: { entries: ShiftEntry[] }) {
  return (
    <div className="min-w-0 overflow-x-auto rounded-xl border" style={{ borderColor: 'var(--border)' }}>
      <table className="w-full min-w-0 border-collapse text-sm">
        <thead>
          <tr className="border-b" style={{ borderColor: 'var(--border)' }}>
            {COLUMNS.map((col) => (
              <th
                key={col.key}
                className={`px-3 py-2 text-[11px] font-medium uppercase tracking-wide ${
                  col.align === 'right' ? 'text-end' : 'text-start'
                }`}
                style={{ color: 'var(--muted)' }}
              >
                {col.label}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {entries.map((entry, i) => (
            <tr key={`${entry.day}-${i}`} className="border-b border-slate-100 last:border-b-0 hover:bg-slate-50">
              {COLUMNS.map((col) => (
                <td
                  key={col.key}
                  className={`px-3 py-2 ${col.align === 'right' ? 'text-end tabular-nums' : 'text-start'}`}
                  style={{ color: 'var(--text)' }}
                >
                  {entry[col.key] ?? '—'}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
