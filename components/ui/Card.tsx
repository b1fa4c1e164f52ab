import type { ReactNode } from 'react';

export type CardProps = {
  title?: string;
  children: ReactNode;
  className?: string;
};

export function Card({ title, children, className = '' }: CardProps) {
  return (
    <section
      className={`min-w-0 rounded-xl border p-4 shadow-sm md:p-5 ${className}`}
      style={{ backgroundColor: 'var(--surface)', borderColor: 'var(--border)' }}
    >
      {title && (
        <h2 className="mb-3 text-[11px] font-medium uppercase tracking-wider" style={{ color: 'var(--muted)' }}>
          {title}
        </h2>
      )}
      {children}
    </section>
  );
}
