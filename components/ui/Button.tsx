'use client';

import type { ButtonHTMLAttributes, ReactNode } from 'react';

export type ButtonProps = ButtonHTMLAttributes<HTMLButtonElement> & {
  busy?: boolean;
  children: ReactNode;
};

export function Button({
  busy = false,
  children,
  className = '',
  disabled,
  type = 'button',
  ...props
}: ButtonProps) {
  const base =
    'inline-flex h-10 min-w-0 items-center justify-center gap-2 rounded-lg px-4 text-sm font-medium transition-colors disabled:pointer-events-none disabled:opacity-50';
  const styles = 'text-white hover:opacity-90 focus-visible:ring-2 focus-visible:ring-offset-2';

  return (
    <button
      type={type}
      disabled={disabled || busy}
      aria-busy={busy || undefined}
      className={`${base} ${styles} ${className}`}
      style={{ backgroundColor: 'var(--accent)' }}
      {...props}
    >
      {children}
    </button>
  );
}
