import type { Metadata } from 'next';
import type { ReactNode } from 'react';
import './globals.css';

export const metadata: Metadata = {
  title: 'Employee Schedule Scanner',
  description: 'Scan employee schedule images into hours and a weekly archive',
};

export default function RootLayout({ children }: Readonly<{ children: ReactNode }>) {
  return (
    <html lang="en">
      <body className="flex min-h-screen flex-col bg-slate-100 text-slate-900 antialiased">
        <div className="min-h-0 flex-1">{children}</div>
      </body>
    </html>
  );
}
