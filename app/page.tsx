import { uploadLimitMb } from '@/lib/schedules/config';
import { ScheduleScannerClient } from './ScheduleScannerClient';

export const dynamic = 'force-dynamic';

export default function ScannerPage() {
  return (
    <div className="min-w-0">
      <ScheduleScannerClient maxUploadMb={uploadLimitMb(process.env)} />
    </div>
  );
}
