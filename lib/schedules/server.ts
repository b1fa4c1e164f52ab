/**
 * Per-process wiring for route handlers: config → model client + file archive.
 */

import { getScannerConfig } from './config';
import { createScheduleModelClient } from './modelClient';
import type { ProcessDeps } from './processSchedule';
import { createFileScheduleArchive } from './storage';

let deps: ProcessDeps | undefined;

/** Throws ConfigError when the API key is missing. */
export function getScheduleDeps(): ProcessDeps {
  if (!deps) {
    const config = getScannerConfig();
    deps = {
      config,
      client: createScheduleModelClient(config),
      archive: createFileScheduleArchive(config.storageRoot),
    };
  }
  return deps;
}
