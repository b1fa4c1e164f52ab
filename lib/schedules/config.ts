/**
 * Scanner config from env. Loaded once per process, immutable after that.
 * Defaults: Haiku model, 60 s model timeout, 10 MB uploads, ./schedules storage.
 */

import path from 'path';
import { ConfigError } from './errors';

export type ScannerConfig = Readonly<{
  apiKey: string;
  apiUrl: string;
  model: string;
  apiVersion: string;
  maxTokens: number;
  requestTimeoutMs: number;
  storageRoot: string;
  maxUploadBytes: number;
}>;

type Env = Record<string, string | undefined>;

const DEFAULT_API_URL = 'https://api.anthropic.com/v1/messages';
const DEFAULT_MODEL = 'claude-3-haiku-20240307';
const DEFAULT_API_VERSION = '2023-06-01';
const DEFAULT_STORAGE_DIR = 'schedules';

function intInRange(raw: string | undefined, fallback: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, parseInt(raw ?? String(fallback), 10) || fallback));
}

function trimmed(raw: string | undefined): string {
  return (raw ?? '').trim();
}

/** Upload limit in MB; readable without the API key (the form shows it). */
export function uploadLimitMb(env: Env): number {
  return intInRange(env.SCHEDULE_MAX_UPLOAD_MB, 10, 1, 25);
}

export function loadScannerConfig(env: Env, cwd: string = process.cwd()): ScannerConfig {
  const apiKey = trimmed(env.SCHEDULE_MODEL_API_KEY);
  if (!apiKey) {
    throw new ConfigError('SCHEDULE_MODEL_API_KEY is not set. Add it to .env and restart the app.');
  }
  const storageDir = trimmed(env.SCHEDULE_STORAGE_DIR) || DEFAULT_STORAGE_DIR;

  return Object.freeze({
    apiKey,
    apiUrl: (trimmed(env.SCHEDULE_MODEL_API_URL) || DEFAULT_API_URL).replace(/\/+$/, ''),
    model: trimmed(env.SCHEDULE_MODEL_NAME) || DEFAULT_MODEL,
    apiVersion: trimmed(env.SCHEDULE_MODEL_VERSION) || DEFAULT_API_VERSION,
    maxTokens: intInRange(env.SCHEDULE_MODEL_MAX_TOKENS, 1024, 256, 4096),
    requestTimeoutMs: intInRange(env.SCHEDULE_MODEL_TIMEOUT_MS, 60_000, 1_000, 300_000),
    storageRoot: path.resolve(cwd, storageDir),
    maxUploadBytes: uploadLimitMb(env) * 1024 * 1024,
  });
}

let cached: ScannerConfig | undefined;

export function getScannerConfig(): ScannerConfig {
  if (!cached) cached = loadScannerConfig(process.env);
  return cached;
}
