import fs from 'node:fs/promises';
import path from 'node:path';
import { isErrnoException } from './errors.js';

export const MANIFEST_FILENAME = '.translation-manifest.json';

export type FileStatus = 'written' | 'skipped' | 'failed';

export type FileResult = {
  rel: string;
  status: FileStatus;
  output?: string;
  reason?: string;
  chunks: number;
  durationMs: number;
};

type PersistedFileResult = Omit<FileResult, 'rel'>;

export type StoredManifest = {
  version: 1;
  model: string;
  backend: string;
  targetLanguage: string;
  inputDir: string;
  totals: Record<FileStatus, number>;
  files: Record<string, PersistedFileResult>;
  createdAt: number;
  updatedAt: number;
};

function sanitizeResult(result: FileResult): PersistedFileResult {
  const persisted: PersistedFileResult = {
    status: result.status,
    chunks: result.chunks,
    durationMs: result.durationMs,
  };
  if (result.output != null) persisted.output = result.output;
  if (result.reason != null) persisted.reason = result.reason;
  return persisted;
}

/** Per-run record of what happened to every file, kept beside the translations. */
export class RunManifest {
  private state: StoredManifest;
  private readonly now: () => number;
  readonly filePath: string;

  constructor(
    runDir: string,
    info: { model: string; backend: string; targetLanguage: string; inputDir: string },
    now: () => number = Date.now,
  ) {
    this.filePath = path.join(runDir, MANIFEST_FILENAME);
    this.now = now;
    const created = now();
    this.state = {
      version: 1,
      ...info,
      totals: { written: 0, skipped: 0, failed: 0 },
      files: {},
      createdAt: created,
      updatedAt: created,
    };
  }

  /** Records a result and rewrites the manifest so an interrupted run still leaves one. */
  async record(result: FileResult): Promise<void> {
    const previous = this.state.files[result.rel];
    if (previous) this.state.totals[previous.status]--;
    this.state.files[result.rel] = sanitizeResult(result);
    this.state.totals[result.status]++;
    this.state.updatedAt = this.now();
    await this.flush();
  }

  async flush(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(this.state, null, 2), 'utf-8');
  }
}

export async function loadManifest(filePath: string): Promise<StoredManifest | null> {
  let data: string;
  try {
    data = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw error;
  }
  const parsed: unknown = JSON.parse(data);
  if (isStoredManifest(parsed)) return parsed;
  return null;
}

function isStoredManifest(value: unknown): value is StoredManifest {
  return typeof value === 'object' && value !== null && 'version' in value && value.version === 1;
}
