import fs from 'node:fs/promises';
import path from 'node:path';
import { isErrnoException } from './errors.js';
import { sanitizePathSegment } from './filename.js';

/** Matches every run directory this tool creates inside an output directory. */
export const RUN_DIR_GLOB = 'run_*/**';

export function formatDateStamp(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function sanitizeRunName(name: string): string {
  return sanitizePathSegment(name) || 'run';
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates `<outputDir>/run_<name>_<n>` and returns its absolute path.
 * `n` starts one past the number of existing `run_<name>_*` directories and
 * moves forward until the name is free, so numbering gaps never cause reuse.
 */
export async function createRunDirectory(outputDir: string, runName: string): Promise<string> {
  const root = path.resolve(outputDir);
  await fs.mkdir(root, { recursive: true });

  const name = sanitizeRunName(runName);
  const prefix = `run_${name}_`;
  const entries = await fs.readdir(root, { withFileTypes: true });
  const existing = entries.filter(e => e.isDirectory() && e.name.startsWith(prefix)).length;

  for (let count = existing + 1; ; count++) {
    const runDir = path.join(root, `${prefix}${count}`);
    try {
      await fs.mkdir(runDir);
      return runDir;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') continue;
      throw error;
    }
  }
}
