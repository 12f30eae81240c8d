import fg from 'fast-glob';
import fs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import { isErrnoException } from './errors.js';

export type SourceFile = { path: string; rel: string; ext: string };
export type FileRecord = SourceFile & { content: string };
export type ScanResult = { root: string; files: SourceFile[] };

const DEFAULT_EXCLUDE = ['.git/**', '**/.git/**'];
const BINARY_SNIFF_BYTES = 8000;

export async function scanDirectory(root: string, opts: {
  include?: string[];
  exclude?: string[];
  gitignore?: boolean;
  maxFiles?: number;
} = {}): Promise<ScanResult> {
  const absRoot = path.resolve(root);
  const ig = ignore();
  if (opts.gitignore) {
    try {
      ig.add(await fs.readFile(path.join(absRoot, '.gitignore'), 'utf-8'));
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
    }
  }
  const patterns = opts.include?.length ? opts.include : ['**/*'];
  const entries = await fg(patterns, {
    cwd: absRoot,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore: [...DEFAULT_EXCLUDE, ...(opts.exclude ?? [])],
  });
  entries.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const files: SourceFile[] = [];
  for (const rel of entries) {
    if (ig.ignores(rel)) continue;
    files.push({ path: path.join(absRoot, rel), rel, ext: path.extname(rel) });
    if (opts.maxFiles && files.length >= opts.maxFiles) break;
  }
  return { root: absRoot, files };
}

/**
 * Globs that keep the tool's own output out of a scan when an output or log
 * directory lies inside the input tree (or is the input directory itself).
 * `pattern` matches what the tool writes into that directory.
 */
export function nestedExcludes(inputDir: string, targets: { dir: string; pattern: string }[]): string[] {
  const globs: string[] = [];
  for (const { dir, pattern } of targets) {
    const rel = path.relative(inputDir, dir);
    if (rel.startsWith('..') || path.isAbsolute(rel)) continue;
    globs.push(rel ? `${fg.escapePath(rel.split(path.sep).join('/'))}/${pattern}` : pattern);
  }
  return globs;
}

export function isBinary(buffer: Buffer): boolean {
  const limit = Math.min(buffer.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i++) {
    if (buffer[i] === 0) return true;
  }
  return false;
}
