import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { CompleteOptions, ModelWrapper } from '../src/model.js';

export async function makeTempDir(prefix = 'dirlingo-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }
}

export type LoggedLine = { level: 'debug' | 'info' | 'warn' | 'error'; message: string };

export function memoryLogger() {
  const lines: LoggedLine[] = [];
  return {
    lines,
    debug: (message: string) => { lines.push({ level: 'debug', message }); },
    info: (message: string) => { lines.push({ level: 'info', message }); },
    warn: (message: string) => { lines.push({ level: 'warn', message }); },
    error: (message: string) => { lines.push({ level: 'error', message }); },
  };
}

export type RecordedCall = { prompt: string; opts?: CompleteOptions };

/** A ModelWrapper whose answers come from `respond`. */
export function fakeModel(respond: (prompt: string, opts?: CompleteOptions) => string | Promise<string>) {
  const calls: RecordedCall[] = [];
  const model: ModelWrapper = {
    async getContextInfo() {
      return { contextSize: 8192 };
    },
    async complete(prompt, opts) {
      calls.push({ prompt, opts });
      return respond(prompt, opts);
    },
    async dispose() {},
  };
  return { model, calls };
}

/** The file content a translation prompt carries, after the `CONTENT:` header. */
export function promptContent(prompt: string): string {
  const marker = 'CONTENT:\n\n';
  return prompt.slice(prompt.indexOf(marker) + marker.length);
}
