import fs from 'node:fs/promises';
import path from 'node:path';
import { replaceLanguageInFilename } from './filename.js';
import { pathExists } from './runDirectory.js';

/** Relative output path for a source file, before collision handling. */
export function planOutputPath(relFilePath: string, targetLang: string): string {
  const dir = path.dirname(relFilePath);
  const file = replaceLanguageInFilename(path.basename(relFilePath), targetLang);
  return dir === '.' ? file : path.join(dir, file);
}

export async function resolveFreePath(dir: string, filename: string): Promise<string> {
  const ext = path.extname(filename);
  const base = ext ? filename.slice(0, -ext.length) : filename;
  let candidate = path.join(dir, filename);
  for (let counter = 1; await pathExists(candidate); counter++) {
    candidate = path.join(dir, `${base}_${counter}${ext}`);
  }
  return candidate;
}

/**
 * Writes `text` under `runDir`, mirroring the source's relative directory and
 * rewriting the language code in its filename. An existing file is never
 * overwritten: `name_1.ext`, `name_2.ext`, ... are tried instead.
 */
export async function saveTranslation(
  runDir: string,
  relFilePath: string,
  text: string,
  targetLang: string,
): Promise<string> {
  const planned = planOutputPath(relFilePath, targetLang);
  const outDir = path.join(runDir, path.dirname(planned));
  await fs.mkdir(outDir, { recursive: true });

  const outPath = await resolveFreePath(outDir, path.basename(planned));
  await fs.writeFile(outPath, text, 'utf-8');
  return outPath;
}
