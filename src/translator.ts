import fs from 'node:fs/promises';
import path from 'node:path';
import type { TranslateConfig } from './config.js';
import { chunkBudget, chunkText, joinChunks, splitEdges, type Chunk } from './chunker.js';
import { errorMessage } from './errors.js';
import { LOG_FILE_GLOB, type RunLogger } from './logger.js';
import { RunManifest, type FileResult } from './manifest.js';
import type { ModelWrapper } from './model.js';
import { planOutputPath, saveTranslation } from './outputWriter.js';
import { isBinary, nestedExcludes, scanDirectory, type FileRecord, type SourceFile } from './projectScanner.js';
import { buildTranslationPrompt } from './prompt.js';
import { createRunDirectory, RUN_DIR_GLOB } from './runDirectory.js';
import { cleanModelOutput } from './sanitize.js';

export type ProgressEvent = {
  type: 'start' | 'write' | 'skip' | 'error';
  file: string;
  message?: string;
};

export type RunSummary = {
  runDir: string;
  written: number;
  skipped: number;
  failed: number;
  results: FileResult[];
};

export type TranslateOptions = Pick<
  TranslateConfig,
  'language' | 'inputDir' | 'outputDir' | 'runName' | 'model' | 'backend' | 'include' | 'exclude' | 'gitignore' | 'maxFiles' | 'contextSize' | 'loggingPath'
>;

type Logger = Pick<RunLogger, 'debug' | 'info' | 'warn' | 'error'>;

function scanFor(config: TranslateOptions): Promise<{ files: SourceFile[] }> {
  return scanDirectory(config.inputDir, {
    include: config.include,
    exclude: [
      ...config.exclude,
      ...nestedExcludes(config.inputDir, [
        { dir: config.outputDir, pattern: RUN_DIR_GLOB },
        { dir: config.loggingPath, pattern: LOG_FILE_GLOB },
      ]),
    ],
    gitignore: config.gitignore,
    maxFiles: config.maxFiles,
  });
}

const UTF8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function decodeText(buffer: Buffer): string {
  try {
    return UTF8.decode(buffer);
  } catch (error) {
    throw new Error('File is not valid UTF-8 text', { cause: error });
  }
}

/**
 * Translates one file's content, splitting it when it exceeds the context budget.
 * Whitespace at the edges of every chunk is copied from the source, so chunk
 * boundaries survive whatever the model does with surrounding blank lines.
 */
export async function translateContent(
  model: ModelWrapper,
  record: Pick<FileRecord, 'rel' | 'content'>,
  opts: { language: string; contextSize: number },
): Promise<{ text: string; chunks: number }> {
  const chunks = chunkText(record.content, chunkBudget(opts.contextSize));
  const translated: Chunk[] = [];

  for (const [index, chunk] of chunks.entries()) {
    const { lead, core, trail } = splitEdges(chunk.text);
    if (!core) {
      translated.push(chunk);
      continue;
    }
    const prompt = buildTranslationPrompt({
      targetLanguage: opts.language,
      relPath: record.rel,
      content: core,
      part: index + 1,
      totalParts: chunks.length,
    });
    const raw = await model.complete(prompt.user, { system: prompt.system });
    const cleaned = cleanModelOutput(raw).trimStart();
    if (!cleaned) {
      const part = chunks.length > 1 ? ` for part ${index + 1} of ${chunks.length}` : '';
      throw new Error(`Model returned an empty translation${part}`);
    }
    translated.push({ text: lead + cleaned + trail, glue: chunk.glue });
  }

  return { text: joinChunks(translated), chunks: chunks.length };
}

export async function translateDirectory(
  model: ModelWrapper,
  config: TranslateOptions,
  opts: { logger: Logger; onProgress?: (evt: ProgressEvent) => void },
): Promise<RunSummary> {
  const { logger } = opts;
  logger.info(`Starting translation for files in '${config.inputDir}' to language '${config.language}'`);

  const runDir = await createRunDirectory(config.outputDir, config.runName);
  logger.info(`Output will be saved to: ${runDir}`);

  const summary: RunSummary = { runDir, written: 0, skipped: 0, failed: 0, results: [] };
  const { files } = await scanFor(config);
  if (!files.length) {
    logger.warn(`No files found in input directory: ${config.inputDir}`);
    return summary;
  }
  logger.debug(`Scanned ${files.length} candidate files`);

  const manifest = new RunManifest(runDir, {
    model: config.model,
    backend: config.backend,
    targetLanguage: config.language,
    inputDir: config.inputDir,
  });

  for (const file of files) {
    const started = Date.now();
    logger.info(`Translating file: ${file.rel}`);
    opts.onProgress?.({ type: 'start', file: file.rel });

    let result: FileResult;
    try {
      const buffer = await fs.readFile(file.path);
      if (isBinary(buffer)) {
        logger.info(`Skipping binary file: ${file.rel}`);
        result = { rel: file.rel, status: 'skipped', reason: 'binary file', chunks: 0, durationMs: Date.now() - started };
      } else {
        const content = decodeText(buffer);
        const translated = content.trim()
          ? await translateContent(model, { rel: file.rel, content }, config)
          : { text: content, chunks: 0 };
        const outPath = await saveTranslation(runDir, file.rel, translated.text, config.language);
        logger.info(`Saved translated file to ${outPath}`);
        result = {
          rel: file.rel,
          status: 'written',
          output: path.relative(runDir, outPath),
          chunks: translated.chunks,
          durationMs: Date.now() - started,
        };
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Failed to process file ${file.path}: ${message}`);
      result = { rel: file.rel, status: 'failed', reason: message, chunks: 0, durationMs: Date.now() - started };
    }

    summary.results.push(result);
    summary[result.status]++;
    await manifest.record(result);

    if (result.status === 'written') opts.onProgress?.({ type: 'write', file: file.rel, message: result.output });
    else if (result.status === 'skipped') opts.onProgress?.({ type: 'skip', file: file.rel, message: result.reason });
    else opts.onProgress?.({ type: 'error', file: file.rel, message: result.reason });
  }

  logger.info('Translation complete');
  return summary;
}

/** What a run would write, without creating directories or calling the model. */
export async function planDirectory(config: TranslateOptions): Promise<{ rel: string; output: string }[]> {
  const { files } = await scanFor(config);
  return files.map(f => ({ rel: f.rel, output: planOutputPath(f.rel, config.language) }));
}
