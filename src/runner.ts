import fs from 'node:fs/promises';
import path from 'node:path';
import ora, { type Ora } from 'ora';
import pc from 'picocolors';
import { isValidLanguage, type CliOptions, type TranslateConfig } from './config.js';
import { ConfigError, errorMessage, ModelNotInstalledError } from './errors.js';
import { createRunLogger, type ConsoleWriter } from './logger.js';
import { ensureModel, type ModelWrapper } from './model.js';
import { ensureModelAvailable, type FetchLike, type PullProgress } from './ollama.js';
import { planDirectory, translateDirectory, type ProgressEvent, type RunSummary } from './translator.js';

export const PROCESSING_COMPLETE = 'Processing complete. Check the output directory and logs for details.';

export type Output = {
  log(line: string): void;
  error(line: string): void;
};

export const consoleOutput: Output = {
  log: line => console.log(line),
  error: line => console.error(line),
};

export type Ask = (
  question: string,
  invalidMessage: string,
  valid: (answer: string) => Promise<boolean>,
) => Promise<string>;

export type RunDeps = {
  output?: Output;
  fetchImpl?: FetchLike;
  createModel?: (config: TranslateConfig, log: (message: string) => void) => Promise<ModelWrapper>;
  /** Keeps spinners and their summary lines off the terminal. */
  silent?: boolean;
};

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes ? `${minutes}m${String(seconds).padStart(2, '0')}s` : `${seconds}s`;
}

function formatPullProgress(progress: PullProgress): string {
  if (progress.total && progress.completed != null) {
    const pct = Math.min(100, (progress.completed / progress.total) * 100);
    return `${progress.status} ${pct.toFixed(0)}%`;
  }
  return progress.status;
}

export async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/** Fills in language and input directory through `ask`, or fails when nobody can answer. */
export async function fillMissingOptions(
  opts: CliOptions,
  io: { interactive: boolean; ask: Ask },
): Promise<CliOptions> {
  const filled = { ...opts };
  if (!filled.language) {
    if (!io.interactive) throw new ConfigError('Missing --language (no interactive terminal to ask).');
    filled.language = await io.ask(
      'Enter the target language (ISO alpha-2 code or language name): ',
      'Please enter a valid language code or name.',
      async answer => isValidLanguage(answer),
    );
  }
  if (!filled.inputDir) {
    if (!io.interactive) throw new ConfigError('Missing --input-dir (no interactive terminal to ask).');
    filled.inputDir = await io.ask(
      'Enter the input directory to translate: ',
      'Please enter a valid directory path.',
      answer => isDirectory(answer),
    );
  }
  return filled;
}

export async function printPlan(config: TranslateConfig, output: Output = consoleOutput): Promise<void> {
  const planned = await planDirectory(config);
  output.log(pc.bold(`🧭  ${planned.length} file(s) would be translated to ${config.language}:`));
  for (const item of planned) {
    output.log(`   ${pc.cyan(item.rel)} → ${item.output}`);
  }
}

/**
 * Makes sure Ollama has the model, pulling it when `autoPull` is set.
 * Returns false (after telling the user what is installed) when it is missing.
 */
export async function checkModel(
  config: Pick<TranslateConfig, 'host' | 'model' | 'autoPull'>,
  opts: { spinner: Ora; output?: Output; fetchImpl?: FetchLike },
): Promise<boolean> {
  const { spinner } = opts;
  const output = opts.output ?? consoleOutput;
  spinner.start(`🤖  Checking model ${config.model}`);
  try {
    const { pulled } = await ensureModelAvailable(config.host, config.model, {
      autoPull: config.autoPull,
      onPullStart: () => { spinner.text = `📥  Pulling model ${config.model}`; },
      onPullProgress: progress => { spinner.text = `📥  ${config.model}: ${formatPullProgress(progress)}`; },
      fetchImpl: opts.fetchImpl,
    });
    spinner.succeed(pulled ? `🤖  Model ${config.model} pulled` : `🤖  Model ${config.model} is installed`);
    return true;
  } catch (error) {
    spinner.fail(`🤖  ${errorMessage(error)}`);
    if (!(error instanceof ModelNotInstalledError)) throw error;
    output.log('Available models:');
    output.log(JSON.stringify(error.available, null, 2));
    if (config.autoPull) {
      output.log('Does the model exist? Make sure the model name is correct.');
    } else {
      output.log(
        `Run 'ollama pull ${config.model}' to install new models, or pass the '--pull' flag to automatically install the model.`,
      );
    }
    return false;
  }
}

export function exitCodeFor(summary: Pick<RunSummary, 'failed'>): number {
  return summary.failed > 0 ? 1 : 0;
}

function defaultCreateModel(config: TranslateConfig, log: (message: string) => void): Promise<ModelWrapper> {
  return ensureModel(config.model, {
    backend: config.backend,
    host: config.host,
    apiKey: config.apiKey,
    contextSize: config.contextSize,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs,
    debug: config.verbose,
    log,
  });
}

/** Checks the model, translates the input directory and reports; resolves to the exit code. */
export async function runTranslation(config: TranslateConfig, deps: RunDeps = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;
  const spinner = () => ora({ spinner: 'dots', isSilent: deps.silent });

  if (config.backend === 'ollama') {
    const ready = await checkModel(config, { spinner: spinner(), output, fetchImpl: deps.fetchImpl });
    if (!ready) return 1;
  }

  const overall = spinner();
  const writeAroundSpinner: ConsoleWriter = (level, line) => {
    const active = overall.isSpinning;
    if (active) overall.clear();
    if (level === 'error' || level === 'warn') output.error(line);
    else output.log(line);
    if (active) overall.render();
  };
  const logger = await createRunLogger({
    loggingPath: config.loggingPath,
    verbose: config.verbose,
    write: (level, line) => {
      // Progress lines already cover per-file info; the console only gets it in verbose mode.
      if (config.verbose || level === 'warn') writeAroundSpinner(level, line);
    },
  });

  let exitCode = 0;
  try {
    logger.debug(`Logging to ${logger.filePath}`);
    const model = await (deps.createModel ?? defaultCreateModel)(config, message => logger.debug(message));
    const { contextSize } = await model.getContextInfo();

    let done = 0;
    const startedAt = new Map<string, number>();
    const logLine = (symbol: string, message: string) => {
      overall.clear();
      output.log(`${symbol}  ${message}`);
      overall.render();
    };

    const onProgress = (evt: ProgressEvent) => {
      const label = pc.cyan(evt.file);
      if (evt.type === 'start') {
        startedAt.set(evt.file, Date.now());
        overall.text = `🌐  ${pc.yellow('Translating')} ${label} ${pc.dim(`[${done} done]`)}`;
        if (!overall.isSpinning) overall.start();
        return;
      }
      done++;
      const started = startedAt.get(evt.file);
      const took = started ? ` • ⏱️  ${pc.dim(formatDuration(Date.now() - started))}` : '';
      startedAt.delete(evt.file);
      if (evt.type === 'write') logLine('✅', `${label} → ${pc.green(evt.message ?? 'written')}${took}`);
      else if (evt.type === 'skip') logLine('⏭️', `${label} – ${pc.magenta('skipped')} ${pc.dim(`(${evt.message ?? ''})`)}${took}`);
      else logLine('❌', `${label} – ${pc.red('error')}: ${pc.red(evt.message ?? '')}${took}`);
    };

    const summary = await translateDirectory(model, { ...config, contextSize }, { logger, onProgress });
    overall.stop();
    await model.dispose();

    const relOut = path.relative(process.cwd(), summary.runDir) || summary.runDir;
    const line = `${pc.green(`Wrote ${summary.written}`)} • ${pc.magenta(`⏭️  skipped ${summary.skipped}`)} • ${pc.red(`❌  failed ${summary.failed}`)}. Output → ${pc.cyan(relOut)}`;
    if (summary.failed) spinner().warn(`⚠️  ${pc.yellow('Done with errors.')} ${line}`);
    else spinner().succeed(`✅  ${pc.green('Done.')} ${line}`);
    exitCode = exitCodeFor(summary);
  } finally {
    if (overall.isSpinning) overall.stop();
    await logger.close();
  }

  output.log(PROCESSING_COMPLETE);
  return exitCode;
}
