import path from 'node:path';
import { ConfigError } from './errors.js';
import { MODEL_BACKENDS, type ModelBackend } from './model.js';
import { DEFAULT_OLLAMA_HOST } from './ollama.js';
import { formatDateStamp } from './runDirectory.js';

export const DEFAULT_MODEL = 'gemma3:1b';
export const DEFAULT_OPENAI_BASE = 'http://localhost:8080/v1';

export type CliOptions = {
  language?: string;
  inputDir?: string;
  outputDir?: string;
  outputDirName?: string;
  model?: string;
  loggingPath?: string;
  pull?: boolean;
  backend?: string;
  host?: string;
  include?: string[];
  exclude?: string[];
  gitignore?: boolean;
  maxFiles?: number;
  context?: number;
  temperature?: number;
  timeout?: number;
  dryRun?: boolean;
  verbose?: boolean;
};

export type TranslateConfig = {
  language: string;
  inputDir: string;
  outputDir: string;
  runName: string;
  model: string;
  backend: ModelBackend;
  host: string;
  apiKey?: string;
  loggingPath: string;
  autoPull: boolean;
  include: string[];
  exclude: string[];
  gitignore: boolean;
  maxFiles?: number;
  contextSize: number;
  temperature: number;
  timeoutMs: number;
  dryRun: boolean;
  verbose: boolean;
};

export type ResolveContext = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  now: Date;
};

export function isValidLanguage(language: string): boolean {
  return language.trim().length >= 2;
}

function parseBackend(value: string): ModelBackend {
  const lower = value.trim().toLowerCase();
  const match = MODEL_BACKENDS.find(b => b === lower);
  if (!match) {
    throw new ConfigError(`Unknown backend "${value}". Use ${MODEL_BACKENDS.join(' or ')}.`);
  }
  return match;
}

function positiveInt(name: string, value: number | undefined, fallback: number): number;
function positiveInt(name: string, value: number | undefined): number | undefined;
function positiveInt(name: string, value: number | undefined, fallback?: number): number | undefined {
  if (value == null) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got ${value}`);
  }
  return Math.floor(value);
}

function isTruthyEnv(value: string | undefined): boolean {
  return value != null && value !== '' && value !== '0' && value.toLowerCase() !== 'false';
}

/** Merges CLI flags, environment and defaults into a validated run configuration. */
export function resolveConfig(opts: CliOptions, ctx: ResolveContext): TranslateConfig {
  const language = opts.language?.trim() ?? '';
  if (!isValidLanguage(language)) {
    throw new ConfigError('Please enter a valid language code or name (at least 2 characters).');
  }
  const inputDir = opts.inputDir?.trim();
  if (!inputDir) {
    throw new ConfigError('An input directory is required (--input-dir).');
  }

  const backend = parseBackend(opts.backend ?? ctx.env.DIRLINGO_BACKEND ?? 'ollama');
  const host = opts.host
    ?? (backend === 'ollama'
      ? ctx.env.OLLAMA_HOST ?? DEFAULT_OLLAMA_HOST
      : ctx.env.DIRLINGO_API_BASE ?? DEFAULT_OPENAI_BASE);

  const temperature = opts.temperature ?? 0.1;
  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new ConfigError(`--temperature must be between 0 and 2, got ${temperature}`);
  }

  const resolve = (p: string) => path.resolve(ctx.cwd, p);
  const runName = opts.outputDirName?.trim() || language;

  return {
    language,
    inputDir: resolve(inputDir),
    outputDir: opts.outputDir
      ? resolve(opts.outputDir)
      : path.join(ctx.cwd, 'output', formatDateStamp(ctx.now)),
    runName,
    model: opts.model ?? ctx.env.DIRLINGO_MODEL ?? DEFAULT_MODEL,
    backend,
    host,
    apiKey: ctx.env.DIRLINGO_API_KEY || undefined,
    loggingPath: opts.loggingPath ? resolve(opts.loggingPath) : path.join(ctx.cwd, 'logs'),
    autoPull: Boolean(opts.pull),
    include: opts.include?.length ? opts.include : ['**/*'],
    exclude: opts.exclude ?? [],
    gitignore: Boolean(opts.gitignore),
    maxFiles: positiveInt('--max-files', opts.maxFiles),
    contextSize: positiveInt('--context', opts.context, 8192),
    temperature,
    timeoutMs: positiveInt('--timeout', opts.timeout, 300_000),
    dryRun: Boolean(opts.dryRun),
    verbose: Boolean(opts.verbose) || isTruthyEnv(ctx.env.DIRLINGO_DEBUG),
  };
}
