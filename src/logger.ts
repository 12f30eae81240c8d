import { createWriteStream, type WriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import pc from 'picocolors';
import { formatDateStamp, pathExists } from './runDirectory.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type RunLogger = {
  readonly filePath: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  close(): Promise<void>;
};

/** Where console lines go; the CLI swaps this to keep its spinner intact. */
export type ConsoleWriter = (level: LogLevel, line: string) => void;

const defaultWriter: ConsoleWriter = (level, line) => {
  if (level === 'error' || level === 'warn') console.error(line);
  else console.log(line);
};

function colorize(level: LogLevel, message: string): string {
  switch (level) {
    case 'debug': return pc.dim(message);
    case 'info': return message;
    case 'warn': return pc.yellow(message);
    case 'error': return pc.red(message);
  }
}

const LOG_FILE_PREFIX = 'translation_run_';

/** Matches every log file this tool writes into a logging directory. */
export const LOG_FILE_GLOB = `${LOG_FILE_PREFIX}*.log`;

/**
 * `translation_run_<date>.log`, or `translation_run_<date>_<n>.log` once logs
 * from the same day exist.
 */
export async function resolveLogFilePath(loggingPath: string, now: Date): Promise<string> {
  const date = formatDateStamp(now);
  const existing = (await fs.readdir(loggingPath)).filter(f => f.endsWith('.log') && f.includes(date));
  let count = existing.length;
  const nameFor = (n: number) => (n > 0 ? `${LOG_FILE_PREFIX}${date}_${n}.log` : `${LOG_FILE_PREFIX}${date}.log`);
  let candidate = path.join(loggingPath, nameFor(count));
  while (await pathExists(candidate)) {
    count++;
    candidate = path.join(loggingPath, nameFor(count));
  }
  return candidate;
}

export async function createRunLogger(opts: {
  loggingPath: string;
  now?: Date;
  verbose?: boolean;
  write?: ConsoleWriter;
}): Promise<RunLogger> {
  const loggingPath = path.resolve(opts.loggingPath);
  await fs.mkdir(loggingPath, { recursive: true });
  const filePath = await resolveLogFilePath(loggingPath, opts.now ?? new Date());
  const stream: WriteStream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
  const write = opts.write ?? defaultWriter;
  let streamError: Error | null = null;
  stream.on('error', (error) => {
    streamError = error;
  });

  const log = (level: LogLevel, message: string) => {
    if (level === 'debug' && !opts.verbose) return;
    stream.write(`${new Date().toISOString()} - ${level.toUpperCase()} - ${message}\n`);
    write(level, colorize(level, message));
  };

  const close = () =>
    new Promise<void>((resolve, reject) => {
      if (streamError) {
        reject(streamError);
        return;
      }
      stream.once('error', reject);
      stream.end(() => resolve());
    });

  return {
    filePath,
    debug: message => log('debug', message),
    info: message => log('info', message),
    warn: message => log('warn', message),
    error: message => log('error', message),
    close,
  };
}
