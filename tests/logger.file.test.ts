import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import { createRunLogger, resolveLogFilePath, type LogLevel } from '../src/logger.js';
import { makeTempDir } from './helpers.js';

const may1 = new Date(2024, 4, 1, 12, 0);

test('names the first log of the day without a counter', async () => {
  const dir = await makeTempDir();
  await fs.writeFile(path.join(dir, 'translation_run_2024-04-30.log'), '');

  assert.equal(await resolveLogFilePath(dir, may1), path.join(dir, 'translation_run_2024-05-01.log'));
});

test('counts earlier logs from the same day', async () => {
  const dir = await makeTempDir();
  await fs.writeFile(path.join(dir, 'translation_run_2024-05-01.log'), '');

  assert.equal(await resolveLogFilePath(dir, may1), path.join(dir, 'translation_run_2024-05-01_1.log'));

  await fs.writeFile(path.join(dir, 'translation_run_2024-05-01_1.log'), '');
  assert.equal(await resolveLogFilePath(dir, may1), path.join(dir, 'translation_run_2024-05-01_2.log'));
});

test('moves past a counter that is already taken', async () => {
  const dir = await makeTempDir();
  await fs.writeFile(path.join(dir, 'translation_run_2024-05-01_1.log'), '');

  assert.equal(await resolveLogFilePath(dir, may1), path.join(dir, 'translation_run_2024-05-01_2.log'));
});

test('writes entries to the file and to the console writer', async () => {
  const dir = path.join(await makeTempDir(), 'logs');
  const seen: { level: LogLevel; line: string }[] = [];

  const logger = await createRunLogger({
    loggingPath: dir,
    now: may1,
    write: (level, line) => { seen.push({ level, line }); },
  });
  logger.info('hello');
  logger.debug('hidden');
  logger.warn('careful');
  await logger.close();

  assert.equal(logger.filePath, path.join(dir, 'translation_run_2024-05-01.log'));
  const lines = (await fs.readFile(logger.filePath, 'utf-8')).trimEnd().split('\n');
  assert.equal(lines.length, 2);
  assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T\S+Z - INFO - hello$/);
  assert.match(lines[1], /^\d{4}-\d{2}-\d{2}T\S+Z - WARN - careful$/);
  assert.deepEqual(seen.map(s => s.level), ['info', 'warn']);
  assert.equal(seen[0].line, 'hello');
});

test('includes debug entries when verbose', async () => {
  const dir = await makeTempDir();
  const logger = await createRunLogger({ loggingPath: dir, now: may1, verbose: true, write: () => {} });
  logger.debug('details');
  await logger.close();

  const content = await fs.readFile(logger.filePath, 'utf-8');
  assert.match(content, / - DEBUG - details\n$/);
});
