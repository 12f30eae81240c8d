import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import { createRunDirectory, formatDateStamp, sanitizeRunName } from '../src/runDirectory.js';
import { makeTempDir } from './helpers.js';

test('creates the output directory and the first run directory', async () => {
  const tmp = await makeTempDir();
  const out = path.join(tmp, 'output', '2024-03-09');

  const runDir = await createRunDirectory(out, 'fr');

  assert.equal(runDir, path.join(out, 'run_fr_1'));
  assert.ok((await fs.stat(runDir)).isDirectory());
});

test('numbers consecutive runs and never reuses a directory', async () => {
  const tmp = await makeTempDir();

  const first = await createRunDirectory(tmp, 'fr');
  const second = await createRunDirectory(tmp, 'fr');

  assert.equal(path.basename(first), 'run_fr_1');
  assert.equal(path.basename(second), 'run_fr_2');
});

test('skips past numbering gaps instead of reusing an existing run', async () => {
  const tmp = await makeTempDir();
  await fs.mkdir(path.join(tmp, 'run_fr_1'));
  await fs.mkdir(path.join(tmp, 'run_fr_3'));

  const runDir = await createRunDirectory(tmp, 'fr');

  assert.equal(path.basename(runDir), 'run_fr_4');
});

test('steps over a plain file that occupies the candidate name', async () => {
  const tmp = await makeTempDir();
  await fs.writeFile(path.join(tmp, 'run_de_1'), 'not a directory');

  const runDir = await createRunDirectory(tmp, 'de');

  assert.equal(path.basename(runDir), 'run_de_2');
});

test('counts only runs with the same name', async () => {
  const tmp = await makeTempDir();
  await fs.mkdir(path.join(tmp, 'run_fr_1'));

  const runDir = await createRunDirectory(tmp, 'de');

  assert.equal(path.basename(runDir), 'run_de_1');
});

test('makes custom run names safe as a path segment', async () => {
  assert.equal(sanitizeRunName('pt/BR test'), 'pt-BR-test');
  assert.equal(sanitizeRunName('   '), 'run');

  const tmp = await makeTempDir();
  const runDir = await createRunDirectory(tmp, 'release: v1');
  assert.equal(path.basename(runDir), 'run_release--v1_1');
});

test('formats local dates as YYYY-MM-DD', () => {
  assert.equal(formatDateStamp(new Date(2024, 0, 5)), '2024-01-05');
  assert.equal(formatDateStamp(new Date(2023, 11, 31, 23, 59)), '2023-12-31');
});
