#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { createInterface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import pc from 'picocolors';
import { DEFAULT_MODEL, resolveConfig, type CliOptions } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { fillMissingOptions, isDirectory, printPlan, runTranslation, type Ask } from './runner.js';

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

const askUntilValid: Ask = async (question, invalidMessage, valid) => {
  const rl = createInterface({ input, output });
  try {
    while (true) {
      const answer = (await rl.question(question)).trim();
      if (await valid(answer)) return answer;
      console.log(invalidMessage);
    }
  } finally {
    rl.close();
  }
};

async function run(cliOpts: CliOptions): Promise<number> {
  const opts = await fillMissingOptions(cliOpts, {
    interactive: Boolean(input.isTTY && output.isTTY),
    ask: askUntilValid,
  });
  const config = resolveConfig(opts, { env: process.env, cwd: process.cwd(), now: new Date() });

  if (!(await isDirectory(config.inputDir))) {
    throw new ConfigError(`Input directory does not exist: ${config.inputDir}`);
  }

  if (config.dryRun) {
    await printPlan(config);
    return 0;
  }
  return runTranslation(config);
}

const program = new Command();

program
  .name('dirlingo')
  .description('🌐  Translate a directory of text and code files with a local LLM, preserving formatting')
  .option('-l, --language <lang>', 'Target language (ISO code or language name)')
  .option('-i, --input-dir <dir>', 'Directory to translate')
  .option('-o, --output-dir <dir>', 'Base output directory (default: ./output/<YYYY-MM-DD>)')
  .option('--output-dir-name <name>', 'Custom name for the run directory (default: the target language)')
  .option('-m, --model <name>', `Model name (default: ${DEFAULT_MODEL})`)
  .option('--logging-path <dir>', 'Directory for log files (default: ./logs)')
  .option('--pull', 'Pull the model if it is not installed', false)
  .option('--backend <backend>', 'LLM backend: ollama (default) or openai (any OpenAI-compatible server)')
  .option('--host <url>', 'Ollama host or OpenAI-compatible base URL')
  .option('--include <globs...>', 'Only translate files matching these globs (default: **/*)')
  .option('--exclude <globs...>', 'Skip files matching these globs')
  .option('--gitignore', 'Honour the input directory\'s .gitignore', false)
  .option('--max-files <n>', 'Limit number of files to process', parseNumber)
  .option('--context <n>', 'Approximate model context size in tokens, used to split large files', parseNumber)
  .option('--temperature <n>', 'Sampling temperature (default: 0.1)', parseNumber)
  .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseNumber)
  .option('--dry-run', 'List files and output names, do not translate', false)
  .option('-v, --verbose', 'Verbose logging', false)
  .action(async (opts: CliOptions) => {
    process.exitCode = await run(opts);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(pc.red(error instanceof ConfigError ? errorMessage(error) : `Error: ${errorMessage(error)}`));
  process.exitCode = 1;
});
