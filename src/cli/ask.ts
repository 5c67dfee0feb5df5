import { createInterface } from 'node:readline/promises';

import type { Command } from 'commander';

import {
  DEFAULT_CONFIG_PATH,
  loadConfigFile,
  loadOptionalConfigFile,
} from '../config/index.js';
import { solve } from '../core/index.js';
import { serializeJSON } from '../report/index.js';
import * as log from '../utils/logger.js';
import type { CommonFlags } from './shared.js';
import { reportError, resolveRun } from './shared.js';

// ── Interactive input ────────────────────────────────────────

async function promptForQuestion(): Promise<string> {
  // The prompt goes to stderr so stdout carries only the JSON result.
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question('Enter your question: ');
  } finally {
    rl.close();
  }
}

// ── Command registration ─────────────────────────────────────

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Solve one question and print the result JSON to stdout')
    .argument('[question...]', 'Question text (prompted for when omitted)')
    .option('--max-retries <n>', 'Retries after the first attempt')
    .option('--timeout <seconds>', 'Timeout per model call in seconds')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--quiet', 'Suppress progress output on stderr')
    .action(async (words: string[], opts: CommonFlags) => {
      log.setSilent(opts.quiet ?? false);
      try {
        const fileConfig =
          opts.config === DEFAULT_CONFIG_PATH
            ? await loadOptionalConfigFile(opts.config)
            : await loadConfigFile(opts.config);
        const { solveOptions } = await resolveRun(opts, fileConfig);

        const question =
          words.length > 0 ? words.join(' ') : await promptForQuestion();

        const result = await solve(question, solveOptions);
        process.stdout.write(serializeJSON(result) + '\n');
        process.exitCode = result.status === 'success' ? 0 : 1;
      } catch (err) {
        process.exitCode = reportError(err);
      }
    });
}
