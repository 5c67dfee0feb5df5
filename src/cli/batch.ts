import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import type {
  BatchEntry,
  BatchOutput,
  QuestionEntry,
  SolveResult,
} from '../schema/index.js';
import { DEFAULT_CONFIG_PATH, loadConfigFile } from '../config/index.js';
import type { SolveOptions } from '../core/index.js';
import { solve } from '../core/index.js';
import {
  generateBatchJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/index.js';
import * as log from '../utils/logger.js';
import type { CommonFlags } from './shared.js';
import { reportError, resolveRun } from './shared.js';

interface RunFlags extends CommonFlags {
  name?: string;
  json?: true;
  reportPath: string;
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(name: string, result: SolveResult): void {
  const verifierPassed = result.status === 'success';
  process.stderr.write(`\n--- ${name} ---\n`);
  process.stderr.write(`Status:           ${result.status}\n`);
  process.stderr.write(`Answer:           ${result.answer || '(none)'}\n`);
  process.stderr.write(`Verifier passed:  ${String(verifierPassed)}\n`);
  process.stderr.write(`Retries:          ${String(result.metadata.retries)}\n`);
}

// ── Batch run ────────────────────────────────────────────────

export interface BatchRunOptions {
  solveOptions: SolveOptions;
  promptVersion: string;
  outputDir: string;
  /** --max-retries was given, so per-question budgets are ignored. */
  maxRetriesFromFlag: boolean;
}

/**
 * Solve each question in order, then write results.json and report.md
 * into `outputDir`.
 */
export async function runBatch(
  questions: readonly QuestionEntry[],
  options: BatchRunOptions,
): Promise<BatchOutput> {
  const { solveOptions } = options;
  const entries: BatchEntry[] = [];

  for (const entry of questions) {
    const startedAt = Date.now();
    const result = await solve(entry.question, {
      ...solveOptions,
      maxRetries: options.maxRetriesFromFlag
        ? solveOptions.maxRetries
        : (entry.maxRetries ?? solveOptions.maxRetries),
    });
    printSummary(entry.name, result);
    entries.push({
      name: entry.name,
      question: entry.question,
      durationMs: Date.now() - startedAt,
      result,
    });
  }

  const output = generateBatchJSON({
    runId: randomUUID(),
    promptVersion: options.promptVersion,
    entries,
  });

  await mkdir(options.outputDir, { recursive: true });
  await writeFile(
    path.join(options.outputDir, 'results.json'),
    serializeJSON(output) + '\n',
    'utf-8',
  );
  await writeFile(
    path.join(options.outputDir, 'report.md'),
    generateMarkdown(output),
    'utf-8',
  );

  return output;
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Solve every question listed in a config file')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--name <name>', 'Solve a single question by name')
    .option('--max-retries <n>', 'Retries after the first attempt')
    .option('--timeout <seconds>', 'Timeout per model call in seconds')
    .option('--report-path <dir>', 'Artifact directory', '.artifacts')
    .option('--json', 'Output batch JSON to stdout')
    .option('--quiet', 'Suppress progress output on stderr')
    .action(async (opts: RunFlags) => {
      log.setSilent(opts.quiet ?? false);
      try {
        const fileConfig = await loadConfigFile(opts.config);

        const questions =
          opts.name !== undefined
            ? fileConfig.questions.filter((q) => q.name === opts.name)
            : fileConfig.questions;

        if (questions.length === 0) {
          process.stderr.write(
            opts.name !== undefined
              ? `No question named "${opts.name}" found in config\n`
              : 'No questions defined in config\n',
          );
          process.exitCode = 2;
          return;
        }

        const { prompts, solveOptions } = await resolveRun(opts, fileConfig);
        const outputDir = path.resolve(opts.reportPath);
        const output = await runBatch(questions, {
          solveOptions,
          promptVersion: prompts.version,
          outputDir,
          maxRetriesFromFlag: opts.maxRetries !== undefined,
        });

        if (opts.json) {
          process.stdout.write(serializeJSON(output) + '\n');
        }

        process.stderr.write(
          `\n${String(output.succeeded)}/${String(output.total)} verified. Report: ${path.join(outputDir, 'report.md')}\n`,
        );
        process.exitCode = output.exitCode;
      } catch (err) {
        process.exitCode = reportError(err);
      }
    });
}
