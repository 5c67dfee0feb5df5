import type { FileConfig } from '../schema/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { PromptTemplates } from '../config/index.js';
import { loadPromptTemplates } from '../config/index.js';
import type { SolveOptions } from '../core/index.js';
import { ConfigurationError } from '../core/index.js';
import * as log from '../utils/logger.js';

// ── Flags shared by every command ────────────────────────────

export interface CommonFlags {
  config: string;
  maxRetries?: string;
  timeout?: string;
  quiet?: true;
}

export interface ResolvedRun {
  prompts: PromptTemplates;
  solveOptions: SolveOptions;
}

// ── Merge: CLI flags > config file > env ─────────────────────

export async function resolveRun(
  flags: CommonFlags,
  fileConfig: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ResolvedRun> {
  const maxRetries =
    flags.maxRetries !== undefined
      ? parseIntegerFlag('--max-retries', flags.maxRetries)
      : fileConfig.maxRetries;
  const timeoutSec =
    flags.timeout !== undefined
      ? parseNumberFlag('--timeout', flags.timeout)
      : fileConfig.timeout;

  const llmConfig = loadLLMConfig({
    ...env,
    ...(fileConfig.provider !== undefined ? { LLM_PROVIDER: fileConfig.provider } : {}),
    ...(fileConfig.model !== undefined ? { VERISOLVE_MODEL: fileConfig.model } : {}),
  });
  const client = createLLMClient(llmConfig);
  const prompts = await loadPromptTemplates(fileConfig.promptsDir);
  log.info(`Provider: ${llmConfig.provider}, prompts: ${prompts.version}`);

  return {
    prompts,
    solveOptions: {
      client,
      prompts,
      maxRetries,
      timeoutMs: timeoutSec * 1000,
      phaseParams: fileConfig.phases,
    },
  };
}

function parseIntegerFlag(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${flag} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseNumberFlag(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${flag} must be a positive number, got "${raw}"`);
  }
  return value;
}

// ── Error reporting ──────────────────────────────────────────

export function reportError(err: unknown): number {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  return err instanceof ConfigurationError ? err.exitCode : 4;
}
