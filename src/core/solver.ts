import type { LLMClient, LLMConfig } from '../llm/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { PromptTemplates } from '../config/prompts.js';
import { loadPromptTemplates } from '../config/prompts.js';
import {
  FAILED_REASONING,
  LIMITS,
  PHASE_PARAMS,
  TIMEOUTS,
} from '../config/defaults.js';
import type {
  CheckItem,
  ExecutionResult,
  Phase,
  PhaseParamsOverrides,
  SolveResult,
} from '../schema/index.js';
import { questionSchema } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { ConfigurationError, isAttemptFailure } from './errors.js';
import type { PhaseContext, PhaseSettings, PhaseSettingsMap } from './gateway.js';
import { plan } from './planner.js';
import { execute } from './executor.js';
import { verify } from './verifier.js';
import { summarize } from './summarizer.js';

// ── Public types ─────────────────────────────────────────────

export interface SolveOptions {
  /** Retries after the first attempt; 0 means exactly one attempt. */
  maxRetries?: number | undefined;
  /** Injected gateway. When absent one is built from `llmConfig` or the env. */
  client?: LLMClient | undefined;
  llmConfig?: LLMConfig | undefined;
  /** Injected templates. When absent they are read from `promptsDir`. */
  prompts?: PromptTemplates | undefined;
  promptsDir?: string | undefined;
  phaseParams?: PhaseParamsOverrides | undefined;
  /** Per gateway call. */
  timeoutMs?: number | undefined;
  summaryMaxChars?: number | undefined;
}

// ── State machine ────────────────────────────────────────────

export type SolverState =
  | { kind: 'attempt_start' }
  | { kind: 'planning' }
  | { kind: 'executing'; plan: string }
  | { kind: 'verifying'; plan: string; execution: ExecutionResult }
  | { kind: 'accepted'; plan: string; execution: ExecutionResult }
  | { kind: 'exhausted' };

type ActiveState = Exclude<SolverState, { kind: 'accepted' | 'exhausted' }>;
type TerminalState = Extract<SolverState, { kind: 'accepted' | 'exhausted' }>;

interface AttemptRecord {
  plan?: string | undefined;
  execution?: ExecutionResult | undefined;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Answer a word problem with plan → execute → verify, retrying the whole
 * pipeline until the verifier passes or `maxRetries + 1` attempts are spent.
 *
 * Only ConfigurationError is thrown, and always before the first model call.
 * Gateway and parse failures are folded into a `failed` result.
 */
export async function solve(
  question: string,
  options: SolveOptions = {},
): Promise<SolveResult> {
  const parsedQuestion = questionSchema.safeParse(question);
  if (!parsedQuestion.success) {
    throw new ConfigurationError('Question must be a non-empty string');
  }

  const maxRetries = options.maxRetries ?? LIMITS.DEFAULT_MAX_RETRIES;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ConfigurationError(
      `maxRetries must be a non-negative integer, got ${String(maxRetries)}`,
    );
  }

  const timeoutMs = options.timeoutMs ?? TIMEOUTS.GATEWAY_CALL;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(
      `timeoutMs must be a positive number, got ${String(timeoutMs)}`,
    );
  }

  const client =
    options.client ?? createLLMClient(options.llmConfig ?? loadLLMConfig());
  const prompts =
    options.prompts ?? (await loadPromptTemplates(options.promptsDir));

  const ctx: PhaseContext = {
    client,
    prompts,
    settings: resolvePhaseSettings(options.phaseParams),
    timeoutMs,
  };

  return runSolveLoop(
    parsedQuestion.data,
    maxRetries,
    ctx,
    options.summaryMaxChars ?? LIMITS.MAX_SUMMARY_CHARS,
  );
}

// ── Loop ─────────────────────────────────────────────────────

async function runSolveLoop(
  question: string,
  maxRetries: number,
  ctx: PhaseContext,
  summaryMaxChars: number,
): Promise<SolveResult> {
  const totalAttempts = maxRetries + 1;
  const checks: CheckItem[] = [];
  let attempt = 0;
  let current: AttemptRecord = {};
  let state: SolverState = { kind: 'attempt_start' };

  log.section(`Solving: ${question}`);

  function nextAttemptOrExhausted(): SolverState {
    if (attempt < maxRetries) {
      attempt++;
      return { kind: 'attempt_start' };
    }
    return { kind: 'exhausted' };
  }

  async function advance(from: ActiveState): Promise<SolverState> {
    switch (from.kind) {
      case 'attempt_start':
        current = {};
        log.attempt(attempt, totalAttempts);
        return { kind: 'planning' };

      case 'planning': {
        const planText = await plan(question, ctx);
        current.plan = planText;
        return { kind: 'executing', plan: planText };
      }

      case 'executing': {
        const execution = await execute(question, from.plan, ctx);
        current.execution = execution;
        return { kind: 'verifying', plan: from.plan, execution };
      }

      case 'verifying': {
        const verification = await verify(question, from.execution, ctx);
        checks.push(...verification.checks);
        if (verification.passed) {
          return { kind: 'accepted', plan: from.plan, execution: from.execution };
        }
        log.warn(`Verification failed on attempt ${String(attempt + 1)}`);
        return nextAttemptOrExhausted();
      }
    }
  }

  while (!isTerminal(state)) {
    try {
      state = await advance(state);
    } catch (err) {
      if (!isAttemptFailure(err)) throw err;
      log.warn(`Attempt ${String(attempt + 1)} failed (${err.kind}): ${err.message}`);
      state = nextAttemptOrExhausted();
    }
  }

  return buildResult(state, current, checks, attempt, summaryMaxChars);
}

function isTerminal(state: SolverState): state is TerminalState {
  return state.kind === 'accepted' || state.kind === 'exhausted';
}

// ── Result assembly ──────────────────────────────────────────

function buildResult(
  state: TerminalState,
  last: AttemptRecord,
  checks: readonly CheckItem[],
  retries: number,
  summaryMaxChars: number,
): SolveResult {
  if (state.kind === 'accepted') {
    log.verdict(true, `Verified answer: ${state.execution.proposed_answer}`);
    return {
      answer: state.execution.proposed_answer,
      status: 'success',
      reasoning_visible_to_user: summarize(state.execution, summaryMaxChars),
      metadata: { plan: state.plan, checks: [...checks], retries },
    };
  }

  // Exhausted: report the last attempt as-is, unverified.
  log.verdict(false, `No verified answer after ${String(retries + 1)} attempt(s)`);
  const reasoning = last.execution
    ? summarize(last.execution, summaryMaxChars)
    : '';
  return {
    answer: last.execution?.proposed_answer ?? '',
    status: 'failed',
    reasoning_visible_to_user: reasoning || FAILED_REASONING,
    metadata: { plan: last.plan ?? '', checks: [...checks], retries },
  };
}

// ── Settings ─────────────────────────────────────────────────

export function resolvePhaseSettings(
  overrides?: PhaseParamsOverrides,
): PhaseSettingsMap {
  const resolve = (phase: Phase): PhaseSettings => ({
    temperature: overrides?.[phase]?.temperature ?? PHASE_PARAMS[phase].temperature,
    maxOutputTokens:
      overrides?.[phase]?.maxOutputTokens ?? PHASE_PARAMS[phase].maxOutputTokens,
  });

  return {
    planner: resolve('planner'),
    executor: resolve('executor'),
    verifier: resolve('verifier'),
  };
}
