import type { PromptTemplate } from '../config/prompts.js';
import { renderTemplate } from '../config/prompts.js';
import type { ExecutionResult, VerificationResult } from '../schema/index.js';
import { verificationResultSchema } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { MalformedOutputError } from './errors.js';
import type { PhaseContext, RenderedPrompt } from './gateway.js';
import { generateForPhase } from './gateway.js';
import { parseStructured } from './parser.js';

// ── Main entry ───────────────────────────────────────────────

/**
 * Have the model check an execution result. A missing `passed` flag or
 * a malformed check entry is a MalformedOutputError, never `passed: false`.
 */
export async function verify(
  question: string,
  execution: ExecutionResult,
  ctx: PhaseContext,
): Promise<VerificationResult> {
  log.llm('Verifier checking the proposed answer...');
  const raw = await generateForPhase(
    ctx,
    'verifier',
    buildVerifierPrompt(ctx.prompts.verifier, question, execution),
  );

  const result = parseStructured(raw, verificationResultSchema);
  if (!result.ok) {
    throw new MalformedOutputError('verifier', result.error, raw);
  }

  for (const check of result.value.checks) {
    log.check(check.passed, check.check_name, check.details);
  }
  if (result.value.issues) {
    log.detail(`Issues: ${result.value.issues}`);
  }
  return result.value;
}

// ── Template rendering ───────────────────────────────────────

export function buildVerifierPrompt(
  template: PromptTemplate,
  question: string,
  execution: ExecutionResult,
): RenderedPrompt {
  const vars = {
    question,
    proposedAnswer: execution.proposed_answer,
    explanation: execution.explanation,
    notes: formatNotes(execution.intermediate),
  };
  return {
    system: renderTemplate(template.system, vars),
    user: renderTemplate(template.user, vars),
  };
}

function formatNotes(intermediate: ExecutionResult['intermediate']): string {
  if (intermediate === undefined || intermediate === null) return '(none)';
  if (typeof intermediate === 'string') return intermediate || '(none)';
  return JSON.stringify(intermediate);
}
