import type { PromptTemplate } from '../config/prompts.js';
import { renderTemplate } from '../config/prompts.js';
import type { ExecutionResult } from '../schema/index.js';
import { executionResultSchema } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { MalformedOutputError } from './errors.js';
import type { PhaseContext, RenderedPrompt } from './gateway.js';
import { generateForPhase } from './gateway.js';
import { parseStructured } from './parser.js';

// ── Main entry ───────────────────────────────────────────────

export async function execute(
  question: string,
  planText: string,
  ctx: PhaseContext,
): Promise<ExecutionResult> {
  log.llm('Executor following the plan...');
  const raw = await generateForPhase(
    ctx,
    'executor',
    buildExecutorPrompt(ctx.prompts.executor, question, planText),
  );

  const result = parseStructured(raw, executionResultSchema);
  if (!result.ok) {
    throw new MalformedOutputError('executor', result.error, raw);
  }

  log.detail(`Proposed answer: ${result.value.proposed_answer}`);
  return result.value;
}

// ── Template rendering ───────────────────────────────────────

export function buildExecutorPrompt(
  template: PromptTemplate,
  question: string,
  planText: string,
): RenderedPrompt {
  const vars = { question, plan: planText };
  return {
    system: renderTemplate(template.system, vars),
    user: renderTemplate(template.user, vars),
  };
}
