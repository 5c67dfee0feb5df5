import type { PromptTemplate } from '../config/prompts.js';
import { renderTemplate } from '../config/prompts.js';
import * as log from '../utils/logger.js';
import { MalformedOutputError } from './errors.js';
import type { PhaseContext, RenderedPrompt } from './gateway.js';
import { generateForPhase } from './gateway.js';
import { stripCodeFences } from './parser.js';

// ── Main entry ───────────────────────────────────────────────

/**
 * Ask the model for a short numbered plan. The plan is only context for
 * the executor, so nothing beyond "non-empty" is enforced on it.
 */
export async function plan(
  question: string,
  ctx: PhaseContext,
): Promise<string> {
  log.llm('Planner drafting a plan...');
  const raw = await generateForPhase(
    ctx,
    'planner',
    buildPlannerPrompt(ctx.prompts.planner, question),
  );

  const planText = stripCodeFences(raw);
  if (planText.length === 0) {
    throw new MalformedOutputError('planner', 'Model returned an empty plan', raw);
  }

  for (const line of planText.split('\n')) {
    log.detail(line);
  }
  return planText;
}

// ── Template rendering ───────────────────────────────────────

export function buildPlannerPrompt(
  template: PromptTemplate,
  question: string,
): RenderedPrompt {
  const vars = { question };
  return {
    system: renderTemplate(template.system, vars),
    user: renderTemplate(template.user, vars),
  };
}
