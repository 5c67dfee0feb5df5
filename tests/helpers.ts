import type { PromptTemplates } from '../src/config/prompts.js';
import type { CheckItem } from '../src/schema/index.js';

export const promptFixture: PromptTemplates = {
  version: 'test',
  planner: {
    system: 'PLANNER',
    user: 'Q={{question}}',
  },
  executor: {
    system: 'EXECUTOR',
    user: 'Q={{question}}\nPLAN={{plan}}',
  },
  verifier: {
    system: 'VERIFIER',
    user: 'Q={{question}} A={{proposedAnswer}} E={{explanation}} N={{notes}}',
  },
};

export function execJSON(
  proposedAnswer: string,
  explanation: string,
  intermediate?: unknown,
): string {
  return JSON.stringify({
    proposed_answer: proposedAnswer,
    explanation,
    ...(intermediate !== undefined ? { intermediate } : {}),
  });
}

export function check(name: string, passed: boolean, details = 'ok'): CheckItem {
  return { check_name: name, passed, details };
}

export function verifyJSON(
  passed: boolean,
  checks: readonly CheckItem[] = [check('arithmetic', passed)],
  issues = '',
): string {
  return JSON.stringify({ passed, checks, issues });
}
