import type { GenerationParams, LLMClient } from './client.js';

// Unscripted calls cycle through one passing planner → executor → verifier
// round, so `provider: mock` solves any question without a model.
export const DEFAULT_SCRIPT: readonly string[] = [
  '1. Restate the question\n2. Answer it directly',
  JSON.stringify({
    proposed_answer: 'mock answer',
    explanation: 'Mock provider reply; no model was called.',
  }),
  JSON.stringify({
    passed: true,
    checks: [
      { check_name: 'mock', passed: true, details: 'Mock provider always passes' },
    ],
    issues: '',
  }),
];

export type MockResponse = string | Error;

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
  params: GenerationParams;
}

export interface MockLLMClient extends LLMClient {
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing.
 * Consumes scripted responses in order, then cycles through
 * DEFAULT_SCRIPT once they run out. An `Error` entry is thrown instead of returned, which
 * stands in for a transport failure.
 */
export function createMockClient(
  responses?: readonly MockResponse[],
): MockLLMClient {
  const calls: MockCall[] = [];

  return {
    calls,
    async generate(
      systemPrompt: string,
      userPrompt: string,
      params: GenerationParams,
    ): Promise<string> {
      const scripted = responses ?? [];
      const response =
        scripted[calls.length] ??
        DEFAULT_SCRIPT[(calls.length - scripted.length) % DEFAULT_SCRIPT.length] ??
        '';
      calls.push({ systemPrompt, userPrompt, params });
      if (response instanceof Error) throw response;
      return response;
    },
  };
}
