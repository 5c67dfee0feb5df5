/**
 * LLM abstraction module (the model gateway).
 * Provider-agnostic interface for the planner, executor and verifier.
 * Only module allowed to make LLM API calls.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { apiKeyVariable } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createGeminiClient } from './gemini.js';
import { createMockClient } from './mock.js';
import { ConfigurationError } from '../core/errors.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createGeminiClient } from './gemini.js';
export { createMockClient } from './mock.js';
export type { MockCall, MockLLMClient, MockResponse } from './mock.js';
export { createConcurrencyLimitedClient } from './limit.js';

// ── Provider factory ─────────────────────────────────────────

export function createLLMClient(config: LLMConfig): LLMClient {
  if (config.provider === 'mock') {
    return createMockClient();
  }

  if (!config.apiKey) {
    throw new ConfigurationError(
      `${String(apiKeyVariable(config.provider))} is required when using the ${config.provider} provider`,
    );
  }

  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(config.apiKey, config.model);
    case 'openai':
      return createOpenAIClient(config.apiKey, config.model);
    case 'gemini':
      return createGeminiClient(config.apiKey, config.model);
  }
}
