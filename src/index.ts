/**
 * verisolve public API.
 */

export * from './core/index.js';
export * from './schema/index.js';
export {
  createLLMClient,
  createMockClient,
  createConcurrencyLimitedClient,
  loadLLMConfig,
} from './llm/index.js';
export type {
  LLMClient,
  LLMConfig,
  LLMProvider,
  GenerationParams,
  MockLLMClient,
  MockResponse,
} from './llm/index.js';
export { loadPromptTemplates, renderTemplate } from './config/index.js';
export type { PromptTemplate, PromptTemplates } from './config/index.js';
