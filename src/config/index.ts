/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated. Prompt templates are versioned files, not literals.
 */

export {
  TIMEOUTS,
  LIMITS,
  PHASE_PARAMS,
  PROMPT_VERSION,
  DEFAULT_CONFIG_PATH,
  FAILED_REASONING,
} from './defaults.js';
export { loadConfigFile, loadOptionalConfigFile } from './loader.js';
export {
  loadPromptTemplates,
  renderTemplate,
  DEFAULT_PROMPTS_DIR,
} from './prompts.js';
export type { PromptTemplate, PromptTemplates } from './prompts.js';
