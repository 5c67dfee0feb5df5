/**
 * Default configuration values.
 * All values are overridable via config file or `solve` options.
 */

export const TIMEOUTS = {
  GATEWAY_CALL: 60_000,
} as const;

export const LIMITS = {
  DEFAULT_MAX_RETRIES: 1,
  MAX_SUMMARY_CHARS: 250,
} as const;

// Planning gets a little temperature for varied plans across retries;
// execution and verification stay deterministic.
export const PHASE_PARAMS = {
  planner: { temperature: 0.2, maxOutputTokens: 512 },
  executor: { temperature: 0, maxOutputTokens: 1024 },
  verifier: { temperature: 0, maxOutputTokens: 1024 },
} as const;

export const PROMPT_VERSION = 'v1';

export const DEFAULT_CONFIG_PATH = '.verisolve.yaml';

export const FAILED_REASONING =
  'The solver could not find a consistent solution after verification.';
