/**
 * Core orchestration module.
 * Coordinates the planner → executor → verifier pipeline and its retry loop.
 * No CLI and no file output; the gateway is injected.
 */

export { solve, resolvePhaseSettings } from './solver.js';
export type { SolveOptions, SolverState } from './solver.js';
export { plan, buildPlannerPrompt } from './planner.js';
export { execute, buildExecutorPrompt } from './executor.js';
export { verify, buildVerifierPrompt } from './verifier.js';
export { summarize } from './summarizer.js';
export { parseStructured, extractJSON, stripCodeFences } from './parser.js';
export type { ParseResult } from './parser.js';
export { generateForPhase } from './gateway.js';
export type {
  PhaseContext,
  PhaseSettings,
  PhaseSettingsMap,
  RenderedPrompt,
} from './gateway.js';
export {
  ConfigurationError,
  GatewayError,
  MalformedOutputError,
  isAttemptFailure,
} from './errors.js';
export type { AttemptFailure } from './errors.js';
