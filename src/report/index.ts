/**
 * Report generation module.
 * Deterministic, no LLM calls.
 * Turns solve results into markdown + JSON artifacts.
 */

export { generateBatchJSON, generateMarkdown, serializeJSON } from './reporter.js';
export type { BatchInput } from './reporter.js';
