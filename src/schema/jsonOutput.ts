import { z } from 'zod';

import { solveResultSchema } from './solve.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Batch entry ─────────────────────────────────────────────

export const batchEntrySchema = z.object({
  name: z.string().min(1),
  question: z.string().min(1),
  durationMs: z.number().int().nonnegative(),
  result: solveResultSchema,
});

export type BatchEntry = z.infer<typeof batchEntrySchema>;

// ── Root output ─────────────────────────────────────────────

export const batchOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  promptVersion: z.string().min(1),
  total: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  results: z.array(batchEntrySchema),
});

export type BatchOutput = z.infer<typeof batchOutputSchema>;
