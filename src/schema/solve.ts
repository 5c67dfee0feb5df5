import { z } from 'zod';

// ── Question ────────────────────────────────────────────────

export const questionSchema = z
  .string()
  .trim()
  .min(1, 'Question must not be empty');

// ── Phases ──────────────────────────────────────────────────

export const phaseSchema = z.enum(['planner', 'executor', 'verifier']);

export type Phase = z.infer<typeof phaseSchema>;

// ── ExecutionResult ─────────────────────────────────────────
// `intermediate` is free-form: the model is asked for {"notes": "..."}
// but any JSON value (null, a list, a bare string) is kept as-is.

export const executionResultSchema = z.object({
  proposed_answer: z.string(),
  explanation: z.string(),
  intermediate: z.unknown().optional(),
});

export type ExecutionResult = z.infer<typeof executionResultSchema>;

// ── VerificationResult ──────────────────────────────────────

export const checkItemSchema = z.object({
  check_name: z.string(),
  passed: z.boolean(),
  details: z.string(),
});

export type CheckItem = z.infer<typeof checkItemSchema>;

export const verificationResultSchema = z.object({
  passed: z.boolean(),
  checks: z.array(checkItemSchema),
  issues: z.string().default(''),
});

export type VerificationResult = z.infer<typeof verificationResultSchema>;

// ── SolveResult ─────────────────────────────────────────────

export const solveStatusSchema = z.enum(['success', 'failed']);

export type SolveStatus = z.infer<typeof solveStatusSchema>;

export const solveMetadataSchema = z.object({
  plan: z.string(),
  checks: z.array(checkItemSchema),
  retries: z.number().int().nonnegative(),
});

export type SolveMetadata = z.infer<typeof solveMetadataSchema>;

export const solveResultSchema = z.object({
  answer: z.string(),
  status: solveStatusSchema,
  reasoning_visible_to_user: z.string(),
  metadata: solveMetadataSchema,
});

export type SolveResult = z.infer<typeof solveResultSchema>;
