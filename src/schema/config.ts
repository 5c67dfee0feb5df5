import { z } from 'zod';

// ── Generation overrides per phase ──────────────────────────

export const phaseParamsOverrideSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
});

export type PhaseParamsOverride = z.infer<typeof phaseParamsOverrideSchema>;

export const phaseParamsOverridesSchema = z.object({
  planner: phaseParamsOverrideSchema.optional(),
  executor: phaseParamsOverrideSchema.optional(),
  verifier: phaseParamsOverrideSchema.optional(),
});

export type PhaseParamsOverrides = z.infer<typeof phaseParamsOverridesSchema>;

// ── Question entry (batch runs) ─────────────────────────────

export const questionEntrySchema = z.object({
  name: z.string().min(1),
  question: z.string().trim().min(1),
  maxRetries: z.number().int().nonnegative().optional(),
});

export type QuestionEntry = z.infer<typeof questionEntrySchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'gemini', 'mock']).optional(),
  model: z.string().min(1).optional(),
  maxRetries: z.number().int().nonnegative().optional().default(1),
  timeout: z.number().positive().optional().default(60),
  promptsDir: z.string().min(1).optional(),
  phases: phaseParamsOverridesSchema.optional(),
  questions: z.array(questionEntrySchema).optional().default([]),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
