import { z } from 'zod';

import { ConfigurationError } from '../core/errors.js';

// ── LLMClient interface ──────────────────────────────────────

export interface GenerationParams {
  temperature: number;
  maxOutputTokens: number;
  signal?: AbortSignal | undefined;
}

export interface LLMClient {
  generate(
    systemPrompt: string,
    userPrompt: string,
    params: GenerationParams,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'gemini', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

const API_KEY_VARS: Record<LLMProvider, string | null> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  gemini: 'GEMINI_API_KEY',
  mock: null,
};

export function apiKeyVariable(provider: LLMProvider): string | null {
  return API_KEY_VARS[provider];
}

export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = llmProviderSchema.safeParse(env['LLM_PROVIDER'] ?? 'gemini');
  if (!provider.success) {
    throw new ConfigurationError(
      `Unknown LLM_PROVIDER "${String(env['LLM_PROVIDER'])}" (expected one of ${llmProviderSchema.options.join(', ')})`,
    );
  }

  const keyVar = apiKeyVariable(provider.data);
  const apiKey = keyVar ? env[keyVar] : undefined;
  const model = env['VERISOLVE_MODEL'];

  const result = llmConfigSchema.safeParse({
    provider: provider.data,
    apiKey: apiKey === '' ? undefined : apiKey,
    model: model === '' ? undefined : model,
  });
  if (!result.success) {
    throw new ConfigurationError(`Invalid LLM config: ${result.error.message}`);
  }

  return result.data;
}
