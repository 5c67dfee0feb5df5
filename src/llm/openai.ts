import { z } from 'zod';

import type { GenerationParams, LLMClient } from './client.js';
import { fetchWithRetry, readJSON } from './http.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      params: GenerationParams,
    ): Promise<string> {
      const response = await fetchWithRetry('OpenAI', COMPLETIONS_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: resolvedModel,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: params.temperature,
          max_tokens: params.maxOutputTokens,
        }),
        signal: params.signal ?? null,
      });

      const parsed = chatResponseSchema.parse(await readJSON(response));

      return parsed.choices[0].message.content;
    },
  };
}
