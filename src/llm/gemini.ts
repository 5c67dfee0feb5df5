import { z } from 'zod';

import type { GenerationParams, LLMClient } from './client.js';
import { fetchWithRetry, readJSON } from './http.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gemini-2.0-flash';
const API_BASE = 'https://generativelanguage.googleapis.com/v1beta/models';

// ── Response validation ──────────────────────────────────────

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })),
        }),
      }),
    )
    .nonempty(),
});

// ── Provider factory ─────────────────────────────────────────

export function createGeminiClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const url = `${API_BASE}/${encodeURIComponent(resolvedModel)}:generateContent`;

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      params: GenerationParams,
    ): Promise<string> {
      const response = await fetchWithRetry('Gemini', url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': apiKey,
        },
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: systemPrompt }] },
          contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
          generationConfig: {
            temperature: params.temperature,
            maxOutputTokens: params.maxOutputTokens,
          },
        }),
        signal: params.signal ?? null,
      });

      const parsed = generateContentResponseSchema.parse(await readJSON(response));

      const text = parsed.candidates[0].content.parts
        .map((part) => part.text ?? '')
        .join('');
      if (text.length === 0) {
        throw new Error('Gemini API returned no text content');
      }

      return text;
    },
  };
}
