import Anthropic from '@anthropic-ai/sdk';

import type { GenerationParams, LLMClient } from './client.js';
import { sleep } from './http.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_RETRIES = 3;

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Error && err.message.includes('429')) return true;
  return false;
}

async function withRetry<T>(
  fn: () => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt === MAX_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * 5000;
      log.warn(
        `[llm] Anthropic rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`,
      );
      if (!(await sleep(waitMs, signal))) {
        throw new Error('Anthropic request aborted', { cause: err });
      }
    }
  }

  throw new Error('Anthropic API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  // Rate-limit retries live in withRetry.
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      params: GenerationParams,
    ): Promise<string> {
      const response = await withRetry(() =>
        client.messages.create(
          {
            model: resolvedModel,
            max_tokens: params.maxOutputTokens,
            system: systemPrompt,
            messages: [{ role: 'user', content: userPrompt }],
            temperature: params.temperature,
          },
          params.signal ? { signal: params.signal } : undefined,
        ),
        params.signal,
      );

      const text = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
      if (text.length === 0) {
        throw new Error('Anthropic API returned no text content');
      }

      return text;
    },
  };
}
