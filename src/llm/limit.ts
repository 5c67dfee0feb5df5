import type { GenerationParams, LLMClient } from './client.js';

/**
 * Wraps a client so that at most `limit` generate calls are in flight.
 * Further calls queue in FIFO order. Lets several `solve` invocations
 * share one provider quota.
 */
export function createConcurrencyLimitedClient(
  client: LLMClient,
  limit: number,
): LLMClient {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${String(limit)}`);
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  async function acquire(): Promise<void> {
    if (active < limit) {
      active++;
      return;
    }
    // The releasing call hands its slot over, so `active` stays unchanged.
    await new Promise<void>((resolve) => waiting.push(resolve));
  }

  function release(): void {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active--;
    }
  }

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      params: GenerationParams,
    ): Promise<string> {
      await acquire();
      try {
        return await client.generate(systemPrompt, userPrompt, params);
      } finally {
        release();
      }
    },
  };
}
