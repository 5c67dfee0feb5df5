import * as log from '../utils/logger.js';

// ── Rate-limit-aware fetch ───────────────────────────────────

const MAX_RETRIES = 3;
const BACKOFF_MS = 5000;

export async function fetchWithRetry(
  label: string,
  url: string,
  init: RequestInit,
): Promise<Response> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    const response = await fetch(url, init);

    if (response.status === 429 && attempt < MAX_RETRIES - 1) {
      const retryAfter = response.headers.get('retry-after');
      const waitMs = retryAfter
        ? parseFloat(retryAfter) * 1000
        : (attempt + 1) * BACKOFF_MS;
      log.warn(
        `[llm] ${label} rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`,
      );
      if (!(await sleep(waitMs, init.signal))) {
        throw new Error(`${label} request aborted`);
      }
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `${label} API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error(`${label} API: max retries exceeded due to rate limiting`);
}

export async function readJSON(response: Response): Promise<unknown> {
  const raw = await response.text();
  const body: unknown = JSON.parse(raw);
  return body;
}

/** Wait `ms`, cut short by `signal`. Resolves false when aborted. */
export function sleep(
  ms: number,
  signal?: AbortSignal | null,
): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
