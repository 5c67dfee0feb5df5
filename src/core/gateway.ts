import type { LLMClient } from '../llm/index.js';
import type { PromptTemplates } from '../config/prompts.js';
import type { Phase } from '../schema/index.js';
import { GatewayError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface PhaseSettings {
  temperature: number;
  maxOutputTokens: number;
}

export type PhaseSettingsMap = Readonly<Record<Phase, PhaseSettings>>;

/** Everything a phase function needs besides its own inputs. */
export interface PhaseContext {
  client: LLMClient;
  prompts: PromptTemplates;
  settings: PhaseSettingsMap;
  timeoutMs: number;
}

export interface RenderedPrompt {
  system: string;
  user: string;
}

// ── Gateway call ─────────────────────────────────────────────

/**
 * One model call for one phase. Transport errors and timeouts both
 * surface as GatewayError; the call is never retried here.
 */
export async function generateForPhase(
  ctx: PhaseContext,
  phase: Phase,
  prompt: RenderedPrompt,
): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new GatewayError(
          phase,
          `Model call timed out after ${String(ctx.timeoutMs)}ms`,
        ),
      );
      controller.abort();
    }, ctx.timeoutMs);
  });

  try {
    const call = ctx.client.generate(prompt.system, prompt.user, {
      ...ctx.settings[phase],
      signal: controller.signal,
    });
    return await Promise.race([call, timeout]);
  } catch (err) {
    if (err instanceof GatewayError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new GatewayError(phase, message, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}
