import type { Phase } from '../schema/index.js';

// ── Configuration ────────────────────────────────────────────
// Precondition violations. Raised before any attempt runs and never retried.

export class ConfigurationError extends Error {
  readonly kind = 'configuration';
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ── Attempt-level failures ───────────────────────────────────
// Both end the current attempt and consume one retry.

export class GatewayError extends Error {
  readonly kind = 'gateway';
  readonly exitCode = 4;

  constructor(
    readonly phase: Phase,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${phase}] ${message}`, options);
    this.name = 'GatewayError';
  }
}

export class MalformedOutputError extends Error {
  readonly kind = 'malformed_output';
  readonly exitCode = 4;

  constructor(
    readonly phase: Phase,
    message: string,
    readonly rawOutput: string,
  ) {
    super(`[${phase}] ${message}`);
    this.name = 'MalformedOutputError';
  }
}

export type AttemptFailure = GatewayError | MalformedOutputError;

export function isAttemptFailure(err: unknown): err is AttemptFailure {
  return err instanceof GatewayError || err instanceof MalformedOutputError;
}
