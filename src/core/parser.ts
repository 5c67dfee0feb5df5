import type { z } from 'zod';

// ── Result type ──────────────────────────────────────────────

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

// ── Noise removal ────────────────────────────────────────────

const FENCE_MARKER = /```[A-Za-z0-9_-]*/g;

/** Remove every ``` / ```json marker, keeping what was between them. */
export function stripCodeFences(raw: string): string {
  return raw.replace(FENCE_MARKER, '').trim();
}

/**
 * Narrow model text down to the JSON it most likely holds: the body of
 * the first fenced block, else the outermost braces, else the trimmed text.
 */
export function extractJSON(raw: string): string {
  const fenced = /```[A-Za-z0-9_-]*[ \t]*\n?([\s\S]*?)```/.exec(raw);
  const body = fenced?.[1]?.trim();
  if (body) return body;

  const unfenced = stripCodeFences(raw);
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start !== -1 && end > start) return unfenced.slice(start, end + 1);

  return unfenced;
}

// ── JSON extraction + validation ─────────────────────────────

export function parseStructured<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
): ParseResult<z.output<S>> {
  const json = extractJSON(raw);
  if (json.length === 0) {
    return { ok: false, error: 'Empty model output' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: formatIssues(result.error) };
  }

  return { ok: true, value: result.data };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}
