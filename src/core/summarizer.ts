import { LIMITS } from '../config/defaults.js';
import type { ExecutionResult } from '../schema/index.js';

// ── Markers ──────────────────────────────────────────────────

// "Step 2:", "3.", "4)", "-", "*", "•" at the start of a line.
const LINE_MARKER = /^\s*(?:step\s*\d+\s*[:.)-]?|\d+[.)]|[-*•])\s+/i;
// "Step 2:" in the middle of a sentence.
const INLINE_STEP_MARKER = /\bstep\s*\d+\s*[:.)-]\s*/gi;
const ELLIPSIS = '...';

// ── Main entry ───────────────────────────────────────────────

/**
 * Condense an executor explanation into the text shown to the user.
 * Local and deterministic. Nothing from `intermediate` survives.
 */
export function summarize(
  execution: ExecutionResult,
  maxChars: number = LIMITS.MAX_SUMMARY_CHARS,
): string {
  const hidden = collectStrings(execution.intermediate)
    .map(collapseWhitespace)
    .filter((s) => s.length > 0)
    .sort((a, b) => b.length - a.length);

  let text = redact(collapseWhitespace(execution.explanation), hidden);

  text = text
    .split(/\r?\n/)
    .map((line) => line.replace(LINE_MARKER, ''))
    .join(' ')
    .replace(INLINE_STEP_MARKER, '');

  text = truncate(collapseWhitespace(text), maxChars);

  // Marker removal and truncation can stitch a hidden string back together.
  while (hidden.some((s) => text.includes(s))) {
    text = redact(text, hidden);
  }

  return text;
}

// ── Helpers ──────────────────────────────────────────────────

function collectStrings(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.flatMap(collectStrings);
  if (typeof value === 'object' && value !== null) {
    return Object.values(value).flatMap(collectStrings);
  }
  return [];
}

function redact(text: string, hidden: readonly string[]): string {
  let out = text;
  for (const s of hidden) {
    out = out.split(s).join(' ');
  }
  return collapseWhitespace(out);
}

function collapseWhitespace(text: string): string {
  return text.replace(/[ \t]+/g, ' ').replace(/ *\n */g, '\n').trim();
}

function truncate(text: string, maxChars: number): string {
  const flat = text.replace(/\s+/g, ' ');
  if (flat.length <= maxChars) return flat;

  let cut = flat.slice(0, Math.max(0, maxChars - ELLIPSIS.length));
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > cut.length / 2) {
    cut = cut.slice(0, lastSpace);
  }
  return cut.trimEnd() + ELLIPSIS;
}
