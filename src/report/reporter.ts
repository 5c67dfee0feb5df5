import type { BatchEntry, BatchOutput, SolveResult } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';

// ── Batch JSON ───────────────────────────────────────────────

export interface BatchInput {
  runId: string;
  promptVersion: string;
  entries: readonly BatchEntry[];
}

export function generateBatchJSON(batch: BatchInput): BatchOutput {
  const succeeded = batch.entries.filter(
    (e) => e.result.status === 'success',
  ).length;
  const failed = batch.entries.length - succeeded;

  return {
    version: JSON_OUTPUT_VERSION,
    runId: batch.runId,
    promptVersion: batch.promptVersion,
    total: batch.entries.length,
    succeeded,
    failed,
    exitCode: failed > 0 ? 1 : 0,
    results: [...batch.entries],
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: BatchOutput | SolveResult): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0,
  );
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(output: BatchOutput): string {
  const lines: string[] = [];

  lines.push('# verisolve report');
  lines.push('');
  lines.push(`- Run ID: \`${output.runId}\``);
  lines.push(`- Prompt version: ${output.promptVersion}`);
  lines.push(
    `- Result: ${String(output.succeeded)}/${String(output.total)} verified, ${String(output.failed)} failed`,
  );
  lines.push('');
  lines.push('| # | Name | Status | Answer | Retries | Time |');
  lines.push('|---|------|--------|--------|---------|------|');

  output.results.forEach((entry, i) => {
    const icon = entry.result.status === 'success' ? '✅' : '❌';
    lines.push(
      `| ${String(i + 1)} | ${escapeCell(entry.name)} | ${icon} ${entry.result.status} | ${escapeCell(entry.result.answer) || '—'} | ${String(entry.result.metadata.retries)} | ${(entry.durationMs / 1000).toFixed(1)}s |`,
    );
  });

  for (const entry of output.results) {
    lines.push('');
    lines.push(`## ${entry.name}`);
    lines.push('');
    lines.push(`> ${entry.question}`);
    lines.push('');
    lines.push(`**Answer:** ${entry.result.answer || '(none)'}`);
    lines.push('');
    lines.push(entry.result.reasoning_visible_to_user);

    if (entry.result.metadata.checks.length > 0) {
      lines.push('');
      lines.push('### Checks');
      lines.push('');
      for (const check of entry.result.metadata.checks) {
        const icon = check.passed ? '✅' : '❌';
        lines.push(`- ${icon} **${check.check_name}**: ${check.details}`);
      }
    }
  }

  lines.push('');
  return lines.join('\n');
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}
