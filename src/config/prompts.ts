import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Phase } from '../schema/index.js';
import { phaseSchema } from '../schema/index.js';
import { PROMPT_VERSION } from './defaults.js';
import { ConfigurationError } from '../core/errors.js';

// ── Public types ─────────────────────────────────────────────

export interface PromptTemplate {
  system: string;
  user: string;
}

export interface PromptTemplates {
  version: string;
  planner: PromptTemplate;
  executor: PromptTemplate;
  verifier: PromptTemplate;
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Loading ──────────────────────────────────────────────────

/**
 * Read `<dir>/<version>/<phase>.system.txt` and `<phase>.user.txt`
 * for every phase.
 */
export async function loadPromptTemplates(
  dir: string = DEFAULT_PROMPTS_DIR,
  version: string = PROMPT_VERSION,
): Promise<PromptTemplates> {
  const versionDir = path.join(dir, version);

  const [planner, executor, verifier] = await Promise.all(
    phaseSchema.options.map((phase) => loadTemplate(versionDir, phase)),
  );

  if (!planner || !executor || !verifier) {
    throw new ConfigurationError(`Incomplete prompt set in ${versionDir}`);
  }

  return { version, planner, executor, verifier };
}

async function loadTemplate(
  versionDir: string,
  phase: Phase,
): Promise<PromptTemplate> {
  const [system, user] = await Promise.all(
    (['system', 'user'] as const).map(async (part) => {
      const file = path.join(versionDir, `${phase}.${part}.txt`);
      try {
        return await readFile(file, 'utf-8');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Cannot read prompt template ${file}: ${message}`);
      }
    }),
  );

  return { system: system ?? '', user: user ?? '' };
}

// ── Rendering ────────────────────────────────────────────────

/**
 * Substitute `{{name}}` placeholders. Unknown placeholders are left as-is.
 * Values are inserted literally (no `$&`-style replacement patterns).
 */
export function renderTemplate(
  template: string,
  vars: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) =>
    Object.hasOwn(vars, name) ? (vars[name] ?? match) : match,
  );
}
