import { access, readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { ConfigurationError } from '../core/errors.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.verisolve.yaml` (or JSON) config file.
 * Throws a ConfigurationError if the file is unreadable or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot parse config file ${configPath}: ${message}`);
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}: ${result.error.message}`,
    );
  }

  return result.data;
}

/**
 * Like loadConfigFile, but a missing file yields the defaults.
 * Used for the optional default config path.
 */
export async function loadOptionalConfigFile(
  configPath: string,
): Promise<FileConfig> {
  try {
    await access(configPath);
  } catch {
    return fileConfigSchema.parse({});
  }
  return loadConfigFile(configPath);
}
