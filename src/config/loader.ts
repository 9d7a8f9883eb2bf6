import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { describeError } from '../utils/errors.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 1;
  readonly path: string;

  constructor(configPath: string, reason: string, options?: { cause: unknown }) {
    super(`Invalid config ${configPath}: ${reason}`, options);
    this.name = 'ConfigError';
    this.path = configPath;
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a report config file (YAML, or JSON when the path
 * ends in `.json`). An empty YAML file yields an empty config.
 * Throws ConfigError if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let parsed: unknown;
  try {
    const raw = await readFile(configPath, 'utf-8');
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(configPath, describeError(err), { cause: err });
  }

  try {
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    throw new ConfigError(configPath, describeError(err), { cause: err });
  }
}
