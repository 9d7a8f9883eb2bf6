import { open, readFile } from 'node:fs/promises';

import { parseBenchmarkResults } from '../schema/index.js';
import type { BenchmarkResults } from '../schema/index.js';
import { REPORT_DEFAULTS } from '../config/defaults.js';
import { describeError } from '../utils/errors.js';

// ── Error ────────────────────────────────────────────────────

export class ResultsLoadError extends Error {
  readonly exitCode = 1;
  readonly path: string;

  constructor(resultsPath: string, reason: string, options?: { cause: unknown }) {
    super(`Cannot load results ${resultsPath}: ${reason}`, options);
    this.name = 'ResultsLoadError';
    this.path = resultsPath;
  }
}

// ── Load ─────────────────────────────────────────────────────

/**
 * Read and decode a benchmark results document.
 * Throws ResultsLoadError on a missing file, invalid JSON, or a
 * document whose sections have the wrong shape.
 */
export async function loadResults(resultsPath: string): Promise<BenchmarkResults> {
  let parsed: unknown;
  try {
    const raw = await readFile(resultsPath, 'utf-8');
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ResultsLoadError(resultsPath, describeError(err), { cause: err });
  }

  try {
    return parseBenchmarkResults(parsed);
  } catch (err) {
    throw new ResultsLoadError(resultsPath, describeError(err), { cause: err });
  }
}

// ── Write ────────────────────────────────────────────────────

/** Replace the file's contents with `text`. The handle is closed on every path. */
export async function writeReport(outputPath: string, text: string): Promise<void> {
  const handle = await open(outputPath, 'w');
  try {
    await handle.writeFile(text, 'utf-8');
  } finally {
    await handle.close();
  }
}

// ── Paths ────────────────────────────────────────────────────

export function outputPathFor(resultsPath: string): string {
  if (resultsPath.endsWith('.json')) {
    return resultsPath.slice(0, -'.json'.length) + REPORT_DEFAULTS.OUTPUT_SUFFIX;
  }
  return resultsPath + REPORT_DEFAULTS.OUTPUT_SUFFIX;
}
