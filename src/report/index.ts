/**
 * Report generation module.
 * Deterministic apart from the `Generated` clock line.
 * Loads a benchmark results document and renders it as markdown.
 */

export { renderReport } from './reporter.js';
export type { RenderOptions } from './reporter.js';
export { loadResults, writeReport, outputPathFor, ResultsLoadError } from './io.js';
