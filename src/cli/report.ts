import type { Command } from 'commander';

import { EXIT_CODES, REPORT_DEFAULTS } from '../config/defaults.js';
import { ConfigError, loadConfigFile } from '../config/loader.js';
import type { FileConfig } from '../schema/config.js';
import {
  ResultsLoadError,
  loadResults,
  outputPathFor,
  renderReport,
  writeReport,
} from '../report/index.js';
import { describeError } from '../utils/errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface ReportCommandOptions {
  output?: string;
  config?: string;
  title?: string;
  project?: string;
  quiet?: true;
}

/** Process seams, replaced in tests. */
export interface ReportIO {
  stdout: (chunk: string) => void;
  now: () => Date;
}

const processIO: ReportIO = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  now: () => new Date(),
};

// ── Error ────────────────────────────────────────────────────

export class InvocationError extends Error {
  readonly exitCode = EXIT_CODES.FAILURE;

  constructor(message: string = REPORT_DEFAULTS.USAGE) {
    super(message);
    this.name = 'InvocationError';
  }
}

// ── Command body ─────────────────────────────────────────────

/**
 * Load the results document, render it, write the report and echo it.
 * Resolves to the process exit code; never rejects.
 */
export async function runReport(
  resultsPath: string | undefined,
  opts: ReportCommandOptions,
  io: ReportIO = processIO,
): Promise<number> {
  try {
    if (resultsPath === undefined) {
      throw new InvocationError();
    }

    // 1. Config file (CLI flags override)
    let fileConfig: FileConfig = {};
    if (opts.config !== undefined) {
      fileConfig = await loadConfigFile(opts.config);
      log.loaded('config', opts.config);
    }

    // 2. Results document; nothing is written if this fails
    const results = await loadResults(resultsPath);
    log.loaded('results', resultsPath);
    if (results.results === undefined || results.results === null) {
      log.warn('No "results" section; measurement tables will show defaults');
    }

    // 3. Render
    const report = renderReport(results, {
      now: io.now(),
      title: opts.title ?? fileConfig.title ?? REPORT_DEFAULTS.TITLE,
      projectName:
        opts.project ?? fileConfig.projectName ?? REPORT_DEFAULTS.PROJECT_NAME,
    });

    // 4. Write + echo
    const outputPath =
      opts.output ?? fileConfig.output ?? outputPathFor(resultsPath);
    await writeReport(outputPath, report);
    log.written(outputPath, report);

    io.stdout(`✓ Report generated: ${outputPath}\n`);
    if (!(opts.quiet ?? fileConfig.quiet ?? false)) {
      io.stdout(report + '\n');
    }

    return EXIT_CODES.SUCCESS;
  } catch (err) {
    if (err instanceof InvocationError) {
      io.stdout(`${err.message}\n`);
      return err.exitCode;
    }
    log.failed(describeError(err));
    if (err instanceof ResultsLoadError || err instanceof ConfigError) {
      return err.exitCode;
    }
    return EXIT_CODES.FAILURE;
  }
}

// ── Command registration ─────────────────────────────────────

export function registerReportCommand(program: Command): void {
  program
    .argument('[results]', 'Benchmark results JSON file')
    .option('-o, --output <path>', 'Report path (default: <results>_report.md)')
    .option('-c, --config <path>', 'YAML or JSON config file')
    .option('--title <title>', 'Report title')
    .option('--project <name>', 'Project named in the recommendations')
    .option('-q, --quiet', 'Do not echo the report to stdout')
    .action(async (resultsPath: string | undefined, opts: ReportCommandOptions) => {
      process.exitCode = await runReport(resultsPath, opts);
    });
}
