#!/usr/bin/env node

/**
 * bench-report CLI entry point.
 * Thin wrapper — all logic delegated to the report module.
 */

import { Command } from 'commander';

import { registerReportCommand } from './report.js';

const program = new Command();

program
  .name('bench-report')
  .description(
    'Render a markdown report from a TypeScript/Go/Rust benchmark results JSON file.',
  )
  .version('1.0.0');

registerReportCommand(program);

await program.parseAsync();
