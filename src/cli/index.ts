/**
 * CLI module — thin wrapper over the report module.
 * Parses arguments, delegates, maps errors to exit codes.
 */

export { registerReportCommand, runReport, InvocationError } from './report.js';
export type { ReportCommandOptions, ReportIO } from './report.js';
