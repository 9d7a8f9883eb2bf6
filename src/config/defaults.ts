/**
 * Default configuration values and the fixed report layout.
 * Title and project name are overridable via config file or CLI flags.
 */

export const REPORT_DEFAULTS = {
  TITLE: 'PHP MCP Server Benchmark Report',
  PROJECT_NAME: 'Dependency Buster',
  OUTPUT_SUFFIX: '_report.md',
  USAGE: 'Usage: bench-report <benchmark_results.json>',
} as const;

export const NOT_AVAILABLE = 'N/A';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

// ── Compared implementations ────────────────────────────────

export const IMPLEMENTATIONS = ['TypeScript', 'Go', 'Rust'] as const;

export type Implementation = (typeof IMPLEMENTATIONS)[number];

// ── Detailed comparison table ───────────────────────────────
// A `null` metric key renders `fixedCell` instead of a measurement.
// The winner column is fixed rather than computed from the row.

export const COMPARISON_WINNER = 'Rust';

export interface ComparisonRow {
  label: string;
  unit: string;
  metrics: Record<Implementation, string | null>;
  fixedCell?: string;
}

export const COMPARISON_ROWS: readonly ComparisonRow[] = [
  {
    label: 'Binary Size',
    unit: 'MB',
    metrics: { TypeScript: null, Go: 'binary_size_mb', Rust: 'binary_size_mb' },
    fixedCell: 'N/A (needs runtime)',
  },
  {
    label: 'Startup Time',
    unit: 'ms',
    metrics: {
      TypeScript: 'startup_time_ms',
      Go: 'startup_time_ms',
      Rust: 'startup_time_ms',
    },
  },
  {
    label: 'Memory Peak',
    unit: 'MB',
    metrics: {
      TypeScript: 'memory_peak_mb',
      Go: 'memory_peak_mb',
      Rust: 'memory_peak_mb',
    },
  },
  {
    label: 'Full Analysis',
    unit: 'ms',
    metrics: {
      TypeScript: 'full_analysis_ms',
      Go: 'full_analysis_ms',
      Rust: 'full_analysis_ms',
    },
  },
];

// ── Per-operation breakdown ─────────────────────────────────

export const OPERATIONS = [
  { label: 'Dependency Analysis', key: 'dependency_analysis_ms' },
  { label: 'PSR-4 Validation', key: 'psr4_validation_ms' },
  { label: 'Namespace Detection', key: 'namespace_detection_ms' },
  { label: 'Security Audit', key: 'security_audit_ms' },
  { label: 'License Analysis', key: 'license_analysis_ms' },
] as const;

// ── Ranking markers ─────────────────────────────────────────

export const RANK_MEDALS = {
  FIRST: '🥇',
  SECOND: '🥈',
  OTHER: '🥉',
} as const;
