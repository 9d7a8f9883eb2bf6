import { z } from 'zod';

// ── Leaves ───────────────────────────────────────────────────
// The results document is produced by shell tooling. Leaves are
// printed as found, whatever their JSON type; only the containers
// the renderer walks into are checked.

export const leafSchema = z.unknown();

// ── System ───────────────────────────────────────────────────

export const systemInfoSchema = z
  .object({
    os: leafSchema,
    arch: leafSchema,
    kernel: leafSchema,
    cpu: leafSchema,
    memory: leafSchema,
  })
  .passthrough();

export type SystemInfo = z.infer<typeof systemInfoSchema>;

// ── Test details ─────────────────────────────────────────────

export const testDetailsSchema = z
  .object({
    repository: leafSchema,
    files_analyzed: leafSchema,
    php_files: leafSchema,
    dependencies: leafSchema,
    test_runs: leafSchema,
  })
  .passthrough();

export type TestDetails = z.infer<typeof testDetailsSchema>;

// ── Per-implementation metrics ───────────────────────────────
// Free-form: numeric timings plus extras such as `notes`. The
// `results` section may carry keys that are not implementations,
// so its values are only narrowed when one is looked up.

export const implementationMetricsSchema = z.record(z.string(), z.unknown());

export type ImplementationMetrics = z.infer<typeof implementationMetricsSchema>;

// ── Summary ──────────────────────────────────────────────────

export const timingInsightSchema = z
  .object({
    language: leafSchema,
    time_ms: leafSchema,
    improvement_vs_slowest: leafSchema,
  })
  .passthrough();

export type TimingInsight = z.infer<typeof timingInsightSchema>;

export const memoryInsightSchema = z
  .object({
    language: leafSchema,
    memory_mb: leafSchema,
    improvement_vs_highest: leafSchema,
  })
  .passthrough();

export type MemoryInsight = z.infer<typeof memoryInsightSchema>;

export const rankingEntrySchema = z
  .object({
    rank: leafSchema,
    language: leafSchema,
    score: leafSchema,
  })
  .passthrough();

export type RankingEntry = z.infer<typeof rankingEntrySchema>;

export const benchmarkSummarySchema = z
  .object({
    fastest_startup: timingInsightSchema.nullish(),
    lowest_memory: memoryInsightSchema.nullish(),
    fastest_analysis: timingInsightSchema.nullish(),
    performance_ranking: z.array(rankingEntrySchema).nullish(),
  })
  .passthrough();

export type BenchmarkSummary = z.infer<typeof benchmarkSummarySchema>;

// ── BenchmarkResults ─────────────────────────────────────────

export const benchmarkResultsSchema = z
  .object({
    timestamp: leafSchema,
    system: systemInfoSchema.nullish(),
    test_details: testDetailsSchema.nullish(),
    winners: z.record(z.string(), leafSchema).nullish(),
    results: z.record(z.string(), z.unknown()).nullish(),
    summary: benchmarkSummarySchema.nullish(),
  })
  .passthrough();

export type BenchmarkResults = z.infer<typeof benchmarkResultsSchema>;

// ── Validators ───────────────────────────────────────────────

export function parseBenchmarkResults(data: unknown): BenchmarkResults {
  return benchmarkResultsSchema.parse(data);
}

// ── Accessors ────────────────────────────────────────────────

/**
 * Metrics recorded for one implementation, or undefined when the
 * entry is missing or is not an object.
 */
export function metricsFor(
  results: BenchmarkResults,
  implementation: string,
): ImplementationMetrics | undefined {
  const parsed = implementationMetricsSchema.safeParse(
    results.results?.[implementation],
  );
  return parsed.success ? parsed.data : undefined;
}
