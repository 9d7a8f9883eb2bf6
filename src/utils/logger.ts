/**
 * Stage logger for bench-report: what was read, what was written,
 * and why a run stopped.
 *
 * Everything goes to stderr; stdout carries only the confirmation
 * line and the rendered report.
 */

export type InputKind = 'config' | 'results';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Stages ──────────────────────────────────────────────────

export function loaded(kind: InputKind, path: string): void {
  write(`📂 Loaded ${kind}: ${path}`);
}

export function written(path: string, text: string): void {
  const bytes = Buffer.byteLength(text, 'utf-8');
  write(`📝 Wrote ${String(bytes)} bytes to ${path}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function failed(message: string): void {
  write(`💥 ${message}`);
}
