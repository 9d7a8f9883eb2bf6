import { NOT_AVAILABLE } from '../config/defaults.js';

// ── Values ───────────────────────────────────────────────────

/** Render a document value as it appears in the report; null and absent fall back. */
export function display(value: unknown, fallback: string = NOT_AVAILABLE): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** `<value> <unit>`, with `N/A` standing in for a missing value. */
export function withUnit(value: unknown, unit: string): string {
  return `${display(value)} ${unit}`;
}

// ── Labels ───────────────────────────────────────────────────

/**
 * `startup_time` → `Startup Time`. Every run of letters is capitalised
 * and lower-cased after its first letter, so `psr4_check` → `Psr4 Check`.
 */
export function categoryLabel(key: string): string {
  return key
    .replace(/_/g, ' ')
    .replace(
      /[A-Za-z]+/g,
      (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
    );
}

// ── Time ─────────────────────────────────────────────────────

export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const day = `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

// ── Speedup ──────────────────────────────────────────────────

/**
 * Percentage by which `rust` beats `ts`, to one decimal place.
 * Returns `N/A` unless both are non-zero numbers, so a zero
 * baseline never reaches the division.
 */
export function formatSpeedup(ts: unknown, rust: unknown): string {
  if (typeof ts !== 'number' || typeof rust !== 'number') return NOT_AVAILABLE;
  if (ts === 0 || rust === 0 || Number.isNaN(ts) || Number.isNaN(rust)) {
    return NOT_AVAILABLE;
  }
  const speedup = ((ts - rust) / ts) * 100;
  return `${toOneDecimal(speedup)}% faster`;
}

/**
 * One-decimal rendering that breaks exact ties toward the even digit
 * (`0.25` → `0.2`, `0.75` → `0.8`); everything else matches `toFixed(1)`.
 * A double sits exactly halfway between tenths only at odd multiples
 * of 0.25.
 */
export function toOneDecimal(value: number): string {
  const isTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (!isTie) return value.toFixed(1);
  const lower = Math.floor(value * 10);
  const tenths = lower % 2 === 0 ? lower : lower + 1;
  return (tenths / 10).toFixed(1);
}

// ── Markdown ─────────────────────────────────────────────────

export function tableRow(cells: readonly string[]): string {
  return `| ${cells.join(' | ')} |`;
}
