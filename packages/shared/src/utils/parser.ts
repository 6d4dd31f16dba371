import msLib from 'ms';
import bytesLib from 'bytes';

/** Non-negative decimal: digits with an optional fractional part. */
export const DECIMAL_PATTERN = /^\d+(?:\.\d+)?$/;

/** Non-negative integer. */
export const INTEGER_PATTERN = /^\d+$/;

/**
 * Parse tool output into a number, returning `fallback` when the text is
 * missing or does not match `pattern`. Every numeric field of a snapshot goes
 * through here; unreadable values become defaults, never errors.
 */
export function parseNumericOrDefault(
  raw: string | null | undefined,
  fallback: number,
  pattern: RegExp = DECIMAL_PATTERN,
): number {
  if (raw === null || raw === undefined) return fallback;
  const value = raw.trim();
  if (!pattern.test(value)) return fallback;
  return Number(value);
}

export function parseIntegerOrDefault(raw: string | null | undefined, fallback = 0): number {
  return parseNumericOrDefault(raw, fallback, INTEGER_PATTERN);
}

/**
 * Like {@link parseNumericOrDefault} but keeps the validated text as is.
 * Used for load figures, which are persisted as decimal strings.
 */
export function decimalTextOrDefault(raw: string | null | undefined, fallback: string): string {
  if (raw === null || raw === undefined) return fallback;
  const value = raw.trim();
  return DECIMAL_PATTERN.test(value) ? value : fallback;
}

/**
 * Whole-number percentage of `part` in `total`, truncated.
 * Returns 0 when `total` is not positive.
 */
export function truncatedPercent(part: number, total: number): number {
  if (total <= 0) return 0;
  return Math.floor((part * 100) / total);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Drop digits beyond `decimals` without rounding. The scaled value is first
 * snapped to six decimals so that `0.29 * 100` truncates to 29, not 28.
 */
export function truncateTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.trunc(Math.round(value * factor * 1e6) / 1e6) / factor;
}

/**
 * Convert a millidegree sensor reading (e.g. `45123`) to `45.1°C`.
 */
export function millidegreesToCelsius(raw: string | null | undefined): string | null {
  const value = parseIntegerOrDefault(raw, -1);
  if (value < 0) return null;
  return `${(Math.floor(value / 100) / 10).toFixed(1)}°C`;
}

/** Split a text-table row on runs of whitespace. */
export function columns(line: string): string[] {
  const trimmed = line.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

export function firstLine(text: string | null | undefined): string | null {
  if (!text) return null;
  const line = text.split(/\r?\n/).find((l) => l.trim().length > 0);
  return line === undefined ? null : line.trim();
}

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '2d', '100ms', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  if (ms < 86_400_000) return `${Math.round(ms / 3_600_000)}h`;
  return `${Math.round(ms / 86_400_000)}d`;
}

/**
 * Format bytes to a human-readable string.
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ' }) ?? '0 B';
}

/**
 * Format a CPU percentage for display.
 */
export function formatCpu(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Format an uptime in seconds as `<d>d <h>h <m>m <s>s`.
 */
export function formatUptime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86400);
  const hours = Math.floor((total % 86400) / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return `${days}d ${hours}h ${minutes}m ${secs}s`;
}
