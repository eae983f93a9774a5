/**
 * Telemetry and observability helpers
 */

import { isVerbose } from "./env.js";
import type { CliIO } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(io: CliIO, key: string, fields: Record<string, unknown>, verbose = false): void {
  if (!verbose && !isVerbose(io.env)) {
    return;
  }

  io.stderr(formatMetric(key, fields) + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  io: CliIO,
  label: string,
  fn: () => Promise<T>,
  verbose = false
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(io, label, { duration_ms: duration, success }, verbose);
  }
}
