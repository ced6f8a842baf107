/**
 * Telemetry and observability helpers
 */

import type { RunMetrics } from "@breakprops/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

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
export function emitMetric(
  key: string,
  fields: Record<string, unknown>,
  verbose: boolean = isVerbose()
): void {
  if (!verbose) {
    return;
  }

  writeStderr(formatMetric(key, fields) + "\n");
}

/**
 * Emit the counters of the last SDK run
 */
export function emitRunMetrics(family: string, run: RunMetrics | undefined, verbose?: boolean): void {
  if (!run) {
    return;
  }

  emitMetric(
    `sync.${family}`,
    {
      lines: run.linesParsed,
      ranges_parsed: run.rangesParsed,
      ranges_merged: run.rangesMerged,
      properties: run.propertyCount,
      singles: run.singleRangesCount,
      packed_length: run.packedLength,
      duration_ms: run.durationMs,
    },
    verbose
  );
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  options: { verbose?: boolean } = {}
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(
      label,
      {
        duration_ms: duration,
        success,
      },
      options.verbose
    );
  }
}
