/**
 * Metrics tracking for generation runs
 */

import type { PropertyFamilyId } from "../types.js";

export interface RunMetrics {
  linesParsed: number;
  rangesParsed: number;
  rangesMerged: number;
  propertyCount: number;
  singleRangesCount: number;
  packedLength: number;
  durationMs: number;
}

class MetricsCollector {
  #metrics = new Map<PropertyFamilyId, RunMetrics>();

  /**
   * Get or create metrics for a family
   */
  #getMetrics(family: PropertyFamilyId): RunMetrics {
    let metrics = this.#metrics.get(family);
    if (!metrics) {
      metrics = {
        linesParsed: 0,
        rangesParsed: 0,
        rangesMerged: 0,
        propertyCount: 0,
        singleRangesCount: 0,
        packedLength: 0,
        durationMs: 0,
      };
      this.#metrics.set(family, metrics);
    }
    return metrics;
  }

  /**
   * Record the outcome of parsing
   */
  recordParse(family: PropertyFamilyId, lines: number, ranges: number): void {
    const metrics = this.#getMetrics(family);
    metrics.linesParsed = lines;
    metrics.rangesParsed = ranges;
  }

  /**
   * Record the range count after merging
   */
  recordProcess(family: PropertyFamilyId, merged: number): void {
    this.#getMetrics(family).rangesMerged = merged;
  }

  /**
   * Record packed output size
   */
  recordPack(
    family: PropertyFamilyId,
    packedLength: number,
    singleRangesCount: number,
    propertyCount: number
  ): void {
    const metrics = this.#getMetrics(family);
    metrics.packedLength = packedLength;
    metrics.singleRangesCount = singleRangesCount;
    metrics.propertyCount = propertyCount;
  }

  /**
   * Record run duration
   */
  recordDuration(family: PropertyFamilyId, ms: number): void {
    this.#getMetrics(family).durationMs = ms;
  }

  /**
   * Get metrics for a family
   */
  getMetrics(family: PropertyFamilyId): RunMetrics | undefined {
    return this.#metrics.get(family);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<PropertyFamilyId, RunMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Reset metrics for a family, or all of them
   */
  reset(family?: PropertyFamilyId): void {
    if (family) {
      this.#metrics.delete(family);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
