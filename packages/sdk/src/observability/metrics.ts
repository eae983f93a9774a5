/**
 * Metrics tracking for index build and candidate selection
 */

const MAX_SAMPLES = 100;

export interface IndexMetrics {
  /** Selections narrowed through byTag or byTimeInterval */
  hitCount: number;
  /** Selections that had to scan every row */
  missCount: number;
  buildTimeMs: number[];
  selectTimeMs: number[];
  rows: number;
  timeIntervals: number;
  tags: number;
}

class MetricsCollector {
  #metrics: IndexMetrics = MetricsCollector.#empty();

  static #empty(): IndexMetrics {
    return {
      hitCount: 0,
      missCount: 0,
      buildTimeMs: [],
      selectTimeMs: [],
      rows: 0,
      timeIntervals: 0,
      tags: 0,
    };
  }

  static #push(samples: number[], ms: number): void {
    samples.push(ms);
    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  /**
   * Record a selection that the index narrowed
   */
  recordHit(): void {
    this.#metrics.hitCount++;
  }

  /**
   * Record a selection that fell back to a full scan
   */
  recordMiss(): void {
    this.#metrics.missCount++;
  }

  recordBuildTime(ms: number): void {
    MetricsCollector.#push(this.#metrics.buildTimeMs, ms);
  }

  recordSelectTime(ms: number): void {
    MetricsCollector.#push(this.#metrics.selectTimeMs, ms);
  }

  /**
   * Update index size metrics
   */
  updateSize(rows: number, timeIntervals: number, tags: number): void {
    this.#metrics.rows = rows;
    this.#metrics.timeIntervals = timeIntervals;
    this.#metrics.tags = tags;
  }

  /**
   * Snapshot of the current metrics
   */
  getMetrics(): IndexMetrics {
    return {
      ...this.#metrics,
      buildTimeMs: [...this.#metrics.buildTimeMs],
      selectTimeMs: [...this.#metrics.selectTimeMs],
    };
  }

  /**
   * Fraction of selections the index narrowed
   */
  getHitRate(): number {
    const total = this.#metrics.hitCount + this.#metrics.missCount;
    return total > 0 ? this.#metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  getP95SelectTime(): number {
    return this.getP95(this.#metrics.selectTimeMs);
  }

  reset(): void {
    this.#metrics = MetricsCollector.#empty();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
