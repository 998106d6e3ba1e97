/**
 * Metrics tracking for table operations
 */

export interface TableMetrics {
  cacheHits: number;
  cacheMisses: number;
  queryTimeMs: number[];
  writeTimeMs: number[];
  rebuildTimeMs: number[];
}

/** Samples kept per timing series */
const MAX_SAMPLES = 100;

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #metrics = new Map<string, TableMetrics>();

  /**
   * Get or create metrics for a table (keyed by "<database>/<table>")
   */
  #getMetrics(table: string): TableMetrics {
    let metrics = this.#metrics.get(table);
    if (!metrics) {
      metrics = {
        cacheHits: 0,
        cacheMisses: 0,
        queryTimeMs: [],
        writeTimeMs: [],
        rebuildTimeMs: [],
      };
      this.#metrics.set(table, metrics);
    }
    return metrics;
  }

  recordCacheHit(table: string): void {
    this.#getMetrics(table).cacheHits++;
  }

  recordCacheMiss(table: string): void {
    this.#getMetrics(table).cacheMisses++;
  }

  recordQueryTime(table: string, ms: number): void {
    pushSample(this.#getMetrics(table).queryTimeMs, ms);
  }

  recordWriteTime(table: string, ms: number): void {
    pushSample(this.#getMetrics(table).writeTimeMs, ms);
  }

  recordRebuildTime(table: string, ms: number): void {
    pushSample(this.#getMetrics(table).rebuildTimeMs, ms);
  }

  getMetrics(table: string): TableMetrics | undefined {
    return this.#metrics.get(table);
  }

  getAllMetrics(): Map<string, TableMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Result cache hit rate for a table
   */
  getHitRate(table: string): number {
    const metrics = this.#metrics.get(table);
    if (!metrics) return 0;
    const total = metrics.cacheHits + metrics.cacheMisses;
    return total > 0 ? metrics.cacheHits / total : 0;
  }

  /**
   * Calculate p95 for a series of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  reset(table?: string): void {
    if (table) {
      this.#metrics.delete(table);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
