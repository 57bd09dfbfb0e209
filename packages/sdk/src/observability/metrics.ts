/**
 * Metrics tracking for store operations
 */

export interface StoreMetrics {
  loads: number;
  commits: number;
  aborts: number;
  migrations: number;
  restores: number;
  lockRetries: number;
  loadTimeMs: number[];
  commitTimeMs: number[];
}

const MAX_SAMPLES = 100;

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);

  // Keep only last 100 samples to avoid unbounded memory growth
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

function emptyMetrics(): StoreMetrics {
  return {
    loads: 0,
    commits: 0,
    aborts: 0,
    migrations: 0,
    restores: 0,
    lockRetries: 0,
    loadTimeMs: [],
    commitTimeMs: [],
  };
}

class MetricsCollector {
  #metrics = new Map<string, StoreMetrics>();

  /**
   * Get or create metrics for a durable file
   */
  #getMetrics(filePath: string): StoreMetrics {
    let metrics = this.#metrics.get(filePath);
    if (!metrics) {
      metrics = emptyMetrics();
      this.#metrics.set(filePath, metrics);
    }
    return metrics;
  }

  recordLoad(filePath: string, ms: number): void {
    const metrics = this.#getMetrics(filePath);
    metrics.loads++;
    pushSample(metrics.loadTimeMs, ms);
  }

  recordCommit(filePath: string, ms: number): void {
    const metrics = this.#getMetrics(filePath);
    metrics.commits++;
    pushSample(metrics.commitTimeMs, ms);
  }

  recordAbort(filePath: string): void {
    this.#getMetrics(filePath).aborts++;
  }

  recordMigration(filePath: string): void {
    this.#getMetrics(filePath).migrations++;
  }

  recordRestore(filePath: string): void {
    this.#getMetrics(filePath).restores++;
  }

  recordLockRetry(filePath: string): void {
    this.#getMetrics(filePath).lockRetries++;
  }

  /**
   * Get metrics for a durable file
   */
  getMetrics(filePath: string): StoreMetrics | undefined {
    return this.#metrics.get(filePath);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, StoreMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a sample set
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Reset metrics for one file, or for all of them
   */
  reset(filePath?: string): void {
    if (filePath) {
      this.#metrics.delete(filePath);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
