/**
 * @fileoverview Query statistics
 *
 * Running record of executed query times and of the plan parameters the
 * base optimizer produced. Feeds parameter tuning in BaseQueryOptimizer.
 */

export interface QueryPattern {
  topK: number;
  maxDepth: number;
  edgeTypes: string[];
  minSimilarity: number;
  strategy?: string;
}

export interface QueryPerformanceSummary {
  queryCount: number;
  cacheHitRate: number;
  avgQueryTimeMs: number;
  minQueryTimeMs: number;
  maxQueryTimeMs: number;
  recentAvgTimeMs: number;
  commonPatterns: Array<{ pattern: QueryPattern; count: number }>;
}

export interface QueryStatsOptions {
  now?: () => number;
  /** Window for `recentQueryTimes`, in ms (default 5 minutes) */
  recentWindowMs?: number;
}

export class QueryStats {
  private queryTimes: Array<{ elapsedMs: number; at: number }> = [];
  private cacheHits = 0;
  private totalTimeMs = 0;
  private patterns = new Map<string, { pattern: QueryPattern; count: number }>();
  private readonly now: () => number;
  private readonly recentWindowMs: number;

  constructor(options: QueryStatsOptions = {}) {
    this.now = options.now ?? Date.now;
    this.recentWindowMs = options.recentWindowMs ?? 5 * 60 * 1000;
  }

  /** Queries executed plus cache hits */
  get queryCount(): number {
    return this.queryTimes.length + this.cacheHits;
  }

  get avgQueryTimeMs(): number {
    const count = this.queryCount;
    return count === 0 ? 0 : this.totalTimeMs / count;
  }

  get cacheHitRate(): number {
    const count = this.queryCount;
    return count === 0 ? 0 : this.cacheHits / count;
  }

  recordQueryTime(elapsedMs: number): void {
    const value = Number.isFinite(elapsedMs) ? Math.max(0, elapsedMs) : 0;
    this.totalTimeMs += value;
    this.queryTimes.push({ elapsedMs: value, at: this.now() });
  }

  recordCacheHit(): void {
    this.cacheHits++;
  }

  recordPattern(pattern: QueryPattern): void {
    const normalized: QueryPattern = { ...pattern, edgeTypes: [...pattern.edgeTypes] };
    const key = patternKey(normalized);
    const entry = this.patterns.get(key);
    if (entry) {
      entry.count++;
    } else {
      this.patterns.set(key, { pattern: normalized, count: 1 });
    }
  }

  /**
   * Most frequent patterns first; equal counts keep first-seen order.
   */
  commonPatterns(topN = 5): Array<{ pattern: QueryPattern; count: number }> {
    return Array.from(this.patterns.values())
      .map((entry, index) => ({ entry, index }))
      .sort((a, b) => b.entry.count - a.entry.count || a.index - b.index)
      .slice(0, topN)
      .map(({ entry }) => ({ pattern: entry.pattern, count: entry.count }));
  }

  recentQueryTimes(windowMs = this.recentWindowMs): number[] {
    const cutoff = this.now() - windowMs;
    return this.queryTimes.filter((entry) => entry.at >= cutoff).map((entry) => entry.elapsedMs);
  }

  summary(): QueryPerformanceSummary {
    const times = this.queryTimes.map((entry) => entry.elapsedMs);
    const recent = this.recentQueryTimes();
    return {
      queryCount: this.queryCount,
      cacheHitRate: this.cacheHitRate,
      avgQueryTimeMs: this.avgQueryTimeMs,
      minQueryTimeMs: times.length > 0 ? Math.min(...times) : 0,
      maxQueryTimeMs: times.length > 0 ? Math.max(...times) : 0,
      recentAvgTimeMs: recent.length > 0 ? recent.reduce((a, b) => a + b, 0) / recent.length : 0,
      commonPatterns: this.commonPatterns(),
    };
  }

  reset(): void {
    this.queryTimes = [];
    this.cacheHits = 0;
    this.totalTimeMs = 0;
    this.patterns = new Map();
  }
}

function patternKey(pattern: QueryPattern): string {
  return JSON.stringify([
    pattern.topK,
    pattern.maxDepth,
    pattern.edgeTypes,
    pattern.minSimilarity,
    pattern.strategy ?? null,
  ]);
}
