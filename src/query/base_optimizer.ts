/**
 * @fileoverview Base weighting
 *
 * First stage of planning: blends vector and graph weights and settles the
 * vector-search parameters. Once enough history exists the parameters are
 * tuned from QueryStats (slow queries retrieve less, fast ones more).
 */

import { QueryStats } from './query_stats.js';

export interface BaseQueryParams {
  topK: number;
  maxDepth: number;
  edgeTypes: string[];
  minSimilarity: number;
}

export interface BaseOptimization {
  params: BaseQueryParams;
  weights: { vector: number; graph: number };
}

export interface BaseQueryOptimizerOptions {
  vectorWeight?: number;
  graphWeight?: number;
  stats?: QueryStats;
}

/** Queries recorded before tuning starts */
const TUNING_MIN_QUERIES = 10;
const SLOW_QUERY_MS = 1000;
const FAST_QUERY_MS = 100;

export class BaseQueryOptimizer {
  readonly stats: QueryStats;
  readonly vectorWeight: number;
  readonly graphWeight: number;

  constructor(options: BaseQueryOptimizerOptions = {}) {
    this.stats = options.stats ?? new QueryStats();
    this.vectorWeight = options.vectorWeight ?? 0.7;
    this.graphWeight = options.graphWeight ?? 0.3;
  }

  optimize(input: BaseQueryParams): BaseOptimization {
    const params: BaseQueryParams = { ...input, edgeTypes: [...input.edgeTypes] };

    if (this.stats.queryCount >= TUNING_MIN_QUERIES) {
      const avgMs = this.stats.avgQueryTimeMs;
      if (avgMs > SLOW_QUERY_MS && input.topK > 3) {
        params.topK = Math.max(3, input.topK - 2);
      } else if (avgMs < FAST_QUERY_MS && input.topK < 10) {
        params.topK = Math.min(10, input.topK + 2);
      }

      const commonDepth = mostCommonDepth(this.stats);
      if (commonDepth !== undefined) {
        params.maxDepth = commonDepth;
      }

      if (this.stats.cacheHitRate < 0.3) {
        params.minSimilarity = Math.max(0.3, input.minSimilarity - 0.1);
      }
    }

    this.stats.recordPattern({
      topK: params.topK,
      maxDepth: params.maxDepth,
      edgeTypes: params.edgeTypes,
      minSimilarity: params.minSimilarity,
    });

    return {
      params,
      weights: { vector: this.vectorWeight, graph: this.graphWeight },
    };
  }
}

/**
 * Depth appearing most often among the top recorded patterns, weighted by
 * how often each pattern occurred. Ties go to the depth seen first.
 */
function mostCommonDepth(stats: QueryStats): number | undefined {
  const counts = new Map<number, number>();
  for (const { pattern, count } of stats.commonPatterns()) {
    counts.set(pattern.maxDepth, (counts.get(pattern.maxDepth) ?? 0) + count);
  }
  let best: number | undefined;
  let bestCount = 0;
  for (const [depth, count] of counts) {
    if (count > bestCount) {
      best = depth;
      bestCount = count;
    }
  }
  return best;
}
