import { describe, it, expect } from 'vitest';
import { BaseQueryOptimizer } from '../base_optimizer.js';
import { QueryStats } from '../query_stats.js';

const params = { topK: 5, maxDepth: 2, edgeTypes: ['subclass_of', 'mentions'], minSimilarity: 0.5 };

function statsWith(times: number[], cacheHits = 0): QueryStats {
  const stats = new QueryStats();
  for (const time of times) stats.recordQueryTime(time);
  for (let i = 0; i < cacheHits; i++) stats.recordCacheHit();
  return stats;
}

describe('BaseQueryOptimizer', () => {
  it('passes parameters through before enough history exists', () => {
    const optimizer = new BaseQueryOptimizer({ stats: statsWith([5000, 5000]) });
    const result = optimizer.optimize(params);

    expect(result.params).toEqual(params);
    expect(result.weights).toEqual({ vector: 0.7, graph: 0.3 });
  });

  it('records every optimized pattern', () => {
    const stats = new QueryStats();
    const optimizer = new BaseQueryOptimizer({ stats });
    optimizer.optimize(params);
    optimizer.optimize(params);

    expect(stats.commonPatterns()).toEqual([{ pattern: params, count: 2 }]);
  });

  it('retrieves fewer results when queries are slow', () => {
    const optimizer = new BaseQueryOptimizer({ stats: statsWith(new Array<number>(10).fill(2000), 5) });
    expect(optimizer.optimize(params).params.topK).toBe(3);
  });

  it('retrieves more results when queries are fast, up to 10', () => {
    const optimizer = new BaseQueryOptimizer({ stats: statsWith(new Array<number>(10).fill(20), 5) });
    expect(optimizer.optimize(params).params.topK).toBe(7);
    expect(optimizer.optimize({ ...params, topK: 9 }).params.topK).toBe(10);
  });

  it('lowers the similarity floor when the cache hit rate is low', () => {
    const optimizer = new BaseQueryOptimizer({ stats: statsWith(new Array<number>(10).fill(500)) });
    const result = optimizer.optimize({ ...params, minSimilarity: 0.35 });
    expect(result.params.minSimilarity).toBe(0.3);
    expect(result.params.topK).toBe(5);
  });

  it('adopts the most common recorded depth', () => {
    const stats = statsWith(new Array<number>(10).fill(500), 10);
    stats.recordPattern({ ...params, maxDepth: 4 });
    stats.recordPattern({ ...params, maxDepth: 4 });
    stats.recordPattern({ ...params, maxDepth: 1 });
    const optimizer = new BaseQueryOptimizer({ stats });

    expect(optimizer.optimize(params).params.maxDepth).toBe(4);
  });

  it('uses configured weights', () => {
    const optimizer = new BaseQueryOptimizer({ vectorWeight: 0.4, graphWeight: 0.6 });
    expect(optimizer.optimize(params).weights).toEqual({ vector: 0.4, graph: 0.6 });
  });
});
