/**
 * @fileoverview Learning feedback loop
 *
 * Online adjustment of relationship weights from executed results. Each
 * outcome nudges the weight of every edge type seen on a result path by
 * `learningRate * (effectiveness - 0.5)`, where effectiveness is the number
 * of path steps using the edge type divided by the result count. Nothing is
 * batched or persisted; the weight table is mutated in place.
 */

import { normalizeEdgeType, type RelationshipWeightTable } from '../graphs/relationship_weights.js';
import { NOOP_TRACER, type PlanTracer } from '../observability/plan_traces.js';
import type { QueryStats } from '../query/query_stats.js';
import { logDebug } from '../telemetry/logger.js';
import type { ExecutionPlan, ExecutionResult, TraversalStrategy } from '../types.js';

export interface LearningRecord {
  queryId: string;
  elapsedMs: number;
  resultCount: number;
  avgScore: number;
  /** Keyed by normalized edge type */
  edgeEffectiveness: Record<string, number>;
  strategy?: TraversalStrategy;
  recordedAt: number;
}

export interface QueryTimeSummary {
  count: number;
  meanMs: number;
  /** Least-squares slope of elapsed time over record index, ms per query */
  trendMsPerQuery: number;
}

export interface LearningFeedbackOptions {
  stats?: QueryStats;
  /** Step size for weight updates (default 0.05) */
  learningRate?: number;
  tracer?: PlanTracer;
  now?: () => number;
}

export class LearningFeedbackLoop {
  private records: LearningRecord[] = [];
  private readonly stats?: QueryStats;
  private readonly learningRate: number;
  private readonly tracer: PlanTracer;
  private readonly now: () => number;

  constructor(
    private readonly weights: RelationshipWeightTable,
    options: LearningFeedbackOptions = {}
  ) {
    this.stats = options.stats;
    this.learningRate = options.learningRate ?? 0.05;
    this.tracer = options.tracer ?? NOOP_TRACER;
    this.now = options.now ?? Date.now;
  }

  recordOutcome(
    queryId: string,
    results: readonly ExecutionResult[],
    elapsedMs: number,
    planUsed?: Pick<ExecutionPlan, 'traversal'>
  ): LearningRecord {
    const resultCount = results.length;
    const avgScore = results.reduce((sum, r) => sum + (r.score ?? 0), 0) / Math.max(1, resultCount);

    const occurrences = new Map<string, number>();
    for (const result of results) {
      for (const step of result.path ?? []) {
        if (!step.edgeType) continue;
        const edgeType = normalizeEdgeType(step.edgeType);
        occurrences.set(edgeType, (occurrences.get(edgeType) ?? 0) + 1);
      }
    }

    const effectivenessByEdge = Array.from(occurrences, ([edgeType, count]) => {
      const effectiveness = count / Math.max(1, resultCount);
      const weight = this.weights.adjust(edgeType, this.learningRate * (effectiveness - 0.5));
      return { edgeType, effectiveness, weight };
    });
    const edgeEffectiveness = Object.fromEntries(
      effectivenessByEdge.map(({ edgeType, effectiveness }) => [edgeType, effectiveness])
    );
    const adjusted = Object.fromEntries(effectivenessByEdge.map(({ edgeType, weight }) => [edgeType, weight]));

    const record: LearningRecord = {
      queryId,
      elapsedMs,
      resultCount,
      avgScore,
      edgeEffectiveness,
      strategy: planUsed?.traversal.strategy,
      recordedAt: this.now(),
    };
    this.records.push(record);
    this.stats?.recordQueryTime(elapsedMs);

    if (occurrences.size > 0) {
      logDebug('Relationship weights adjusted', { queryId, weights: adjusted });
      this.tracer.logEvent('weights_adjusted', { queryId, weights: adjusted });
    }
    return record;
  }

  history(): LearningRecord[] {
    return [...this.records];
  }

  queryTimeSummary(): QueryTimeSummary {
    const times = this.records.map((record) => record.elapsedMs);
    const count = times.length;
    if (count === 0) {
      return { count: 0, meanMs: 0, trendMsPerQuery: 0 };
    }
    const meanMs = times.reduce((a, b) => a + b, 0) / count;
    const meanIndex = (count - 1) / 2;
    let numerator = 0;
    let denominator = 0;
    times.forEach((time, index) => {
      numerator += (index - meanIndex) * (time - meanMs);
      denominator += (index - meanIndex) ** 2;
    });
    return {
      count,
      meanMs,
      trendMsPerQuery: denominator === 0 ? 0 : numerator / denominator,
    };
  }

  /** Keep only the newest `keep` records. */
  truncateHistory(keep: number): void {
    const n = Math.max(0, Math.floor(keep));
    this.records = n === 0 ? [] : this.records.slice(-n);
  }
}
