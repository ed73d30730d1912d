/**
 * @fileoverview Query metrics collection
 *
 * Per-query timing records: a tracking id per planned query, nested phase
 * timings (`expansion`, `expansion.topics`, ...), and the result count and
 * quality reported once the query has been executed. Completed records are
 * kept in a bounded, oldest-first history.
 */

import { randomUUID } from 'crypto';

// ============================================================================
// TYPES
// ============================================================================

export interface PhaseTiming {
  durationMs: number;
  count: number;
  metadata: Record<string, unknown>;
}

export interface QueryMetricsRecord {
  queryId: string;
  params: Record<string, unknown>;
  startTime: number;
  endTime?: number;
  durationMs?: number;
  /** Keyed by dotted phase path */
  phases: Record<string, PhaseTiming>;
  resultCount: number;
  qualityScore: number;
  error?: string;
}

export interface PhaseSummary {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

/**
 * What the planner needs from a metrics sink.
 */
export interface PlanMetricsSink {
  startTracking(params: Record<string, unknown>): string;
  timePhase<T>(queryId: string, phase: string, fn: () => Promise<T> | T): Promise<T>;
  endTracking(queryId: string, resultCount?: number, qualityScore?: number): QueryMetricsRecord | undefined;
}

export interface QueryMetricsOptions {
  /** Completed records kept (default 1000) */
  maxHistory?: number;
  now?: () => number;
}

interface ActiveQuery {
  record: QueryMetricsRecord;
  phaseStack: string[];
}

// ============================================================================
// COLLECTOR
// ============================================================================

export class QueryMetricsCollector implements PlanMetricsSink {
  private readonly active = new Map<string, ActiveQuery>();
  private completed: QueryMetricsRecord[] = [];
  private readonly maxHistory: number;
  private readonly now: () => number;

  constructor(options: QueryMetricsOptions = {}) {
    this.maxHistory = options.maxHistory ?? 1000;
    this.now = options.now ?? Date.now;
  }

  startTracking(params: Record<string, unknown> = {}, queryId: string = randomUUID()): string {
    this.active.set(queryId, {
      record: {
        queryId,
        params: { ...params },
        startTime: this.now(),
        phases: {},
        resultCount: 0,
        qualityScore: 0,
      },
      phaseStack: [],
    });
    // Abandoned queries are dropped oldest first.
    if (this.active.size > this.maxHistory) {
      const oldest = this.active.keys().next();
      if (!oldest.done) this.active.delete(oldest.value);
    }
    return queryId;
  }

  isTracking(queryId: string): boolean {
    return this.active.has(queryId);
  }

  /**
   * Run `fn` and add its duration to the phase. Nested calls are recorded
   * under the enclosing phase's path. Unknown ids just run `fn`.
   */
  async timePhase<T>(
    queryId: string,
    phase: string,
    fn: () => Promise<T> | T,
    metadata?: Record<string, unknown>
  ): Promise<T> {
    const query = this.active.get(queryId);
    if (!query) return fn();

    const parent = query.phaseStack[query.phaseStack.length - 1];
    const path = parent ? `${parent}.${phase}` : phase;
    const timing = query.record.phases[path] ?? { durationMs: 0, count: 0, metadata: {} };
    timing.count++;
    Object.assign(timing.metadata, metadata);
    query.record.phases[path] = timing;

    query.phaseStack.push(path);
    const started = this.now();
    try {
      return await fn();
    } finally {
      timing.durationMs += this.now() - started;
      query.phaseStack.pop();
    }
  }

  endTracking(
    queryId: string,
    resultCount = 0,
    qualityScore = 0,
    error?: string
  ): QueryMetricsRecord | undefined {
    const query = this.active.get(queryId);
    if (!query) return undefined;
    this.active.delete(queryId);

    const record = query.record;
    record.endTime = this.now();
    record.durationMs = record.endTime - record.startTime;
    record.resultCount = resultCount;
    record.qualityScore = qualityScore;
    if (error !== undefined) record.error = error;

    this.completed.push(record);
    if (this.completed.length > this.maxHistory) {
      this.completed.splice(0, this.completed.length - this.maxHistory);
    }
    return record;
  }

  getQueryMetrics(queryId: string): QueryMetricsRecord | undefined {
    return this.active.get(queryId)?.record ?? this.completed.find((record) => record.queryId === queryId);
  }

  /** Newest completed records, oldest first */
  getRecentMetrics(count = 10): QueryMetricsRecord[] {
    if (count <= 0) return [];
    return this.completed.slice(-count);
  }

  phaseTimingSummary(): Record<string, PhaseSummary> {
    const durations = new Map<string, number[]>();
    for (const record of this.completed) {
      for (const [path, timing] of Object.entries(record.phases)) {
        const list = durations.get(path) ?? [];
        list.push(timing.durationMs);
        durations.set(path, list);
      }
    }

    const summary: Record<string, PhaseSummary> = {};
    for (const [path, list] of durations) {
      summary[path] = {
        count: list.length,
        avgMs: list.reduce((a, b) => a + b, 0) / list.length,
        minMs: Math.min(...list),
        maxMs: Math.max(...list),
      };
    }
    return summary;
  }
}
