/**
 * @fileoverview Plan trace events
 * Tracer sink the planner reports recoverable failures and milestones to.
 */

export type PlanEventKind =
  | 'plan_created'
  | 'pattern_detected'
  | 'expansion_completed'
  | 'expansion_failure'
  | 'graph_access_failure'
  | 'rewrite_failure'
  | 'weights_adjusted';

export type PlanEventPayload = Record<string, unknown>;

export interface PlanTracer {
  logEvent(kind: PlanEventKind, payload: PlanEventPayload): void;
}

export interface PlanTraceRecord {
  kind: PlanEventKind;
  payload: PlanEventPayload;
  traceId?: string;
  recordedAt: number;
}

export const NOOP_TRACER: PlanTracer = Object.freeze({
  logEvent: () => undefined,
});

/**
 * Keeps events in arrival order, optionally bounded.
 */
export class InMemoryPlanTracer implements PlanTracer {
  private readonly records: PlanTraceRecord[] = [];

  constructor(
    private readonly maxRecords = 1000,
    private readonly now: () => number = Date.now,
  ) {}

  logEvent(kind: PlanEventKind, payload: PlanEventPayload): void {
    const traceId = typeof payload.traceId === 'string' ? payload.traceId : undefined;
    this.records.push({ kind, payload, traceId, recordedAt: this.now() });
    if (this.records.length > this.maxRecords) {
      this.records.splice(0, this.records.length - this.maxRecords);
    }
  }

  getEvents(kind?: PlanEventKind): PlanTraceRecord[] {
    return kind ? this.records.filter((record) => record.kind === kind) : [...this.records];
  }

  getTrace(traceId: string): PlanTraceRecord[] {
    return this.records.filter((record) => record.traceId === traceId);
  }

  clear(): void {
    this.records.length = 0;
  }
}
