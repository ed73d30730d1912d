import { beforeEach, describe, expect, it } from 'vitest';
import { createQueryPlanner, MAX_TRAVERSAL_DEPTH, QueryPlanner, validatePlanQuery } from '../orchestrator.js';
import { DEFAULT_BUDGET, DEFAULT_EDGE_TYPES } from '../../config/planner_config.js';
import { InvalidQueryError } from '../../core/errors.js';
import { CategoryGraph } from '../../graphs/category_graph.js';
import { InMemoryGraphAccess, type GraphDataAccess } from '../../graphs/graph_access.js';
import { QueryMetricsCollector } from '../../metrics/query_metrics.js';
import { InMemoryPlanTracer } from '../../observability/plan_traces.js';
import { setLogLevel } from '../../telemetry/logger.js';
import type { Entity, GraphType, VectorSearchFn } from '../../types.js';

const NOW = Date.parse('2026-07-02T12:00:00.000Z');
const VECTOR = [0.1, 0.2, 0.3];

const KNOWLEDGE_GRAPH = new InMemoryGraphAccess({
  relationshipTypes: ['mentions', 'subclass_of', 'instance_of', 'related_to'],
});

interface FlakyAccessOptions {
  graphType?: GraphType;
  entities?: Entity[];
  failRelationshipTypes?: boolean;
  failEntities?: boolean;
  failingEntityIds?: string[];
}

/** Accessor whose lookups can be told to throw */
class FlakyGraphAccess implements GraphDataAccess {
  readonly available = true;
  readonly graphType?: GraphType;

  constructor(private readonly options: FlakyAccessOptions = {}) {
    this.graphType = options.graphType;
  }

  getEntities(limit: number): Entity[] {
    if (this.options.failEntities) throw new Error('entity store unavailable');
    return (this.options.entities ?? []).slice(0, limit);
  }

  getEntity(entityId: string): Entity | undefined {
    if (this.options.failingEntityIds?.includes(entityId)) throw new Error('feature lookup timed out');
    return this.options.entities?.find((entity) => entity.id === entityId);
  }

  getRelationshipTypes(): string[] {
    if (this.options.failRelationshipTypes) throw new Error('schema endpoint down');
    return ['subclass_of', 'related_to'];
  }
}

describe('validatePlanQuery', () => {
  it('requires a query vector', () => {
    expect(() => validatePlanQuery({ queryText: 'what is entropy' })).toThrow(InvalidQueryError);
    expect(() => validatePlanQuery(null)).toThrow('Invalid query queryVector: a query vector is required');
  });

  it('names the first malformed field', () => {
    expect(() => validatePlanQuery({ queryVector: [] })).toThrow(/^Invalid query queryVector:/);
    expect(() => validatePlanQuery({ queryVector: VECTOR, priority: 'urgent' })).toThrow(/^Invalid query priority:/);
    expect(() => validatePlanQuery({ queryVector: VECTOR, maxTraversalDepth: -1 })).toThrow(
      /^Invalid query maxTraversalDepth:/
    );
    expect(() => validatePlanQuery({ queryVector: VECTOR, maxTraversalDepth: 100_000_000 })).toThrow(
      /^Invalid query maxTraversalDepth:/
    );
  });

  it('accepts the deepest allowed traversal', () => {
    expect(validatePlanQuery({ queryVector: VECTOR, maxTraversalDepth: MAX_TRAVERSAL_DEPTH }).maxTraversalDepth).toBe(
      MAX_TRAVERSAL_DEPTH
    );
  });

  it('returns the validated query', () => {
    expect(validatePlanQuery({ queryVector: VECTOR, queryText: 'entropy' })).toEqual({
      queryVector: VECTOR,
      queryText: 'entropy',
    });
  });
});

describe('QueryPlanner', () => {
  let tracer: InMemoryPlanTracer;
  let planner: QueryPlanner;

  beforeEach(() => {
    setLogLevel('silent');
    tracer = new InMemoryPlanTracer();
    planner = createQueryPlanner({ tracer, now: () => NOW });
  });

  it('rejects a query without a usable vector', async () => {
    await expect(planner.plan({ queryVector: [] })).rejects.toBeInstanceOf(InvalidQueryError);
  });

  it('plans a vector-only query when there is no graph', async () => {
    const plan = await planner.plan({ queryVector: VECTOR });

    expect(plan.graphType).toBe('unknown');
    expect(plan.priority).toBe('normal');
    expect(plan.vectorParams).toEqual({ topK: 5, minScore: 0.5 });
    expect(plan.weights).toEqual({ vector: 0.7, graph: 0.3, hierarchicalBonus: 0.2 });
    expect(plan.traversal.edgeTypes).toEqual([]);
    expect(plan.traversal.maxDepth).toBe(0);
    expect(plan.traversal.levelBudgets).toEqual([]);
    expect(plan.traversal.totalNodeBudget).toBe(0);
    expect(plan.budget.graphTraversalMs).toBe(0);
    expect(plan.budget.maxNodes).toBe(0);
    expect(plan.budget.maxEdges).toBe(0);
    expect(plan.budget.vectorSearchMs).toBe(350);
    expect(plan.entryPoints).toEqual([]);
    expect(plan.expansion).toBeUndefined();
    expect(plan.pattern).toBeUndefined();
    expect(plan.createdAt).toBe('2026-07-02T12:00:00.000Z');
  });

  it('plans a definition query over a hierarchical graph', async () => {
    const plan = await planner.plan(
      { queryVector: VECTOR, queryText: 'what is quantum entanglement', traceId: 'trace-def' },
      KNOWLEDGE_GRAPH
    );

    expect(plan.graphType).toBe('hierarchical');
    expect(plan.pattern).toEqual({ kind: 'definition', entities: ['quantum entanglement'] });
    expect(plan.traversal.strategy).toBe('definition');
    expect(plan.traversal.edgeTypes).toEqual(['instance_of', 'subclass_of', 'related_to', 'mentions']);
    expect(plan.traversal.maxDepth).toBe(2);
    expect(plan.traversal.totalNodeBudget).toBe(1000);
    expect(plan.traversal.levelBudgets).toEqual([400, 140]);
    expect(plan.budget).toEqual(DEFAULT_BUDGET);
    expect(plan.expansion?.hasExpansions).toBe(false);

    const detected = tracer.getEvents('pattern_detected');
    expect(detected).toHaveLength(1);
    expect(detected[0].payload).toEqual({
      traceId: 'trace-def',
      kind: 'definition',
      entities: ['quantum entanglement'],
    });
    expect(tracer.getTrace('trace-def').map((event) => event.kind)).toEqual([
      'expansion_completed',
      'pattern_detected',
      'plan_created',
    ]);
  });

  it('still plans when topic search fails', async () => {
    const categories = new CategoryGraph();
    categories.registerEdge('Physics', 'Quantum_Physics');
    planner = createQueryPlanner({ tracer, categoryGraph: categories, now: () => NOW });
    const search: VectorSearchFn = () => {
      throw new Error('index offline');
    };

    const plan = await planner.plan(
      { queryVector: VECTOR, queryText: 'quantum physics basics', traceId: 'trace-search' },
      undefined,
      search
    );

    expect(plan.expansion?.topics).toEqual([]);
    expect(plan.expansion?.categories).toEqual([
      { category: 'Quantum_Physics', depth: 1 },
      { category: 'Physics', depth: 0 },
    ]);
    expect(plan.expansion?.hasExpansions).toBe(true);

    const failures = tracer.getEvents('expansion_failure');
    expect(failures).toHaveLength(1);
    expect(failures[0].traceId).toBe('trace-search');
    expect(failures[0].payload.message).toBe('Topic expansion failed: index offline');
  });

  it('expands against a very deep category chain', async () => {
    const categories = new CategoryGraph();
    for (let i = 0; i < 20000; i++) categories.registerEdge(`topic${i}`, `topic${i + 1}`);
    planner = createQueryPlanner({ tracer, categoryGraph: categories, now: () => NOW });

    const plan = await planner.plan({ queryVector: VECTOR, queryText: 'topic20000 overview' });

    expect(plan.expansion?.categories).toEqual([
      { category: 'topic20000', depth: 20000 },
      { category: 'topic19999', depth: 19999 },
    ]);
  });

  it('falls back to the default edge types when the relationship lookup fails', async () => {
    const plan = await planner.plan(
      { queryVector: VECTOR, traceId: 'trace-graph' },
      new FlakyGraphAccess({ failRelationshipTypes: true })
    );

    expect([...plan.traversal.edgeTypes].sort()).toEqual([...DEFAULT_EDGE_TYPES].sort());

    const failures = tracer.getEvents('graph_access_failure');
    expect(failures).toHaveLength(1);
    expect(failures[0].traceId).toBe('trace-graph');
    expect(failures[0].payload.code).toBe('GRAPH_ACCESS_FAILURE');
    expect(failures[0].payload.details).toEqual({
      operation: 'relationship_types',
      cause: 'schema endpoint down',
    });
  });

  it('prefers explicit edge types over the graph vocabulary', async () => {
    const plan = await planner.plan(
      { queryVector: VECTOR, edgeTypes: ['mentions', 'part_of'] },
      new FlakyGraphAccess({ failRelationshipTypes: true })
    );

    expect(plan.traversal.edgeTypes).toEqual(['part_of', 'mentions']);
    expect(tracer.getEvents('graph_access_failure')).toEqual([]);
  });

  it('drops the hierarchical bonus on linked graphs', async () => {
    const plan = await planner.plan({ queryVector: VECTOR }, new FlakyGraphAccess({ graphType: 'linked' }));

    expect(plan.graphType).toBe('linked');
    expect(plan.weights.hierarchicalBonus).toBe(0);
    expect(plan.traversal.hierarchicalWeight).toBe(1.0);
  });

  it('ranks requested start entities, treating failed lookups as neutral', async () => {
    const access = new FlakyGraphAccess({
      entities: [
        {
          id: 'Q1',
          features: {
            inboundConnections: 5000,
            outboundConnections: 5000,
            referenceCount: 10000,
            mentionCount: 10000,
            lastModified: NOW,
          },
        },
      ],
      failingEntityIds: ['Q2'],
    });

    const plan = await planner.plan({ queryVector: VECTOR, startEntities: ['Q2', 'Q1'] }, access);

    expect(plan.entryPoints.map((entry) => entry.entityId)).toEqual(['Q1', 'Q2']);
    expect(plan.entryPoints[0].importance).toBeGreaterThan(plan.entryPoints[1].importance);

    const failures = tracer.getEvents('graph_access_failure');
    expect(failures).toHaveLength(1);
    expect(failures[0].payload.details).toEqual({ operation: 'entity_features', cause: 'feature lookup timed out' });
  });

  it('gives up on entry points when the entity sample fails', async () => {
    const plan = await planner.plan({ queryVector: VECTOR }, new FlakyGraphAccess({ failEntities: true }));

    expect(plan.entryPoints).toEqual([]);
    expect(plan.traversal.edgeTypes).toEqual(['subclass_of', 'related_to']);
    expect(tracer.getEvents('graph_access_failure')).toHaveLength(1);
  });

  it('scales the budget with priority', async () => {
    const low = await planner.plan({ queryVector: VECTOR, priority: 'low' }, KNOWLEDGE_GRAPH);
    const high = await planner.plan({ queryVector: VECTOR, priority: 'high' }, KNOWLEDGE_GRAPH);

    expect(low.budget.vectorSearchMs).toBe(250);
    expect(high.budget.vectorSearchMs).toBe(750);
    expect(high.traversal.totalNodeBudget).toBe(1950);
  });

  it('carries the category filter into the vector parameters', async () => {
    const plan = await planner.plan({ queryVector: VECTOR, categoryFilter: ['Physics'] });
    expect(plan.vectorParams.categories).toEqual(['Physics']);
  });

  it('records each plan in the optimization history', async () => {
    const plan = await planner.plan({ queryVector: VECTOR, queryText: 'types of galaxies' }, KNOWLEDGE_GRAPH);

    expect(planner.getOptimizationHistory()).toEqual([
      {
        timestamp: '2026-07-02T12:00:00.000Z',
        planId: plan.planId,
        queryText: 'types of galaxies',
        strategy: 'collection',
        expanded: false,
      },
    ]);
    expect(planner.getQueryStats().commonPatterns()).toHaveLength(1);
  });
});

describe('QueryPlanner with metrics', () => {
  it('times each stage and closes tracking when the outcome is recorded', async () => {
    setLogLevel('silent');
    const metrics = new QueryMetricsCollector({ now: () => NOW });
    const planner = new QueryPlanner({ metrics, now: () => NOW });

    const plan = await planner.plan({ queryVector: VECTOR, queryText: 'what is entropy' }, KNOWLEDGE_GRAPH);
    expect(plan.queryId).toBeDefined();
    const queryId = plan.queryId ?? '';
    expect(metrics.isTracking(queryId)).toBe(true);
    expect(Object.keys(metrics.getQueryMetrics(queryId)?.phases ?? {})).toEqual([
      'base_weighting',
      'expansion',
      'rewriting',
      'traversal_planning',
      'budget_allocation',
    ]);

    const before = planner.getWeightTable().weight('subclass_of');
    const record = planner.recordOutcome(
      plan,
      [
        { id: 'r1', score: 0.9, path: [{ edgeType: 'subclass_of' }] },
        { id: 'r2', score: 0.7, path: [{ edgeType: 'subclass_of' }] },
      ],
      80
    );

    expect(record.queryId).toBe(queryId);
    expect(record.strategy).toBe('definition');
    expect(planner.getWeightTable().weight('subclass_of')).toBeCloseTo(before + 0.025, 10);
    expect(metrics.isTracking(queryId)).toBe(false);

    const completed = metrics.getQueryMetrics(queryId);
    expect(completed?.resultCount).toBe(2);
    expect(completed?.qualityScore).toBeCloseTo(0.8, 10);
    expect(planner.getQueryStats().queryCount).toBe(1);
  });

  it('uses the plan id for learning when no metrics sink is attached', async () => {
    setLogLevel('silent');
    const planner = new QueryPlanner();
    const plan = await planner.plan({ queryVector: VECTOR });

    expect(plan.queryId).toBeUndefined();
    expect(planner.recordOutcome(plan, [], 10).queryId).toBe(plan.planId);
  });

  it('keeps budget consumption apart for plans in flight', async () => {
    setLogLevel('silent');
    const planner = new QueryPlanner({ now: () => NOW });
    const first = await planner.plan({ queryVector: VECTOR }, KNOWLEDGE_GRAPH);
    const second = await planner.plan({ queryVector: VECTOR }, KNOWLEDGE_GRAPH);
    const allocator = planner.getBudgetAllocator();

    allocator.trackConsumption(first.planId, 'maxNodes', 2000);
    allocator.trackConsumption(second.planId, 'maxNodes', 650);
    planner.recordOutcome(first, [], 40);

    expect(allocator.consumptionReport(second.planId)).toEqual({
      consumed: { maxNodes: 650 },
      ratios: { maxNodes: 0.5 },
      overallRatio: 0.5,
    });
    expect(allocator.openPlanCount).toBe(1);

    const next = await planner.plan({ queryVector: VECTOR }, KNOWLEDGE_GRAPH);
    expect(next.budget.maxNodes).toBe(2600);
    expect(next.traversal.totalNodeBudget).toBe(2600);
  });

  it('rejects invalid configuration at construction', () => {
    expect(() => new QueryPlanner({ config: { vectorWeight: 2 } })).toThrow(/Invalid planner configuration/);
  });
});
