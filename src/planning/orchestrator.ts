/**
 * @fileoverview Query planner orchestration
 *
 * Composes the planning stages into a single `plan()` call. Stage order is
 * fixed:
 *
 *   base weighting -> expansion -> rewriting -> traversal planning
 *   -> budget allocation -> metrics/trace emission
 *
 * Only a missing or malformed query is fatal. Expansion, rewriting and
 * graph lookups degrade: failures are logged, reported to the tracer, and
 * planning continues with neutral values.
 *
 * The weight table and category graph are owned by the planner for its
 * lifetime and shared across plans; entity importance is scored with a
 * fresh model per plan.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  resolveBudgetDefaults,
  resolvePlannerConfig,
  type PlannerConfig,
  type PlannerConfigInput,
} from '../config/planner_config.js';
import { GraphAccessFailure, InvalidQueryError, type PlannerError } from '../core/errors.js';
import { CategoryGraph } from '../graphs/category_graph.js';
import { EntityImportanceModel } from '../graphs/entity_importance.js';
import { ABSENT_GRAPH_ACCESS, detectGraphType, type GraphDataAccess } from '../graphs/graph_access.js';
import { RelationshipWeightTable } from '../graphs/relationship_weights.js';
import type { PlanMetricsSink } from '../metrics/query_metrics.js';
import { NOOP_TRACER, type PlanEventKind, type PlanTracer } from '../observability/plan_traces.js';
import { BaseQueryOptimizer } from '../query/base_optimizer.js';
import { QueryExpansionEngine } from '../query/expansion.js';
import { QueryStats } from '../query/query_stats.js';
import { QueryRewriter, type RewriteOutput } from '../query/rewriter.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type {
  Entity,
  ExecutionPlan,
  ExecutionResult,
  ExpansionResult,
  PlanQuery,
  PlanWeights,
  RankedEntity,
  TraversalHints,
  TraversalStrategy,
  VectorParams,
  VectorSearchFn,
} from '../types.js';
import { BudgetAllocator, type EarlyStopHeuristic } from './budget_allocator.js';
import { LearningFeedbackLoop, type LearningRecord } from './learning.js';
import { levelBudgets, TraversalPlanner } from './traversal_planner.js';

// ============================================================================
// QUERY VALIDATION
// ============================================================================

/** Deepest traversal a query may ask for */
export const MAX_TRAVERSAL_DEPTH = 32;

const PlanQuerySchema = z.object({
  queryVector: z.array(z.number().finite()).min(1),
  queryText: z.string().optional(),
  maxVectorResults: z.number().int().positive().optional(),
  maxTraversalDepth: z.number().int().nonnegative().max(MAX_TRAVERSAL_DEPTH).optional(),
  edgeTypes: z.array(z.string().min(1)).optional(),
  minSimilarity: z.number().min(0).max(1).optional(),
  priority: z.enum(['low', 'normal', 'high']).optional(),
  startEntities: z.array(z.string().min(1)).optional(),
  categoryFilter: z.array(z.string()).optional(),
  expandTopics: z.boolean().optional(),
  topicExpansionFactor: z.number().nonnegative().optional(),
  traceId: z.string().optional(),
});

/**
 * @throws InvalidQueryError naming the first invalid field
 */
export function validatePlanQuery(query: unknown): PlanQuery {
  if (typeof query !== 'object' || query === null || !('queryVector' in query) || query.queryVector === undefined) {
    throw new InvalidQueryError('queryVector', 'a query vector is required');
  }
  const parsed = PlanQuerySchema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'query';
    throw new InvalidQueryError(field, issue?.message ?? 'invalid query');
  }
  return parsed.data;
}

// ============================================================================
// TYPES
// ============================================================================

export interface QueryPlannerOptions {
  /** Validated with PlannerConfigSchema; defaults fill the gaps */
  config?: PlannerConfigInput;
  weights?: RelationshipWeightTable;
  categoryGraph?: CategoryGraph;
  stats?: QueryStats;
  tracer?: PlanTracer;
  metrics?: PlanMetricsSink;
  earlyStopHeuristic?: EarlyStopHeuristic;
  now?: () => number;
}

export interface OptimizationRecord {
  timestamp: string;
  planId: string;
  queryText?: string;
  strategy: TraversalStrategy;
  expanded: boolean;
}

const DEFAULT_TOP_K = 5;
const DEFAULT_MAX_DEPTH = 2;
const DEFAULT_MIN_SIMILARITY = 0.5;
const ENTRY_POINT_SAMPLE = 20;
const ENTRY_POINT_LIMIT = 10;
const LINKED_HIERARCHICAL_WEIGHT = 1.0;

// ============================================================================
// PLANNER
// ============================================================================

export class QueryPlanner {
  readonly config: PlannerConfig;
  private readonly weights: RelationshipWeightTable;
  private readonly categoryGraph: CategoryGraph;
  private readonly stats: QueryStats;
  private readonly tracer: PlanTracer;
  private readonly metrics?: PlanMetricsSink;
  private readonly now: () => number;

  private readonly baseOptimizer: BaseQueryOptimizer;
  private readonly expansionEngine: QueryExpansionEngine;
  private readonly rewriter: QueryRewriter;
  private readonly traversalPlanner: TraversalPlanner;
  private readonly budgetAllocator: BudgetAllocator;
  private readonly learning: LearningFeedbackLoop;

  private readonly optimizationHistory: OptimizationRecord[] = [];

  constructor(options: QueryPlannerOptions = {}) {
    this.config = resolvePlannerConfig(options.config ?? {});
    this.weights = options.weights ?? new RelationshipWeightTable({
      defaultWeight: this.config.defaultEdgeWeight,
      overrides: this.config.edgeWeightOverrides,
    });
    this.categoryGraph = options.categoryGraph ?? new CategoryGraph();
    this.stats = options.stats ?? new QueryStats({ now: options.now });
    this.tracer = options.tracer ?? NOOP_TRACER;
    this.metrics = options.metrics;
    this.now = options.now ?? Date.now;

    this.baseOptimizer = new BaseQueryOptimizer({
      vectorWeight: this.config.vectorWeight,
      graphWeight: this.config.graphWeight,
      stats: this.stats,
    });
    this.expansionEngine = new QueryExpansionEngine({
      similarityThreshold: this.config.similarityThreshold,
      maxExpansions: this.config.maxExpansions,
      tracer: this.tracer,
    });
    this.rewriter = new QueryRewriter(this.weights);
    this.traversalPlanner = new TraversalPlanner(this.weights);
    this.budgetAllocator = new BudgetAllocator({
      defaults: resolveBudgetDefaults(this.config),
      priorityMultipliers: this.config.priorityMultipliers,
      baseHeuristic: options.earlyStopHeuristic,
    });
    this.learning = new LearningFeedbackLoop(this.weights, {
      stats: this.stats,
      learningRate: this.config.learningRate,
      tracer: this.tracer,
      now: this.now,
    });
  }

  /**
   * Build an execution plan for `query`.
   *
   * @param dataAccess - Graph the plan will run against; the absent variant
   *   yields a vector-only plan.
   * @param search - Similarity search used for topic expansion.
   * @throws InvalidQueryError when the query vector is missing or a field is malformed
   */
  async plan(
    query: PlanQuery,
    dataAccess: GraphDataAccess = ABSENT_GRAPH_ACCESS,
    search?: VectorSearchFn
  ): Promise<ExecutionPlan> {
    const q = validatePlanQuery(query);
    const planId = randomUUID();
    const traceId = q.traceId ?? planId;
    const priority = q.priority ?? 'normal';

    const queryId = this.metrics?.startTracking({
      planId,
      queryText: q.queryText,
      priority,
      maxVectorResults: q.maxVectorResults,
      maxTraversalDepth: q.maxTraversalDepth,
    });
    const stage = <T>(name: string, fn: () => Promise<T> | T): Promise<T> =>
      this.metrics && queryId !== undefined ? this.metrics.timePhase(queryId, name, fn) : Promise.resolve().then(fn);

    // Base weighting
    const { graphType, hints, vectorParams, weights } = await stage('base_weighting', async () => {
      const detected = await detectGraphType(dataAccess);
      const edgeTypes = q.edgeTypes ?? await this.availableEdgeTypes(dataAccess, traceId);
      const base = this.baseOptimizer.optimize({
        topK: q.maxVectorResults ?? DEFAULT_TOP_K,
        maxDepth: q.maxTraversalDepth ?? DEFAULT_MAX_DEPTH,
        edgeTypes,
        minSimilarity: q.minSimilarity ?? DEFAULT_MIN_SIMILARITY,
      });
      const linked = detected === 'linked';
      const planWeights: PlanWeights = {
        vector: base.weights.vector,
        graph: base.weights.graph,
        hierarchicalBonus: linked ? 0 : this.config.hierarchicalBonus,
      };
      const baseHints: TraversalHints = {
        strategy: 'hierarchical',
        edgeTypes: base.params.edgeTypes,
        maxDepth: base.params.maxDepth,
        hierarchicalWeight: linked ? LINKED_HIERARCHICAL_WEIGHT : this.config.hierarchicalWeight,
      };
      return {
        graphType: detected,
        hints: baseHints,
        vectorParams: { topK: base.params.topK, minScore: base.params.minSimilarity },
        weights: planWeights,
      };
    });

    // Expansion
    const queryText = q.queryText?.trim() ?? '';
    let expansion: ExpansionResult | undefined;
    if (queryText.length > 0) {
      expansion = await stage('expansion', () =>
        this.expansionEngine.expand(q.queryVector, queryText, search, this.categoryGraph, traceId)
      );
    }

    // Rewriting
    const rewritten = await stage('rewriting', () => this.rewrite(q, hints, vectorParams, traceId));
    if (rewritten.pattern) {
      this.tracer.logEvent('pattern_detected', { traceId, ...rewritten.pattern });
    }

    // Traversal planning
    const { traversal, entryPoints } = await stage('traversal_planning', async () => {
      const { edgeTypes, maxDepth, ...planHints } = rewritten.hints;
      const planned = this.traversalPlanner.plan(
        edgeTypes,
        maxDepth,
        this.budgetAllocator.defaults.maxNodes,
        planHints
      );
      const ranked = await this.rankEntryPoints(dataAccess, q.startEntities, expansion, traceId);
      return { traversal: planned, entryPoints: ranked };
    });

    // Budget allocation
    const budget = await stage('budget_allocation', () =>
      this.budgetAllocator.allocate(
        {
          strategy: traversal.strategy,
          edgeTypes: traversal.edgeTypes,
          maxDepth: traversal.maxDepth,
          topK: rewritten.vectorParams.topK,
          expandTopics: traversal.expandTopics,
          topicExpansionFactor: traversal.topicExpansionFactor,
        },
        priority,
        planId
      )
    );

    const plan: ExecutionPlan = {
      planId,
      queryId,
      priority,
      graphType,
      vectorParams: rewritten.vectorParams,
      traversal: {
        ...traversal,
        totalNodeBudget: budget.maxNodes,
        levelBudgets: levelBudgets(traversal.maxDepth, budget.maxNodes),
      },
      budget,
      weights,
      expansion,
      pattern: rewritten.pattern,
      entryPoints,
      createdAt: new Date(this.now()).toISOString(),
    };

    this.optimizationHistory.push({
      timestamp: plan.createdAt,
      planId,
      queryText: q.queryText,
      strategy: plan.traversal.strategy,
      expanded: expansion?.hasExpansions ?? false,
    });
    this.tracer.logEvent('plan_created', {
      traceId,
      planId,
      queryId,
      graphType,
      strategy: plan.traversal.strategy,
      edgeTypes: plan.traversal.edgeTypes,
      priority,
    });
    logDebug('Execution plan created', {
      planId,
      strategy: plan.traversal.strategy,
      edgeTypeCount: plan.traversal.edgeTypes.length,
    });
    return plan;
  }

  /**
   * Feed executed results back: adjusts relationship weights, records query
   * time, moves the plan's budget consumption into history and closes
   * metrics tracking for the plan.
   */
  recordOutcome(plan: ExecutionPlan, results: readonly ExecutionResult[], elapsedMs: number): LearningRecord {
    const record = this.learning.recordOutcome(plan.queryId ?? plan.planId, results, elapsedMs, plan);
    this.budgetAllocator.recordCompletion(plan.planId);
    if (this.metrics && plan.queryId !== undefined) {
      this.metrics.endTracking(plan.queryId, record.resultCount, record.avgScore);
    }
    return record;
  }

  shouldStopEarly(results: readonly ExecutionResult[], budgetConsumedRatio: number): boolean {
    return this.budgetAllocator.shouldStopEarly(results, budgetConsumedRatio);
  }

  getWeightTable(): RelationshipWeightTable {
    return this.weights;
  }

  getCategoryGraph(): CategoryGraph {
    return this.categoryGraph;
  }

  getBudgetAllocator(): BudgetAllocator {
    return this.budgetAllocator;
  }

  getLearningLoop(): LearningFeedbackLoop {
    return this.learning;
  }

  getQueryStats(): QueryStats {
    return this.stats;
  }

  getOptimizationHistory(): OptimizationRecord[] {
    return [...this.optimizationHistory];
  }

  // ============================================================================
  // STAGES
  // ============================================================================

  private rewrite(
    q: PlanQuery,
    hints: TraversalHints,
    vectorParams: VectorParams,
    traceId: string
  ): RewriteOutput {
    try {
      return this.rewriter.rewritePlan({
        hints,
        vectorParams,
        queryText: q.queryText,
        categoryFilter: q.categoryFilter,
        expandTopics: q.expandTopics,
        topicExpansionFactor: q.topicExpansionFactor,
      });
    } catch (error: unknown) {
      logWarning('Query rewriting failed; using base hints', { traceId, error: getErrorMessage(error) });
      this.tracer.logEvent('rewrite_failure', { traceId, message: getErrorMessage(error) });
      return { hints, vectorParams };
    }
  }

  /**
   * Relationship types the graph offers. A failed lookup falls back to the
   * configured default edge types.
   */
  private async availableEdgeTypes(access: GraphDataAccess, traceId: string): Promise<string[]> {
    if (!access.available) return [];
    try {
      return [...await access.getRelationshipTypes()];
    } catch (error: unknown) {
      this.reportRecoverable(
        'graph_access_failure',
        new GraphAccessFailure('relationship_types', getErrorMessage(error), toError(error)),
        traceId
      );
      return [...this.config.defaultEdgeTypes];
    }
  }

  /**
   * Rank candidate start entities. Lookups that fail leave the entity with
   * no features, which scores neutral.
   */
  private async rankEntryPoints(
    access: GraphDataAccess,
    startEntities: string[] | undefined,
    expansion: ExpansionResult | undefined,
    traceId: string
  ): Promise<RankedEntity[]> {
    if (!access.available) return [];

    let candidates: Entity[];
    if (startEntities && startEntities.length > 0) {
      candidates = await Promise.all(startEntities.map((id) => this.lookupEntity(access, id, traceId)));
    } else {
      try {
        candidates = await access.getEntities(ENTRY_POINT_SAMPLE);
      } catch (error: unknown) {
        this.reportRecoverable(
          'graph_access_failure',
          new GraphAccessFailure('entities', getErrorMessage(error), toError(error)),
          traceId
        );
        return [];
      }
    }

    const categoryWeights = expansion
      ? this.categoryGraph.weightsFor(expansion.categories.map((entry) => entry.category))
      : undefined;
    const model = new EntityImportanceModel({ now: this.now });
    return model.rankWithScores(candidates, categoryWeights).slice(0, ENTRY_POINT_LIMIT);
  }

  private async lookupEntity(access: GraphDataAccess, id: string, traceId: string): Promise<Entity> {
    try {
      return (await access.getEntity(id)) ?? { id };
    } catch (error: unknown) {
      this.reportRecoverable(
        'graph_access_failure',
        new GraphAccessFailure('entity_features', `${id}: ${getErrorMessage(error)}`, toError(error)),
        traceId
      );
      return { id };
    }
  }

  private reportRecoverable(kind: PlanEventKind, error: PlannerError, traceId: string): void {
    logWarning(`${error.message}; continuing with neutral values`, { traceId, code: error.code });
    this.tracer.logEvent(kind, { ...error.toJSON(), traceId });
  }
}

export function createQueryPlanner(options: QueryPlannerOptions = {}): QueryPlanner {
  return new QueryPlanner(options);
}
