/**
 * @fileoverview Graph Query Planner - graph-aware retrieval planning
 *
 * Builds execution plans for hybrid retrieval (vector search followed by a
 * knowledge-graph walk). A plan says which edge types to follow and in what
 * order, how deep, how many nodes per level, which entities to start from,
 * and how much time and node budget each phase gets. Executing the plan is
 * left to the caller.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createQueryPlanner, InMemoryGraphAccess } from 'graph-query-planner';
 *
 * const planner = createQueryPlanner({ config: { maxExpansions: 3 } });
 * planner.getCategoryGraph().registerEdge('Science', 'Physics');
 *
 * const plan = await planner.plan(
 *   { queryVector: embedding, queryText: 'what is quantum entanglement' },
 *   new InMemoryGraphAccess({ relationshipTypes: ['subclass_of', 'mentions'] }),
 *   search,
 * );
 *
 * // ... execute the plan, then:
 * planner.recordOutcome(plan, results, elapsedMs);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PRIMARY ENTRY POINT
// ============================================================================

export {
  QueryPlanner,
  createQueryPlanner,
  MAX_TRAVERSAL_DEPTH,
  validatePlanQuery,
  type OptimizationRecord,
  type QueryPlannerOptions,
} from './planning/orchestrator.js';

export { toPlanDocument, type JsonValue, type PlanDocument } from './planning/plan_document.js';

// ============================================================================
// PLANNING COMPONENTS
// ============================================================================

export {
  DEFAULT_TRAVERSAL_COSTS,
  TraversalPlanner,
  activeDepths,
  emptyTraversalPlan,
  levelBudgets,
  traversalCost,
  type TraversalPlanHints,
} from './planning/traversal_planner.js';

export {
  BudgetAllocator,
  DEFAULT_PRIORITY_MULTIPLIERS,
  defaultEarlyStopHeuristic,
  type BudgetAllocatorOptions,
  type BudgetRequest,
  type ConsumptionReport,
  type EarlyStopHeuristic,
  type QueryComplexity,
} from './planning/budget_allocator.js';

export {
  LearningFeedbackLoop,
  type LearningFeedbackOptions,
  type LearningRecord,
  type QueryTimeSummary,
} from './planning/learning.js';

export {
  INTENT_TEMPLATES,
  QueryRewriter,
  type RewriteInput,
  type RewriteOutput,
} from './query/rewriter.js';

export { QueryExpansionEngine, tokenize, type QueryExpansionOptions } from './query/expansion.js';

export {
  BaseQueryOptimizer,
  type BaseOptimization,
  type BaseQueryOptimizerOptions,
  type BaseQueryParams,
} from './query/base_optimizer.js';

export {
  QueryStats,
  type QueryPattern,
  type QueryPerformanceSummary,
  type QueryStatsOptions,
} from './query/query_stats.js';

// ============================================================================
// GRAPH MODEL
// ============================================================================

export {
  DEFAULT_RELATIONSHIP_WEIGHTS,
  RelationshipWeightTable,
  normalizeEdgeType,
  type RelationshipWeightTableOptions,
} from './graphs/relationship_weights.js';

export { CategoryGraph } from './graphs/category_graph.js';

export {
  EntityImportanceModel,
  IMPORTANCE_FEATURE_WEIGHTS,
  type EntityImportanceOptions,
  type ImportanceBreakdown,
  type ImportanceFeature,
} from './graphs/entity_importance.js';

export {
  ABSENT_GRAPH_ACCESS,
  InMemoryGraphAccess,
  detectGraphType,
  type GraphDataAccess,
  type InMemoryGraphAccessOptions,
} from './graphs/graph_access.js';

// ============================================================================
// OBSERVABILITY
// ============================================================================

export {
  InMemoryPlanTracer,
  NOOP_TRACER,
  type PlanEventKind,
  type PlanEventPayload,
  type PlanTraceRecord,
  type PlanTracer,
} from './observability/plan_traces.js';

export {
  QueryMetricsCollector,
  type PhaseSummary,
  type PhaseTiming,
  type PlanMetricsSink,
  type QueryMetricsOptions,
  type QueryMetricsRecord,
} from './metrics/query_metrics.js';

export { getLogLevel, setLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// CONFIGURATION & ERRORS
// ============================================================================

export * from './config/index.js';

export {
  ConfigurationError,
  ExpansionFailure,
  GraphAccessFailure,
  InvalidQueryError,
  PlannerError,
  isPlannerError,
  isRecoverable,
  type ErrorJSON,
  type GraphAccessOperation,
} from './core/errors.js';

export { getErrorMessage } from './utils/errors.js';

export { Err, Ok, safeAsync, type Result } from './core/result.js';

// ============================================================================
// TYPES
// ============================================================================

export type {
  Budget,
  BudgetResource,
  CategoryExpansion,
  Entity,
  EntityFeatures,
  ExecutionPlan,
  ExecutionResult,
  ExpansionResult,
  GraphType,
  PathStep,
  PatternKind,
  PatternMatch,
  PlanQuery,
  PlanWeights,
  QueryPriority,
  RankedEntity,
  TopicExpansion,
  TraversalHints,
  TraversalPlan,
  TraversalStrategy,
  VectorParams,
  VectorSearchFilter,
  VectorSearchFn,
  VectorSearchHit,
} from './types.js';
