/**
 * @fileoverview Core types for the graph query planner
 */

// ============================================================================
// QUERY TYPES
// ============================================================================

export type QueryPriority = 'low' | 'normal' | 'high';

export interface PlanQuery {
  /** Embedding of the query. Required. */
  queryVector: number[];
  queryText?: string;
  maxVectorResults?: number;
  maxTraversalDepth?: number;
  edgeTypes?: string[];
  minSimilarity?: number;
  priority?: QueryPriority;
  /** Entity ids the caller wants the walk to start from */
  startEntities?: string[];
  categoryFilter?: string[];
  expandTopics?: boolean;
  topicExpansionFactor?: number;
  traceId?: string;
}

// ============================================================================
// EXTERNAL SEARCH
// ============================================================================

export interface VectorSearchHit {
  id: string;
  score: number;
  metadata?: Record<string, unknown>;
}

export type VectorSearchFilter = (hit: VectorSearchHit) => boolean;

export type VectorSearchFn = (
  vector: number[],
  topK: number,
  filter?: VectorSearchFilter
) => Promise<VectorSearchHit[]> | VectorSearchHit[];

// ============================================================================
// ENTITIES
// ============================================================================

export interface EntityFeatures {
  inboundConnections?: number;
  outboundConnections?: number;
  referenceCount?: number;
  categories?: string[];
  mentionCount?: number;
  /** Epoch milliseconds or an ISO-8601 string */
  lastModified?: number | string;
}

export interface Entity {
  readonly id: string;
  readonly type?: string;
  readonly features?: Readonly<EntityFeatures>;
}

export interface RankedEntity {
  entityId: string;
  importance: number;
}

// ============================================================================
// EXPANSION
// ============================================================================

export interface TopicExpansion {
  topicId: string;
  name: string;
  similarity: number;
}

export interface CategoryExpansion {
  category: string;
  depth: number;
}

export interface ExpansionResult {
  originalVector: number[];
  originalText: string;
  topics: TopicExpansion[];
  categories: CategoryExpansion[];
  hasExpansions: boolean;
}

// ============================================================================
// TRAVERSAL
// ============================================================================

export type TraversalStrategy =
  | 'hierarchical'
  | 'topic_focused'
  | 'comparison'
  | 'definition'
  | 'causal'
  | 'collection';

/**
 * Strategy and preferences produced by base weighting and query rewriting,
 * consumed by the traversal planner and the budget allocator.
 */
export interface TraversalHints {
  strategy: TraversalStrategy;
  edgeTypes: string[];
  maxDepth: number;
  hierarchicalWeight: number;
  preferredEdgeTypes?: string[];
  targetEntities?: string[];
  prioritizeRelationships?: boolean;
  comparisonEntities?: string[];
  findCommonCategories?: boolean;
  findRelationshipsBetween?: boolean;
  collectionTarget?: string;
  expandTopics?: boolean;
  topicExpansionFactor?: number;
}

export interface TraversalPlan extends TraversalHints {
  /** Node budget per level, index 0 = start level */
  levelBudgets: number[];
  /** Deepest level at which each edge type is still followed */
  activeDepths: Record<string, number>;
  traversalCosts: Record<string, number>;
  totalNodeBudget: number;
}

// ============================================================================
// BUDGET
// ============================================================================

export interface Budget {
  vectorSearchMs: number;
  graphTraversalMs: number;
  rankingMs: number;
  timeoutMs: number;
  maxNodes: number;
  maxEdges: number;
  categoryTraversalMs: number;
  maxCategories: number;
  topicExpansionMs: number;
  maxTopics: number;
}

export type BudgetResource = keyof Budget;

// ============================================================================
// EXECUTION PLAN
// ============================================================================

export type GraphType = 'hierarchical' | 'linked' | 'unknown';

export type PatternKind = 'topic_lookup' | 'comparison' | 'definition' | 'causal' | 'enumeration';

export interface PatternMatch {
  kind: PatternKind;
  entities: string[];
}

export interface VectorParams {
  topK: number;
  minScore: number;
  categories?: string[];
}

export interface PlanWeights {
  vector: number;
  graph: number;
  hierarchicalBonus: number;
}

export interface ExecutionPlan {
  planId: string;
  /** Metrics tracking id, when a metrics sink is attached */
  queryId?: string;
  priority: QueryPriority;
  graphType: GraphType;
  vectorParams: VectorParams;
  traversal: TraversalPlan;
  budget: Budget;
  weights: PlanWeights;
  expansion?: ExpansionResult;
  pattern?: PatternMatch;
  entryPoints: RankedEntity[];
  createdAt: string;
}

// ============================================================================
// EXECUTION FEEDBACK
// ============================================================================

export interface PathStep {
  edgeType?: string;
  from?: string;
  to?: string;
}

export interface ExecutionResult {
  id?: string;
  score?: number;
  path?: PathStep[];
  metadata?: {
    type?: string;
    category?: string;
    [key: string]: unknown;
  };
}
