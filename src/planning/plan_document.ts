/**
 * @fileoverview ExecutionPlan serialization
 *
 * Plain nested document with snake_case keys, for handoff to an executor
 * or for logging. Edge-type keyed maps keep their labels as given.
 */

import type { Budget, ExecutionPlan, ExpansionResult, TraversalPlan } from '../types.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type PlanDocument = { [key: string]: JsonValue };

export function toPlanDocument(plan: ExecutionPlan): PlanDocument {
  const doc: PlanDocument = {
    plan_id: plan.planId,
    priority: plan.priority,
    graph_type: plan.graphType,
    created_at: plan.createdAt,
    vector_params: withoutUndefined({
      top_k: plan.vectorParams.topK,
      min_score: plan.vectorParams.minScore,
      categories: plan.vectorParams.categories ? [...plan.vectorParams.categories] : undefined,
    }),
    traversal: traversalDocument(plan.traversal),
    budget: budgetDocument(plan.budget),
    weights: {
      vector: plan.weights.vector,
      graph: plan.weights.graph,
      hierarchical_bonus: plan.weights.hierarchicalBonus,
    },
    entry_points: plan.entryPoints.map((entry) => ({
      entity_id: entry.entityId,
      importance: entry.importance,
    })),
  };
  if (plan.queryId !== undefined) doc.query_id = plan.queryId;
  if (plan.expansion) doc.expansion = expansionDocument(plan.expansion);
  if (plan.pattern) {
    doc.pattern = { kind: plan.pattern.kind, entities: [...plan.pattern.entities] };
  }
  return doc;
}

function traversalDocument(traversal: TraversalPlan): PlanDocument {
  return withoutUndefined({
    strategy: traversal.strategy,
    edge_types: [...traversal.edgeTypes],
    max_depth: traversal.maxDepth,
    hierarchical_weight: traversal.hierarchicalWeight,
    total_node_budget: traversal.totalNodeBudget,
    level_budgets: [...traversal.levelBudgets],
    active_depths: { ...traversal.activeDepths },
    traversal_costs: { ...traversal.traversalCosts },
    preferred_edge_types: copyList(traversal.preferredEdgeTypes),
    target_entities: copyList(traversal.targetEntities),
    prioritize_relationships: traversal.prioritizeRelationships,
    comparison_entities: copyList(traversal.comparisonEntities),
    find_common_categories: traversal.findCommonCategories,
    find_relationships_between: traversal.findRelationshipsBetween,
    collection_target: traversal.collectionTarget,
    expand_topics: traversal.expandTopics,
    topic_expansion_factor: traversal.topicExpansionFactor,
  });
}

function budgetDocument(budget: Budget): PlanDocument {
  return {
    vector_search_ms: budget.vectorSearchMs,
    graph_traversal_ms: budget.graphTraversalMs,
    ranking_ms: budget.rankingMs,
    timeout_ms: budget.timeoutMs,
    max_nodes: budget.maxNodes,
    max_edges: budget.maxEdges,
    category_traversal_ms: budget.categoryTraversalMs,
    max_categories: budget.maxCategories,
    topic_expansion_ms: budget.topicExpansionMs,
    max_topics: budget.maxTopics,
  };
}

function expansionDocument(expansion: ExpansionResult): PlanDocument {
  return {
    original_vector: [...expansion.originalVector],
    original_text: expansion.originalText,
    topics: expansion.topics.map((topic) => ({
      topic_id: topic.topicId,
      name: topic.name,
      similarity: topic.similarity,
    })),
    categories: expansion.categories.map((entry) => ({
      category: entry.category,
      depth: entry.depth,
    })),
    has_expansions: expansion.hasExpansions,
  };
}

function copyList(values: readonly string[] | undefined): string[] | undefined {
  return values ? [...values] : undefined;
}

function withoutUndefined(fields: Record<string, JsonValue | undefined>): PlanDocument {
  const doc: PlanDocument = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) doc[key] = value;
  }
  return doc;
}
