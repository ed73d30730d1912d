/**
 * @fileoverview Traversal planning
 *
 * Turns weighted edge-type priorities into a walk schedule:
 * - level budgets: 40% of the node budget at the start level, then
 *   `total * 0.2 * 0.7^level`, each clipped to what is left
 * - activation depth: higher-priority edge types stay active deeper
 * - traversal cost: hierarchical edges are cheap, mention edges expensive
 */

import { normalizeEdgeType, type RelationshipWeightTable } from '../graphs/relationship_weights.js';
import type { TraversalHints, TraversalPlan } from '../types.js';

// ============================================================================
// COSTS
// ============================================================================

export const DEFAULT_TRAVERSAL_COSTS: Readonly<Record<string, number>> = {
  subclass_of: 0.6,
  instance_of: 0.6,
  part_of: 0.7,
  has_part: 0.7,
  category_contains: 0.7,
  in_category: 0.7,
  related_to: 1.0,
  similar_to: 1.0,
  refers_to: 1.1,
  created_by: 1.2,
  authored_by: 1.2,
  developed_by: 1.2,
  mentions: 1.5,
  mentioned_in: 1.5,
};

const DEFAULT_COST = 1.0;
const TRAVERSAL_COSTS: ReadonlyMap<string, number> = new Map(Object.entries(DEFAULT_TRAVERSAL_COSTS));
const FIRST_LEVEL_SHARE = 0.4;
const LEVEL_SHARE = 0.2;
const LEVEL_DECAY = 0.7;

export function traversalCost(edgeType: string): number {
  return TRAVERSAL_COSTS.get(normalizeEdgeType(edgeType)) ?? DEFAULT_COST;
}

// ============================================================================
// PLANNER
// ============================================================================

export type TraversalPlanHints = Partial<Omit<TraversalHints, 'edgeTypes' | 'maxDepth'>>;

export class TraversalPlanner {
  constructor(private readonly weights: RelationshipWeightTable) {}

  plan(
    edgeTypes: readonly string[],
    maxDepth: number,
    totalNodeBudget: number,
    hints: TraversalPlanHints = {}
  ): TraversalPlan {
    const depth = Math.max(0, Math.floor(maxDepth));
    const total = Math.max(0, Math.floor(totalNodeBudget));
    const ordered = this.order(edgeTypes, hints.preferredEdgeTypes);

    if (ordered.length === 0) {
      return emptyTraversalPlan({ ...hints, totalNodeBudget: total });
    }

    const traversalCosts = Object.fromEntries(ordered.map((edgeType) => [edgeType, traversalCost(edgeType)]));

    return {
      ...hints,
      strategy: hints.strategy ?? 'hierarchical',
      hierarchicalWeight: hints.hierarchicalWeight ?? 1.5,
      edgeTypes: ordered,
      maxDepth: depth,
      totalNodeBudget: total,
      levelBudgets: levelBudgets(depth, total),
      activeDepths: activeDepths(ordered, depth),
      traversalCosts,
    };
  }

  /**
   * Preferred edge types that are available come first, in preference
   * order; the rest follow by weight.
   */
  private order(edgeTypes: readonly string[], preferred: readonly string[] = []): string[] {
    const unique = Array.from(new Set(edgeTypes));
    const front: string[] = [];
    for (const wanted of preferred) {
      const key = normalizeEdgeType(wanted);
      const match = unique.find((edgeType) => normalizeEdgeType(edgeType) === key);
      if (match !== undefined && !front.includes(match)) front.push(match);
    }
    const rest = this.weights.prioritize(unique.filter((edgeType) => !front.includes(edgeType)));
    return [...front, ...rest];
  }
}

/**
 * Node budget per level; non-increasing and summing to at most `total`.
 */
export function levelBudgets(maxDepth: number, total: number): number[] {
  const budgets: number[] = [];
  let remaining = total;
  for (let level = 0; level < maxDepth; level++) {
    const share = level === 0
      ? total * FIRST_LEVEL_SHARE
      : total * LEVEL_SHARE * Math.pow(LEVEL_DECAY, level);
    const budget = Math.min(remaining, Math.floor(share));
    if (budget === 0) {
      // Shares only shrink with depth
      return budgets.concat(new Array<number>(maxDepth - level).fill(0));
    }
    budgets.push(budget);
    remaining -= budget;
  }
  return budgets;
}

/**
 * Rank 0 stays active to `maxDepth`, the last rank to depth 1.
 */
export function activeDepths(ordered: readonly string[], maxDepth: number): Record<string, number> {
  const n = ordered.length;
  return Object.fromEntries(
    ordered.map((edgeType, rank) => [
      edgeType,
      n === 1 ? maxDepth : Math.max(1, Math.round((1 - rank / (n - 1)) * maxDepth)),
    ])
  );
}

export function emptyTraversalPlan(hints: TraversalPlanHints & { totalNodeBudget?: number } = {}): TraversalPlan {
  return {
    ...hints,
    strategy: hints.strategy ?? 'hierarchical',
    hierarchicalWeight: hints.hierarchicalWeight ?? 1.5,
    edgeTypes: [],
    maxDepth: 0,
    totalNodeBudget: hints.totalNodeBudget ?? 0,
    levelBudgets: [],
    activeDepths: {},
    traversalCosts: {},
  };
}
