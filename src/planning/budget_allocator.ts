/**
 * @fileoverview Budget allocation and early stopping
 *
 * Budgets are advisory: the executor enforces them, the planner only sizes
 * them. Allocation order:
 *
 * 1. defaults, scaled by estimated query complexity
 * 2. per-resource history (mean/p95 of recorded consumption) where present
 * 3. priority multiplier (non-decreasing low -> normal -> high)
 * 4. category, topic-expansion and strategy adjustments
 * 5. graph fields zeroed when there is nothing to traverse
 */

import { DEFAULT_BUDGET } from '../config/planner_config.js';
import { normalizeEdgeType } from '../graphs/relationship_weights.js';
import type {
  Budget,
  BudgetResource,
  ExecutionResult,
  QueryPriority,
  TraversalStrategy,
} from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface BudgetRequest {
  strategy?: TraversalStrategy;
  edgeTypes: readonly string[];
  maxDepth: number;
  topK: number;
  expandTopics?: boolean;
  topicExpansionFactor?: number;
}

export type QueryComplexity = 'low' | 'medium' | 'high' | 'very_high';

export type EarlyStopHeuristic = (results: readonly ExecutionResult[], budgetConsumedRatio: number) => boolean;

export interface ConsumptionReport {
  consumed: Partial<Record<BudgetResource, number>>;
  ratios: Partial<Record<BudgetResource, number>>;
  overallRatio: number;
}

export interface BudgetAllocatorOptions {
  defaults?: Partial<Budget>;
  priorityMultipliers?: Record<QueryPriority, number>;
  /** Consulted when no planner-specific stopping rule fires */
  baseHeuristic?: EarlyStopHeuristic;
  /** Samples kept per resource (default 100) */
  historyLimit?: number;
  /** Ledgers kept for plans not yet completed; the oldest go first (default 1000) */
  openPlanLimit?: number;
}

interface ConsumptionLedger {
  budget: Budget;
  consumed: Map<BudgetResource, number>;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_PRIORITY_MULTIPLIERS: Readonly<Record<QueryPriority, number>> = {
  low: 0.5,
  normal: 1.0,
  high: 1.5,
};

const COMPLEXITY_MULTIPLIERS: Readonly<Record<QueryComplexity, number>> = {
  low: 0.7,
  medium: 1.0,
  high: 1.5,
  very_high: 2.0,
};

const CATEGORY_EDGE_TYPES = new Set(['category_contains', 'in_category']);
const CATEGORY_FOCUS = 1.5;
const HIERARCHICAL_BONUS = 1.3;
const TOPIC_FOCUS_BONUS = 1.4;
const COMPARISON_BONUS = 1.2;
const HISTORY_FLOOR = 0.8;

const BUDGET_RESOURCES: readonly BudgetResource[] = [
  'vectorSearchMs',
  'graphTraversalMs',
  'rankingMs',
  'timeoutMs',
  'maxNodes',
  'maxEdges',
  'categoryTraversalMs',
  'maxCategories',
  'topicExpansionMs',
  'maxTopics',
];

const GRAPH_RESOURCES: readonly BudgetResource[] = [
  'graphTraversalMs',
  'maxNodes',
  'maxEdges',
  'categoryTraversalMs',
  'maxCategories',
];

const HIGH_CONFIDENCE = 0.85;

// ============================================================================
// EARLY STOPPING
// ============================================================================

/**
 * Stop when the top three results are already strong late in the budget,
 * or when scores fall off sharply after the top result.
 */
export const defaultEarlyStopHeuristic: EarlyStopHeuristic = (results, budgetConsumedRatio) => {
  if (results.length < 3) return false;

  const top3 = results.slice(0, 3);
  if (budgetConsumedRatio > 0.7 && top3.every((r) => typeof r.score === 'number')) {
    const avgTop = top3.reduce((sum, r) => sum + (r.score ?? 0), 0) / 3;
    if (avgTop > HIGH_CONFIDENCE) return true;
  }

  if (results.length > 5 && results.every((r) => typeof r.score === 'number')) {
    const first = results[0].score ?? 0;
    const fifth = results[4].score ?? 0;
    if (first - fifth > 0.3) return true;
  }

  return false;
};

// ============================================================================
// ALLOCATOR
// ============================================================================

export class BudgetAllocator {
  readonly defaults: Readonly<Budget>;
  private readonly priorityMultipliers: Readonly<Record<QueryPriority, number>>;
  private readonly baseHeuristic: EarlyStopHeuristic;
  private readonly historyLimit: number;
  private readonly history = new Map<BudgetResource, number[]>();
  private readonly ledgers = new Map<string, ConsumptionLedger>();
  private readonly openPlanLimit: number;

  constructor(options: BudgetAllocatorOptions = {}) {
    this.defaults = { ...DEFAULT_BUDGET, ...options.defaults };
    this.priorityMultipliers = options.priorityMultipliers ?? DEFAULT_PRIORITY_MULTIPLIERS;
    this.baseHeuristic = options.baseHeuristic ?? defaultEarlyStopHeuristic;
    this.historyLimit = options.historyLimit ?? 100;
    this.openPlanLimit = options.openPlanLimit ?? 1000;
  }

  /**
   * Size a budget for one plan. With a `planId`, a consumption ledger is
   * opened for that plan, so concurrent plans are tracked apart.
   */
  allocate(request: BudgetRequest, priority: QueryPriority = 'normal', planId?: string): Budget {
    const budget: Budget = { ...this.defaults };
    const complexity = COMPLEXITY_MULTIPLIERS[this.estimateComplexity(request)];
    const priorityMultiplier = this.priorityMultipliers[priority];

    for (const resource of BUDGET_RESOURCES) {
      budget[resource] *= complexity;
      const adjusted = this.historicalValue(resource);
      if (adjusted !== undefined) {
        budget[resource] = adjusted;
      }
      budget[resource] *= priorityMultiplier;
    }

    if (request.edgeTypes.some((edgeType) => CATEGORY_EDGE_TYPES.has(normalizeEdgeType(edgeType)))) {
      budget.categoryTraversalMs *= CATEGORY_FOCUS;
      budget.maxCategories *= CATEGORY_FOCUS;
    }

    if (request.expandTopics) {
      const factor = Math.max(0, request.topicExpansionFactor ?? 1.0);
      budget.topicExpansionMs *= factor;
      budget.maxTopics *= factor;
    }

    switch (request.strategy) {
      case 'hierarchical':
        budget.graphTraversalMs *= HIERARCHICAL_BONUS;
        budget.maxNodes *= HIERARCHICAL_BONUS;
        break;
      case 'topic_focused':
        budget.vectorSearchMs *= TOPIC_FOCUS_BONUS;
        break;
      case 'comparison':
        budget.vectorSearchMs *= COMPARISON_BONUS;
        budget.graphTraversalMs *= COMPARISON_BONUS;
        break;
      default:
        break;
    }

    if (request.edgeTypes.length === 0) {
      for (const resource of GRAPH_RESOURCES) {
        budget[resource] = 0;
      }
    }

    for (const resource of BUDGET_RESOURCES) {
      budget[resource] = Math.floor(budget[resource]);
    }

    if (planId !== undefined) this.openLedger(planId, budget);
    return { ...budget };
  }

  estimateComplexity(request: BudgetRequest): QueryComplexity {
    const score = request.topK * 0.5 + request.maxDepth * 2 + request.edgeTypes.length * 0.3;
    if (score < 5) return 'low';
    if (score < 10) return 'medium';
    if (score < 20) return 'high';
    return 'very_high';
  }

  /**
   * True when enough high-confidence category hits arrived, or when result
   * diversity collapsed late in the budget; otherwise the base heuristic decides.
   */
  shouldStopEarly(results: readonly ExecutionResult[], budgetConsumedRatio: number): boolean {
    if (results.length > 0) {
      const confidentCategories = results.filter(
        (r) => r.metadata?.type === 'category' && (r.score ?? 0) > HIGH_CONFIDENCE
      );
      if (confidentCategories.length >= 3 && budgetConsumedRatio >= 0.6) {
        return true;
      }

      if (results.length > 10) {
        const unique = new Set<string>();
        for (const result of results) {
          const category = result.metadata?.category;
          if (category) unique.add(category);
        }
        if (unique.size / results.length < 0.3 && budgetConsumedRatio >= 0.7) {
          return true;
        }
      }
    }

    return this.baseHeuristic(results, budgetConsumedRatio);
  }

  // ============================================================================
  // CONSUMPTION HISTORY
  // ============================================================================

  /**
   * Add to a plan's consumption. A plan that was never allocated here is
   * measured against the defaults.
   */
  trackConsumption(planId: string, resource: BudgetResource, amount: number): void {
    if (!Number.isFinite(amount)) return;
    const ledger = this.ledgers.get(planId) ?? this.openLedger(planId, this.defaults);
    ledger.consumed.set(resource, (ledger.consumed.get(resource) ?? 0) + amount);
  }

  /**
   * Move a plan's consumption into history and close its ledger; future
   * allocations for these resources follow observed usage (never below 80%
   * of the default).
   */
  recordCompletion(planId: string): void {
    const ledger = this.ledgers.get(planId);
    if (!ledger) return;
    this.ledgers.delete(planId);
    for (const [resource, consumed] of ledger.consumed) {
      const samples = this.history.get(resource) ?? [];
      samples.push(consumed);
      if (samples.length > this.historyLimit) {
        samples.splice(0, samples.length - this.historyLimit);
      }
      this.history.set(resource, samples);
    }
  }

  /** Consumption of an open plan relative to the budget it was given. */
  consumptionReport(planId: string): ConsumptionReport {
    const ledger = this.ledgers.get(planId);
    const reference = ledger?.budget ?? this.defaults;
    const consumed: Partial<Record<BudgetResource, number>> = {};
    const ratios: Partial<Record<BudgetResource, number>> = {};
    for (const [resource, amount] of ledger?.consumed ?? []) {
      consumed[resource] = amount;
      ratios[resource] = reference[resource] > 0 ? amount / reference[resource] : 0;
    }
    const values = Object.values(ratios);
    const overallRatio = values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
    return { consumed, ratios, overallRatio };
  }

  get openPlanCount(): number {
    return this.ledgers.size;
  }

  private openLedger(planId: string, budget: Readonly<Budget>): ConsumptionLedger {
    const ledger: ConsumptionLedger = { budget: { ...budget }, consumed: new Map() };
    this.ledgers.delete(planId);
    this.ledgers.set(planId, ledger);
    while (this.ledgers.size > this.openPlanLimit) {
      const oldest = this.ledgers.keys().next();
      if (oldest.done) break;
      this.ledgers.delete(oldest.value);
    }
    return ledger;
  }

  private historicalValue(resource: BudgetResource): number | undefined {
    const samples = this.history.get(resource);
    if (!samples || samples.length === 0) return undefined;
    const mean = samples.reduce((a, b) => a + b, 0) / samples.length;
    const sorted = [...samples].sort((a, b) => a - b);
    const p95 = sorted[Math.min(Math.floor(sorted.length * 0.95), sorted.length - 1)];
    return Math.max((mean + p95) / 2, this.defaults[resource] * HISTORY_FLOOR);
  }
}
