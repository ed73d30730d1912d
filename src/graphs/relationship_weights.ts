/**
 * @fileoverview Relationship weight table
 *
 * Priority weight per edge-type label. Hierarchical relations (subclass_of,
 * instance_of, part_of, category membership) outrank associative ones
 * (related_to, similar_to), which outrank high fan-out mention edges.
 *
 * The table is process-lifetime and mutated in place by the learning loop;
 * every write is clamped to [MIN_EDGE_WEIGHT, MAX_EDGE_WEIGHT]. Callers that
 * share one table across concurrent plans must serialize `adjust()` calls.
 */

import { ConfigurationError } from '../core/errors.js';
import { MAX_EDGE_WEIGHT, MIN_EDGE_WEIGHT } from '../config/planner_config.js';

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_RELATIONSHIP_WEIGHTS: Readonly<Record<string, number>> = {
  // Hierarchical
  subclass_of: 1.5,
  instance_of: 1.4,
  part_of: 1.3,
  has_part: 1.2,
  // Category membership
  category_contains: 1.3,
  in_category: 1.3,
  // Associative
  related_to: 1.0,
  similar_to: 0.9,
  refers_to: 0.8,
  // Authorship
  created_by: 0.7,
  authored_by: 0.7,
  developed_by: 0.7,
  // Temporal
  preceded_by: 0.6,
  succeeded_by: 0.6,
  // Causal
  causes: 1.1,
  caused_by: 1.1,
  // High fan-out
  mentions: 0.5,
  mentioned_in: 0.5,
};

const ALIASES: ReadonlyMap<string, string> = new Map([['contains_part', 'has_part']]);

// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * Normalize an edge label to lowercase snake_case.
 *
 * `IsSubclassOf`, `is-subclass-of` and `is subclass of` all become
 * `subclass_of`; the `is_` prefix is dropped only from relational forms
 * ending in a preposition (`is_part_of`, `is_created_by`).
 */
export function normalizeEdgeType(edgeType: string): string {
  const snake = edgeType
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
    .replace(/_+/g, '_');

  const relational = /^is_(.+_(?:of|by|to|in))$/.exec(snake);
  const collapsed = relational ? relational[1] : snake;
  return ALIASES.get(collapsed) ?? collapsed;
}

function clampWeight(weight: number): number {
  return Math.max(MIN_EDGE_WEIGHT, Math.min(MAX_EDGE_WEIGHT, weight));
}

// ============================================================================
// WEIGHT TABLE
// ============================================================================

export interface RelationshipWeightTableOptions {
  /** Weight returned for labels with no entry */
  defaultWeight?: number;
  /** Per-label weights applied over the defaults; keys are normalized */
  overrides?: Record<string, number>;
}

export class RelationshipWeightTable {
  private readonly weights = new Map<string, number>();
  readonly defaultWeight: number;

  constructor(options: RelationshipWeightTableOptions = {}) {
    const issues: string[] = [];
    const defaultWeight = options.defaultWeight ?? 0.5;
    if (!isValidWeight(defaultWeight)) {
      issues.push(`defaultWeight: ${defaultWeight} is outside [${MIN_EDGE_WEIGHT}, ${MAX_EDGE_WEIGHT}]`);
    }
    for (const [edgeType, weight] of Object.entries(options.overrides ?? {})) {
      if (!isValidWeight(weight)) {
        issues.push(`overrides.${edgeType}: ${weight} is outside [${MIN_EDGE_WEIGHT}, ${MAX_EDGE_WEIGHT}]`);
      }
    }
    if (issues.length > 0) {
      throw new ConfigurationError(issues, 'relationship weights');
    }

    this.defaultWeight = defaultWeight;
    for (const [edgeType, weight] of Object.entries(DEFAULT_RELATIONSHIP_WEIGHTS)) {
      this.weights.set(edgeType, weight);
    }
    for (const [edgeType, weight] of Object.entries(options.overrides ?? {})) {
      this.weights.set(normalizeEdgeType(edgeType), weight);
    }
  }

  weight(edgeType: string): number {
    return this.weights.get(normalizeEdgeType(edgeType)) ?? this.defaultWeight;
  }

  has(edgeType: string): boolean {
    return this.weights.has(normalizeEdgeType(edgeType));
  }

  /**
   * Sort edge types by weight, highest first. Equal weights keep input order.
   */
  prioritize(edgeTypes: readonly string[]): string[] {
    return edgeTypes
      .map((edgeType, index) => ({ edgeType, index, weight: this.weight(edgeType) }))
      .sort((a, b) => b.weight - a.weight || a.index - b.index)
      .map((entry) => entry.edgeType);
  }

  filterAbove(edgeTypes: readonly string[], minWeight = 0.7): string[] {
    return edgeTypes.filter((edgeType) => this.weight(edgeType) >= minWeight);
  }

  /**
   * Nudge a weight by `delta`. Returns the clamped weight now stored.
   */
  adjust(edgeType: string, delta: number): number {
    const next = clampWeight(this.weight(edgeType) + (Number.isFinite(delta) ? delta : 0));
    this.weights.set(normalizeEdgeType(edgeType), next);
    return next;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.weights);
  }
}

function isValidWeight(weight: number): boolean {
  return Number.isFinite(weight) && weight >= MIN_EDGE_WEIGHT && weight <= MAX_EDGE_WEIGHT;
}
