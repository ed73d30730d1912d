/**
 * @fileoverview Intent-pattern query rewriting
 *
 * Detects the intent of the query text with a fixed, ordered table of
 * templates and injects a matching traversal strategy. Templates are tried
 * in this order and the first match wins:
 *
 * 1. topic_lookup  "about X", "information on X", "details about X"
 * 2. comparison    "compare X and Y", "differences between X vs Y"
 * 3. definition    "what is X", "define X", "meaning of X"
 * 4. causal        "causes of X", "effects of X", "impact of X"
 * 5. enumeration   "list of X", "types of X", "examples of X"
 *
 * No match leaves the hints untouched apart from weight re-ordering.
 */

import type { RelationshipWeightTable } from '../graphs/relationship_weights.js';
import type { PatternKind, PatternMatch, TraversalHints, VectorParams } from '../types.js';

// ============================================================================
// INTENT TEMPLATES
// ============================================================================

interface IntentTemplate {
  readonly kind: PatternKind;
  readonly pattern: RegExp;
  readonly extract: (match: RegExpExecArray) => string[];
}

const firstGroup = (match: RegExpExecArray): string[] => [match[1] ?? ''];
const firstTwoGroups = (match: RegExpExecArray): string[] => [match[1] ?? '', match[2] ?? ''];

export const INTENT_TEMPLATES: readonly IntentTemplate[] = [
  {
    kind: 'topic_lookup',
    pattern: /(?:about|information|details)\s+(?:on|about)\s+([a-z0-9\s]+)/,
    extract: firstGroup,
  },
  {
    kind: 'comparison',
    pattern: /(?:compare|comparison|differences?|similarities?)\s+(?:(?:between|of)\s+)?([a-z0-9\s]+?)\s+(?:and|vs\.?|versus)\s+([a-z0-9\s]+)/,
    extract: firstTwoGroups,
  },
  {
    kind: 'definition',
    pattern: /(?:what\s+is|define|definition\s+of|meaning\s+of)\s+([a-z0-9\s]+)/,
    extract: firstGroup,
  },
  {
    kind: 'causal',
    pattern: /(?:causes?|effects?|impact|influence|results?)\s+of\s+([a-z0-9\s]+)/,
    extract: firstGroup,
  },
  {
    kind: 'enumeration',
    pattern: /(?:list|enumerate|types|kinds|categories|examples)\s+of\s+([a-z0-9\s]+)/,
    extract: firstGroup,
  },
];

const DEFINITION_EDGES = ['instance_of', 'subclass_of', 'defined_as'];
const CAUSAL_EDGES = ['causes', 'caused_by', 'affects', 'affected_by'];
const ENUMERATION_EDGES = ['instance_of', 'subclass_of', 'example_of', 'has_example'];

// ============================================================================
// REWRITER
// ============================================================================

export interface RewriteInput {
  hints: TraversalHints;
  vectorParams: VectorParams;
  queryText?: string;
  categoryFilter?: string[];
  expandTopics?: boolean;
  topicExpansionFactor?: number;
}

export interface RewriteOutput {
  hints: TraversalHints;
  vectorParams: VectorParams;
  pattern?: PatternMatch;
}

export class QueryRewriter {
  constructor(private readonly weights: RelationshipWeightTable) {}

  /**
   * Detect the query intent. Entities are the trimmed captured phrases.
   */
  rewrite(queryText: string): PatternMatch | undefined {
    const text = queryText.toLowerCase();
    for (const template of INTENT_TEMPLATES) {
      const match = template.pattern.exec(text);
      if (!match) continue;
      const entities = template.extract(match).map((entity) => entity.trim().replace(/\s+/g, ' '));
      if (entities.some((entity) => entity.length === 0)) continue;
      return { kind: template.kind, entities };
    }
    return undefined;
  }

  /**
   * Copy of `hints` carrying the strategy and traversal preferences for the
   * detected pattern.
   */
  applyHints(hints: TraversalHints, kind: PatternKind, entities: string[]): TraversalHints {
    const next: TraversalHints = { ...hints, edgeTypes: [...hints.edgeTypes] };
    switch (kind) {
      case 'topic_lookup':
        next.strategy = 'topic_focused';
        next.targetEntities = [...entities];
        next.prioritizeRelationships = true;
        break;
      case 'comparison':
        next.strategy = 'comparison';
        next.comparisonEntities = [...entities];
        next.findCommonCategories = true;
        next.findRelationshipsBetween = true;
        break;
      case 'definition':
        next.strategy = 'definition';
        next.preferredEdgeTypes = [...DEFINITION_EDGES];
        break;
      case 'causal':
        next.strategy = 'causal';
        next.preferredEdgeTypes = [...CAUSAL_EDGES];
        break;
      case 'enumeration':
        next.strategy = 'collection';
        next.preferredEdgeTypes = [...ENUMERATION_EDGES];
        next.collectionTarget = entities[0];
        break;
    }
    return next;
  }

  /**
   * Full rewriting pass: pattern hints, weight ordering of edge types,
   * category filter and topic-expansion request.
   */
  rewritePlan(input: RewriteInput): RewriteOutput {
    let hints: TraversalHints = { ...input.hints, edgeTypes: [...input.hints.edgeTypes] };
    const vectorParams: VectorParams = { ...input.vectorParams };

    const pattern = input.queryText ? this.rewrite(input.queryText) : undefined;
    if (pattern) {
      hints = this.applyHints(hints, pattern.kind, pattern.entities);
    }

    hints.edgeTypes = this.weights.prioritize(hints.edgeTypes);

    if (input.categoryFilter && input.categoryFilter.length > 0) {
      vectorParams.categories = [...input.categoryFilter];
    }
    if (input.expandTopics) {
      hints.expandTopics = true;
      hints.topicExpansionFactor = input.topicExpansionFactor ?? 1.0;
    }

    return { hints, vectorParams, pattern };
  }
}
