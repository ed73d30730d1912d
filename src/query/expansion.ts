/**
 * @fileoverview Query expansion
 *
 * Augments a query with related topics (external similarity search over
 * topic-typed vectors) and related categories (lexical overlap with the
 * category hierarchy, plus each match's immediate neighbours).
 *
 * Expansion never aborts planning: a failing search degrades to an empty
 * topic list, is logged, and is reported to the tracer.
 */

import type { CategoryGraph } from '../graphs/category_graph.js';
import { ExpansionFailure } from '../core/errors.js';
import { Err, Ok, safeAsync, type Result } from '../core/result.js';
import { NOOP_TRACER, type PlanTracer } from '../observability/plan_traces.js';
import { logWarning } from '../telemetry/logger.js';
import type {
  CategoryExpansion,
  ExpansionResult,
  TopicExpansion,
  VectorSearchFn,
  VectorSearchHit,
} from '../types.js';

export interface QueryExpansionOptions {
  /** Minimum topic similarity kept (default 0.65) */
  similarityThreshold?: number;
  /** Cap on topics and on categories (default 5) */
  maxExpansions?: number;
  tracer?: PlanTracer;
}

/** Fraction of a category's tokens the query must contain */
const CATEGORY_OVERLAP_RATIO = 0.5;

const isTopicHit = (hit: VectorSearchHit): boolean => hit.metadata?.type === 'topic';

/**
 * Lowercase alphanumeric tokens; `Quantum_Physics` -> ['quantum', 'physics'].
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 0);
}

export class QueryExpansionEngine {
  readonly similarityThreshold: number;
  readonly maxExpansions: number;
  private readonly tracer: PlanTracer;

  constructor(options: QueryExpansionOptions = {}) {
    this.similarityThreshold = options.similarityThreshold ?? 0.65;
    this.maxExpansions = options.maxExpansions ?? 5;
    this.tracer = options.tracer ?? NOOP_TRACER;
  }

  async expand(
    queryVector: number[],
    queryText: string,
    search: VectorSearchFn | undefined,
    categoryGraph: CategoryGraph,
    traceId?: string
  ): Promise<ExpansionResult> {
    let topics: TopicExpansion[] = [];
    if (search) {
      const topicResult = await this.expandTopics(queryVector, search);
      if (topicResult.ok) {
        topics = topicResult.value;
      } else {
        logWarning('Topic expansion failed; continuing without topics', {
          error: topicResult.error.message,
          traceId,
        });
        this.tracer.logEvent('expansion_failure', { ...topicResult.error.toJSON(), traceId });
      }
    }

    const categories = this.expandCategories(queryText, categoryGraph);
    const result: ExpansionResult = {
      originalVector: [...queryVector],
      originalText: queryText,
      topics,
      categories,
      hasExpansions: topics.length > 0 || categories.length > 0,
    };

    this.tracer.logEvent('expansion_completed', {
      traceId,
      topicCount: topics.length,
      categoryCount: categories.length,
    });
    return result;
  }

  async expandTopics(
    queryVector: number[],
    search: VectorSearchFn
  ): Promise<Result<TopicExpansion[], ExpansionFailure>> {
    const hits = await safeAsync(() => search(queryVector, this.maxExpansions * 2, isTopicHit));
    if (!hits.ok) {
      return Err(new ExpansionFailure(hits.error.message, hits.error));
    }
    if (!Array.isArray(hits.value)) {
      return Err(new ExpansionFailure('search returned a non-array result'));
    }

    const topics = hits.value
      .filter((hit) => isTopicHit(hit) && Number.isFinite(hit.score) && hit.score >= this.similarityThreshold)
      .slice(0, this.maxExpansions)
      .map((hit): TopicExpansion => {
        const name = hit.metadata?.name;
        return {
          topicId: hit.id,
          name: typeof name === 'string' ? name : '',
          similarity: Math.min(1, hit.score),
        };
      });
    return Ok(topics);
  }

  /**
   * Categories whose name tokens the query covers by at least half, plus
   * categories one hop away from each match, most specific first.
   */
  expandCategories(queryText: string, categoryGraph: CategoryGraph): CategoryExpansion[] {
    const queryTokens = new Set(tokenize(queryText));
    if (queryTokens.size === 0) return [];

    const direct: string[] = [];
    for (const category of categoryGraph.categories()) {
      const categoryTokens = new Set(tokenize(category));
      if (categoryTokens.size === 0) continue;
      let overlap = 0;
      for (const token of categoryTokens) {
        if (queryTokens.has(token)) overlap++;
      }
      if (overlap > 0 && overlap / categoryTokens.size >= CATEGORY_OVERLAP_RATIO) {
        direct.push(category);
      }
    }

    const union = new Set(direct);
    for (const category of direct) {
      for (const [related] of categoryGraph.related(category, 1)) {
        union.add(related);
      }
    }

    return Array.from(union)
      .map((category) => ({ category, depth: categoryGraph.depth(category) }))
      .sort((a, b) => b.depth - a.depth)
      .slice(0, this.maxExpansions);
  }
}
