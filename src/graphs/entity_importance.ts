/**
 * @fileoverview Entity importance model
 *
 * Scores an entity snapshot in [0, 1] as a fixed weighted sum of five
 * sub-scores. Counts are log-scaled and reach 1.0 at a fixed saturation
 * count. A feature the snapshot does not carry scores a neutral 0.5.
 */

import type { Entity, EntityFeatures, RankedEntity } from '../types.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export type ImportanceFeature =
  | 'connectionCount'
  | 'referenceCount'
  | 'categoryImportance'
  | 'explicitness'
  | 'recency';

export const IMPORTANCE_FEATURE_WEIGHTS: Readonly<Record<ImportanceFeature, number>> = {
  connectionCount: 0.3,
  referenceCount: 0.2,
  categoryImportance: 0.2,
  explicitness: 0.15,
  recency: 0.15,
};

const IMPORTANCE_FEATURES: readonly ImportanceFeature[] = [
  'connectionCount',
  'referenceCount',
  'categoryImportance',
  'explicitness',
  'recency',
];

/** Counts at which each log-scaled sub-score reaches 1.0 */
const SATURATION = {
  connections: 100,
  references: 20,
  mentions: 50,
} as const;

const NEUTRAL = 0.5;
const DAY_MS = 24 * 60 * 60 * 1000;
const RECENCY_HORIZON_DAYS = 365;

export interface EntityImportanceOptions {
  /** Clock used for recency */
  now?: () => number;
}

export type ImportanceBreakdown = Record<ImportanceFeature, number>;

// ============================================================================
// MODEL
// ============================================================================

export class EntityImportanceModel {
  private readonly cache = new Map<string, number>();
  private readonly now: () => number;

  constructor(options: EntityImportanceOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  score(entity: Entity, categoryWeights?: Readonly<Record<string, number>>): number {
    const key = cacheKey(entity, categoryWeights);
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const breakdown = this.breakdown(entity, categoryWeights);
    let importance = 0;
    for (const feature of IMPORTANCE_FEATURES) {
      importance += breakdown[feature] * IMPORTANCE_FEATURE_WEIGHTS[feature];
    }
    importance = clamp01(importance);

    this.cache.set(key, importance);
    return importance;
  }

  /**
   * Per-feature sub-scores, each in [0, 1], before weighting.
   */
  breakdown(entity: Entity, categoryWeights?: Readonly<Record<string, number>>): ImportanceBreakdown {
    const features: Readonly<EntityFeatures> = entity.features ?? {};
    return {
      connectionCount: connectionScore(features),
      referenceCount: logScore(features.referenceCount, SATURATION.references),
      categoryImportance: categoryScore(features.categories, categoryWeights),
      explicitness: logScore(features.mentionCount, SATURATION.mentions),
      recency: this.recencyScore(features.lastModified),
    };
  }

  /**
   * Entities sorted by importance, highest first; ties keep input order.
   */
  rank<T extends Entity>(entities: readonly T[], categoryWeights?: Readonly<Record<string, number>>): T[] {
    return entities
      .map((entity, index) => ({ entity, index, importance: this.score(entity, categoryWeights) }))
      .sort((a, b) => b.importance - a.importance || a.index - b.index)
      .map((entry) => entry.entity);
  }

  rankWithScores(entities: readonly Entity[], categoryWeights?: Readonly<Record<string, number>>): RankedEntity[] {
    return this.rank(entities, categoryWeights).map((entity) => ({
      entityId: entity.id,
      importance: this.score(entity, categoryWeights),
    }));
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private recencyScore(lastModified: number | string | undefined): number {
    const timestamp = parseTimestamp(lastModified);
    if (timestamp === undefined) return NEUTRAL;
    const ageDays = (this.now() - timestamp) / DAY_MS;
    return clamp01(1 - ageDays / RECENCY_HORIZON_DAYS);
  }
}

// ============================================================================
// SUB-SCORES
// ============================================================================

function connectionScore(features: Readonly<EntityFeatures>): number {
  if (features.inboundConnections === undefined && features.outboundConnections === undefined) {
    return NEUTRAL;
  }
  const total = nonNegative(features.inboundConnections) + nonNegative(features.outboundConnections);
  return Math.min(1, Math.log1p(total) / Math.log1p(SATURATION.connections));
}

function logScore(count: number | undefined, saturation: number): number {
  if (count === undefined) return NEUTRAL;
  return Math.min(1, Math.log1p(nonNegative(count)) / Math.log1p(saturation));
}

function categoryScore(
  categories: readonly string[] | undefined,
  categoryWeights: Readonly<Record<string, number>> | undefined
): number {
  if (!categoryWeights || !categories || categories.length === 0) return NEUTRAL;
  const total = categories.reduce(
    (sum, category) => sum + (Object.hasOwn(categoryWeights, category) ? categoryWeights[category] : NEUTRAL),
    0
  );
  return clamp01(total / categories.length);
}

function parseTimestamp(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const timestamp = typeof value === 'number' ? value : Date.parse(value);
  return Number.isFinite(timestamp) ? timestamp : undefined;
}

function nonNegative(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return NEUTRAL;
  return Math.max(0, Math.min(1, value));
}

/**
 * Cache key covering the entity id and the category weights that can affect
 * it, so a different weighting of the same entity is scored afresh.
 */
function cacheKey(entity: Entity, categoryWeights?: Readonly<Record<string, number>>): string {
  const categories = entity.features?.categories ?? [];
  if (!categoryWeights || categories.length === 0) return entity.id;
  const relevant = categories.map((category) => `${category}=${categoryWeights[category] ?? NEUTRAL}`);
  return `${entity.id}|${relevant.join(',')}`;
}
