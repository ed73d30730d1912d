/**
 * @fileoverview Knowledge-graph data access
 *
 * The planner reads the graph only through `GraphDataAccess`. Every method
 * is part of the contract; a caller with no graph passes `ABSENT_GRAPH_ACCESS`
 * instead of a partial object, so capabilities are never probed at runtime.
 * Methods may answer synchronously or with a promise.
 */

import type { Entity, EntityFeatures, GraphType } from '../types.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

type MaybePromise<T> = T | Promise<T>;

export interface GraphDataAccess {
  /** Declared graph type; `undefined` asks for heuristic detection */
  readonly graphType?: GraphType;
  /** False only for the absent variant */
  readonly available: boolean;
  getEntities(limit: number): MaybePromise<Entity[]>;
  getEntity(entityId: string): MaybePromise<Entity | undefined>;
  getRelationshipTypes(): MaybePromise<string[]>;
}

export const ABSENT_GRAPH_ACCESS: GraphDataAccess = Object.freeze({
  available: false,
  getEntities: () => [],
  getEntity: () => undefined,
  getRelationshipTypes: () => [],
});

// ============================================================================
// IN-MEMORY ACCESS
// ============================================================================

export interface InMemoryGraphAccessOptions {
  graphType?: GraphType;
  entities?: Entity[];
  relationshipTypes?: string[];
}

/**
 * Snapshot-backed accessor for callers that already hold the graph in memory.
 */
export class InMemoryGraphAccess implements GraphDataAccess {
  readonly available = true;
  readonly graphType?: GraphType;
  private readonly entities = new Map<string, Entity>();
  private readonly relationshipTypes: string[];

  constructor(options: InMemoryGraphAccessOptions = {}) {
    this.graphType = options.graphType;
    for (const entity of options.entities ?? []) {
      this.entities.set(entity.id, entity);
    }
    this.relationshipTypes = [...new Set(options.relationshipTypes ?? [])];
  }

  addEntity(id: string, features: EntityFeatures = {}, type?: string): void {
    this.entities.set(id, { id, type, features });
  }

  getEntities(limit: number): Entity[] {
    return Array.from(this.entities.values()).slice(0, Math.max(0, limit));
  }

  getEntity(entityId: string): Entity | undefined {
    return this.entities.get(entityId);
  }

  getRelationshipTypes(): string[] {
    return [...this.relationshipTypes];
  }
}

// ============================================================================
// GRAPH TYPE DETECTION
// ============================================================================

const DETECTION_SAMPLE_SIZE = 20;

const HIERARCHICAL_ENTITY_TYPES = ['category', 'article', 'topic', 'taxonomy'];
const LINKED_ENTITY_TYPES = ['document', 'page', 'link', 'hash'];
const HIERARCHICAL_RELATIONSHIPS = ['subclass_of', 'instance_of', 'category_contains', 'in_category'];
const LINKED_RELATIONSHIPS = ['links_to', 'references', 'contains_hash'];

/**
 * Classify the graph from a sample of entity types and the relationship
 * vocabulary. The side with more indicators wins; a tie is `unknown`.
 * Lookup failures count as no signal.
 */
export async function detectGraphType(access: GraphDataAccess): Promise<GraphType> {
  if (access.graphType) return access.graphType;
  if (!access.available) return 'unknown';

  let entities: Entity[] = [];
  try {
    entities = await access.getEntities(DETECTION_SAMPLE_SIZE);
  } catch (error: unknown) {
    logDebug('Graph type detection could not sample entities', { error: getErrorMessage(error) });
  }

  let relationshipTypes: string[] = [];
  try {
    relationshipTypes = (await access.getRelationshipTypes()).map((type) => type.toLowerCase());
  } catch (error: unknown) {
    logDebug('Graph type detection could not list relationship types', { error: getErrorMessage(error) });
  }

  let hierarchical = 0;
  let linked = 0;

  for (const entity of entities) {
    const type = (entity.type ?? '').toLowerCase();
    if (HIERARCHICAL_ENTITY_TYPES.some((marker) => type.includes(marker))) hierarchical++;
    if (LINKED_ENTITY_TYPES.some((marker) => type.includes(marker))) linked++;
  }

  for (const marker of HIERARCHICAL_RELATIONSHIPS) {
    if (relationshipTypes.some((type) => type.includes(marker))) hierarchical++;
  }
  for (const marker of LINKED_RELATIONSHIPS) {
    if (relationshipTypes.some((type) => type.includes(marker))) linked++;
  }

  if (hierarchical > linked) return 'hierarchical';
  if (linked > hierarchical) return 'linked';
  return 'unknown';
}
