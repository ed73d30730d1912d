import { afterEach, describe, expect, it, vi } from 'vitest';
import { QueryExpansionEngine, tokenize } from '../expansion.js';
import { CategoryGraph } from '../../graphs/category_graph.js';
import { InMemoryPlanTracer } from '../../observability/plan_traces.js';
import type { VectorSearchHit } from '../../types.js';

const VECTOR = [0.1, 0.2, 0.3];

function scienceGraph(): CategoryGraph {
  const graph = new CategoryGraph();
  graph.registerEdge('Science', 'Physics');
  graph.registerEdge('Physics', 'Quantum_Physics');
  graph.registerEdge('Science', 'Chemistry');
  return graph;
}

const HITS: VectorSearchHit[] = [
  { id: 't1', score: 0.9, metadata: { type: 'topic', name: 'Quantum mechanics' } },
  { id: 't2', score: 0.6, metadata: { type: 'topic', name: 'Optics' } },
  { id: 'd1', score: 0.95, metadata: { type: 'document', name: 'Lecture notes' } },
  { id: 't3', score: 1.2, metadata: { type: 'topic' } },
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('tokenize', () => {
  it('splits on non-alphanumerics and lowercases', () => {
    expect(tokenize('Quantum_Physics (2nd ed.)')).toEqual(['quantum', 'physics', '2nd', 'ed']);
    expect(tokenize('  ')).toEqual([]);
  });
});

describe('QueryExpansionEngine', () => {
  it('keeps topic hits above the threshold, capped at similarity 1', async () => {
    const search = vi.fn(() => HITS);
    const engine = new QueryExpansionEngine();

    const result = await engine.expandTopics(VECTOR, search);

    expect(search).toHaveBeenCalledWith(VECTOR, 10, expect.any(Function));
    expect(result).toEqual({
      ok: true,
      value: [
        { topicId: 't1', name: 'Quantum mechanics', similarity: 0.9 },
        { topicId: 't3', name: '', similarity: 1 },
      ],
    });
  });

  it('truncates topics to maxExpansions', async () => {
    const engine = new QueryExpansionEngine({ maxExpansions: 1 });
    const result = await engine.expandTopics(VECTOR, async () => HITS);
    expect(result.ok && result.value.map((topic) => topic.topicId)).toEqual(['t1']);
  });

  it('expands categories by token overlap plus immediate neighbours, deepest first', () => {
    const engine = new QueryExpansionEngine();
    const categories = engine.expandCategories('quantum entanglement in physics', scienceGraph());

    expect(categories).toEqual([
      { category: 'Quantum_Physics', depth: 2 },
      { category: 'Physics', depth: 1 },
      { category: 'Science', depth: 0 },
    ]);
  });

  it('requires half of a category name to match', () => {
    const graph = new CategoryGraph();
    graph.registerEdge('Solid_State_Physics', 'Semiconductors');
    const engine = new QueryExpansionEngine();

    expect(engine.expandCategories('physics', graph)).toEqual([]);
    expect(engine.expandCategories('state physics', graph)).toEqual([
      { category: 'Semiconductors', depth: 1 },
      { category: 'Solid_State_Physics', depth: 0 },
    ]);
  });

  it('combines topics and categories', async () => {
    const tracer = new InMemoryPlanTracer();
    const engine = new QueryExpansionEngine({ tracer });

    const result = await engine.expand(VECTOR, 'chemistry', () => HITS, scienceGraph(), 'trace-1');

    expect(result.originalText).toBe('chemistry');
    expect(result.originalVector).toEqual(VECTOR);
    expect(result.topics).toHaveLength(2);
    expect(result.categories).toEqual([
      { category: 'Chemistry', depth: 1 },
      { category: 'Science', depth: 0 },
    ]);
    expect(result.hasExpansions).toBe(true);
    expect(tracer.getEvents('expansion_completed')[0].payload).toEqual({
      traceId: 'trace-1',
      topicCount: 2,
      categoryCount: 2,
    });
  });

  it('degrades to category-only expansion when search fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const tracer = new InMemoryPlanTracer();
    const engine = new QueryExpansionEngine({ tracer });
    const failing = () => Promise.reject(new Error('index offline'));

    const result = await engine.expand(VECTOR, 'physics', failing, scienceGraph(), 'trace-2');

    expect(result.topics).toEqual([]);
    expect(result.hasExpansions).toBe(result.categories.length > 0);
    expect(result.hasExpansions).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);

    const failures = tracer.getTrace('trace-2').filter((event) => event.kind === 'expansion_failure');
    expect(failures).toHaveLength(1);
    expect(failures[0].payload).toMatchObject({
      code: 'EXPANSION_FAILURE',
      message: 'Topic expansion failed: index offline',
      details: { cause: 'index offline' },
    });
  });

  it('reports no expansions when nothing matches and search throws', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const engine = new QueryExpansionEngine();
    const throwing = (): VectorSearchHit[] => {
      throw new Error('bad request');
    };

    const result = await engine.expand(VECTOR, 'cooking recipes', throwing, scienceGraph());

    expect(result).toEqual({
      originalVector: VECTOR,
      originalText: 'cooking recipes',
      topics: [],
      categories: [],
      hasExpansions: false,
    });
  });

  it('skips topic search when no search function is given', async () => {
    const engine = new QueryExpansionEngine();
    const result = await engine.expand(VECTOR, 'physics', undefined, scienceGraph());
    expect(result.topics).toEqual([]);
  });
});
