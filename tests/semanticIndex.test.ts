import { describe, expect, it } from 'vitest';
import { IndexConfigurationError, RetrievalUnavailableError } from '../src/errors';
import {
  buildSemanticIndex,
  cosineSimilarity,
  embedQuery,
  scoreSemantic,
  semanticText,
  vectorNorm
} from '../src/services/semanticIndex';
import { contentHash } from '../src/services/vectorCache';
import {
  FakeEmbeddingClient,
  MemoryVectorCacheStore,
  exampleCourses,
  makeCourse,
  silentLogger
} from './helpers/fakes';

function deps(embedder: FakeEmbeddingClient, store: MemoryVectorCacheStore, batchSize = 100) {
  return { embedder, store, batchSize, logger: silentLogger };
}

describe('cosineSimilarity', () => {
  it('is symmetric', () => {
    const a = [0.3, -1.2, 4, 0.5];
    const b = [2, 0.1, -0.7, 3];
    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });

  it('is 1 for parallel and -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
    expect(cosineSimilarity([1, 2, 3], [-1, -2, -3])).toBeCloseTo(-1, 12);
  });

  it('is 0 when either vector has zero norm', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
  });

  it('rejects vectors of different dimension', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(IndexConfigurationError);
  });
});

describe('semanticText', () => {
  it('labels each populated field on its own line', () => {
    const course = makeCourse({
      offeringName: 'EN.601.475',
      title: 'Machine Learning',
      description: 'Models that learn.',
      department: 'EN Computer Science',
      level: 'Graduate',
      instructor: '',
      academicAreas: ['E', 'Q']
    });
    expect(semanticText(course)).toBe(
      [
        'Title: Machine Learning',
        'Course: EN.601.475 - EN Computer Science',
        'Description: Models that learn.',
        'Areas: E, Q',
        'Level: Graduate'
      ].join('\n')
    );
  });
});

describe('buildSemanticIndex', () => {
  it('embeds every course in batches and persists the cache', async () => {
    const embedder = new FakeEmbeddingClient();
    const store = new MemoryVectorCacheStore();
    const { index, report } = await buildSemanticIndex(exampleCourses, deps(embedder, store, 2));

    expect(embedder.calls.map((batch) => batch.length)).toEqual([2, 1]);
    expect(report).toEqual({ cached: 0, embedded: 3, pruned: 0 });
    expect(index.dimension).toBe(4);
    expect(index.vectors).toHaveLength(3);
    expect(store.saves).toHaveLength(1);
    expect(store.saves[0].entries.map((e) => e.identifier)).toEqual(['CS.100.01', 'CS.200.01', 'CS.300.01']);
    expect(store.saves[0].entries[0].contentHash).toBe(contentHash(semanticText(exampleCourses[0])));
  });

  it('reuses cached vectors whose content hash still matches', async () => {
    const store = new MemoryVectorCacheStore();
    await buildSemanticIndex(exampleCourses, deps(new FakeEmbeddingClient(), store));

    const second = new FakeEmbeddingClient();
    const { report } = await buildSemanticIndex(exampleCourses, deps(second, store));
    expect(second.calls).toEqual([]);
    expect(report).toEqual({ cached: 3, embedded: 0, pruned: 0 });
    expect(store.saves).toHaveLength(1);
  });

  it('re-embeds a course whose text changed', async () => {
    const store = new MemoryVectorCacheStore();
    await buildSemanticIndex(exampleCourses, deps(new FakeEmbeddingClient(), store));

    const changed = [
      exampleCourses[0],
      { ...exampleCourses[1], description: 'SQL and storage engines' },
      exampleCourses[2]
    ];
    const embedder = new FakeEmbeddingClient();
    const { index, report } = await buildSemanticIndex(changed, deps(embedder, store));

    expect(embedder.calls).toHaveLength(1);
    expect(embedder.calls[0]).toEqual([semanticText(changed[1])]);
    expect(report.embedded).toBe(1);
    expect(index.vectors[1]).toEqual([0, 3, 0, 0.1]);
  });

  it('prunes cache entries for courses no longer in the catalog', async () => {
    const store = new MemoryVectorCacheStore();
    await buildSemanticIndex(exampleCourses, deps(new FakeEmbeddingClient(), store));

    const { report } = await buildSemanticIndex(exampleCourses.slice(0, 2), deps(new FakeEmbeddingClient(), store));
    expect(report).toEqual({ cached: 2, embedded: 0, pruned: 1 });
    expect((await store.load('test-embedding')).map((e) => e.identifier)).toEqual(['CS.100.01', 'CS.200.01']);
  });

  it('treats entries of another model as stale', async () => {
    const store = new MemoryVectorCacheStore();
    await buildSemanticIndex(exampleCourses, deps(new FakeEmbeddingClient(), store));

    const other = new FakeEmbeddingClient(undefined, 'other-model');
    const { report } = await buildSemanticIndex(exampleCourses, deps(other, store));
    expect(report.embedded).toBe(3);
  });

  it('fails the build when vectors disagree on dimension', async () => {
    const embedder = new FakeEmbeddingClient((text) => (text.includes('Databases') ? [1, 2] : [1, 2, 3]));
    await expect(
      buildSemanticIndex(exampleCourses, deps(embedder, new MemoryVectorCacheStore()))
    ).rejects.toBeInstanceOf(IndexConfigurationError);
  });

  it('fails the build when the embedding service is unavailable', async () => {
    const embedder = new FakeEmbeddingClient();
    embedder.failWith = new RetrievalUnavailableError('embed failed: connection refused');
    const store = new MemoryVectorCacheStore();
    await expect(buildSemanticIndex(exampleCourses, deps(embedder, store))).rejects.toBeInstanceOf(
      RetrievalUnavailableError
    );
    expect(store.saves).toHaveLength(0);
  });
});

describe('query scoring', () => {
  it('rejects a query vector whose dimension differs from the index', async () => {
    const { index } = await buildSemanticIndex(
      exampleCourses,
      deps(new FakeEmbeddingClient(), new MemoryVectorCacheStore())
    );
    const mismatched = new FakeEmbeddingClient(() => [1, 0]);
    await expect(embedQuery(index, mismatched, 'deep learning')).rejects.toBeInstanceOf(IndexConfigurationError);
  });

  it('scores courses by cosine similarity to the query vector', async () => {
    const embedder = new FakeEmbeddingClient();
    const { index } = await buildSemanticIndex(exampleCourses, deps(embedder, new MemoryVectorCacheStore()));
    const query = await embedQuery(index, embedder, 'deep learning');
    const norm = vectorNorm(query);

    expect(query).toEqual([2, 0, 0, 0.1]);
    expect(scoreSemantic(index, query, norm, 0)).toBeCloseTo(cosineSimilarity(query, [3, 0, 0, 0.1]), 12);
    expect(scoreSemantic(index, query, norm, 0)).toBeGreaterThan(scoreSemantic(index, query, norm, 2));
    expect(scoreSemantic(index, query, norm, 2)).toBeGreaterThan(scoreSemantic(index, query, norm, 1));
  });
});
