import type { Logger } from 'pino';
import { IndexConfigurationError } from '../errors';
import { CachedVector, Course, EmbeddingClient } from '../types';
import { VectorCacheStore, contentHash } from './vectorCache';

export interface SemanticIndex {
  model: string;
  dimension: number;
  vectors: number[][];
  norms: number[];
}

export interface SemanticBuildDeps {
  embedder: EmbeddingClient;
  store: VectorCacheStore;
  batchSize: number;
  logger: Logger;
}

export interface SemanticBuildReport {
  cached: number;
  embedded: number;
  pruned: number;
}

export function semanticText(course: Course): string {
  const parts = [`Title: ${course.title}`, `Course: ${course.offeringName} - ${course.department}`];
  if (course.description) parts.push(`Description: ${course.description}`);
  if (course.academicAreas.length > 0) parts.push(`Areas: ${course.academicAreas.join(', ')}`);
  if (course.level) parts.push(`Level: ${course.level}`);
  if (course.instructor) parts.push(`Instructors: ${course.instructor}`);
  if (course.prerequisites.length > 0) parts.push(`Prerequisites: ${course.prerequisites.join(' ')}`);
  return parts.join('\n');
}

export function vectorNorm(v: number[]): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) sum += a[i] * b[i];
  return sum;
}

function cosineWithNorms(a: number[], normA: number, b: number[], normB: number): number {
  if (normA === 0 || normB === 0) return 0;
  const sim = dot(a, b) / (normA * normB);
  return Math.max(-1, Math.min(1, sim));
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new IndexConfigurationError(`Vector dimensions differ (${a.length} vs ${b.length})`);
  }
  return cosineWithNorms(a, vectorNorm(a), b, vectorNorm(b));
}

function assertDimension(vector: number[], dimension: number, what: string): void {
  if (vector.length === 0) {
    throw new IndexConfigurationError(`Empty embedding vector for ${what}`);
  }
  if (vector.length !== dimension) {
    throw new IndexConfigurationError(
      `Embedding for ${what} has dimension ${vector.length}, expected ${dimension}`
    );
  }
}

/**
 * Resolves one vector per course, reusing cached vectors whose content hash
 * still matches and embedding the rest. Fails rather than leaving any course
 * without a vector.
 */
export async function buildSemanticIndex(
  courses: readonly Course[],
  deps: SemanticBuildDeps
): Promise<{ index: SemanticIndex; report: SemanticBuildReport }> {
  const { embedder, store, batchSize, logger } = deps;
  const cachedEntries = await store.load(embedder.model);
  const cache = new Map(cachedEntries.map((entry) => [entry.identifier, entry]));

  const entries: CachedVector[] = new Array<CachedVector>(courses.length);
  const misses: Array<{ position: number; identifier: string; text: string; hash: string }> = [];

  courses.forEach((course, position) => {
    const text = semanticText(course);
    const hash = contentHash(text);
    const hit = cache.get(course.identifier);
    if (hit && hit.contentHash === hash) {
      entries[position] = hit;
    } else {
      misses.push({ position, identifier: course.identifier, text, hash });
    }
  });

  const totalBatches = Math.ceil(misses.length / batchSize);
  for (let i = 0; i < misses.length; i += batchSize) {
    const batch = misses.slice(i, i + batchSize);
    logger.info(
      { batch: i / batchSize + 1, of: totalBatches, size: batch.length },
      'embedding course batch'
    );
    const vectors = await embedder.embed(batch.map((m) => m.text));
    batch.forEach((miss, j) => {
      entries[miss.position] = { identifier: miss.identifier, contentHash: miss.hash, vector: vectors[j] };
    });
  }

  const dimension = entries[0]?.vector.length ?? 0;
  entries.forEach((entry) => assertDimension(entry.vector, dimension, entry.identifier));

  const current = new Set(courses.map((c) => c.identifier));
  const pruned = cachedEntries.filter((entry) => !current.has(entry.identifier)).length;
  if (misses.length > 0 || pruned > 0) {
    await store.save(embedder.model, entries);
  }

  const report = { cached: courses.length - misses.length, embedded: misses.length, pruned };
  logger.info(report, 'semantic index built');

  return {
    index: {
      model: embedder.model,
      dimension,
      vectors: entries.map((e) => e.vector),
      norms: entries.map((e) => vectorNorm(e.vector))
    },
    report
  };
}

export async function embedQuery(
  index: SemanticIndex,
  embedder: EmbeddingClient,
  text: string
): Promise<number[]> {
  const [vector] = await embedder.embed([text]);
  assertDimension(vector ?? [], index.dimension, 'query');
  return vector;
}

export function scoreSemantic(index: SemanticIndex, queryVector: number[], queryNorm: number, docIndex: number): number {
  return cosineWithNorms(queryVector, queryNorm, index.vectors[docIndex], index.norms[docIndex]);
}
