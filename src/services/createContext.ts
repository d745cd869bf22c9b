import path from 'path';
import { config } from '../config/env';
import { query } from '../db/db';
import { logger } from '../logger';
import { loadCatalogFile } from './catalogService';
import { createEmbeddingClient } from './embeddingClient';
import { RecommenderContext } from './recommenderContext';
import { FileVectorCacheStore, PgVectorCacheStore, VectorCacheStore } from './vectorCache';

export function createVectorCacheStore(): VectorCacheStore {
  if (config.DATABASE_URL) {
    return new PgVectorCacheStore({ query });
  }
  return new FileVectorCacheStore(path.resolve(config.EMBEDDING_CACHE_PATH), logger);
}

export function createRecommenderContext(): RecommenderContext {
  const catalogPath = path.resolve(config.CATALOG_PATH);
  return new RecommenderContext({
    loadCatalog: () => loadCatalogFile(catalogPath, logger),
    embedder: createEmbeddingClient(),
    store: createVectorCacheStore(),
    weights: config.weights,
    batchSize: config.EMBEDDING_BATCH_SIZE,
    logger
  });
}
