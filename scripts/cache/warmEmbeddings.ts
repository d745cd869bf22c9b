import path from 'path';
import { config } from '../../src/config/env';
import { closePool } from '../../src/db/db';
import { logger } from '../../src/logger';
import { loadCatalogFile } from '../../src/services/catalogService';
import { createVectorCacheStore } from '../../src/services/createContext';
import { createEmbeddingClient } from '../../src/services/embeddingClient';
import { buildSemanticIndex } from '../../src/services/semanticIndex';

// Vectorizes every course whose cached embedding is missing or stale so the
// server starts without calling the embedding service for the catalog.
async function main() {
  const catalogPath = path.resolve(process.argv[2] ?? config.CATALOG_PATH);
  const catalog = await loadCatalogFile(catalogPath, logger);
  const { index, report } = await buildSemanticIndex(catalog.courses, {
    embedder: createEmbeddingClient(),
    store: createVectorCacheStore(),
    batchSize: config.EMBEDDING_BATCH_SIZE,
    logger
  });
  logger.info({ ...report, dimension: index.dimension, model: index.model }, 'embedding cache up to date');
}

main()
  .catch((err) => {
    logger.error({ err }, 'warmEmbeddings failed');
    process.exitCode = 1;
  })
  .finally(async () => {
    await closePool();
  });
