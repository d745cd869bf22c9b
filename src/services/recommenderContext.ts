import type { Logger } from 'pino';
import { IndexNotReadyError, errorMessage } from '../errors';
import {
  CatalogSnapshot,
  EmbeddingClient,
  FilterOptions,
  HybridWeights,
  IndexState,
  IndexStats
} from '../types';
import { filterOptions } from './catalogService';
import { LexicalIndex, buildLexicalIndex } from './lexicalIndex';
import { SemanticIndex, buildSemanticIndex } from './semanticIndex';
import { VectorCacheStore } from './vectorCache';

export interface RecommenderIndexes {
  catalog: CatalogSnapshot;
  lexical: LexicalIndex;
  semantic: SemanticIndex;
  filterOptions: FilterOptions;
  builtAt: Date;
}

export interface RecommenderContextOptions {
  loadCatalog: () => Promise<CatalogSnapshot>;
  embedder: EmbeddingClient;
  store: VectorCacheStore;
  weights: HybridWeights;
  batchSize: number;
  logger: Logger;
}

/**
 * Owns the built indexes for the lifetime of the process. Indexes are
 * replaced as a whole by `reload()`; a query only ever sees a complete
 * snapshot.
 */
export class RecommenderContext {
  readonly embedder: EmbeddingClient;
  readonly weights: HybridWeights;
  readonly logger: Logger;

  private current: RecommenderIndexes | null = null;
  private building: Promise<RecommenderIndexes> | null = null;
  private lastError: string | null = null;
  private failed = false;

  constructor(private readonly options: RecommenderContextOptions) {
    this.embedder = options.embedder;
    this.weights = options.weights;
    this.logger = options.logger;
  }

  get state(): IndexState {
    if (this.building) return 'building';
    if (this.current) return 'ready';
    return this.failed ? 'failed' : 'idle';
  }

  get serving(): boolean {
    return this.current !== null;
  }

  snapshot(): RecommenderIndexes {
    if (!this.current) {
      throw new IndexNotReadyError(this.state);
    }
    return this.current;
  }

  reload(): Promise<RecommenderIndexes> {
    if (!this.building) {
      this.building = this.build().finally(() => {
        this.building = null;
      });
    }
    return this.building;
  }

  private async build(): Promise<RecommenderIndexes> {
    const { loadCatalog, embedder, store, batchSize, logger } = this.options;
    const started = Date.now();
    try {
      const catalog = await loadCatalog();
      const lexical = buildLexicalIndex(catalog.courses);
      const { index: semantic } = await buildSemanticIndex(catalog.courses, {
        embedder,
        store,
        batchSize,
        logger
      });
      const indexes: RecommenderIndexes = {
        catalog,
        lexical,
        semantic,
        filterOptions: filterOptions(catalog.courses),
        builtAt: new Date()
      };
      this.current = indexes;
      this.lastError = null;
      this.failed = false;
      logger.info(
        { courses: catalog.courses.length, version: catalog.version, durationMs: Date.now() - started },
        'recommender indexes ready'
      );
      return indexes;
    } catch (err) {
      this.lastError = errorMessage(err);
      this.failed = true;
      logger.error({ err }, 'recommender index build failed');
      throw err;
    }
  }

  stats(): IndexStats {
    const current = this.current;
    return {
      state: this.state,
      catalogVersion: current?.catalog.version ?? null,
      courses: current?.catalog.courses.length ?? 0,
      vocabulary: current?.lexical.idf.size ?? 0,
      dimension: current?.semantic.dimension ?? null,
      builtAt: current?.builtAt.toISOString() ?? null,
      lastError: this.lastError
    };
  }
}
