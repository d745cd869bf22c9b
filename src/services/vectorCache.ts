import fs from 'fs';
import path from 'path';
import { createHash } from 'crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  EMBEDDING_CACHE_FORMAT_VERSION,
  EMBEDDING_CACHE_TABLE
} from '../config/system/constants';
import { IndexConfigurationError } from '../errors';
import { CachedVector } from '../types';

export interface VectorCacheStore {
  /** Entries stored for `model`; entries of other models are never returned. */
  load(model: string): Promise<CachedVector[]>;
  /** Replaces the stored entries for `model` with exactly `entries`. */
  save(model: string, entries: CachedVector[]): Promise<void>;
}

export function contentHash(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

const cachedVectorSchema = z.object({
  identifier: z.string().min(1),
  contentHash: z.string().min(1),
  vector: z.array(z.number())
});

const cacheFileSchema = z.object({
  version: z.literal(EMBEDDING_CACHE_FORMAT_VERSION),
  model: z.string(),
  dimension: z.number().int().nonnegative(),
  createdAt: z.string(),
  entries: z.array(cachedVectorSchema)
});

export type VectorCacheFile = z.infer<typeof cacheFileSchema>;

export class FileVectorCacheStore implements VectorCacheStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  /** A cache that cannot be parsed is discarded; the next build re-embeds and rewrites it. */
  private discard(reason: string): CachedVector[] {
    this.logger.warn({ path: this.filePath, reason }, 'embedding cache ignored');
    return [];
  }

  async load(model: string): Promise<CachedVector[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return this.discard('not valid JSON');
    }
    const parsed = cacheFileSchema.safeParse(json);
    if (!parsed.success) {
      return this.discard('unsupported format');
    }
    return parsed.data.model === model ? parsed.data.entries : [];
  }

  async save(model: string, entries: CachedVector[]): Promise<void> {
    const file: VectorCacheFile = {
      version: EMBEDDING_CACHE_FORMAT_VERSION,
      model,
      dimension: entries[0]?.vector.length ?? 0,
      createdAt: new Date().toISOString(),
      entries
    };
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.promises.writeFile(tmp, JSON.stringify(file), 'utf8');
    await fs.promises.rename(tmp, this.filePath);
  }
}

export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

const cacheRowSchema = z.object({
  course_id: z.string(),
  content_hash: z.string(),
  vector: z.array(z.number())
});

export class PgVectorCacheStore implements VectorCacheStore {
  private tableReady = false;

  constructor(
    private readonly db: Queryable,
    private readonly table = EMBEDDING_CACHE_TABLE
  ) {}

  private async ensureTable(): Promise<void> {
    if (this.tableReady) return;
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        course_id text PRIMARY KEY,
        content_hash text NOT NULL,
        model text NOT NULL,
        vector jsonb NOT NULL,
        updated_at timestamptz DEFAULT now()
      );
    `);
    this.tableReady = true;
  }

  async load(model: string): Promise<CachedVector[]> {
    await this.ensureTable();
    const { rows } = await this.db.query(
      `SELECT course_id, content_hash, vector FROM ${this.table} WHERE model = $1 ORDER BY course_id;`,
      [model]
    );
    const parsed = z.array(cacheRowSchema).safeParse(rows);
    if (!parsed.success) {
      throw new IndexConfigurationError(`Embedding cache table ${this.table} has malformed rows`);
    }
    return parsed.data.map((row) => ({
      identifier: row.course_id,
      contentHash: row.content_hash,
      vector: row.vector
    }));
  }

  async save(model: string, entries: CachedVector[]): Promise<void> {
    await this.ensureTable();
    const ids = entries.map((e) => e.identifier);
    if (entries.length > 0) {
      await this.db.query(
        `
        INSERT INTO ${this.table} (course_id, content_hash, model, vector)
        SELECT id, hash, $1, vec::jsonb
        FROM unnest($2::text[], $3::text[], $4::text[]) AS t(id, hash, vec)
        ON CONFLICT (course_id) DO UPDATE
        SET content_hash = EXCLUDED.content_hash,
            model = EXCLUDED.model,
            vector = EXCLUDED.vector,
            updated_at = now();
        `,
        [model, ids, entries.map((e) => e.contentHash), entries.map((e) => JSON.stringify(e.vector))]
      );
    }
    await this.db.query(`DELETE FROM ${this.table} WHERE NOT (course_id = ANY($1::text[]));`, [ids]);
  }
}
