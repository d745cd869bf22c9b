import { z } from 'zod';
import { config } from '../config/env';
import { HTTP_TIMEOUT_MS } from '../config/system/constants';
import { RetrievalUnavailableError, errorMessage } from '../errors';
import { EmbeddingClient } from '../types';

const vectorSchema = z.array(z.number());

const embeddingResponseSchema = z.union([
  z.object({ embeddings: z.array(vectorSchema) }),
  z.object({ data: z.array(z.object({ embedding: vectorSchema, index: z.number().int().optional() })) }),
  z.object({ vector: vectorSchema })
]);

type EmbeddingResponse = z.infer<typeof embeddingResponseSchema>;

export interface EmbeddingClientOptions {
  endpoint: string;
  model: string;
  apiKey?: string;
  timeoutMs?: number;
}

export async function fetchJson(
  url: string,
  options: RequestInit,
  caller: string,
  timeoutMs = HTTP_TIMEOUT_MS
): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { ...options, signal: controller.signal });
    if (!res.ok) {
      const text = await res.text();
      throw new RetrievalUnavailableError(`${caller} failed (${res.status}): ${text.slice(0, 200)}`);
    }
    return await res.json();
  } catch (err) {
    if (err instanceof RetrievalUnavailableError) throw err;
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err);
    throw new RetrievalUnavailableError(`${caller} failed: ${reason}`, err);
  } finally {
    clearTimeout(timeout);
  }
}

function extractVectors(data: EmbeddingResponse, expected: number): number[][] {
  if ('embeddings' in data) {
    return data.embeddings;
  }
  if ('data' in data) {
    return [...data.data]
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      .map((item) => item.embedding);
  }
  return expected === 1 ? [data.vector] : [];
}

export function createEmbeddingClient(
  options: EmbeddingClientOptions = {
    endpoint: config.EMBEDDING_ENDPOINT,
    model: config.EMBEDDING_MODEL,
    apiKey: config.EMBEDDING_API_KEY
  }
): EmbeddingClient {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (options.apiKey) {
    headers.Authorization = `Bearer ${options.apiKey}`;
  }

  return {
    model: options.model,
    async embed(texts: string[]): Promise<number[][]> {
      if (texts.length === 0) return [];
      const body = await fetchJson(
        options.endpoint,
        {
          method: 'POST',
          headers,
          body: JSON.stringify({ model: options.model, input: texts })
        },
        'embed',
        options.timeoutMs
      );

      const parsed = embeddingResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new RetrievalUnavailableError('embed failed: unsupported embedding response shape');
      }
      const vectors = extractVectors(parsed.data, texts.length);
      if (vectors.length !== texts.length) {
        throw new RetrievalUnavailableError(
          `embed failed: expected ${texts.length} vectors, received ${vectors.length}`
        );
      }
      return vectors;
    }
  };
}
