export const HTTP_TIMEOUT_MS = 10_000;

export const RATE_LIMIT_ALLOWLIST = ['127.0.0.1'];

export const EMBEDDING_CACHE_FORMAT_VERSION = 1;

export const EMBEDDING_CACHE_TABLE = 'course_embeddings';
