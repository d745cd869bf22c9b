import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      EMBEDDING_ENDPOINT: 'http://embeddings.test/v1/embeddings',
      EMBEDDING_MODEL: 'test-embedding',
      API_KEY: '',
      CATALOG_PATH: 'data/courses.json',
      EMBEDDING_CACHE_PATH: 'data/embedding-cache.test.json'
    }
  }
});
