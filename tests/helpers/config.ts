import type { AppConfig } from '@/config/app.config';

export const TEST_CONFIG: AppConfig = {
  port: 0,
  nodeEnv: 'test',
  http: { rateLimitPerMinute: 60 },
  catalog: { url: 'redis://localhost:6379', graphName: 'eventgraph', timeoutMs: 1000 },
  models: {
    provider: 'ollama',
    ollamaBaseUrl: 'http://localhost:11434',
    fastModel: 'fast-model',
    reasoningModel: 'reasoning-model',
    embeddingModel: 'embedding-model',
    timeoutMs: 1000,
    maxRetries: 0,
  },
  retrieval: {
    vectorIndexLabel: 'AISummary',
    vectorIndexProperty: 'embedding_v4',
    vectorTopK: 20,
    fallbackScanLimit: 5000,
    similarityFloor: 0.3,
    maxCandidates: 20,
    detailFetchConcurrency: 5,
  },
  rerank: { threshold: 0.4, fallbackCount: 3 },
  maxResults: 10,
  answerContextSize: 5,
  collectionLimit: 5,
  session: { historyLimit: 6, ttlMinutes: 30, maxSessions: 100 },
};
