/** App configuration, read from the environment (dotenv loads `.env` in src/index.ts). */
import { z } from 'zod';

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const ratioFrom = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const EnvSchema = z.object({
  PORT: intFrom(4000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  CORS_ORIGIN: z.string().optional(),
  RATE_LIMIT_PER_MINUTE: intFrom(60),

  FALKORDB_URL: z.string().min(1).default('redis://localhost:6379'),
  FALKORDB_GRAPH_NAME: z.string().min(1).default('eventgraph'),
  CATALOG_TIMEOUT_MS: intFrom(5_000),

  AI_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  AI_MODEL_FAST: z.string().min(1).default('gpt-4o-mini'),
  AI_MODEL_REASONING: z.string().min(1).default('gpt-4.1-mini'),
  AI_MODEL_EMBEDDING: z.string().min(1).default('text-embedding-3-small'),
  MODEL_TIMEOUT_MS: intFrom(8_000),
  MODEL_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(1),

  VECTOR_INDEX_LABEL: z.string().min(1).default('AISummary'),
  VECTOR_INDEX_PROPERTY: z.string().min(1).default('embedding_v4'),
  VECTOR_TOP_K: intFrom(20),
  FALLBACK_SCAN_LIMIT: intFrom(5_000),
  SIMILARITY_FLOOR: ratioFrom(0.3),
  MAX_CANDIDATES: intFrom(20),
  DETAIL_FETCH_CONCURRENCY: intFrom(5),

  RERANK_THRESHOLD: ratioFrom(0.4),
  RERANK_FALLBACK_COUNT: z.coerce.number().int().min(0).default(3),

  MAX_RESULTS: intFrom(10),
  ANSWER_CONTEXT_SIZE: intFrom(5),
  COLLECTION_LIMIT: intFrom(5),

  SESSION_HISTORY_LIMIT: intFrom(6),
  SESSION_TTL_MINUTES: intFrom(30),
  MAX_SESSIONS: intFrom(1_000),
});

export interface RetrievalConfig {
  vectorIndexLabel: string;
  vectorIndexProperty: string;
  vectorTopK: number;
  fallbackScanLimit: number;
  similarityFloor: number;
  maxCandidates: number;
  detailFetchConcurrency: number;
}

export interface RerankConfig {
  threshold: number;
  fallbackCount: number;
}

export interface ModelConfig {
  provider: 'openai' | 'ollama';
  openaiApiKey?: string;
  ollamaBaseUrl: string;
  fastModel: string;
  reasoningModel: string;
  embeddingModel: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'test' | 'production';
  http: { corsOrigins?: string[]; rateLimitPerMinute: number };
  catalog: { url: string; graphName: string; timeoutMs: number };
  models: ModelConfig;
  retrieval: RetrievalConfig;
  rerank: RerankConfig;
  maxResults: number;
  answerContextSize: number;
  collectionLimit: number;
  session: { historyLimit: number; ttlMinutes: number; maxSessions: number };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  if (e.AI_PROVIDER === 'openai' && !e.OPENAI_API_KEY) {
    throw new Error('Invalid configuration: OPENAI_API_KEY is required when AI_PROVIDER=openai');
  }

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    http: {
      corsOrigins: e.CORS_ORIGIN?.split(',')
        .map((o) => o.trim())
        .filter(Boolean),
      rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
    },
    catalog: {
      url: e.FALKORDB_URL,
      graphName: e.FALKORDB_GRAPH_NAME,
      timeoutMs: e.CATALOG_TIMEOUT_MS,
    },
    models: {
      provider: e.AI_PROVIDER,
      openaiApiKey: e.OPENAI_API_KEY,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
      fastModel: e.AI_MODEL_FAST,
      reasoningModel: e.AI_MODEL_REASONING,
      embeddingModel: e.AI_MODEL_EMBEDDING,
      timeoutMs: e.MODEL_TIMEOUT_MS,
      maxRetries: e.MODEL_MAX_RETRIES,
    },
    retrieval: {
      vectorIndexLabel: e.VECTOR_INDEX_LABEL,
      vectorIndexProperty: e.VECTOR_INDEX_PROPERTY,
      vectorTopK: e.VECTOR_TOP_K,
      fallbackScanLimit: e.FALLBACK_SCAN_LIMIT,
      similarityFloor: e.SIMILARITY_FLOOR,
      maxCandidates: e.MAX_CANDIDATES,
      detailFetchConcurrency: e.DETAIL_FETCH_CONCURRENCY,
    },
    rerank: {
      threshold: e.RERANK_THRESHOLD,
      fallbackCount: e.RERANK_FALLBACK_COUNT,
    },
    maxResults: e.MAX_RESULTS,
    answerContextSize: e.ANSWER_CONTEXT_SIZE,
    collectionLimit: e.COLLECTION_LIMIT,
    session: {
      historyLimit: e.SESSION_HISTORY_LIMIT,
      ttlMinutes: e.SESSION_TTL_MINUTES,
      maxSessions: e.MAX_SESSIONS,
    },
  };
}
