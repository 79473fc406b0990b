import { validateEnv } from './env.validation.js';

export type AppConfig = ReturnType<typeof configuration>;

export const configuration = () => {
  // ConfigModule validates before the factories run, so this parse only
  // re-applies defaults and coercion.
  const env = validateEnv(process.env);

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
    },
    ai: {
      provider: env.AI_PROVIDER,
      openai: {
        apiKey: env.OPENAI_API_KEY,
        chatModel: env.OPENAI_CHAT_MODEL,
        embeddingModel: env.OPENAI_EMBEDDING_MODEL,
      },
    },
    embedding: {
      dimensions: env.EMBEDDING_DIMENSIONS,
      batchSize: env.EMBEDDING_BATCH_SIZE,
      maxConcurrency: env.EMBEDDING_MAX_CONCURRENCY,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
    },
    ingestion: {
      maxAttempts: env.INGESTION_MAX_ATTEMPTS,
      retryBaseDelayMs: env.INGESTION_RETRY_BASE_DELAY_MS,
    },
    knowledge: {
      store: env.KNOWLEDGE_STORE,
    },
    database: {
      url: env.DATABASE_URL,
      ssl: env.DATABASE_SSL ?? false,
      statementTimeoutMs: env.DATABASE_STATEMENT_TIMEOUT_MS,
    },
    chunking: {
      maxSize: env.CHUNK_MAX_SIZE,
      overlap: env.CHUNK_OVERLAP,
      lookback: env.CHUNK_LOOKBACK,
    },
    retrieval: {
      topK: env.RETRIEVAL_TOP_K,
      maxK: env.RETRIEVAL_MAX_K,
      vectorWeight: env.RETRIEVAL_VECTOR_WEIGHT,
      keywordWeight: env.RETRIEVAL_KEYWORD_WEIGHT,
      overfetchFactor: env.RETRIEVAL_OVERFETCH_FACTOR,
    },
    sync: {
      webhookSecret: env.SYNC_WEBHOOK_SECRET,
    },
  };
};

export type AiConfig = AppConfig['ai'];
export type EmbeddingConfig = AppConfig['embedding'];
export type IngestionConfig = AppConfig['ingestion'];
export type KnowledgeConfig = AppConfig['knowledge'];
export type DatabaseConfig = AppConfig['database'];
export type ChunkingConfig = AppConfig['chunking'];
export type RetrievalConfig = AppConfig['retrieval'];
export type SyncConfig = AppConfig['sync'];
