import { z } from 'zod';

const truthyValues = new Set(['true', '1', 'yes', 'y', 'on']);

const booleanFlag = z
  .preprocess((value) => {
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (normalized.length === 0) {
        return undefined;
      }
      return truthyValues.has(normalized);
    }
    if (typeof value === 'number') {
      return value === 1;
    }
    return value;
  }, z.boolean().optional())
  .optional();

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const weight = z.coerce.number().finite().nonnegative();

/** Width of the `embedding` column in sql/001_init.sql. */
export const POSTGRES_EMBEDDING_DIMENSIONS = 1536;

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    AI_PROVIDER: z.enum(['openai']).default('openai'),
    OPENAI_API_KEY: optionalString,
    OPENAI_CHAT_MODEL: z.string().trim().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().trim().default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(100),
    EMBEDDING_MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    INGESTION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
    INGESTION_RETRY_BASE_DELAY_MS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(500),
    KNOWLEDGE_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: optionalString,
    DATABASE_SSL: booleanFlag,
    DATABASE_STATEMENT_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(15000),
    CHUNK_MAX_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    CHUNK_LOOKBACK: z.coerce.number().int().nonnegative().default(200),
    RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
    RETRIEVAL_MAX_K: z.coerce.number().int().positive().default(50),
    RETRIEVAL_VECTOR_WEIGHT: weight.default(0.7),
    RETRIEVAL_KEYWORD_WEIGHT: weight.default(0.3),
    RETRIEVAL_OVERFETCH_FACTOR: z.coerce.number().int().positive().default(2),
    SYNC_WEBHOOK_SECRET: optionalString,
  })
  .superRefine((env, ctx) => {
    if (
      env.AI_PROVIDER === 'openai' &&
      !env.OPENAI_API_KEY &&
      env.NODE_ENV !== 'test'
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message:
          'OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
      });
    }
    if (
      env.KNOWLEDGE_STORE === 'postgres' &&
      !env.DATABASE_URL &&
      env.NODE_ENV !== 'test'
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message:
          'DATABASE_URL is required when KNOWLEDGE_STORE=postgres outside of test environment',
      });
    }
    if (
      env.KNOWLEDGE_STORE === 'postgres' &&
      env.EMBEDDING_DIMENSIONS !== POSTGRES_EMBEDDING_DIMENSIONS
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['EMBEDDING_DIMENSIONS'],
        message: `EMBEDDING_DIMENSIONS must be ${POSTGRES_EMBEDDING_DIMENSIONS} with KNOWLEDGE_STORE=postgres; change the vector column in sql/001_init.sql first`,
      });
    }
    if (env.CHUNK_OVERLAP >= env.CHUNK_MAX_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: 'CHUNK_OVERLAP must be smaller than CHUNK_MAX_SIZE',
      });
    }
    if (env.RETRIEVAL_TOP_K > env.RETRIEVAL_MAX_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RETRIEVAL_TOP_K'],
        message: 'RETRIEVAL_TOP_K must not exceed RETRIEVAL_MAX_K',
      });
    }
    if (env.RETRIEVAL_VECTOR_WEIGHT + env.RETRIEVAL_KEYWORD_WEIGHT <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RETRIEVAL_VECTOR_WEIGHT'],
        message: 'retrieval weights must have a positive total',
      });
    }
  });

export type EnvSchema = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): EnvSchema => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const messages = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed - ${messages}`);
  }
  return parsed.data;
};
