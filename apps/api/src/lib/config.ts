import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().int().positive().default(5001),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // OpenAI-compatible chat + embeddings
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  CHAT_MODEL: z.string().default('gpt-4o'),
  CHAT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  RAG_MODEL: z.string().default('gpt-4o'),
  RAG_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  // Postgres (profiles, feedback, pgvector chunks). Optional: without it the
  // preference store and document index are reported unavailable.
  DATABASE_URL: z.string().min(1).optional(),

  // Fine-tuned inference server
  RUNPOD_IP: z.string().default('localhost'),
  FINETUNE_INFERENCE_PORT: z.coerce.number().int().positive().default(8010),
  FINETUNE_URL_OVERRIDE: z.string().url().optional(),
  FINETUNE_HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  FINETUNE_GENERATE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Retrieval
  RAG_TOP_K: z.coerce.number().int().positive().default(5),
  RAG_MIN_SIMILARITY: z.coerce.number().min(0).max(1).default(0.3),
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
});

export interface OpenAIConfig {
  apiKey: string | undefined;
  baseURL: string | undefined;
  chatModel: string;
  chatTemperature: number;
  ragModel: string;
  ragTemperature: number;
  embeddingModel: string;
}

export interface FinetuneConfig {
  url: string;
  healthTimeoutMs: number;
  generateTimeoutMs: number;
}

export interface RagConfig {
  topK: number;
  minSimilarity: number;
  chunkSize: number;
  chunkOverlap: number;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  corsOrigin: string;
  databaseUrl: string | undefined;
  openai: OpenAIConfig;
  finetune: FinetuneConfig;
  rag: RagConfig;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.API_PORT,
    corsOrigin: e.CORS_ORIGIN,
    databaseUrl: e.DATABASE_URL,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
      chatModel: e.CHAT_MODEL,
      chatTemperature: e.CHAT_TEMPERATURE,
      ragModel: e.RAG_MODEL,
      ragTemperature: e.RAG_TEMPERATURE,
      embeddingModel: e.EMBEDDING_MODEL,
    },
    finetune: {
      url: e.FINETUNE_URL_OVERRIDE ?? `http://${e.RUNPOD_IP}:${e.FINETUNE_INFERENCE_PORT}`,
      healthTimeoutMs: e.FINETUNE_HEALTH_TIMEOUT_MS,
      generateTimeoutMs: e.FINETUNE_GENERATE_TIMEOUT_MS,
    },
    rag: {
      topK: e.RAG_TOP_K,
      minSimilarity: e.RAG_MIN_SIMILARITY,
      chunkSize: e.RAG_CHUNK_SIZE,
      chunkOverlap: e.RAG_CHUNK_OVERLAP,
    },
  };
};
