import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { ConfigurationError } from "./errors";

// Local overrides first; dotenv never overwrites a variable that is already set.
loadEnv({ path: ".env.local" });
loadEnv({ path: ".env" });

export function requireEnv(name: string): string {
  const value = process.env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`Missing ${name} environment variable.`);
  }
  return value;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const unitInterval = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
  DATABASE_URL: optionalString,
  QDRANT_URL: optionalString,
  QDRANT_API_KEY: optionalString,
  QDRANT_VECTOR_SIZE: positiveInt(1536), // text-embedding-3-small
  OPENAI_API_KEY: optionalString,
  OPENAI_EMBEDDING_MODEL: z.string().trim().min(1).default("text-embedding-3-small"),
  EMBEDDINGS_PROVIDER: z.enum(["openai", "hash"]).default("openai"),
  VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
  COMPANY_DIRECTORY: z.enum(["postgres", "memory"]).default("postgres"),
  GENERATION_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  ANTHROPIC_MODEL: z.string().trim().min(1).default("claude-3-5-haiku-latest"),
  CHUNK_SIZE: positiveInt(800),
  CHUNK_OVERLAP: nonNegativeInt(100),
  RETRIEVER_TOP_K: positiveInt(5),
  TRIGRAM_THRESHOLD: unitInterval(0.3),
  RESOLVER_MIN_CONFIDENCE: unitInterval(0.5),
  CONTEXT_MAX_CHUNKS: positiveInt(6),
  CONTEXT_MAX_CHARS: positiveInt(6000),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  GENERATION_MAX_OUTPUT_TOKENS: positiveInt(800),
  REFRESH_MINUTES: positiveInt(30),
  BACKEND_TIMEOUT_MS: positiveInt(10_000),
  RETRY_ATTEMPTS: z.coerce.number().int().positive().max(3).default(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt(250),
  EMBEDDING_BATCH_SIZE: positiveInt(64),
  EMBEDDING_CONCURRENCY: positiveInt(2),
});

export type RagConfig = {
  databaseUrl?: string;
  qdrant: { url?: string; apiKey?: string; vectorSize: number };
  embeddings: {
    provider: "openai" | "hash";
    model: string;
    apiKey?: string;
    batchSize: number;
    concurrency: number;
  };
  vectorStore: "qdrant" | "memory";
  companyDirectory: "postgres" | "memory";
  generation: {
    provider: "openai" | "anthropic";
    model: string;
    temperature: number;
    maxOutputTokens: number;
  };
  chunking: { maxLen: number; overlap: number };
  retrieval: { topK: number; trigramThreshold: number; minConfidence: number };
  budget: { maxChunks: number; maxChars: number };
  refreshMinutes: number;
  retry: { attempts: number; baseDelayMs: number; timeoutMs: number };
};

/**
 * Parse the retrieval settings from `env` (defaults to `process.env`).
 * Empty variables fall back to their defaults; malformed ones raise
 * {@link ConfigurationError}.
 */
export function loadRagConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    raw[key] = value ? value : undefined;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration (${issues}).`);
  }
  const e = parsed.data;

  if (e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    throw new ConfigurationError("CHUNK_OVERLAP must be smaller than CHUNK_SIZE.");
  }

  return {
    databaseUrl: e.DATABASE_URL,
    qdrant: { url: e.QDRANT_URL, apiKey: e.QDRANT_API_KEY, vectorSize: e.QDRANT_VECTOR_SIZE },
    embeddings: {
      provider: e.EMBEDDINGS_PROVIDER,
      model: e.EMBEDDINGS_PROVIDER === "hash" ? "local-hash" : e.OPENAI_EMBEDDING_MODEL,
      apiKey: e.OPENAI_API_KEY,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      concurrency: e.EMBEDDING_CONCURRENCY,
    },
    vectorStore: e.VECTOR_STORE,
    companyDirectory: e.COMPANY_DIRECTORY,
    generation: {
      provider: e.GENERATION_PROVIDER,
      model: e.GENERATION_PROVIDER === "anthropic" ? e.ANTHROPIC_MODEL : e.OPENAI_MODEL,
      temperature: e.GENERATION_TEMPERATURE,
      maxOutputTokens: e.GENERATION_MAX_OUTPUT_TOKENS,
    },
    chunking: { maxLen: e.CHUNK_SIZE, overlap: e.CHUNK_OVERLAP },
    retrieval: {
      topK: e.RETRIEVER_TOP_K,
      trigramThreshold: e.TRIGRAM_THRESHOLD,
      minConfidence: e.RESOLVER_MIN_CONFIDENCE,
    },
    budget: { maxChunks: e.CONTEXT_MAX_CHUNKS, maxChars: e.CONTEXT_MAX_CHARS },
    refreshMinutes: e.REFRESH_MINUTES,
    retry: {
      attempts: e.RETRY_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      timeoutMs: e.BACKEND_TIMEOUT_MS,
    },
  };
}
