import { AiSdkGenerator, type Generator } from "@/lib/ai/generate";
import { getGenerationModel } from "@/lib/ai/model";
import { upsertCompanies, type CompanyIngestResult } from "@/lib/companies/ingest";
import { MemoryCompanyDirectory } from "@/lib/companies/memory";
import { PostgresCompanyDirectory } from "@/lib/companies/postgres";
import type { CompanyDirectory, CompanyRecord } from "@/lib/companies/types";
import { loadRagConfig, type RagConfig } from "@/lib/config";
import { closeDb, getDb, getSql } from "@/lib/db/client";
import type { Embedder } from "@/lib/embeddings/embedder";
import { HashEmbedder } from "@/lib/embeddings/hash";
import { OpenAIEmbedder } from "@/lib/embeddings/openai";
import { ConfigurationError } from "@/lib/errors";
import {
  checkHealth,
  inProcessHealth,
  postgresHealthCheck,
  qdrantHealthCheck,
  type HealthProbe,
  type HealthReport,
} from "@/lib/health";
import { IngestionPipeline, type IngestResult } from "@/lib/ingestion/pipeline";
import { startRefreshLoop, type DocumentSource, type RefreshHandle, type RefreshReport } from "@/lib/ingestion/refresh";
import { getQdrantClient } from "@/lib/qdrant/client";
import { ensureDocumentChunksCollection } from "@/lib/qdrant/collections";
import { answerQuestion, type Answer } from "@/lib/retrieval/answer";
import { resolve, resolveScored, type EntityResolverDeps, type ResolvedCompany } from "@/lib/retrieval/entities";
import { retrieve, type RetrievalResult, type RetrieveOptions, type RetrieverDeps } from "@/lib/retrieval/vector";
import { validateBudget } from "@/lib/retrieval/context";
import { MemoryVectorStore } from "@/lib/vector/memory";
import { QdrantVectorStore } from "@/lib/vector/qdrant";
import type { VectorStore } from "@/lib/vector/store";

export type RagServiceOverrides = {
  config?: RagConfig;
  embedder?: Embedder;
  store?: VectorStore;
  directory?: CompanyDirectory;
  generator?: Generator;
};

export type RagService = {
  readonly config: RagConfig;
  readonly embedder: Embedder;
  readonly store: VectorStore;
  readonly directory: CompanyDirectory;
  /** Create the Qdrant collection and the Postgres trigram indexes when those backends are used. */
  init(): Promise<void>;
  retrieve(query: string, opts?: RetrieveOptions): Promise<RetrievalResult>;
  resolve(query: string, limit?: number, signal?: AbortSignal): Promise<CompanyRecord[]>;
  resolveScored(query: string, opts?: { limit?: number; signal?: AbortSignal }): Promise<ResolvedCompany[]>;
  ingest(symbol: string, documents: readonly unknown[], opts?: { signal?: AbortSignal }): Promise<IngestResult>;
  deleteSymbol(symbol: string, opts?: { signal?: AbortSignal }): Promise<void>;
  answer(query: string, opts?: RetrieveOptions): Promise<Answer>;
  upsertCompanies(rows: unknown[]): Promise<CompanyIngestResult>;
  health(): Promise<HealthReport>;
  startRefresh(
    source: DocumentSource,
    opts?: {
      extraSymbols?: () => string[] | Promise<string[]>;
      concurrency?: number;
      onReport?: (report: RefreshReport) => void;
    },
  ): RefreshHandle;
  close(): Promise<void>;
};

function createEmbedder(config: RagConfig): Embedder {
  if (config.embeddings.provider === "hash") return new HashEmbedder(config.qdrant.vectorSize);
  return new OpenAIEmbedder({
    model: config.embeddings.model,
    dimensions: config.qdrant.vectorSize,
    apiKey: config.embeddings.apiKey,
  });
}

/**
 * Wire the retrieval core from configuration. Backends are only connected
 * when they are selected and not overridden.
 */
export function createRagService(overrides: RagServiceOverrides = {}): RagService {
  const config = overrides.config ?? loadRagConfig();
  const budget = validateBudget(config.budget);
  const probes: Record<string, HealthProbe> = {};
  const setup: Array<() => Promise<void>> = [];
  const teardown: Array<() => Promise<void>> = [];

  const embedder = overrides.embedder ?? createEmbedder(config);

  let store = overrides.store;
  if (!store) {
    if (config.vectorStore === "qdrant") {
      const client = getQdrantClient({ url: config.qdrant.url, apiKey: config.qdrant.apiKey });
      store = new QdrantVectorStore({ client, dimensions: config.qdrant.vectorSize });
      probes.qdrant = () => qdrantHealthCheck(client);
      setup.push(() => ensureDocumentChunksCollection(client, config.qdrant.vectorSize));
    } else {
      store = new MemoryVectorStore(config.qdrant.vectorSize);
      probes.vectorStore = inProcessHealth;
    }
  }

  let directory = overrides.directory;
  if (!directory) {
    if (config.companyDirectory === "postgres") {
      const postgresDirectory = new PostgresCompanyDirectory(getDb(config.databaseUrl));
      directory = postgresDirectory;
      probes.postgres = () => postgresHealthCheck(getSql(config.databaseUrl));
      setup.push(() => postgresDirectory.ensureCompanySearch());
      teardown.push(closeDb);
    } else {
      directory = new MemoryCompanyDirectory();
      probes.companyDirectory = inProcessHealth;
    }
  }

  if (embedder.dimensions !== store.dimensions) {
    throw new ConfigurationError(
      `Embedder produces ${embedder.dimensions}-dimensional vectors but the store holds ${store.dimensions}.`,
    );
  }

  let generator = overrides.generator;
  const getGenerator = (): Generator => {
    generator ??= new AiSdkGenerator(getGenerationModel(config.generation));
    return generator;
  };

  const resolverDeps: EntityResolverDeps = {
    directory,
    threshold: config.retrieval.trigramThreshold,
    retry: config.retry,
  };
  const retrieverDeps: RetrieverDeps = {
    embedder,
    store,
    resolver: resolverDeps,
    topK: config.retrieval.topK,
    minConfidence: config.retrieval.minConfidence,
    retry: config.retry,
  };
  const pipeline = new IngestionPipeline({
    embedder,
    store,
    chunking: config.chunking,
    batchSize: config.embeddings.batchSize,
    concurrency: config.embeddings.concurrency,
    retry: config.retry,
  });

  const loops = new Set<RefreshHandle>();
  const companyDirectory = directory;
  const vectorStore = store;

  return {
    config,
    embedder,
    store: vectorStore,
    directory: companyDirectory,

    async init() {
      for (const step of setup) await step();
    },

    retrieve: (query, opts) => retrieve(retrieverDeps, query, opts),
    resolve: (query, limit, signal) => resolve(resolverDeps, query, limit, signal),
    resolveScored: (query, opts) => resolveScored(resolverDeps, query, opts),
    ingest: (symbol, documents, opts) => pipeline.ingest(symbol, documents, opts),
    deleteSymbol: (symbol, opts) => pipeline.deleteSymbol(symbol, opts),

    answer: (query, opts) =>
      answerQuestion(
        {
          retriever: retrieverDeps,
          generator: getGenerator(),
          budget,
          temperature: config.generation.temperature,
          maxOutputTokens: config.generation.maxOutputTokens,
        },
        query,
        opts,
      ),

    upsertCompanies: (rows) => upsertCompanies(companyDirectory, rows, { retry: config.retry }),

    health: () => checkHealth(probes),

    startRefresh(source, opts) {
      const loop = startRefreshLoop({
        pipeline,
        store: vectorStore,
        source,
        intervalMs: config.refreshMinutes * 60_000,
        extraSymbols: opts?.extraSymbols,
        concurrency: opts?.concurrency,
        onReport: opts?.onReport,
      });
      const handle: RefreshHandle = {
        async stop() {
          loops.delete(handle);
          await loop.stop();
        },
      };
      loops.add(handle);
      return handle;
    },

    async close() {
      await Promise.all([...loops].map((loop) => loop.stop()));
      for (const step of teardown) await step();
    },
  };
}

export type { RagConfig } from "@/lib/config";
export { loadRagConfig } from "@/lib/config";
export * from "@/lib/errors";
export type { CompanyRecord, CompanyDirectory, CompanyCandidate, MatchKind } from "@/lib/companies/types";
export { MemoryCompanyDirectory } from "@/lib/companies/memory";
export { PostgresCompanyDirectory } from "@/lib/companies/postgres";
export type { Embedder } from "@/lib/embeddings/embedder";
export { HashEmbedder } from "@/lib/embeddings/hash";
export { OpenAIEmbedder } from "@/lib/embeddings/openai";
export type { VectorStore, DocumentChunk, ChunkInput, ScoredChunk, UpsertResult } from "@/lib/vector/store";
export { MemoryVectorStore } from "@/lib/vector/memory";
export { QdrantVectorStore } from "@/lib/vector/qdrant";
export { chunkText, splitIntoChunks } from "@/lib/text/chunk";
export { assemblePrompt, buildContext, type ContextBudget } from "@/lib/retrieval/context";
export type { RetrievalResult, RetrievalHit, RetrieveOptions } from "@/lib/retrieval/vector";
export type { Answer, AnswerSource } from "@/lib/retrieval/answer";
export type { Generator, Generation, GenerateOptions } from "@/lib/ai/generate";
export { IngestionPipeline, type IngestResult } from "@/lib/ingestion/pipeline";
export {
  collectDocuments,
  fundamentalsToDocument,
  newsToDocument,
  type RawDocument,
  type NewsItem,
  type FundamentalsSnapshot,
} from "@/lib/ingestion/documents";
export type { DocumentSource, RefreshHandle, RefreshReport } from "@/lib/ingestion/refresh";
export type { HealthReport, ServiceHealth } from "@/lib/health";
