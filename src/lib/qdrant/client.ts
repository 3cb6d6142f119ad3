import { QdrantClient } from "@qdrant/js-client-rest";

import { requireEnv } from "@/lib/config";
import { ConfigurationError, StoreUnavailableError, type RagError } from "@/lib/errors";

export type QdrantConfig = {
  url: string;
  apiKey?: string;
};

export function getQdrantConfig(): QdrantConfig {
  const apiKey = process.env.QDRANT_API_KEY?.trim();
  return {
    url: requireEnv("QDRANT_URL"),
    apiKey: apiKey || undefined,
  };
}

export type QdrantCondition =
  | { key: string; match: { value: string | boolean } }
  | { key: string; match: { any: string[] } }
  | { has_id: string[] };

export type QdrantFilter = {
  must?: QdrantCondition[];
  must_not?: QdrantCondition[];
};

export type QdrantPayload = Record<string, unknown>;

export type QdrantPointId = string | number;

/**
 * The part of `QdrantClient` the vector store uses. Kept structural so tests
 * can hand in an in-process fake.
 */
export interface QdrantPointsClient {
  search(
    collectionName: string,
    args: {
      vector: number[];
      limit: number;
      filter?: QdrantFilter;
      with_payload?: boolean;
    },
  ): Promise<Array<{ id: QdrantPointId; score: number; payload?: QdrantPayload | null }>>;

  upsert(
    collectionName: string,
    args: {
      wait?: boolean;
      points: Array<{ id: string; vector: number[]; payload: QdrantPayload }>;
    },
  ): Promise<unknown>;

  setPayload(
    collectionName: string,
    args: { wait?: boolean; payload: QdrantPayload; points: string[] },
  ): Promise<unknown>;

  delete(
    collectionName: string,
    args: { wait?: boolean } & ({ points: string[] } | { filter: QdrantFilter }),
  ): Promise<unknown>;

  scroll(
    collectionName: string,
    args: {
      filter?: QdrantFilter;
      limit?: number;
      offset?: QdrantPointId;
      with_payload?: boolean | string[];
      with_vector?: boolean;
    },
  ): Promise<{
    points: Array<{ id: QdrantPointId; payload?: QdrantPayload | null }>;
    next_page_offset?: unknown;
  }>;
}

export interface QdrantAdminClient {
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;

  createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: "Cosine" } },
  ): Promise<unknown>;

  createPayloadIndex(
    collectionName: string,
    args: { wait?: boolean; field_name: string; field_schema: "keyword" },
  ): Promise<unknown>;
}

const globalForQdrant = globalThis as unknown as {
  __qdrantClient?: QdrantClient;
};

export function getQdrantClient(config?: Partial<QdrantConfig>): QdrantClient {
  if (globalForQdrant.__qdrantClient) return globalForQdrant.__qdrantClient;

  const url = config?.url ?? getQdrantConfig().url;
  const apiKey = config?.apiKey ?? (process.env.QDRANT_API_KEY?.trim() || undefined);
  const client = new QdrantClient({ url, apiKey });

  if (process.env.NODE_ENV !== "production") {
    globalForQdrant.__qdrantClient = client;
  }

  return client;
}

/** HTTP status of a Qdrant `ApiError`, if the error carries one. */
export function errorStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/**
 * Client errors (bad dimensions, missing collection) will not heal on retry;
 * everything else is treated as an outage.
 */
export function qdrantError(err: unknown, action: string): RagError {
  const status = errorStatus(err);
  if (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429) {
    return new ConfigurationError(`Vector index rejected ${action} (status ${status}).`, { cause: err });
  }
  return new StoreUnavailableError(`Vector index ${action} failed.`, { cause: err });
}
