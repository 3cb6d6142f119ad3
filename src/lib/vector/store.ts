import crypto from "node:crypto";

import { ConfigurationError } from "@/lib/errors";

export type DocumentKind = "news" | "fundamentals" | "filing" | "other";

export type ChunkMetadata = {
  kind?: DocumentKind;
  title?: string;
  url?: string;
  /** ISO date or date-time of the source document. */
  publishedAt?: string;
};

/** A chunk ready to be stored: text plus its embedding. */
export type ChunkInput = {
  text: string;
  embedding: number[];
  sourceRevision: string;
  chunkIndex: number;
  metadata?: ChunkMetadata;
};

/** A stored chunk as returned by searches (the vector itself is not echoed). */
export type DocumentChunk = {
  id: string;
  symbol: string;
  text: string;
  sourceRevision: string;
  chunkIndex: number;
  createdAt: Date;
  metadata: ChunkMetadata;
};

export type ScoredChunk = {
  chunk: DocumentChunk;
  /** Cosine distance to the query: smaller is closer. */
  distance: number;
};

export type UpsertOptions = {
  /** Revisions to keep even though `chunks` carries none of their chunks. */
  retain?: readonly string[];
  signal?: AbortSignal;
};

export type UpsertResult = {
  inserted: number;
  removed: number;
  unchanged: boolean;
};

export type SimilaritySearchOptions = {
  symbol?: string;
  excludeIds?: readonly string[];
  signal?: AbortSignal;
};

export interface VectorStore {
  /** Fixed embedding length for the lifetime of the store. */
  readonly dimensions: number;

  /**
   * Make the revisions in `chunks` plus `retain` the symbol's complete set:
   * chunks of any other revision are removed, revisions already stored in
   * full are left untouched, the rest are written.
   */
  upsert(symbol: string, chunks: readonly ChunkInput[], opts?: UpsertOptions): Promise<UpsertResult>;

  /**
   * The `k` closest chunks, optionally restricted to one symbol. Ties go to
   * the most recently created chunk.
   */
  similaritySearch(
    queryEmbedding: readonly number[],
    k: number,
    opts?: SimilaritySearchOptions,
  ): Promise<ScoredChunk[]>;

  deleteSymbol(symbol: string, signal?: AbortSignal): Promise<void>;

  /** Revisions of `symbol` whose chunks are all stored. */
  listRevisions(symbol: string, signal?: AbortSignal): Promise<string[]>;

  listSymbols(signal?: AbortSignal): Promise<string[]>;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/** Stable UUID for a chunk, so rewriting a revision overwrites the same points. */
export function chunkId(symbol: string, sourceRevision: string, chunkIndex: number): string {
  const hex = crypto
    .createHash("sha256")
    .update(`${normalizeSymbol(symbol)}\u0000${sourceRevision}\u0000${chunkIndex}`)
    .digest("hex");
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join("-");
}

export function assertDimensions(embedding: readonly number[], dimensions: number): void {
  if (embedding.length !== dimensions) {
    throw new ConfigurationError(
      `Embedding has ${embedding.length} dimensions but the store holds ${dimensions}-dimensional vectors.`,
    );
  }
}

export function groupByRevision(chunks: readonly ChunkInput[]): Map<string, ChunkInput[]> {
  const groups = new Map<string, ChunkInput[]>();
  for (const c of chunks) {
    const group = groups.get(c.sourceRevision);
    if (group) group.push(c);
    else groups.set(c.sourceRevision, [c]);
  }
  return groups;
}

/** Distance ascending, then newest first, then id. */
export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  const age = b.chunk.createdAt.getTime() - a.chunk.createdAt.getTime();
  if (age !== 0) return age;
  return a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0;
}
