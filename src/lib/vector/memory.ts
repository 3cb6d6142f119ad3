import { cosineDistance } from "@/lib/embeddings/embedder";

import {
  assertDimensions,
  chunkId,
  compareScored,
  groupByRevision,
  normalizeSymbol,
  type ChunkInput,
  type DocumentChunk,
  type ScoredChunk,
  type SimilaritySearchOptions,
  type UpsertOptions,
  type UpsertResult,
  type VectorStore,
} from "./store";

type StoredChunk = DocumentChunk & { embedding: number[] };

function publicChunk({ embedding: _embedding, ...chunk }: StoredChunk): DocumentChunk {
  return { ...chunk, metadata: { ...chunk.metadata } };
}

/**
 * Brute-force cosine search over an in-process map. Every upsert swaps the
 * symbol's map in one step, so readers never see a half-written revision.
 */
export class MemoryVectorStore implements VectorStore {
  private readonly bySymbol = new Map<string, Map<string, StoredChunk>>();

  constructor(
    readonly dimensions: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async upsert(symbol: string, chunks: readonly ChunkInput[], opts?: UpsertOptions): Promise<UpsertResult> {
    const key = normalizeSymbol(symbol);
    for (const c of chunks) assertDimensions(c.embedding, this.dimensions);
    opts?.signal?.throwIfAborted();

    const existing = this.bySymbol.get(key) ?? new Map<string, StoredChunk>();
    const storedRevisions = new Set([...existing.values()].map((c) => c.sourceRevision));
    const incoming = groupByRevision(chunks);
    const keep = new Set([...incoming.keys(), ...(opts?.retain ?? [])]);

    const next = new Map<string, StoredChunk>();
    let removed = 0;
    for (const c of existing.values()) {
      if (keep.has(c.sourceRevision)) next.set(c.id, c);
      else removed += 1;
    }

    let inserted = 0;
    const createdAt = this.now();
    for (const [revision, group] of incoming) {
      if (storedRevisions.has(revision)) continue;
      for (const c of group) {
        const id = chunkId(key, revision, c.chunkIndex);
        next.set(id, {
          id,
          symbol: key,
          text: c.text,
          sourceRevision: revision,
          chunkIndex: c.chunkIndex,
          createdAt,
          metadata: { ...c.metadata },
          embedding: [...c.embedding],
        });
        inserted += 1;
      }
    }

    if (next.size > 0) this.bySymbol.set(key, next);
    else this.bySymbol.delete(key);

    return { inserted, removed, unchanged: inserted === 0 && removed === 0 };
  }

  async similaritySearch(
    queryEmbedding: readonly number[],
    k: number,
    opts?: SimilaritySearchOptions,
  ): Promise<ScoredChunk[]> {
    assertDimensions(queryEmbedding, this.dimensions);
    if (k <= 0) return [];

    const excluded = new Set(opts?.excludeIds ?? []);
    const pools = opts?.symbol
      ? [this.bySymbol.get(normalizeSymbol(opts.symbol)) ?? new Map<string, StoredChunk>()]
      : [...this.bySymbol.values()];

    const scored: Array<{ stored: StoredChunk; hit: ScoredChunk }> = [];
    for (const pool of pools) {
      for (const stored of pool.values()) {
        if (excluded.has(stored.id)) continue;
        scored.push({
          stored,
          hit: { chunk: stored, distance: cosineDistance(queryEmbedding, stored.embedding) },
        });
      }
    }

    return scored
      .sort((a, b) => compareScored(a.hit, b.hit))
      .slice(0, k)
      .map(({ stored, hit }) => ({ chunk: publicChunk(stored), distance: hit.distance }));
  }

  async deleteSymbol(symbol: string): Promise<void> {
    this.bySymbol.delete(normalizeSymbol(symbol));
  }

  async listRevisions(symbol: string): Promise<string[]> {
    const pool = this.bySymbol.get(normalizeSymbol(symbol));
    if (!pool) return [];
    return [...new Set([...pool.values()].map((c) => c.sourceRevision))].sort();
  }

  async listSymbols(): Promise<string[]> {
    return [...this.bySymbol.keys()].sort();
  }

  /** Number of stored chunks, optionally for one symbol. */
  count(symbol?: string): number {
    if (symbol) return this.bySymbol.get(normalizeSymbol(symbol))?.size ?? 0;
    let total = 0;
    for (const pool of this.bySymbol.values()) total += pool.size;
    return total;
  }
}
