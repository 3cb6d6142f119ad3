import { z } from "zod";

import { isAbortError, isRagError } from "@/lib/errors";
import {
  qdrantError,
  type QdrantCondition,
  type QdrantFilter,
  type QdrantPayload,
  type QdrantPointId,
  type QdrantPointsClient,
} from "@/lib/qdrant/client";
import { DOCUMENT_CHUNKS_COLLECTION } from "@/lib/qdrant/collections";

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

const WRITE_BATCH = 128;
const SCROLL_PAGE = 256;
/** Extra hits fetched so ties at the cut-off can be broken by recency. */
const TIE_HEADROOM = 8;

const chunkPayloadSchema = z.object({
  symbol: z.string(),
  text: z.string(),
  source_revision: z.string(),
  revision_size: z.number().int().positive(),
  chunk_index: z.number().int().min(0),
  created_at: z.string().datetime(),
  kind: z.enum(["news", "fundamentals", "filing", "other"]).optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  published_at: z.string().optional(),
  committed: z.boolean().optional(),
});

const revisionPayloadSchema = chunkPayloadSchema.pick({
  source_revision: true,
  revision_size: true,
  committed: true,
});

/** `stored` counts every point of the revision, `committed` only those visible to searches. */
type RevisionState = { stored: number; committed: number; size: number };

type PendingPoint = { id: string; vector: number[]; payload: QdrantPayload };

export type QdrantVectorStoreOptions = {
  client: QdrantPointsClient;
  dimensions: number;
  collectionName?: string;
  now?: () => Date;
};

function symbolCondition(symbol: string): QdrantCondition {
  return { key: "symbol", match: { value: symbol } };
}

const COMMITTED: QdrantCondition = { key: "committed", match: { value: true } };

function isComplete(state: RevisionState): boolean {
  return state.committed >= state.size;
}

function pageOffset(value: unknown): QdrantPointId | undefined {
  return typeof value === "string" || typeof value === "number" ? value : undefined;
}

function toPayload(symbol: string, chunk: ChunkInput, revisionSize: number, createdAt: string): QdrantPayload {
  const payload: QdrantPayload = {
    symbol,
    text: chunk.text,
    source_revision: chunk.sourceRevision,
    revision_size: revisionSize,
    chunk_index: chunk.chunkIndex,
    created_at: createdAt,
    committed: false,
  };
  const meta = chunk.metadata;
  if (meta?.kind) payload.kind = meta.kind;
  if (meta?.title) payload.title = meta.title;
  if (meta?.url) payload.url = meta.url;
  if (meta?.publishedAt) payload.published_at = meta.publishedAt;
  return payload;
}

function toDocumentChunk(id: QdrantPointId, payload: z.infer<typeof chunkPayloadSchema>): DocumentChunk {
  return {
    id: String(id),
    symbol: payload.symbol,
    text: payload.text,
    sourceRevision: payload.source_revision,
    chunkIndex: payload.chunk_index,
    createdAt: new Date(payload.created_at),
    metadata: {
      kind: payload.kind,
      title: payload.title,
      url: payload.url,
      publishedAt: payload.published_at,
    },
  };
}

function rethrow(err: unknown, action: string): never {
  if (isAbortError(err) || isRagError(err)) throw err;
  throw qdrantError(err, action);
}

/**
 * Qdrant-backed store. Points are written uncommitted and only flipped to
 * `committed` once every batch of the call has landed; searches see committed
 * points only. Every point also records how many chunks its revision has, so
 * a revision is only reported (and skipped on upsert) once all of its points
 * are committed. Writes for one symbol run one at a time.
 */
export class QdrantVectorStore implements VectorStore {
  readonly dimensions: number;
  private readonly client: QdrantPointsClient;
  private readonly collection: string;
  private readonly now: () => Date;
  private readonly writes = new Map<string, Promise<void>>();

  constructor(opts: QdrantVectorStoreOptions) {
    this.client = opts.client;
    this.dimensions = opts.dimensions;
    this.collection = opts.collectionName ?? DOCUMENT_CHUNKS_COLLECTION;
    this.now = opts.now ?? (() => new Date());
  }

  async upsert(symbol: string, chunks: readonly ChunkInput[], opts?: UpsertOptions): Promise<UpsertResult> {
    const key = normalizeSymbol(symbol);
    for (const c of chunks) assertDimensions(c.embedding, this.dimensions);
    opts?.signal?.throwIfAborted();

    // An abandoned attempt must settle (and clean up) before the next write starts.
    const previous = this.writes.get(key) ?? Promise.resolve();
    const run = previous.then(() => this.write(key, chunks, opts));
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.writes.set(key, settled);
    try {
      return await run;
    } finally {
      if (this.writes.get(key) === settled) this.writes.delete(key);
    }
  }

  async similaritySearch(
    queryEmbedding: readonly number[],
    k: number,
    opts?: SimilaritySearchOptions,
  ): Promise<ScoredChunk[]> {
    assertDimensions(queryEmbedding, this.dimensions);
    opts?.signal?.throwIfAborted();
    if (k <= 0) return [];

    const must: QdrantCondition[] = [COMMITTED];
    if (opts?.symbol) must.push(symbolCondition(normalizeSymbol(opts.symbol)));
    const filter: QdrantFilter = { must };
    if (opts?.excludeIds?.length) filter.must_not = [{ has_id: [...opts.excludeIds] }];

    let res: Awaited<ReturnType<QdrantPointsClient["search"]>>;
    try {
      res = await this.client.search(this.collection, {
        vector: [...queryEmbedding],
        limit: k + TIE_HEADROOM,
        with_payload: true,
        filter,
      });
    } catch (err) {
      rethrow(err, "search");
    }

    const hits: ScoredChunk[] = [];
    for (const point of res) {
      const parsed = chunkPayloadSchema.safeParse(point.payload ?? {});
      if (!parsed.success) {
        console.warn(`[qdrant] Skipping point ${String(point.id)} with malformed payload.`);
        continue;
      }
      hits.push({ chunk: toDocumentChunk(point.id, parsed.data), distance: 1 - point.score });
    }
    return hits.sort(compareScored).slice(0, k);
  }

  async deleteSymbol(symbol: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    try {
      await this.client.delete(this.collection, {
        wait: true,
        filter: { must: [symbolCondition(normalizeSymbol(symbol))] },
      });
    } catch (err) {
      rethrow(err, "symbol deletion");
    }
  }

  async listRevisions(symbol: string, signal?: AbortSignal): Promise<string[]> {
    signal?.throwIfAborted();
    const states = await this.revisionStates(normalizeSymbol(symbol));
    return [...states.entries()]
      .filter(([, state]) => isComplete(state))
      .map(([revision]) => revision)
      .sort();
  }

  async listSymbols(signal?: AbortSignal): Promise<string[]> {
    const symbols = new Set<string>();
    await this.scrollAll(undefined, ["symbol"], (payload) => {
      if (typeof payload.symbol === "string") symbols.add(payload.symbol);
    }, signal);
    return [...symbols].sort();
  }

  private async write(key: string, chunks: readonly ChunkInput[], opts?: UpsertOptions): Promise<UpsertResult> {
    const signal = opts?.signal;
    signal?.throwIfAborted();

    const states = await this.revisionStates(key, signal);
    const incoming = groupByRevision(chunks);
    const keep = new Set([...incoming.keys(), ...(opts?.retain ?? [])]);

    const createdAt = this.now().toISOString();
    const points: PendingPoint[] = [];
    for (const [revision, group] of incoming) {
      const state = states.get(revision);
      if (state && isComplete(state)) continue;
      for (const c of group) {
        points.push({
          id: chunkId(key, revision, c.chunkIndex),
          vector: c.embedding,
          payload: toPayload(key, c, group.length, createdAt),
        });
      }
    }

    await this.writePoints(points, signal);

    const stale = [...states.entries()].filter(([revision]) => !keep.has(revision));
    if (stale.length > 0) {
      signal?.throwIfAborted();
      try {
        await this.client.delete(this.collection, {
          wait: true,
          filter: {
            must: [symbolCondition(key), { key: "source_revision", match: { any: stale.map(([r]) => r) } }],
          },
        });
      } catch (err) {
        rethrow(err, "stale chunk removal");
      }
    }

    const removed = stale.reduce((sum, [, state]) => sum + state.stored, 0);
    return { inserted: points.length, removed, unchanged: points.length === 0 && removed === 0 };
  }

  private async revisionStates(symbol: string, signal?: AbortSignal): Promise<Map<string, RevisionState>> {
    const states = new Map<string, RevisionState>();
    await this.scrollAll(
      { must: [symbolCondition(symbol)] },
      ["source_revision", "revision_size", "committed"],
      (payload) => {
        const parsed = revisionPayloadSchema.safeParse(payload);
        if (!parsed.success) return;
        const { source_revision: revision, revision_size: size, committed } = parsed.data;
        const state = states.get(revision) ?? { stored: 0, committed: 0, size };
        state.stored += 1;
        if (committed === true) state.committed += 1;
        states.set(revision, state);
      },
      signal,
    );
    return states;
  }

  private async scrollAll(
    filter: QdrantFilter | undefined,
    fields: string[],
    visit: (payload: QdrantPayload) => void,
    signal?: AbortSignal,
  ): Promise<void> {
    let offset: QdrantPointId | undefined;
    do {
      signal?.throwIfAborted();
      let page: Awaited<ReturnType<QdrantPointsClient["scroll"]>>;
      try {
        page = await this.client.scroll(this.collection, {
          filter,
          limit: SCROLL_PAGE,
          offset,
          with_payload: fields,
          with_vector: false,
        });
      } catch (err) {
        rethrow(err, "scroll");
      }
      for (const point of page.points) visit(point.payload ?? {});
      offset = pageOffset(page.next_page_offset);
    } while (offset !== undefined);
  }

  /**
   * Write in batches, then commit. On failure remove whatever this call
   * already wrote; points left behind by a failed cleanup stay uncommitted.
   */
  private async writePoints(points: PendingPoint[], signal?: AbortSignal): Promise<void> {
    if (points.length === 0) return;
    const attempted: string[] = [];
    try {
      for (let i = 0; i < points.length; i += WRITE_BATCH) {
        signal?.throwIfAborted();
        const batch = points.slice(i, i + WRITE_BATCH);
        attempted.push(...batch.map((p) => p.id));
        await this.client.upsert(this.collection, { wait: true, points: batch });
      }
      for (let i = 0; i < attempted.length; i += WRITE_BATCH) {
        signal?.throwIfAborted();
        await this.client.setPayload(this.collection, {
          wait: true,
          payload: { committed: true },
          points: attempted.slice(i, i + WRITE_BATCH),
        });
      }
    } catch (err) {
      try {
        await this.client.delete(this.collection, { wait: true, points: attempted });
      } catch (cleanupErr) {
        console.error(`[qdrant] Failed to remove ${attempted.length} uncommitted point(s).`, cleanupErr);
      }
      rethrow(err, "upsert");
    }
  }
}
