import pLimit from "p-limit";

import type { Embedder } from "@/lib/embeddings/embedder";
import { ConfigurationError, IngestionError } from "@/lib/errors";
import { withRetry, type RetryPolicy } from "@/lib/retry";
import { assertChunkParams, splitIntoChunks } from "@/lib/text/chunk";
import { normalizeSymbol, type ChunkInput, type VectorStore } from "@/lib/vector/store";

import { rawDocumentSchema, type RawDocument } from "./documents";

export type IngestStatus = "indexed" | "unchanged" | "superseded";

export type IngestResult = {
  symbol: string;
  status: IngestStatus;
  /** Distinct revisions in the input. */
  revisions: number;
  /** Chunks embedded by this call. */
  embedded: number;
  inserted: number;
  removed: number;
};

export type IngestionDeps = {
  embedder: Embedder;
  store: VectorStore;
  chunking: { maxLen: number; overlap: number };
  batchSize: number;
  concurrency: number;
  retry?: Partial<RetryPolicy>;
};

type Lane = {
  tail: Promise<void>;
  /** Ticket of the newest call; older tickets are superseded. */
  latest: number;
  pending: number;
  inflight?: AbortController;
};

type PendingChunk = { doc: RawDocument; chunkIndex: number; text: string };

function parseDocuments(symbol: string, documents: readonly unknown[]): RawDocument[] {
  const docs: RawDocument[] = [];
  const problems: string[] = [];
  documents.forEach((raw, i) => {
    const parsed = rawDocumentSchema.safeParse(raw);
    if (parsed.success) docs.push(parsed.data);
    else problems.push(`#${i}: ${parsed.error.issues.map((issue) => issue.message).join(", ")}`);
  });
  if (problems.length > 0) {
    throw new IngestionError(`Invalid documents for ${symbol} (${problems.join("; ")}).`);
  }
  return docs;
}

function byRevision(symbol: string, docs: RawDocument[]): Map<string, RawDocument> {
  const revisions = new Map<string, RawDocument>();
  for (const doc of docs) {
    const seen = revisions.get(doc.revision);
    if (seen) {
      if (seen.text !== doc.text) {
        console.warn(`[ingest] ${symbol}: revision ${doc.revision} appears twice with different text; keeping the first.`);
      }
      continue;
    }
    revisions.set(doc.revision, doc);
  }
  return revisions;
}

function sameSet(a: Iterable<string>, b: ReadonlySet<string>): boolean {
  const left = new Set(a);
  if (left.size !== b.size) return false;
  for (const v of left) if (!b.has(v)) return false;
  return true;
}

/**
 * Chunk, embed and index documents per symbol. Calls for one symbol run one
 * at a time; a newer call supersedes any older call that has not committed.
 * Embedding happens in full before anything is written.
 */
export class IngestionPipeline {
  private readonly lanes = new Map<string, Lane>();

  constructor(private readonly deps: IngestionDeps) {
    assertChunkParams(deps.chunking.maxLen, deps.chunking.overlap);
    if (!Number.isInteger(deps.batchSize) || deps.batchSize <= 0) {
      throw new ConfigurationError("Embedding batch size must be a positive integer.");
    }
    if (!Number.isInteger(deps.concurrency) || deps.concurrency <= 0) {
      throw new ConfigurationError("Embedding concurrency must be a positive integer.");
    }
    if (deps.embedder.dimensions !== deps.store.dimensions) {
      throw new ConfigurationError(
        `Embedder produces ${deps.embedder.dimensions}-dimensional vectors but the store holds ${deps.store.dimensions}.`,
      );
    }
  }

  async ingest(
    symbol: string,
    documents: readonly unknown[],
    opts?: { signal?: AbortSignal },
  ): Promise<IngestResult> {
    const key = normalizeSymbol(symbol);
    if (!key) throw new IngestionError("A symbol is required to ingest documents.");
    const docs = parseDocuments(key, documents);
    // Retraction goes through deleteSymbol; an empty batch leaves the symbol as it is.
    if (docs.length === 0) {
      console.warn(`[ingest] ${key}: no documents given; keeping stored chunks.`);
      return { symbol: key, status: "unchanged", revisions: 0, embedded: 0, inserted: 0, removed: 0 };
    }

    const lane = this.supersede(key);
    const ticket = lane.latest;

    return this.enqueue(key, lane, async () => {
      const revisions = byRevision(key, docs);
      const superseded: IngestResult = {
        symbol: key,
        status: "superseded",
        revisions: revisions.size,
        embedded: 0,
        inserted: 0,
        removed: 0,
      };
      if (ticket !== lane.latest) return superseded;

      const controller = new AbortController();
      const onAbort = () => controller.abort(opts?.signal?.reason);
      opts?.signal?.addEventListener("abort", onAbort, { once: true });
      if (opts?.signal?.aborted) onAbort();
      lane.inflight = controller;

      try {
        return await this.run(key, revisions, controller.signal);
      } catch (err) {
        if (ticket !== lane.latest && controller.signal.aborted) return superseded;
        if (opts?.signal?.aborted) throw opts.signal.reason;
        throw err;
      } finally {
        opts?.signal?.removeEventListener("abort", onAbort);
        if (lane.inflight === controller) lane.inflight = undefined;
      }
    });
  }

  /** Remove every chunk of `symbol`. Pending ingestion for the symbol is superseded. */
  async deleteSymbol(symbol: string, opts?: { signal?: AbortSignal }): Promise<void> {
    const key = normalizeSymbol(symbol);
    if (!key) throw new IngestionError("A symbol is required to delete documents.");

    const lane = this.supersede(key);
    await this.enqueue(key, lane, async () => {
      try {
        await withRetry((s) => this.deps.store.deleteSymbol(key, s), {
          ...this.deps.retry,
          label: "vector delete",
          signal: opts?.signal,
        });
      } catch (err) {
        if (opts?.signal?.aborted) throw opts.signal.reason;
        throw new IngestionError(`Failed to delete documents for ${key}.`, { cause: err });
      }
      console.log(`[ingest] ${key}: deleted all chunks.`);
    });
  }

  /** Symbols with queued or running work. */
  get activeSymbols(): string[] {
    return [...this.lanes.keys()].sort();
  }

  private supersede(key: string): Lane {
    let lane = this.lanes.get(key);
    if (!lane) {
      lane = { tail: Promise.resolve(), latest: 0, pending: 0 };
      this.lanes.set(key, lane);
    }
    lane.latest += 1;
    lane.inflight?.abort(new IngestionError(`Ingestion for ${key} was superseded.`));
    return lane;
  }

  private enqueue<T>(key: string, lane: Lane, task: () => Promise<T>): Promise<T> {
    lane.pending += 1;
    const run = lane.tail.then(task);
    lane.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run.finally(() => {
      lane.pending -= 1;
      if (lane.pending === 0 && this.lanes.get(key) === lane) this.lanes.delete(key);
    });
  }

  private async run(
    key: string,
    revisions: Map<string, RawDocument>,
    signal: AbortSignal,
  ): Promise<IngestResult> {
    const started = Date.now();
    const { store, retry } = this.deps;

    const stored = new Set(
      await withRetry((s) => store.listRevisions(key, s), { ...retry, label: "revision listing", signal }).catch(
        (err: unknown) => {
          if (signal.aborted) throw signal.reason;
          throw new IngestionError(`Failed to read stored revisions for ${key}.`, { cause: err });
        },
      ),
    );

    const base = { symbol: key, revisions: revisions.size };
    if (sameSet(revisions.keys(), stored)) {
      return { ...base, status: "unchanged", embedded: 0, inserted: 0, removed: 0 };
    }

    const retain = [...revisions.keys()].filter((r) => stored.has(r));
    const pending: PendingChunk[] = [];
    for (const doc of revisions.values()) {
      if (stored.has(doc.revision)) continue;
      for (const chunk of splitIntoChunks(doc.text, this.deps.chunking.maxLen, this.deps.chunking.overlap)) {
        pending.push({ doc, chunkIndex: chunk.index, text: chunk.text });
      }
    }

    const embeddings = await this.embedAll(
      pending.map((p) => p.text),
      signal,
    );

    // Last point at which a newer call can still win; the write itself is not interrupted.
    signal.throwIfAborted();

    const chunks: ChunkInput[] = pending.map((p, i) => ({
      text: p.text,
      embedding: embeddings[i] ?? [],
      sourceRevision: p.doc.revision,
      chunkIndex: p.chunkIndex,
      metadata: { kind: p.doc.kind, title: p.doc.title, url: p.doc.url, publishedAt: p.doc.publishedAt },
    }));

    let result: Awaited<ReturnType<VectorStore["upsert"]>>;
    try {
      result = await withRetry((s) => store.upsert(key, chunks, { retain, signal: s }), {
        ...retry,
        label: "vector upsert",
      });
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      throw new IngestionError(`Failed to write chunks for ${key}; no partial revision was kept.`, { cause: err });
    }

    console.log(
      `[ingest] ${key}: +${result.inserted} -${result.removed} chunk(s), ` +
        `${revisions.size - retain.length} new revision(s) in ${Date.now() - started}ms.`,
    );

    return {
      ...base,
      status: result.unchanged ? "unchanged" : "indexed",
      embedded: pending.length,
      inserted: result.inserted,
      removed: result.removed,
    };
  }

  private async embedAll(texts: string[], signal: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    const { embedder, batchSize, concurrency, retry } = this.deps;

    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += batchSize) batches.push(texts.slice(i, i + batchSize));

    const limit = pLimit(concurrency);
    try {
      const vectors = await Promise.all(
        batches.map((batch) =>
          limit(() => withRetry((s) => embedder.embed(batch, s), { ...retry, label: "chunk embedding", signal })),
        ),
      );
      return vectors.flat();
    } catch (err) {
      limit.clearQueue();
      if (signal.aborted) throw signal.reason;
      if (err instanceof ConfigurationError) throw err;
      throw new IngestionError("Embedding failed; nothing was written.", { cause: err });
    }
  }
}
