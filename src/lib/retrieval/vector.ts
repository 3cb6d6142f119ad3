import type { CompanyRecord } from "@/lib/companies/types";
import type { Embedder } from "@/lib/embeddings/embedder";
import { ConfigurationError, describeError, RetrievalError } from "@/lib/errors";
import { withRetry, type RetryPolicy } from "@/lib/retry";
import { normalizeSymbol, type DocumentChunk, type ScoredChunk, type VectorStore } from "@/lib/vector/store";

import { resolveScored, type EntityResolverDeps } from "./entities";

export type RetrievalScope = "scoped" | "unscoped";

export type RetrievalHit = {
  chunk: DocumentChunk;
  distance: number;
  scope: RetrievalScope;
};

export type RetrievalResult = {
  query: string;
  /** Symbol the scoped search ran against, if any. */
  symbol?: string;
  resolvedEntity?: CompanyRecord;
  hits: RetrievalHit[];
};

export type RetrieverDeps = {
  embedder: Embedder;
  store: VectorStore;
  /** Without a resolver, only `symbolHint` can scope a search. */
  resolver?: EntityResolverDeps;
  topK: number;
  /** Minimum resolver score for the top company to scope the search. */
  minConfidence: number;
  retry?: Partial<RetryPolicy>;
};

export type RetrieveOptions = {
  symbolHint?: string;
  k?: number;
  signal?: AbortSignal;
};

const SCOPE_RANK: Record<RetrievalScope, number> = { scoped: 0, unscoped: 1 };

function compareHits(a: RetrievalHit, b: RetrievalHit): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  return SCOPE_RANK[a.scope] - SCOPE_RANK[b.scope];
}

function withScope(hits: ScoredChunk[], scope: RetrievalScope): RetrievalHit[] {
  return hits.map((h) => ({ chunk: h.chunk, distance: h.distance, scope }));
}

async function pickScope(
  deps: RetrieverDeps,
  query: string,
  opts?: RetrieveOptions,
): Promise<{ symbol?: string; resolvedEntity?: CompanyRecord }> {
  const hint = opts?.symbolHint?.trim();
  if (hint) return { symbol: normalizeSymbol(hint) };
  if (!deps.resolver) return {};

  try {
    const [top] = await resolveScored(deps.resolver, query, { limit: 1, signal: opts?.signal });
    if (top?.symbol && top.score >= deps.minConfidence) {
      return { symbol: top.symbol, resolvedEntity: top.company };
    }
  } catch (err) {
    if (opts?.signal?.aborted) throw opts.signal.reason;
    console.warn(`[retriever] Entity resolution failed; searching all symbols: ${describeError(err)}`);
  }
  return {};
}

/**
 * Resolve the company a query is about, then run a symbol-scoped vector
 * search topped up with unscoped hits. Scoped hits win exact distance ties.
 */
export async function retrieve(
  deps: RetrieverDeps,
  query: string,
  opts?: RetrieveOptions,
): Promise<RetrievalResult> {
  const q = query.trim();
  if (!q) return { query: q, hits: [] };

  const k = Math.max(1, Math.min(opts?.k ?? deps.topK, 50));
  const signal = opts?.signal;
  const { symbol, resolvedEntity } = await pickScope(deps, q, opts);

  let vector: number[] | undefined;
  try {
    [vector] = await withRetry((s) => deps.embedder.embed([q], s), {
      ...deps.retry,
      label: "query embedding",
      signal,
    });
  } catch (err) {
    if (signal?.aborted) throw signal.reason;
    if (err instanceof ConfigurationError) throw err;
    throw new RetrievalError("Query embedding failed.", { cause: err });
  }
  if (!vector) throw new RetrievalError("Query embedding failed.");
  const queryVector = vector;

  const search = (limit: number, scope: { symbol?: string; excludeIds?: string[] }) =>
    withRetry((s) => deps.store.similaritySearch(queryVector, limit, { ...scope, signal: s }), {
      ...deps.retry,
      label: "vector search",
      signal,
    });

  let hits: RetrievalHit[];
  try {
    const scoped = symbol ? withScope(await search(k, { symbol }), "scoped") : [];
    const unscoped =
      scoped.length < k
        ? withScope(await search(k - scoped.length, { excludeIds: scoped.map((h) => h.chunk.id) }), "unscoped")
        : [];
    hits = [...scoped, ...unscoped].sort(compareHits);
  } catch (err) {
    if (signal?.aborted) throw signal.reason;
    if (err instanceof ConfigurationError) throw err;
    throw new RetrievalError("Vector search failed.", { cause: err });
  }

  return { query: q, symbol, resolvedEntity, hits };
}
