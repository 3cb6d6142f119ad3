import { vi } from "vitest";

import type { Embedder } from "@/lib/embeddings/embedder";
import type { RetrievalHit, RetrievalScope } from "@/lib/retrieval/vector";
import type { ChunkMetadata } from "@/lib/vector/store";

/** Embeds every text to the vector listed for it, or to `fallback`. */
export function tableEmbedder(table: Record<string, number[]>, fallback: number[] = [0, 1]) {
  const embed = vi.fn<Embedder["embed"]>(async (texts) => texts.map((t) => table[t] ?? fallback));
  const embedder: Embedder = { model: "table", dimensions: fallback.length, embed };
  return { embedder, embed };
}

export function hit(
  symbol: string,
  text: string,
  opts: { metadata?: ChunkMetadata; createdAt?: string; distance?: number; scope?: RetrievalScope } = {},
): RetrievalHit {
  return {
    chunk: {
      id: `${symbol}-${text.length}`,
      symbol,
      text,
      sourceRevision: "r1",
      chunkIndex: 0,
      createdAt: new Date(opts.createdAt ?? "2024-05-01T10:00:00.000Z"),
      metadata: opts.metadata ?? {},
    },
    distance: opts.distance ?? 0.1,
    scope: opts.scope ?? "scoped",
  };
}

export const fastRetry = { attempts: 2, baseDelayMs: 0, timeoutMs: 1000 };
