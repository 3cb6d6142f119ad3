import { EmbeddingError } from "@/lib/errors";

/** Maps text to fixed-length vectors. Implementations may batch. */
export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * Check a backend response before anything is stored: one finite vector per
 * input, each of the embedder's declared dimensionality.
 */
export function validateEmbeddings(
  vectors: number[][],
  expectedCount: number,
  dimensions: number,
): number[][] {
  if (vectors.length !== expectedCount) {
    throw new EmbeddingError(
      `Embedding backend returned ${vectors.length} vectors for ${expectedCount} inputs.`,
      { retryable: false },
    );
  }
  for (const v of vectors) {
    if (v.length !== dimensions) {
      throw new EmbeddingError(
        `Embedding has ${v.length} dimensions, expected ${dimensions}.`,
        { retryable: false },
      );
    }
    if (!v.every(Number.isFinite)) {
      throw new EmbeddingError("Embedding contains non-finite values.", { retryable: false });
    }
  }
  return vectors;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i += 1) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  const denom = Math.sqrt(na) * Math.sqrt(nb);
  return denom === 0 ? 0 : dot / denom;
}

/** Cosine distance in [0, 2]; 0 for identical directions. */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  return 1 - cosineSimilarity(a, b);
}
