import { foldAccents } from "@/lib/text/normalize";

import type { Embedder } from "./embedder";

const FNV_OFFSET = 2166136261 >>> 0;
const FNV_PRIME = 16777619;

function fnvHash(token: string, start: number, end: number): number {
  let hash = FNV_OFFSET;
  for (let i = start; i < end; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Feature-hashed character n-grams (3 to 5), L2 normalised. Deterministic and
 * offline; good enough for development and smoke tests, not for production
 * relevance.
 */
export function hashEmbed(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  const tokens = foldAccents(text)
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);

  for (const token of tokens) {
    for (let n = 3; n <= 5; n += 1) {
      if (token.length < n) continue;
      for (let i = 0; i <= token.length - n; i += 1) {
        const hash = fnvHash(token, i, i + n);
        vector[(hash >>> 1) % dimensions] += (hash & 1) === 1 ? -1 : 1;
      }
    }
  }

  const norm = Math.sqrt(Math.max(vector.reduce((s, v) => s + v * v, 0), 1e-9));
  return vector.map((v) => v / norm);
}

export class HashEmbedder implements Embedder {
  readonly model = "local-hash";

  constructor(readonly dimensions: number) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((t) => hashEmbed(t, this.dimensions));
  }
}
