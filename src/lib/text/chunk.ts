import { ConfigurationError } from "@/lib/errors";

export type TextChunk = {
  index: number;
  text: string;
  /** Offsets in code points, end exclusive. */
  startChar: number;
  endChar: number;
};

export function assertChunkParams(maxLen: number, overlap: number): void {
  if (!Number.isInteger(maxLen) || maxLen <= 0) {
    throw new ConfigurationError(`maxLen must be a positive integer (got ${maxLen}).`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`overlap must be a non-negative integer (got ${overlap}).`);
  }
  if (overlap >= maxLen) {
    throw new ConfigurationError(`overlap (${overlap}) must be smaller than maxLen (${maxLen}).`);
  }
}

/**
 * Split `text` into windows of at most `maxLen` characters where each window
 * starts `overlap` characters before the previous one ended. Characters are
 * code points, so surrogate pairs always stay together. The text is not
 * trimmed: dropping the first `overlap` characters of every chunk but the
 * first and concatenating yields the input again.
 */
export function splitIntoChunks(text: string, maxLen: number, overlap: number): TextChunk[] {
  assertChunkParams(maxLen, overlap);

  const chars = Array.from(text);
  const chunks: TextChunk[] = [];
  let start = 0;

  while (start < chars.length) {
    const end = Math.min(chars.length, start + maxLen);
    chunks.push({
      index: chunks.length,
      text: chars.slice(start, end).join(""),
      startChar: start,
      endChar: end,
    });
    if (end === chars.length) break;
    start = end - overlap;
  }

  return chunks;
}

export function chunkText(text: string, maxLen: number, overlap: number): string[] {
  return splitIntoChunks(text, maxLen, overlap).map((c) => c.text);
}
