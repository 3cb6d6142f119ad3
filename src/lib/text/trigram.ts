const NON_WORD = /[^\p{L}\p{N}]+/u;

/**
 * Trigram set of a string, extracted the way Postgres' pg_trgm does it:
 * lower-cased words of letters and digits, each padded with two leading
 * blanks and one trailing blank.
 */
export function trigrams(value: string): Set<string> {
  const out = new Set<string>();
  for (const word of value.toLowerCase().split(NON_WORD)) {
    if (!word) continue;
    const padded = Array.from(`  ${word} `);
    for (let i = 0; i + 3 <= padded.length; i += 1) {
      out.add(padded.slice(i, i + 3).join(""));
    }
  }
  return out;
}

/** Shared trigrams over the union of both sets, in [0, 1]. */
export function trigramSimilarity(a: string, b: string): number {
  const ta = trigrams(a);
  const tb = trigrams(b);
  if (ta.size === 0 || tb.size === 0) return 0;

  let shared = 0;
  for (const t of ta) if (tb.has(t)) shared += 1;
  return shared / (ta.size + tb.size - shared);
}
