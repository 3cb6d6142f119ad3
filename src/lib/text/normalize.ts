const COMBINING_MARKS = /\p{M}+/gu;

/** Remove diacritics: "Nestlé" → "Nestle". */
export function foldAccents(value: string): string {
  return value.normalize("NFD").replace(COMBINING_MARKS, "").normalize("NFC");
}

/** Comparison form for company lookups: accent-folded, lower-case, single-spaced. */
export function normalizeForMatch(value: string): string {
  return foldAccents(value).toLowerCase().replace(/\s+/g, " ").trim();
}

const ENTITIES: Array<[RegExp, string]> = [
  [/&nbsp;/g, " "],
  [/&lt;/g, "<"],
  [/&gt;/g, ">"],
  [/&quot;/g, '"'],
  [/&#39;|&apos;/g, "'"],
  [/&rsquo;|&lsquo;/g, "'"],
  [/&ldquo;|&rdquo;/g, '"'],
  [/&ndash;|&mdash;/g, "-"],
  [/&#8377;/g, "₹"],
  // last, so "&amp;lt;" decodes to "&lt;" and not "<"
  [/&amp;/g, "&"],
];

/**
 * Lightweight HTML to text for scraped article bodies. Block-level closing
 * tags become line breaks; everything else collapses to single spaces.
 */
export function stripHtmlToText(html: string): string {
  const withoutScripts = html
    .replace(/<script[\s\S]*?<\/script>/gi, " ")
    .replace(/<style[\s\S]*?<\/style>/gi, " ");

  let text = withoutScripts
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|tr|li|h[1-6])>/gi, "\n")
    .replace(/<[^>]+>/g, " ");

  for (const [pattern, replacement] of ENTITIES) {
    text = text.replace(pattern, replacement);
  }

  return normalizeWhitespace(text);
}

export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r/g, "")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n[ \t]+/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/[ \t]{2,}/g, " ")
    .trim();
}
