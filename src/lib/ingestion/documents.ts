import crypto from "node:crypto";

import { z } from "zod";

import { normalizeWhitespace, stripHtmlToText } from "@/lib/text/normalize";

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

export const rawDocumentSchema = z.object({
  text: z.string().refine((t) => t.trim().length > 0, { message: "Document text is empty." }),
  revision: z.string().trim().min(1),
  kind: z.enum(["news", "fundamentals", "filing", "other"]).optional(),
  title: optionalText,
  url: optionalText,
  publishedAt: optionalText,
});

export type RawDocument = z.infer<typeof rawDocumentSchema>;

/** A scraped news article as the connectors hand it over. */
export type NewsItem = {
  title?: string | null;
  date?: string | null;
  url?: string | null;
  /** Article body; may contain HTML. */
  content?: string | null;
};

export type FundamentalMetric = {
  rawValue?: string | number | null;
  description?: string | null;
};

export type FundamentalsSnapshot = {
  companyName?: string | null;
  asOf?: string | null;
  sourceUrl?: string | null;
  metrics: Record<string, FundamentalMetric>;
};

export function contentRevision(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

/** `Title/Date/URL` header over the plain-text body. Null when there is nothing to index. */
export function newsToDocument(item: NewsItem): RawDocument | null {
  const title = normalizeWhitespace(item.title ?? "");
  const date = (item.date ?? "").trim();
  const url = (item.url ?? "").trim();
  const body = stripHtmlToText(item.content ?? "");
  if (!title && !body) return null;

  const text = `Title: ${title}\nDate: ${date}\nURL: ${url}\n\n${body}`;
  return {
    text,
    revision: contentRevision(text),
    kind: "news",
    title: title || undefined,
    url: url || undefined,
    publishedAt: date || undefined,
  };
}

/** One `- metric: value (description)` line per metric under a snapshot header. */
export function fundamentalsToDocument(snapshot: FundamentalsSnapshot): RawDocument | null {
  const entries = Object.entries(snapshot.metrics);
  if (entries.length === 0) return null;

  const name = (snapshot.companyName ?? "").trim();
  const asOf = (snapshot.asOf ?? "").trim();
  const source = (snapshot.sourceUrl ?? "").trim();

  const lines = [`Stock snapshot for ${name} as of ${asOf}`, `Source: ${source}`];
  for (const [metric, { rawValue, description }] of entries) {
    const value = rawValue == null ? "n/a" : String(rawValue);
    const desc = description?.trim();
    lines.push(desc ? `- ${metric}: ${value} (${desc})` : `- ${metric}: ${value}`);
  }

  const text = lines.join("\n");
  return {
    text,
    revision: contentRevision(text),
    kind: "fundamentals",
    title: name ? `${name} fundamentals` : undefined,
    url: source || undefined,
    publishedAt: asOf || undefined,
  };
}

/** Flatten everything a connector returned for one symbol, dropping empty items. */
export function collectDocuments(input: {
  news?: NewsItem[];
  fundamentals?: FundamentalsSnapshot | null;
}): RawDocument[] {
  const docs: RawDocument[] = [];
  if (input.fundamentals) {
    const doc = fundamentalsToDocument(input.fundamentals);
    if (doc) docs.push(doc);
  }
  for (const item of input.news ?? []) {
    const doc = newsToDocument(item);
    if (doc) docs.push(doc);
  }
  return docs;
}
