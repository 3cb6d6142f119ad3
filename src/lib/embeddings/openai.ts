import { z } from "zod";

import { requireEnv } from "@/lib/config";
import { EmbeddingError, isAbortError } from "@/lib/errors";

import { validateEmbeddings, type Embedder } from "./embedder";

const embeddingResponseSchema = z.object({
  model: z.string().optional(),
  usage: z.object({ prompt_tokens: z.number(), total_tokens: z.number() }).optional(),
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

export type EmbeddingResponse = z.infer<typeof embeddingResponseSchema>;

const errorResponseSchema = z.object({
  error: z.object({ message: z.string().optional() }).optional(),
});

export type OpenAIEmbedderOptions = {
  model?: string;
  dimensions: number;
  apiKey?: string;
  baseUrl?: string;
  fetch?: typeof fetch;
};

export function getEmbeddingModel(): string {
  return process.env.OPENAI_EMBEDDING_MODEL?.trim() || "text-embedding-3-small";
}

/** OpenAI `/v1/embeddings` over plain fetch. */
export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: OpenAIEmbedderOptions) {
    this.model = opts.model ?? getEmbeddingModel();
    this.dimensions = opts.dimensions;
    this.apiKey = opts.apiKey;
    this.baseUrl = (opts.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (texts.some((t) => t.length === 0)) {
      throw new EmbeddingError("Cannot embed empty text.", { retryable: false });
    }

    const apiKey = this.apiKey ?? requireEnv("OPENAI_API_KEY");

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: this.model, input: texts }),
        signal,
      });
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) throw err;
      throw new EmbeddingError("Embedding backend is unreachable.", { cause: err });
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new EmbeddingError(`Embedding backend returned an unreadable response (${res.status}).`, {
        cause: err,
      });
    }

    if (!res.ok) {
      // 429 and 5xx are outages; anything else is a request we should not repeat.
      const retryable = res.status === 429 || res.status >= 500;
      const detail = errorResponseSchema.safeParse(json);
      throw new EmbeddingError(`Embedding request failed (${res.status}).`, {
        cause: new Error((detail.success ? detail.data.error?.message : undefined) ?? res.statusText),
        retryable,
      });
    }

    const parsed = embeddingResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new EmbeddingError("Embedding backend returned a malformed response.", {
        cause: parsed.error,
        retryable: false,
      });
    }

    const ordered = [...parsed.data.data].sort((a, b) => a.index - b.index);
    return validateEmbeddings(
      ordered.map((d) => d.embedding),
      texts.length,
      this.dimensions,
    );
  }
}
