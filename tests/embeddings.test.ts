import { describe, expect, it, vi } from "vitest";

import { cosineDistance, cosineSimilarity, validateEmbeddings } from "@/lib/embeddings/embedder";
import { hashEmbed, HashEmbedder } from "@/lib/embeddings/hash";
import { OpenAIEmbedder } from "@/lib/embeddings/openai";
import { EmbeddingError } from "@/lib/errors";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function embedderWith(fetchImpl: typeof fetch, dimensions = 2) {
  return new OpenAIEmbedder({ model: "text-embedding-3-small", dimensions, apiKey: "test-key", fetch: fetchImpl });
}

async function failure(promise: Promise<unknown>): Promise<EmbeddingError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof EmbeddingError)) throw new Error(`expected an EmbeddingError, got ${String(err)}`);
  return err;
}

describe("OpenAIEmbedder", () => {
  it("posts a batch and returns vectors in input order", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () =>
      jsonResponse({
        model: "text-embedding-3-small",
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      }),
    );

    const vectors = await embedderWith(fetchImpl).embed(["revenue", "margin"]);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://api.openai.com/v1/embeddings");
    expect(init).toMatchObject({ method: "POST", headers: { Authorization: "Bearer test-key" } });
    expect(JSON.parse(String(init?.body))).toEqual({ model: "text-embedding-3-small", input: ["revenue", "margin"] });
  });

  it("does not call the backend for an empty batch", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    expect(await embedderWith(fetchImpl).embed([])).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("rejects empty text without retrying", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const err = await failure(embedderWith(fetchImpl).embed(["ok", ""]));
    expect(err.retryable).toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("embeds whitespace-only text", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () =>
      jsonResponse({
        data: [
          { index: 0, embedding: [1, 0] },
          { index: 1, embedding: [0, 1] },
        ],
      }),
    );

    expect(await embedderWith(fetchImpl).embed(["ok", "    "])).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("marks rate limits and server errors as retryable", async () => {
    const limited = await failure(
      embedderWith(async () => jsonResponse({ error: { message: "slow down" } }, 429)).embed(["a"]),
    );
    expect(limited.message).toBe("Embedding request failed (429).");
    expect(limited.retryable).toBe(true);

    const broken = await failure(embedderWith(async () => jsonResponse({}, 503)).embed(["a"]));
    expect(broken.retryable).toBe(true);
  });

  it("does not retry rejected requests", async () => {
    const err = await failure(
      embedderWith(async () => jsonResponse({ error: { message: "bad model" } }, 400)).embed(["a"]),
    );
    expect(err.retryable).toBe(false);
  });

  it("treats network failures as retryable outages", async () => {
    const err = await failure(
      embedderWith(async () => {
        throw new TypeError("fetch failed");
      }).embed(["a"]),
    );
    expect(err.message).toBe("Embedding backend is unreachable.");
    expect(err.retryable).toBe(true);
  });

  it("rejects malformed and wrongly sized responses", async () => {
    const malformed = await failure(embedderWith(async () => jsonResponse({ data: "nope" })).embed(["a"]));
    expect(malformed.message).toBe("Embedding backend returned a malformed response.");

    const wrongSize = await failure(
      embedderWith(async () => jsonResponse({ data: [{ index: 0, embedding: [1, 2, 3] }] })).embed(["a"]),
    );
    expect(wrongSize.message).toBe("Embedding has 3 dimensions, expected 2.");
    expect(wrongSize.retryable).toBe(false);
  });
});

describe("hashEmbed", () => {
  it("is deterministic and unit length", () => {
    const v = hashEmbed("Quarterly revenue rose", 64);
    expect(v).toHaveLength(64);
    expect(hashEmbed("Quarterly revenue rose", 64)).toEqual(v);
    expect(Math.hypot(...v)).toBeCloseTo(1, 10);
  });

  it("ignores case and accents", () => {
    expect(hashEmbed("Nestlé", 32)).toEqual(hashEmbed("NESTLE", 32));
  });

  it("returns a zero vector when nothing can be hashed", () => {
    expect(hashEmbed("-- !!", 8)).toEqual(new Array(8).fill(0));
  });

  it("places related texts closer than unrelated ones", async () => {
    const [a, b, c] = await new HashEmbedder(256).embed([
      "Tata Motors quarterly results",
      "tata motors results",
      "monsoon rainfall forecast",
    ]);
    expect(cosineSimilarity(a ?? [], b ?? [])).toBeGreaterThan(cosineSimilarity(a ?? [], c ?? []));
  });
});

describe("vector helpers", () => {
  it("computes cosine distance", () => {
    expect(cosineDistance([1, 0], [1, 0])).toBe(0);
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });

  it("validates backend output", () => {
    expect(() => validateEmbeddings([[1, 0]], 2, 2)).toThrow("Embedding backend returned 1 vectors for 2 inputs.");
    expect(() => validateEmbeddings([[1, Number.NaN]], 1, 2)).toThrow("Embedding contains non-finite values.");
    expect(validateEmbeddings([[1, 0]], 1, 2)).toEqual([[1, 0]]);
  });
});
