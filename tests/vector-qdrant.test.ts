import { afterEach, describe, expect, it, vi } from "vitest";

import { ConfigurationError, StoreUnavailableError } from "@/lib/errors";
import { QdrantVectorStore } from "@/lib/vector/qdrant";
import { chunkId, type ChunkInput } from "@/lib/vector/store";

import { FakeQdrant } from "./helpers/fake-qdrant";

const NOW = new Date("2024-05-01T10:00:00.000Z");

function chunk(revision: string, index: number, embedding: number[] = [1, 0]): ChunkInput {
  return {
    text: `${revision}-${index}`,
    embedding,
    sourceRevision: revision,
    chunkIndex: index,
    metadata: { kind: "news", title: "Q1 results" },
  };
}

function setup() {
  const client = new FakeQdrant();
  const store = new QdrantVectorStore({ client, dimensions: 2, now: () => NOW });
  return { client, store };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("QdrantVectorStore", () => {
  it("writes one point per chunk with its revision size", async () => {
    const { client, store } = setup();

    expect(await store.upsert("tcs", [chunk("r1", 0), chunk("r1", 1)])).toEqual({
      inserted: 2,
      removed: 0,
      unchanged: false,
    });
    expect(client.points.get(chunkId("TCS", "r1", 1))?.payload).toEqual({
      symbol: "TCS",
      text: "r1-1",
      source_revision: "r1",
      revision_size: 2,
      chunk_index: 1,
      created_at: "2024-05-01T10:00:00.000Z",
      kind: "news",
      title: "Q1 results",
      committed: true,
    });
  });

  it("skips revisions that are stored completely", async () => {
    const { client, store } = setup();
    await store.upsert("TCS", [chunk("r1", 0), chunk("r1", 1)]);

    expect(await store.upsert("TCS", [chunk("r1", 0), chunk("r1", 1)])).toEqual({
      inserted: 0,
      removed: 0,
      unchanged: true,
    });
    expect(client.upsertCalls).toBe(1);
  });

  it("removes stale revisions and keeps retained ones", async () => {
    const { client, store } = setup();
    await store.upsert("TCS", [chunk("r1", 0), chunk("r1", 1), chunk("r2", 0)]);

    expect(await store.upsert("TCS", [chunk("r3", 0)], { retain: ["r2"] })).toEqual({
      inserted: 1,
      removed: 2,
      unchanged: false,
    });
    expect(client.revisionsOf("TCS")).toEqual(["r2", "r3"]);
  });

  it("rewrites a partially stored revision", async () => {
    const { client, store } = setup();
    await store.upsert("TCS", [chunk("r1", 0), chunk("r1", 1)]);
    client.points.delete(chunkId("TCS", "r1", 1));

    expect(await store.listRevisions("TCS")).toEqual([]);
    expect(await store.upsert("TCS", [chunk("r1", 0), chunk("r1", 1)])).toMatchObject({ inserted: 2, removed: 0 });
    expect(await store.listRevisions("TCS")).toEqual(["r1"]);
  });

  it("removes what it wrote when a later batch fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { client, store } = setup();
    await store.upsert("TCS", [chunk("r0", 0)]);
    client.failUpsertOnCall = 3;

    const big = Array.from({ length: 130 }, (_, i) => chunk("r1", i));
    await expect(store.upsert("TCS", big)).rejects.toBeInstanceOf(StoreUnavailableError);

    expect(client.revisionsOf("TCS")).toEqual(["r0"]);
    expect(client.points.size).toBe(1);
  });

  it("keeps a failed write out of searches when its cleanup also fails", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { client, store } = setup();
    client.failUpsertOnCall = 2;
    client.deleteError = new Error("connection reset");

    const big = Array.from({ length: 200 }, (_, i) => chunk("r1", i));
    await expect(store.upsert("TCS", big)).rejects.toBeInstanceOf(StoreUnavailableError);

    expect(client.points.size).toBe(128);
    expect(error).toHaveBeenCalledWith("[qdrant] Failed to remove 200 uncommitted point(s).", client.deleteError);
    expect(await store.listRevisions("TCS")).toEqual([]);
    expect(await store.similaritySearch([1, 0], 5)).toEqual([]);

    client.failUpsertOnCall = undefined;
    client.deleteError = undefined;
    expect(await store.upsert("TCS", big)).toMatchObject({ inserted: 200, removed: 0 });
    expect(await store.listRevisions("TCS")).toEqual(["r1"]);
    expect(await store.similaritySearch([1, 0], 5)).toHaveLength(5);
  });

  it("lets an abandoned write clean up before the next one starts", async () => {
    const { client, store } = setup();
    const first = new AbortController();
    client.beforeUpsert = async (call) => {
      if (call !== 1) return;
      first.abort(new StoreUnavailableError("vector upsert timed out after 10ms."));
      await new Promise((resolve) => setTimeout(resolve, 30));
      throw new Error("connection reset");
    };

    const abandoned = store.upsert("TCS", [chunk("r1", 0)], { signal: first.signal }).catch((e: unknown) => e);
    const retried = store.upsert("TCS", [chunk("r1", 0)]);

    expect(await abandoned).toBeInstanceOf(StoreUnavailableError);
    expect(await retried).toMatchObject({ inserted: 1 });
    expect(await store.listRevisions("TCS")).toEqual(["r1"]);
    expect(client.points.size).toBe(1);
  });

  it("pages through large symbol sets", async () => {
    const { store } = setup();
    await store.upsert("AAA", Array.from({ length: 300 }, (_, i) => chunk("r1", i)));
    await store.upsert("BBB", [chunk("r1", 0)]);

    expect(await store.listSymbols()).toEqual(["AAA", "BBB"]);
    expect(await store.listRevisions("AAA")).toEqual(["r1"]);
  });

  it("searches with cosine distance, scope and exclusions", async () => {
    const { store } = setup();
    await store.upsert("TCS", [chunk("r1", 0, [1, 0]), chunk("r1", 1, [0, 1])]);
    await store.upsert("INFY", [chunk("r1", 0, [1, 0])]);

    const scoped = await store.similaritySearch([1, 0], 2, { symbol: "tcs" });
    expect(scoped.map((h) => [h.chunk.text, h.distance])).toEqual([
      ["r1-0", 0],
      ["r1-1", 1],
    ]);
    expect(scoped[0]?.chunk.createdAt.toISOString()).toBe("2024-05-01T10:00:00.000Z");
    expect(scoped[0]?.chunk.metadata).toEqual({ kind: "news", title: "Q1 results" });

    const rest = await store.similaritySearch([1, 0], 5, { excludeIds: scoped.map((h) => h.chunk.id) });
    expect(rest.map((h) => h.chunk.symbol)).toEqual(["INFY"]);
  });

  it("skips points with a malformed payload", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { client, store } = setup();
    await store.upsert("TCS", [chunk("r1", 0)]);
    client.points.set("broken", { id: "broken", vector: [1, 0], payload: { symbol: "TCS", committed: true } });

    const hits = await store.similaritySearch([1, 0], 5);
    expect(hits.map((h) => h.chunk.id)).toEqual([chunkId("TCS", "r1", 0)]);
    expect(warn).toHaveBeenCalledWith("[qdrant] Skipping point broken with malformed payload.");
  });

  it("maps client errors to configuration errors and the rest to outages", async () => {
    const { client, store } = setup();

    client.searchError = Object.assign(new Error("Bad Request"), { status: 400 });
    await expect(store.similaritySearch([1, 0], 1)).rejects.toBeInstanceOf(ConfigurationError);

    client.searchError = new Error("connect ECONNREFUSED");
    const err = await store.similaritySearch([1, 0], 1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err).toMatchObject({ message: "Vector index search failed.", retryable: true });
  });

  it("deletes every point of a symbol", async () => {
    const { client, store } = setup();
    await store.upsert("TCS", [chunk("r1", 0)]);
    await store.upsert("INFY", [chunk("r1", 0)]);

    await store.deleteSymbol("tcs");
    expect(client.revisionsOf("TCS")).toEqual([]);
    expect(client.revisionsOf("INFY")).toEqual(["r1"]);
  });
});
