import { afterEach, describe, expect, it, vi } from "vitest";
import type { LanguageModel } from "ai";

import { AiSdkGenerator, type Generator } from "@/lib/ai/generate";
import { RetrievalError } from "@/lib/errors";
import { answerQuestion, type AnswerDeps } from "@/lib/retrieval/answer";
import { MemoryVectorStore } from "@/lib/vector/memory";
import { chunkId } from "@/lib/vector/store";

import { tableEmbedder } from "./helpers/fixtures";

async function setup(generate: Generator["generate"]) {
  const store = new MemoryVectorStore(2);
  await store.upsert("TCS", [
    {
      text: "TCS revenue rose 8% in Q1.",
      embedding: [1, 0],
      sourceRevision: "r1",
      chunkIndex: 0,
      metadata: { kind: "news", title: "Q1 results", url: "https://example.com/q1" },
    },
  ]);
  const { embedder } = tableEmbedder({}, [1, 0]);
  const generator = { generate: vi.fn(generate) };
  const deps: AnswerDeps = {
    retriever: { embedder, store, topK: 5, minConfidence: 0.5 },
    generator,
    budget: { maxChunks: 6, maxChars: 6000 },
    temperature: 0.2,
    maxOutputTokens: 100,
  };
  return { deps, generator };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("answerQuestion", () => {
  it("grounds the answer in retrieved chunks", async () => {
    const { deps, generator } = await setup(async () => ({ text: "Revenue rose 8% [Doc 1].", tokensUsed: 42 }));

    const answer = await answerQuestion(deps, "How did TCS do?", { symbolHint: "TCS" });

    expect(answer).toEqual({
      answer: "Revenue rose 8% [Doc 1].",
      tokensUsed: 42,
      grounded: true,
      symbol: "TCS",
      sources: [
        {
          doc: 1,
          chunkId: chunkId("TCS", "r1", 0),
          symbol: "TCS",
          distance: 0,
          kind: "news",
          title: "Q1 results",
          url: "https://example.com/q1",
        },
      ],
    });
    const [prompt, opts] = generator.generate.mock.calls[0] ?? [];
    expect(prompt).toContain("[Doc 1] (TCS · news · Q1 results · ");
    expect(prompt).toContain("USER QUESTION: How did TCS do?");
    expect(opts).toEqual({ temperature: 0.2, maxOutputTokens: 100, signal: undefined });
  });

  it("answers ungrounded when nothing fits the budget", async () => {
    const { deps } = await setup(async () => ({ text: "No documents found; generally...", tokensUsed: 7 }));
    deps.budget = { maxChunks: 1, maxChars: 5 };

    const answer = await answerQuestion(deps, "How did TCS do?");

    expect(answer.grounded).toBe(false);
    expect(answer.sources).toEqual([]);
  });

  it("does not call the model for a blank question", async () => {
    const { deps, generator } = await setup(async () => ({ text: "", tokensUsed: 0 }));

    expect(await answerQuestion(deps, "  ")).toEqual({ answer: "", tokensUsed: 0, grounded: false, sources: [] });
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it("wraps generation failures", async () => {
    const { deps } = await setup(async () => {
      throw new Error("provider exploded");
    });

    await expect(answerQuestion(deps, "How did TCS do?")).rejects.toThrow(new RetrievalError("Answer generation failed."));
  });
});

describe("AiSdkGenerator", () => {
  it("returns the text and total token usage", async () => {
    const model: Exclude<LanguageModel, string> = {
      specificationVersion: "v2",
      provider: "test",
      modelId: "test-model",
      supportedUrls: {},
      doGenerate: async () => ({
        finishReason: "stop",
        usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
        content: [{ type: "text", text: "Grounded answer." }],
        warnings: [],
      }),
      doStream: async () => {
        throw new Error("streaming is not used");
      },
    };

    const out = await new AiSdkGenerator(model).generate("prompt", { temperature: 0.2, maxOutputTokens: 50 });

    expect(out).toEqual({ text: "Grounded answer.", tokensUsed: 30 });
  });
});
