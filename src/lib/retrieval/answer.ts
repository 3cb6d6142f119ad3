import type { Generator } from "@/lib/ai/generate";
import type { DocumentKind } from "@/lib/vector/store";
import { isRagError, RetrievalError } from "@/lib/errors";

import { buildContext, type ContextBudget } from "./context";
import { retrieve, type RetrieveOptions, type RetrieverDeps } from "./vector";

export type AnswerDeps = {
  retriever: RetrieverDeps;
  generator: Generator;
  budget: ContextBudget;
  temperature: number;
  maxOutputTokens: number;
};

export type AnswerSource = {
  /** The `n` of `[Doc n]` in the prompt. */
  doc: number;
  chunkId: string;
  symbol: string;
  distance: number;
  kind?: DocumentKind;
  title?: string;
  url?: string;
};

export type Answer = {
  answer: string;
  tokensUsed: number;
  grounded: boolean;
  symbol?: string;
  sources: AnswerSource[];
};

export async function answerQuestion(
  deps: AnswerDeps,
  query: string,
  opts?: RetrieveOptions,
): Promise<Answer> {
  if (!query.trim()) return { answer: "", tokensUsed: 0, grounded: false, sources: [] };

  const result = await retrieve(deps.retriever, query, opts);
  const { prompt, included, grounded } = buildContext(query, result, deps.budget);

  let generation: Awaited<ReturnType<Generator["generate"]>>;
  try {
    generation = await deps.generator.generate(prompt, {
      temperature: deps.temperature,
      maxOutputTokens: deps.maxOutputTokens,
      signal: opts?.signal,
    });
  } catch (err) {
    if (opts?.signal?.aborted) throw opts.signal.reason;
    if (isRagError(err)) throw err;
    throw new RetrievalError("Answer generation failed.", { cause: err });
  }

  return {
    answer: generation.text,
    tokensUsed: generation.tokensUsed,
    grounded,
    symbol: result.symbol,
    sources: included.map((hit, i) => ({
      doc: i + 1,
      chunkId: hit.chunk.id,
      symbol: hit.chunk.symbol,
      distance: hit.distance,
      kind: hit.chunk.metadata.kind,
      title: hit.chunk.metadata.title,
      url: hit.chunk.metadata.url,
    })),
  };
}
