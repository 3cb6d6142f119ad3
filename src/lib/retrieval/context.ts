import { SYSTEM_PROMPT, GROUNDED_INSTRUCTION, UNGROUNDED_INSTRUCTION } from "@/lib/ai/system";
import { ConfigurationError } from "@/lib/errors";

import type { RetrievalHit, RetrievalResult } from "./vector";

export type ContextBudget = {
  maxChunks: number;
  /** Total characters (code points) of admitted chunk text. */
  maxChars: number;
};

export type AssembledContext = {
  prompt: string;
  /** Hits admitted into the prompt; `[Doc n]` is `included[n - 1]`. */
  included: RetrievalHit[];
  grounded: boolean;
};

export function validateBudget(budget: ContextBudget): ContextBudget {
  for (const [name, value] of Object.entries(budget)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError(`Context budget ${name} must be a positive integer.`);
    }
  }
  return budget;
}

function charLength(text: string): number {
  return Array.from(text).length;
}

function docHeader(n: number, hit: RetrievalHit): string {
  const { chunk } = hit;
  const date = chunk.metadata.publishedAt ?? chunk.createdAt.toISOString().slice(0, 10);
  const parts = [chunk.symbol, chunk.metadata.kind, chunk.metadata.title, date].filter(
    (p): p is string => Boolean(p),
  );
  return `[Doc ${n}] (${parts.join(" · ")})`;
}

/**
 * Admit hits in rank order until the next one would break either limit.
 * Chunks are never cut.
 */
export function buildContext(query: string, result: RetrievalResult, budget: ContextBudget): AssembledContext {
  const { maxChunks, maxChars } = validateBudget(budget);

  const included: RetrievalHit[] = [];
  let chars = 0;
  for (const hit of result.hits) {
    const size = charLength(hit.chunk.text);
    if (included.length + 1 > maxChunks || chars + size > maxChars) break;
    included.push(hit);
    chars += size;
  }

  const question = query.trim();
  if (included.length === 0) {
    return {
      prompt: [SYSTEM_PROMPT, "CONTEXT: none.", `USER QUESTION: ${question}`, UNGROUNDED_INSTRUCTION].join("\n\n"),
      included,
      grounded: false,
    };
  }

  const context = included.map((hit, i) => `${docHeader(i + 1, hit)}\n${hit.chunk.text}`).join("\n\n");
  return {
    prompt: [SYSTEM_PROMPT, `CONTEXT:\n${context}`, `USER QUESTION: ${question}`, GROUNDED_INSTRUCTION].join("\n\n"),
    included,
    grounded: true,
  };
}

export function assemblePrompt(query: string, result: RetrievalResult, budget: ContextBudget): string {
  return buildContext(query, result, budget).prompt;
}
