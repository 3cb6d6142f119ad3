import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";

import type { RagConfig } from "@/lib/config";

export function getGenerationModel(config: RagConfig["generation"]): LanguageModel {
  if (config.provider === "anthropic") {
    // No Anthropic key: fall back to OpenAI.
    if (!process.env.ANTHROPIC_API_KEY?.trim()) {
      const fallbackModel = process.env.OPENAI_MODEL?.trim() || "gpt-4o-mini";
      console.warn(`[ai] ANTHROPIC_API_KEY is not set; using OpenAI ${fallbackModel}.`);
      return openai(fallbackModel);
    }
    return anthropic(config.model);
  }
  return openai(config.model);
}
