import { generateText, type LanguageModel } from "ai";

export type GenerateOptions = {
  temperature: number;
  maxOutputTokens: number;
  signal?: AbortSignal;
};

export type Generation = {
  text: string;
  tokensUsed: number;
};

/** The language-model capability answering relies on. */
export interface Generator {
  generate(prompt: string, opts: GenerateOptions): Promise<Generation>;
}

export class AiSdkGenerator implements Generator {
  constructor(private readonly model: LanguageModel) {}

  async generate(prompt: string, opts: GenerateOptions): Promise<Generation> {
    const result = await generateText({
      model: this.model,
      prompt,
      temperature: opts.temperature,
      maxOutputTokens: opts.maxOutputTokens,
      abortSignal: opts.signal,
    });
    return { text: result.text, tokensUsed: result.usage.totalTokens ?? 0 };
  }
}
