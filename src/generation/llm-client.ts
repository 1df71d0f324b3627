import type { GenerationProvider } from "../config/types.js";

export type LlmCompleteParams = {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
};

export type LlmCompletion = {
  text: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
};

export type LlmClient = {
  readonly provider: GenerationProvider;
  readonly model: string;
  complete: (params: LlmCompleteParams) => Promise<LlmCompletion>;
};
