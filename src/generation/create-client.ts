import type { TriageConfig } from "../config/types.js";
import { requireEnv } from "../infra/env.js";
import { GenerationError } from "../infra/errors.js";
import { resolveGenerationTimeout } from "../config/config.js";
import type { LlmClient } from "./llm-client.js";
import { createAnthropicClient } from "./anthropic-client.js";
import { createOpenAIClient } from "./openai-client.js";

export function createLlmClient(config: TriageConfig): LlmClient {
  const generation = config.generation ?? {};
  const provider = generation.provider ?? "openai";
  const timeoutMs = resolveGenerationTimeout(config);

  if (provider === "anthropic") {
    return createAnthropicClient({
      apiKey: requireEnv("ANTHROPIC_API_KEY"),
      model: generation.model,
      maxTokens: generation.maxTokens,
      timeoutMs,
    });
  }

  return createOpenAIClient({
    apiKey: requireEnv("OPENAI_API_KEY"),
    model: generation.model,
    maxTokens: generation.maxTokens,
    baseURL: process.env.OPENAI_BASE_URL?.trim() || undefined,
    timeoutMs,
  });
}

/** Stands in when no provider can be configured; every call fails, so drafts degrade to the fallback text. */
export function createUnavailableClient(reason: string): LlmClient {
  return {
    provider: "openai",
    model: "unavailable",
    complete: async () => {
      throw new GenerationError(`Generation unavailable: ${reason}`);
    },
  };
}
