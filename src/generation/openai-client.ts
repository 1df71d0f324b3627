import OpenAI from "openai";
import { GenerationError, errorMessage } from "../infra/errors.js";
import type { LlmClient, LlmCompleteParams, LlmCompletion } from "./llm-client.js";

export type OpenAIClientOptions = {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  baseURL?: string;
  timeoutMs?: number;
};

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
const DEFAULT_MAX_TOKENS = 500;

export function createOpenAIClient(options: OpenAIClientOptions): LlmClient {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    maxRetries: 1,
  });

  const model = options.model ?? DEFAULT_OPENAI_MODEL;
  const defaultMaxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;

  return {
    provider: "openai",
    model,

    async complete(params: LlmCompleteParams): Promise<LlmCompletion> {
      let response: OpenAI.ChatCompletion;
      try {
        response = await client.chat.completions.create({
          model,
          max_tokens: params.maxTokens ?? defaultMaxTokens,
          temperature: params.temperature,
          messages: [
            { role: "system", content: params.system },
            { role: "user", content: params.prompt },
          ],
        });
      } catch (error) {
        throw new GenerationError(`OpenAI API call failed: ${errorMessage(error)}`);
      }

      const choice = response.choices[0];
      if (!choice) {
        throw new GenerationError("OpenAI returned no choices in response");
      }

      return {
        text: choice.message.content ?? "",
        usage: response.usage
          ? {
              inputTokens: response.usage.prompt_tokens,
              outputTokens: response.usage.completion_tokens,
            }
          : undefined,
      };
    },
  };
}
