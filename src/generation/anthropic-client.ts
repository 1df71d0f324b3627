import Anthropic from "@anthropic-ai/sdk";
import { GenerationError, errorMessage } from "../infra/errors.js";
import type { LlmClient, LlmCompleteParams, LlmCompletion } from "./llm-client.js";

export type AnthropicClientOptions = {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
};

export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-haiku-latest";
const DEFAULT_MAX_TOKENS = 500;

export function createAnthropicClient(options: AnthropicClientOptions): LlmClient {
  const client = new Anthropic({
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
    maxRetries: 1,
  });

  const model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  const defaultMaxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;

  return {
    provider: "anthropic",
    model,

    async complete(params: LlmCompleteParams): Promise<LlmCompletion> {
      let response: Anthropic.Messages.Message;
      try {
        response = await client.messages.create({
          model,
          max_tokens: params.maxTokens ?? defaultMaxTokens,
          system: params.system,
          temperature: params.temperature,
          messages: [{ role: "user", content: params.prompt }],
        });
      } catch (error) {
        throw new GenerationError(`Anthropic API call failed: ${errorMessage(error)}`);
      }

      let text = "";
      for (const block of response.content) {
        if (block.type === "text") {
          text += block.text;
        }
      }

      return {
        text,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    },
  };
}
