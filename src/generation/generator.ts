import { createLogger } from "../logging.js";
import { GenerationError, formatError } from "../infra/errors.js";
import { withTimeout } from "../utils.js";
import { DEFAULT_NETWORK_TIMEOUT_MS } from "../config/config.js";
import type { LlmClient } from "./llm-client.js";
import { REVISE_SYSTEM_PROMPT, buildRevisePrompt } from "./prompt.js";

const log = createLogger("generator");

export const GENERATION_FALLBACK_TEXT =
  "I apologize, but I'm having trouble generating a response right now. Please try again or respond manually.";

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 500;

/**
 * Drafting collaborator used by the conversation controller. Neither call
 * rejects: `draft` degrades to GENERATION_FALLBACK_TEXT and `revise` to the
 * text it was given.
 */
export type Generator = {
  draft: (systemPrompt: string, userPrompt: string, maxTokens?: number) => Promise<string>;
  revise: (originalText: string, feedback: string) => Promise<string>;
};

export type CreateGeneratorParams = {
  client: LlmClient;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
};

export function createGenerator(params: CreateGeneratorParams): Generator {
  const { client } = params;
  const timeoutMs = params.timeoutMs ?? DEFAULT_NETWORK_TIMEOUT_MS;
  const temperature = params.temperature ?? DEFAULT_TEMPERATURE;
  const defaultMaxTokens = params.maxTokens ?? DEFAULT_MAX_TOKENS;

  async function complete(label: string, system: string, prompt: string, maxTokens: number): Promise<string> {
    const result = await withTimeout(
      client.complete({ system, prompt, maxTokens, temperature }),
      timeoutMs,
      `${client.provider} ${label}`,
    );
    const text = result.text.trim();
    if (!text) {
      throw new GenerationError(`${client.provider} returned an empty ${label}`);
    }
    return text;
  }

  return {
    draft: async (systemPrompt, userPrompt, maxTokens) => {
      try {
        return await complete("draft", systemPrompt, userPrompt, maxTokens ?? defaultMaxTokens);
      } catch (err) {
        log.error(`Error generating response: ${formatError(err)}`);
        return GENERATION_FALLBACK_TEXT;
      }
    },

    revise: async (originalText, feedback) => {
      try {
        return await complete("revision", REVISE_SYSTEM_PROMPT, buildRevisePrompt(originalText, feedback), defaultMaxTokens);
      } catch (err) {
        log.error(`Error revising response: ${formatError(err)}`);
        return originalText;
      }
    },
  };
}
