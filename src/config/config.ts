import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "../infra/errors.js";
import type { AppMode, TriageConfig } from "./types.js";

const CONFIG_FILENAMES = [
  "triagedesk.config.yaml",
  "triagedesk.config.yml",
  "triagedesk.config.json",
];

export const DEFAULT_DISPATCH_INTERVAL_MS = 30_000;
export const DEFAULT_DISPATCH_BACKOFF_MS = 60_000;
export const DEFAULT_NETWORK_TIMEOUT_MS = 10_000;

const positiveInt = z.number().int().positive();

const SourceConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    simulate: z.boolean().optional(),
    token: z.string().optional(),
    baseUrl: z.string().url().optional(),
    rateLimitPerMinute: positiveInt.optional(),
  })
  .strict();

const TriageConfigSchema = z
  .object({
    mode: z.enum(["local", "cloud"]).optional(),
    sources: z
      .object({
        linkedin: SourceConfigSchema.optional(),
        gmail: SourceConfigSchema.optional(),
        telegram: SourceConfigSchema.optional(),
        facebook: SourceConfigSchema.optional(),
        instagram: SourceConfigSchema.optional(),
      })
      .strict()
      .optional(),
    dispatcher: z
      .object({
        intervalMs: z.number().int().min(1000).optional(),
        backoffMs: z.number().int().min(1000).optional(),
      })
      .strict()
      .optional(),
    generation: z
      .object({
        provider: z.enum(["openai", "anthropic"]).optional(),
        model: z.string().min(1).optional(),
        maxTokens: positiveInt.optional(),
        temperature: z.number().min(0).max(2).optional(),
        timeoutMs: z.number().int().min(1000).optional(),
        maxResponseLength: positiveInt.optional(),
      })
      .strict()
      .optional(),
    operator: z
      .object({
        telegram: z
          .object({
            token: z.string().optional(),
            chatId: z.union([z.string(), z.number()]).transform(String).optional(),
            allowFrom: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    storage: z
      .object({
        dataDir: z.string().min(1).optional(),
        filename: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    network: z
      .object({
        timeoutMs: z.number().int().min(100).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function validateConfig(value: unknown): TriageConfig {
  if (value === null || value === undefined) {
    return {};
  }
  const result = TriageConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadConfig(dir?: string): TriageConfig {
  const baseDir = dir ?? process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filepath = resolve(baseDir, filename);
    if (!existsSync(filepath)) {
      continue;
    }
    let raw: string;
    try {
      raw = readFileSync(filepath, "utf-8");
    } catch (err) {
      throw new ConfigError(`Failed to read config file ${filepath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    let parsed: unknown;
    try {
      parsed = filename.endsWith(".json") ? JSON.parse(raw) : parseYaml(raw);
    } catch (err) {
      throw new ConfigError(`Failed to parse config file ${filepath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return validateConfig(parsed);
  }

  return {};
}

export function resolveMode(config: TriageConfig): AppMode {
  return config.mode ?? "local";
}

export function resolveDataDir(config: TriageConfig): string {
  return config.storage?.dataDir ?? join(process.cwd(), ".triagedesk");
}

export function resolveDatabasePath(config: TriageConfig): string {
  return join(resolveDataDir(config), config.storage?.filename ?? "triagedesk.db");
}

export function resolveDispatchIntervals(config: TriageConfig): { intervalMs: number; backoffMs: number } {
  return {
    intervalMs: config.dispatcher?.intervalMs ?? DEFAULT_DISPATCH_INTERVAL_MS,
    backoffMs: config.dispatcher?.backoffMs ?? DEFAULT_DISPATCH_BACKOFF_MS,
  };
}

export function resolveNetworkTimeout(config: TriageConfig): number {
  return config.network?.timeoutMs ?? DEFAULT_NETWORK_TIMEOUT_MS;
}

/** Generation requests share the network timeout unless given their own. */
export function resolveGenerationTimeout(config: TriageConfig): number {
  return config.generation?.timeoutMs ?? resolveNetworkTimeout(config);
}
