import { ConfigError } from "./errors.js";

export function requireEnv(key: string): string {
  const value = process.env[key]?.trim();
  if (value === undefined || value === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function optionalEnv(key: string, fallback?: string): string | undefined {
  const trimmed = process.env[key]?.trim();
  return trimmed ? trimmed : fallback;
}

/**
 * Environment wins over the config file so secrets can stay out of it.
 * Blank values on either side count as absent.
 */
export function resolveSecret(envKey: string, fromConfig: string | undefined): string | undefined {
  const fromEnv = optionalEnv(envKey);
  if (fromEnv) return fromEnv;
  const trimmed = fromConfig?.trim();
  return trimmed ? trimmed : undefined;
}
