import type { SourceId } from "../connectors/types.js";

export type { SourceId } from "../connectors/types.js";

export type AppMode = "local" | "cloud";

export type SourceConfig = {
  enabled?: boolean;
  /** Skip the real transport and run the simulator. */
  simulate?: boolean;
  token?: string;
  baseUrl?: string;
  rateLimitPerMinute?: number;
};

export type DispatcherConfig = {
  intervalMs?: number;
  backoffMs?: number;
};

export type GenerationProvider = "openai" | "anthropic";

export type GenerationConfig = {
  provider?: GenerationProvider;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  maxResponseLength?: number;
};

export type OperatorTelegramConfig = {
  token?: string;
  chatId?: string;
  allowFrom?: string[];
};

export type OperatorConfig = {
  telegram?: OperatorTelegramConfig;
};

export type StorageConfig = {
  dataDir?: string;
  filename?: string;
};

export type NetworkConfig = {
  timeoutMs?: number;
};

export type TriageConfig = {
  mode?: AppMode;
  sources?: Partial<Record<SourceId, SourceConfig>>;
  dispatcher?: DispatcherConfig;
  generation?: GenerationConfig;
  operator?: OperatorConfig;
  storage?: StorageConfig;
  network?: NetworkConfig;
};
