import { mkdirSync } from "node:fs";
import { resolveSecret } from "./infra/env.js";
import { ConfigError, formatError } from "./infra/errors.js";
import { createLogger } from "./logging.js";
import {
  resolveDataDir,
  resolveDatabasePath,
  resolveDispatchIntervals,
  resolveGenerationTimeout,
  resolveMode,
} from "./config/config.js";
import type { AppMode, TriageConfig } from "./config/types.js";
import { openTriageStore } from "./store/sqlite-store.js";
import type { TriageStore } from "./store/types.js";
import { createConnectorRegistry, type ConnectorRegistry } from "./connectors/registry.js";
import type { ConnectorFactoryDeps } from "./connectors/factory.js";
import { createLlmClient, createUnavailableClient } from "./generation/create-client.js";
import { createGenerator } from "./generation/generator.js";
import type { LlmClient } from "./generation/llm-client.js";
import { ConversationController } from "./operator/controller.js";
import {
  startOperatorSurface,
  type OperatorSurfaceHandle,
  type OperatorSurfaceParams,
} from "./operator/telegram-surface.js";
import { Dispatcher } from "./dispatcher/dispatcher.js";

const log = createLogger("app");

export type AppDeps = {
  openStore?: (config: TriageConfig) => TriageStore;
  connectors?: ConnectorFactoryDeps;
  llmClient?: LlmClient;
  startSurface?: (params: OperatorSurfaceParams) => Promise<OperatorSurfaceHandle>;
};

export type App = {
  readonly mode: AppMode;
  readonly store: TriageStore;
  readonly registry: ConnectorRegistry;
  readonly dispatcher: Dispatcher;
  readonly controller: ConversationController;
  readonly surface: OperatorSurfaceHandle | null;
  start: () => void;
  /** Runs every cleanup step in reverse order; a failing step does not stop the rest. */
  stop: () => Promise<void>;
};

function resolveLlmClient(config: TriageConfig): LlmClient {
  try {
    return createLlmClient(config);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.warn(`Response generation disabled: ${err.message}`);
    return createUnavailableClient(err.message);
  }
}

function openDefaultStore(config: TriageConfig): TriageStore {
  mkdirSync(resolveDataDir(config), { recursive: true });
  return openTriageStore(resolveDatabasePath(config));
}

async function runCleanups(cleanups: (() => Promise<void>)[]): Promise<void> {
  for (const cleanup of [...cleanups].reverse()) {
    try {
      await cleanup();
    } catch (err) {
      log.error(`Cleanup failed: ${formatError(err)}`);
    }
  }
}

/**
 * Wires storage, sources, generation, the dispatcher and the operator
 * surface. Every source is connected before this resolves; the dispatcher
 * waits for `start()`.
 */
export async function createApp(config: TriageConfig, deps: AppDeps = {}): Promise<App> {
  const mode = resolveMode(config);
  const cleanups: (() => Promise<void>)[] = [];

  const store = (deps.openStore ?? openDefaultStore)(config);
  cleanups.push(async () => {
    if (mode === "local") {
      await store.reset();
      log.info("Local mode: triage data cleared");
    }
    await store.close();
  });

  try {
    const registry = await createConnectorRegistry(config, deps.connectors);
    const connected = await registry.connectAll();
    for (const state of registry.getStates()) {
      const reason = registry.getFallbackReason(state.source);
      log.info(
        `${state.source} (${state.variant}): ${connected[state.source] ? "connected" : "disconnected"}` +
          (reason ? `, ${reason}` : ""),
      );
    }

    const generation = config.generation ?? {};
    const generator = createGenerator({
      client: deps.llmClient ?? resolveLlmClient(config),
      timeoutMs: resolveGenerationTimeout(config),
      maxTokens: generation.maxTokens,
      temperature: generation.temperature,
    });

    const { intervalMs, backoffMs } = resolveDispatchIntervals(config);
    let surface: OperatorSurfaceHandle | null = null;
    const dispatcher = new Dispatcher({
      registry,
      store,
      intervalMs,
      backoffMs,
      notify: async (message) => {
        await surface?.notify(message);
      },
    });
    cleanups.push(() => dispatcher.stop());

    const controller = new ConversationController({
      store,
      registry,
      generator,
      maxResponseLength: generation.maxResponseLength,
      maxTokens: generation.maxTokens,
      describeDispatcher: () => dispatcher.describe(),
    });

    const telegram = config.operator?.telegram;
    const token = resolveSecret("TELEGRAM_BOT_TOKEN", telegram?.token);
    if (token) {
      const started = await (deps.startSurface ?? startOperatorSurface)({
        token,
        chatId: resolveSecret("TELEGRAM_CHAT_ID", telegram?.chatId),
        allowFrom: telegram?.allowFrom,
        controller,
      });
      surface = started;
      cleanups.push(() => started.stop());
    } else {
      log.warn("No operator bot token configured (TELEGRAM_BOT_TOKEN); running without an operator surface");
    }

    return {
      mode,
      store,
      registry,
      dispatcher,
      controller,
      surface,
      start: () => dispatcher.start(),
      stop: () => runCleanups(cleanups),
    };
  } catch (err) {
    await runCleanups(cleanups);
    throw err;
  }
}
