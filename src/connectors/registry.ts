import { createLogger } from "../logging.js";
import { formatError } from "../infra/errors.js";
import type { TriageConfig } from "../config/types.js";
import { resolveConnector, type ConnectorFactoryDeps } from "./factory.js";
import { SOURCE_ORDER, isSourceId } from "./sources.js";
import type { Connector, ConnectorState, SourceId, SourcedMessage } from "./types.js";

const log = createLogger("registry");

export type ConnectorEntry = {
  readonly connector: Connector;
  readonly fallbackReason?: string | null;
};

/**
 * Owns one connector per source. Every per-source call is isolated: a
 * throw from one connector is logged and never reaches the others.
 */
export class ConnectorRegistry {
  private readonly connectors = new Map<SourceId, Connector>();
  private readonly fallbackReasons = new Map<SourceId, string | null>();

  constructor(entries: readonly ConnectorEntry[]) {
    for (const entry of entries) {
      const { source } = entry.connector;
      if (this.connectors.has(source)) {
        throw new Error(`Duplicate connector for ${source}`);
      }
      this.connectors.set(source, entry.connector);
      this.fallbackReasons.set(source, entry.fallbackReason ?? null);
    }
  }

  async connectAll(): Promise<Partial<Record<SourceId, boolean>>> {
    const entries = [...this.connectors.entries()];
    const results = await Promise.all(
      entries.map(async ([source, connector]): Promise<[SourceId, boolean]> => {
        try {
          return [source, await connector.connect()];
        } catch (err) {
          log.error(`Error connecting to ${source}: ${formatError(err)}`);
          return [source, false];
        }
      }),
    );
    const status: Partial<Record<SourceId, boolean>> = {};
    for (const [source, ok] of results) status[source] = ok;
    return status;
  }

  async getAllMessages(): Promise<SourcedMessage[]> {
    const active = [...this.connectors.entries()].filter(([, connector]) => connector.isConnected());
    const batches = await Promise.all(
      active.map(async ([source, connector]): Promise<SourcedMessage[]> => {
        try {
          const raw = await connector.fetchMessages();
          return raw.map((message) => ({ ...message, source }));
        } catch (err) {
          log.error(`Error getting messages from ${source}: ${formatError(err)}`);
          return [];
        }
      }),
    );
    return batches.flat();
  }

  async sendMessage(source: string, recipient: string, content: string): Promise<boolean> {
    const connector = isSourceId(source) ? this.connectors.get(source) : undefined;
    if (!connector) {
      log.error(`Unknown source: ${source}`);
      return false;
    }
    if (!connector.isConnected()) {
      log.error(`Not connected to ${source}`);
      return false;
    }
    try {
      return await connector.sendMessage(recipient, content);
    } catch (err) {
      log.error(`Error sending message via ${source}: ${formatError(err)}`);
      return false;
    }
  }

  getFallbackReason(source: SourceId): string | null {
    return this.fallbackReasons.get(source) ?? null;
  }

  getStates(): ConnectorState[] {
    return [...this.connectors.values()].map((c) => c.getState());
  }
}

/** Sources that are not explicitly disabled, in display order. */
export function enabledSources(config: TriageConfig): SourceId[] {
  return SOURCE_ORDER.filter((source) => config.sources?.[source]?.enabled !== false);
}

/**
 * Resolves every enabled source concurrently (real first, simulator as
 * fallback) and returns the registry.
 */
export async function createConnectorRegistry(
  config: TriageConfig,
  deps: ConnectorFactoryDeps = {},
): Promise<ConnectorRegistry> {
  const sources = enabledSources(config);
  const resolved = await Promise.all(sources.map((source) => resolveConnector(source, config, deps)));
  for (const entry of resolved) {
    log.debug(
      `${entry.connector.source}: ${entry.variant}${entry.fallbackReason ? ` (${entry.fallbackReason})` : ""}`,
    );
  }
  return new ConnectorRegistry(resolved);
}
