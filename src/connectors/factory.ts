import { createLogger } from "../logging.js";
import { resolveSecret } from "../infra/env.js";
import { errorMessage } from "../infra/errors.js";
import { resolveNetworkTimeout } from "../config/config.js";
import type { SourceConfig, TriageConfig } from "../config/types.js";
import type { RetryOptions } from "../infra/retry.js";
import { createConnector } from "./connector.js";
import { createSimulatedTransport, type SimulatedTransportOptions } from "./simulated.js";
import { DEFAULT_RATE_LIMITS } from "./sources.js";
import { createTelegramTransport } from "./telegram/transport.js";
import { createGmailTransport } from "./gmail/transport.js";
import { createLinkedInTransport } from "./linkedin/transport.js";
import { createMetaGraphTransport } from "./meta-graph/transport.js";
import type { Connector, ConnectorVariant, SourceId, SourceTransport, TransportResult } from "./types.js";

const log = createLogger("connectors");

/** Environment variable holding each source's credential. */
export const SOURCE_CREDENTIAL_ENV: Record<SourceId, string> = {
  linkedin: "LINKEDIN_ACCESS_TOKEN",
  gmail: "GMAIL_ACCESS_TOKEN",
  telegram: "TELEGRAM_SOURCE_BOT_TOKEN",
  facebook: "FACEBOOK_PAGE_ACCESS_TOKEN",
  instagram: "INSTAGRAM_ACCESS_TOKEN",
};

export type RealTransportOptions = {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

type CommonTransportParams = {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

function buildTransport(source: SourceId, token: string, common: CommonTransportParams): SourceTransport {
  switch (source) {
    case "telegram":
      return createTelegramTransport({ token, ...common });
    case "gmail":
      return createGmailTransport({ accessToken: token, ...common });
    case "linkedin":
      return createLinkedInTransport({ accessToken: token, ...common });
    case "facebook":
    case "instagram":
      return createMetaGraphTransport({ source, accessToken: token, ...common });
  }
}

/** Builds the real transport, or explains why it cannot be built. Never throws. */
export function createRealTransport(
  source: SourceId,
  sourceConfig: SourceConfig,
  options: RealTransportOptions = {},
): TransportResult {
  const token = resolveSecret(SOURCE_CREDENTIAL_ENV[source], sourceConfig.token);
  if (!token) {
    return { ok: false, reason: `missing credentials (${SOURCE_CREDENTIAL_ENV[source]})` };
  }
  const common: CommonTransportParams = { baseUrl: sourceConfig.baseUrl, timeoutMs: options.timeoutMs, fetchImpl: options.fetchImpl };
  return { ok: true, transport: buildTransport(source, token, common) };
}

export type ConnectorFactoryDeps = {
  buildRealTransport?: (source: SourceId, sourceConfig: SourceConfig, options: RealTransportOptions) => TransportResult;
  simulator?: SimulatedTransportOptions;
  retry?: Pick<RetryOptions, "attempts" | "baseDelayMs" | "sleep">;
  now?: () => number;
  fetchImpl?: typeof fetch;
};

export type ResolvedConnector = {
  readonly connector: Connector;
  readonly variant: ConnectorVariant;
  /** Why the simulator was chosen; null for the real variant. */
  readonly fallbackReason: string | null;
};

/**
 * Real variant first; if it cannot be built or does not connect, the
 * simulator takes its place. Either way the connector comes back
 * connected, and the decision is returned rather than hidden.
 */
export async function resolveConnector(
  source: SourceId,
  config: TriageConfig,
  deps: ConnectorFactoryDeps = {},
): Promise<ResolvedConnector> {
  const sourceConfig = config.sources?.[source] ?? {};
  const timeoutMs = resolveNetworkTimeout(config);
  const shell = {
    rateLimitPerMinute: sourceConfig.rateLimitPerMinute ?? DEFAULT_RATE_LIMITS[source],
    timeoutMs,
    retry: deps.retry,
    now: deps.now,
  };

  let reason: string;
  if (sourceConfig.simulate) {
    reason = "simulation requested in config";
  } else {
    const build = deps.buildRealTransport ?? createRealTransport;
    let built: TransportResult;
    try {
      built = build(source, sourceConfig, { timeoutMs, fetchImpl: deps.fetchImpl });
    } catch (err) {
      built = { ok: false, reason: `construction failed: ${errorMessage(err)}` };
    }

    if (built.ok) {
      const real = createConnector({ transport: built.transport, ...shell });
      if (await real.connect()) {
        return { connector: real, variant: "real", fallbackReason: null };
      }
      reason = `connect failed: ${real.getState().lastError ?? "unknown error"}`;
    } else {
      reason = built.reason;
    }
  }

  log.warn(`${source}: using simulated connector (${reason})`);
  const simulated = createConnector({
    transport: createSimulatedTransport(source, { now: deps.now, ...deps.simulator }),
    ...shell,
  });
  // Connected like the real variant would be, so callers see no difference.
  await simulated.connect();
  return { connector: simulated, variant: "simulated", fallbackReason: reason };
}
