import { createLogger } from "../logging.js";
import { AuthenticationError, RateLimitExceededError, errorMessage, formatError } from "../infra/errors.js";
import { withRetry, type RetryOptions } from "../infra/retry.js";
import { withTimeout } from "../utils.js";
import { RateLimiter } from "./rate-limiter.js";
import type { Connector, ConnectorState, FetchBatch, RawMessage, SourceTransport } from "./types.js";

export const DEFAULT_CALL_TIMEOUT_MS = 10_000;

export type CreateConnectorParams = {
  transport: SourceTransport;
  rateLimitPerMinute: number;
  timeoutMs?: number;
  retry?: Pick<RetryOptions, "attempts" | "baseDelayMs" | "sleep">;
  now?: () => number;
};

/**
 * Wraps a transport in the shared connector contract: connection state,
 * per-minute budget, bounded retries and a timeout on every call. Fetch and
 * send never reject; failures land in `lastError`.
 */
export function createConnector(params: CreateConnectorParams): Connector {
  const { transport } = params;
  const { source, variant } = transport;
  const log = createLogger(`connector:${source}`);
  const timeoutMs = params.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
  const now = params.now ?? Date.now;
  const limiter = new RateLimiter({ limit: params.rateLimitPerMinute, now });

  let connected = false;
  let permanentlyFailed = false;
  let lastError: string | null = null;
  let requestCount = 0;
  let connecting: Promise<boolean> | null = null;

  const retryOptions: RetryOptions = {
    ...params.retry,
    onRetry: (err, attempt, delayMs) => {
      log.warn(`${errorMessage(err)}; retry ${attempt} in ${delayMs}ms`);
    },
  };

  function call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(() => withTimeout(fn(), timeoutMs, `${source} ${label}`), retryOptions);
  }

  function recordFailure(label: string, err: unknown): void {
    lastError = errorMessage(err);
    if (err instanceof AuthenticationError) {
      connected = false;
      permanentlyFailed = true;
      log.error(`${label} rejected credentials, disabling ${source} for this process: ${lastError}`);
      return;
    }
    log.warn(`${label} failed: ${formatError(err)}`);
  }

  function acquire(label: string): boolean {
    if (limiter.tryAcquire()) {
      requestCount += 1;
      return true;
    }
    const retryAt = limiter.retryAt() ?? now();
    lastError = new RateLimitExceededError(source, retryAt).message;
    log.debug(`${label} skipped: ${lastError}`);
    return false;
  }

  async function doConnect(): Promise<boolean> {
    try {
      await call("connect", () => transport.connect());
      connected = true;
      lastError = null;
      log.info(`Connected (${variant})`);
      return true;
    } catch (err) {
      connected = false;
      recordFailure("connect", err);
      return false;
    }
  }

  return {
    source,
    variant,

    connect: async () => {
      if (permanentlyFailed) return false;
      if (connected) return true;
      // Concurrent callers share one attempt.
      connecting ??= doConnect().finally(() => {
        connecting = null;
      });
      return connecting;
    },

    fetchMessages: async (): Promise<RawMessage[]> => {
      if (!connected) return [];
      if (!acquire("fetch")) return [];
      let batch: FetchBatch;
      try {
        batch = await call("fetch", () => transport.fetch());
      } catch (err) {
        recordFailure("fetch", err);
        return [];
      }
      // A batch that timed out or failed above is never committed.
      try {
        await batch.commit();
      } catch (err) {
        log.warn(`fetch commit failed, messages may be read again: ${formatError(err)}`);
      }
      lastError = null;
      return batch.messages;
    },

    sendMessage: async (recipient, content) => {
      if (!connected) return false;
      if (!acquire("send")) return false;
      try {
        await call("send", () => transport.send(recipient, content));
        lastError = null;
        return true;
      } catch (err) {
        recordFailure("send", err);
        return false;
      }
    },

    isConnected: () => connected,

    getState: (): ConnectorState => ({
      source,
      variant,
      connected,
      permanentlyFailed,
      lastError,
      requestCount,
      rateLimit: limiter.snapshot(),
    }),
  };
}
