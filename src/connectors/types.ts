export type SourceId = "linkedin" | "gmail" | "telegram" | "facebook" | "instagram";

export type ConnectorVariant = "real" | "simulated";

export type SourceMeta = {
  id: SourceId;
  label: string;
};

/** A message as a source returns it, before it is tagged and persisted. */
export type RawMessage = {
  readonly sender: string;
  readonly content: string;
  readonly receivedAt?: number;
  readonly externalId?: string;
  /** Address to answer on when it differs from the display sender (chat id, thread id). */
  readonly replyTo?: string;
};

export type SourcedMessage = RawMessage & {
  readonly source: SourceId;
};

export type RateLimitSnapshot = {
  readonly limit: number;
  readonly used: number;
  readonly windowStartedAt: number;
  readonly blockedUntil: number | null;
};

export type ConnectorState = {
  readonly source: SourceId;
  readonly variant: ConnectorVariant;
  readonly connected: boolean;
  readonly permanentlyFailed: boolean;
  readonly lastError: string | null;
  readonly requestCount: number;
  readonly rateLimit: RateLimitSnapshot;
};

/** The uniform adapter every source variant is exposed through. */
export type Connector = {
  readonly source: SourceId;
  readonly variant: ConnectorVariant;
  connect: () => Promise<boolean>;
  fetchMessages: () => Promise<RawMessage[]>;
  sendMessage: (recipient: string, content: string) => Promise<boolean>;
  isConnected: () => boolean;
  getState: () => ConnectorState;
};

/**
 * What one fetch read. The source cursor (offset, read marks, last-seen
 * ids) only moves when the connector calls `commit`, so a batch that is
 * dropped is read again on the next fetch.
 */
export type FetchBatch = {
  readonly messages: RawMessage[];
  commit: () => Promise<void>;
};

/**
 * Wire-level half of a connector. Implementations throw from the error
 * taxonomy (AuthenticationError, TransientProviderError, SourceError) and
 * leave state, rate limiting and retries to the connector shell.
 */
export type SourceTransport = {
  readonly source: SourceId;
  readonly variant: ConnectorVariant;
  connect: () => Promise<void>;
  fetch: () => Promise<FetchBatch>;
  send: (recipient: string, content: string) => Promise<void>;
};

export type TransportResult =
  | { readonly ok: true; readonly transport: SourceTransport }
  | { readonly ok: false; readonly reason: string };
