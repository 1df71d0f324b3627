import { createLogger } from "../logging.js";
import { errorMessage, formatError } from "../infra/errors.js";
import { DEFAULT_DISPATCH_BACKOFF_MS, DEFAULT_DISPATCH_INTERVAL_MS } from "../config/config.js";
import { classifyMessage } from "../classifier/classifier.js";
import type { MessageCategory } from "../classifier/types.js";
import type { ConnectorRegistry } from "../connectors/registry.js";
import type { Message, TriageStore } from "../store/types.js";

const log = createLogger("dispatcher");

export type DispatcherDeps = {
  readonly registry: Pick<ConnectorRegistry, "getAllMessages">;
  readonly store: Pick<TriageStore, "addMessage">;
  readonly classify?: (content: string, sender: string, source: string) => MessageCategory;
  /** Called once per stored message; a rejection is logged and ignored. */
  readonly notify?: (message: Message) => Promise<void>;
  readonly intervalMs?: number;
  readonly backoffMs?: number;
  readonly now?: () => number;
};

export type TickResult = {
  readonly fetched: number;
  readonly stored: number;
  readonly failed: number;
};

export type DispatcherStats = {
  readonly running: boolean;
  readonly ticks: number;
  readonly stored: number;
  readonly lastTickAt: number | null;
  readonly lastError: string | null;
};

let activeDispatcher: Dispatcher | null = null;

/**
 * Polls the registry on a fixed interval, classifies and stores what it
 * finds and announces each stored message. One running instance per
 * process; stopping is cooperative and waits for the current tick.
 */
export class Dispatcher {
  private readonly registry: DispatcherDeps["registry"];
  private readonly store: DispatcherDeps["store"];
  private readonly classify: (content: string, sender: string, source: string) => MessageCategory;
  private readonly notify: ((message: Message) => Promise<void>) | undefined;
  private readonly intervalMs: number;
  private readonly backoffMs: number;
  private readonly now: () => number;

  private running = false;
  private stopping = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private ticks = 0;
  private storedTotal = 0;
  private lastTickAt: number | null = null;
  private lastError: string | null = null;

  constructor(deps: DispatcherDeps) {
    this.registry = deps.registry;
    this.store = deps.store;
    this.classify = deps.classify ?? ((content, sender, source) => classifyMessage(content, sender, source));
    this.notify = deps.notify;
    this.intervalMs = deps.intervalMs ?? DEFAULT_DISPATCH_INTERVAL_MS;
    this.backoffMs = deps.backoffMs ?? DEFAULT_DISPATCH_BACKOFF_MS;
    this.now = deps.now ?? Date.now;
  }

  start(): void {
    if (activeDispatcher !== null) {
      throw new Error("A dispatcher is already running in this process");
    }
    activeDispatcher = this;
    this.running = true;
    this.stopping = false;
    log.info(`Dispatcher started (every ${this.intervalMs}ms, backoff ${this.backoffMs}ms)`);
    this.schedule(0);
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.stopping = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.running = false;
    if (activeDispatcher === this) {
      activeDispatcher = null;
    }
    log.info("Dispatcher stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): DispatcherStats {
    return {
      running: this.running,
      ticks: this.ticks,
      stored: this.storedTotal,
      lastTickAt: this.lastTickAt,
      lastError: this.lastError,
    };
  }

  describe(): string {
    if (!this.running) return "Dispatcher: stopped";
    const last = this.lastTickAt === null ? "never" : new Date(this.lastTickAt).toISOString();
    return `Dispatcher: running, ${this.ticks} ticks, ${this.storedTotal} stored, last tick ${last}`;
  }

  /**
   * One pass: fetch, classify, store, notify. Per-message failures are
   * counted and skipped; a failure to fetch at all rejects.
   */
  async runOnce(): Promise<TickResult> {
    if (this.stopping) {
      return { fetched: 0, stored: 0, failed: 0 };
    }
    const messages = await this.registry.getAllMessages();
    let stored = 0;
    let failed = 0;

    for (const raw of messages) {
      let message: Message;
      try {
        message = await this.store.addMessage({
          source: raw.source,
          sender: raw.sender,
          content: raw.content,
          receivedAt: raw.receivedAt ?? this.now(),
          category: this.classify(raw.content, raw.sender, raw.source),
          replyTo: raw.replyTo,
          externalId: raw.externalId,
        });
      } catch (err) {
        failed++;
        log.error(`Failed to store ${raw.source} message from ${raw.sender}: ${errorMessage(err)}`);
        continue;
      }
      stored++;
      log.info(`New ${message.source} message from ${message.sender} (${message.category})`);

      if (this.notify) {
        try {
          await this.notify(message);
        } catch (err) {
          log.warn(`Notification for message ${message.id} failed: ${errorMessage(err)}`);
        }
      }
    }

    this.ticks++;
    this.storedTotal += stored;
    this.lastTickAt = this.now();
    return { fetched: messages.length, stored, failed };
  }

  private schedule(delayMs: number): void {
    if (this.stopping) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    let delay = this.intervalMs;
    try {
      await this.runOnce();
      this.lastError = null;
    } catch (err) {
      this.lastError = errorMessage(err);
      delay = this.backoffMs;
      log.error(`Dispatcher tick failed, retrying in ${delay}ms: ${formatError(err)}`);
    }
    this.schedule(delay);
  }
}
