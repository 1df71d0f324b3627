import { createLogger } from "../logging.js";
import { sleep as defaultSleep, truncate } from "../utils.js";
import { SIMULATED_MESSAGES, SIMULATED_MESSAGE_PROBABILITY } from "./simulated-messages.js";
import type { FetchBatch, RawMessage, SourceId, SourceTransport } from "./types.js";

const CONNECT_LATENCY_MS = 1000;
const SEND_LATENCY_MS = 500;

export type SimulatedTransportOptions = {
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  probability?: number;
  connectLatencyMs?: number;
  sendLatencyMs?: number;
};

/** Stand-in for a source without working credentials. Never fails. */
export function createSimulatedTransport(source: SourceId, options: SimulatedTransportOptions = {}): SourceTransport {
  const log = createLogger(`simulated:${source}`);
  const random = options.random ?? Math.random;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const probability = options.probability ?? SIMULATED_MESSAGE_PROBABILITY[source];
  const connectLatencyMs = options.connectLatencyMs ?? CONNECT_LATENCY_MS;
  const sendLatencyMs = options.sendLatencyMs ?? SEND_LATENCY_MS;
  const templates = SIMULATED_MESSAGES[source];
  let produced = 0;

  // Latency between half and one-and-a-half times the nominal value.
  const jitter = (base: number): number => Math.round(base * (0.5 + random()));

  function draw(): RawMessage[] {
    if (random() >= probability) {
      return [];
    }
    const index = Math.min(templates.length - 1, Math.floor(random() * templates.length));
    const template = templates[index];
    if (!template) {
      return [];
    }
    produced += 1;
    return [
      {
        sender: template.sender,
        content: template.content,
        receivedAt: now(),
        externalId: `sim-${source}-${produced}`,
      },
    ];
  }

  return {
    source,
    variant: "simulated",

    connect: async () => {
      await sleep(jitter(connectLatencyMs));
    },

    fetch: async (): Promise<FetchBatch> => ({ messages: draw(), commit: async () => {} }),

    send: async (recipient, content) => {
      await sleep(jitter(sendLatencyMs));
      log.info(`Simulated send to ${recipient}: ${truncate(content, 50)}`);
    },
  };
}
