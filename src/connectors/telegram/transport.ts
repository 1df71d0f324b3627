import { requestJson } from "../../infra/http.js";
import { SourceError } from "../../infra/errors.js";
import { truncate } from "../../utils.js";
import type { RawMessage, SourceTransport } from "../types.js";
import type { TelegramApiResponse, TelegramTransportParams, TelegramUpdate, TelegramUser } from "./types.js";

const SOURCE = "telegram";
const DEFAULT_BASE_URL = "https://api.telegram.org";
const MAX_TEXT_LENGTH = 4000;
const UPDATE_BATCH = 50;

function senderLabel(from: TelegramUser | undefined): string {
  if (!from) return "Unknown";
  if (from.username) return `@${from.username}`;
  const name = [from.first_name, from.last_name].filter(Boolean).join(" ");
  return name || String(from.id);
}

export function toRawMessage(update: TelegramUpdate): RawMessage | null {
  const message = update.message;
  if (!message) return null;
  const text = message.text ?? message.caption;
  if (!text) return null;
  if (message.from?.is_bot) return null;
  return {
    sender: senderLabel(message.from),
    content: text,
    receivedAt: message.date * 1000,
    externalId: `${message.chat.id}:${message.message_id}`,
    replyTo: String(message.chat.id),
  };
}

/** Bot API over plain HTTP. The update offset lives in memory and moves on commit. */
export function createTelegramTransport(params: TelegramTransportParams): SourceTransport {
  const baseUrl = (params.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
  let offset = 0;

  async function api<T>(method: string, body?: Record<string, unknown>): Promise<T> {
    const data = await requestJson<TelegramApiResponse<T>>(SOURCE, `${baseUrl}/bot${params.token}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body ?? {}),
      timeoutMs: params.timeoutMs,
      fetchImpl: params.fetchImpl,
    });
    if (!data.ok || data.result === undefined) {
      throw new SourceError(`${method} failed: ${data.description ?? "unknown error"}`, SOURCE);
    }
    return data.result;
  }

  return {
    source: SOURCE,
    variant: "real",

    connect: async () => {
      await api<TelegramUser>("getMe");
    },

    fetch: async () => {
      const updates = await api<TelegramUpdate[]>("getUpdates", {
        offset,
        limit: UPDATE_BATCH,
        timeout: 0,
        allowed_updates: ["message"],
      });
      const messages: RawMessage[] = [];
      let next = offset;
      for (const update of updates) {
        next = Math.max(next, update.update_id + 1);
        const raw = toRawMessage(update);
        if (raw) messages.push(raw);
      }
      return {
        messages,
        commit: async () => {
          offset = Math.max(offset, next);
        },
      };
    },

    send: async (recipient, content) => {
      await api("sendMessage", {
        chat_id: recipient,
        text: truncate(content, MAX_TEXT_LENGTH),
      });
    },
  };
}
