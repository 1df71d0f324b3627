import { requestJson } from "../../infra/http.js";
import { RecentIds } from "../recent-ids.js";
import type { RawMessage, SourceTransport } from "../types.js";
import type {
  GraphAccount,
  GraphConversationPage,
  GraphMessage,
  MetaGraphTransportParams,
  MetaPlatform,
} from "./types.js";

const DEFAULT_BASE_URL = "https://graph.facebook.com";
const DEFAULT_API_VERSION = "v21.0";
const MESSAGES_PER_CONVERSATION = 5;

export function toRawMessage(message: GraphMessage): RawMessage | null {
  if (!message.message) return null;
  const receivedAt = Date.parse(message.created_time);
  return {
    sender: message.from.name ?? message.from.username ?? message.from.id,
    content: message.message,
    receivedAt: Number.isNaN(receivedAt) ? undefined : receivedAt,
    externalId: message.id,
    replyTo: message.from.id,
  };
}

/** Page inbox for Facebook Messenger and Instagram Direct; both sit on the same Graph endpoints. */
export function createMetaGraphTransport(params: MetaGraphTransportParams): SourceTransport {
  const { source } = params;
  const platform: MetaPlatform = source === "instagram" ? "instagram" : "messenger";
  const baseUrl = `${(params.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "")}/${params.apiVersion ?? DEFAULT_API_VERSION}`;
  const seen = new RecentIds();
  let pageId: string | null = null;
  let since = Date.now();

  function call<T>(path: string, query: Record<string, string> = {}, init: RequestInit = {}): Promise<T> {
    const search = new URLSearchParams({ ...query, access_token: params.accessToken });
    return requestJson<T>(source, `${baseUrl}${path}?${search.toString()}`, {
      ...init,
      headers: { "Content-Type": "application/json" },
      timeoutMs: params.timeoutMs,
      fetchImpl: params.fetchImpl,
    });
  }

  return {
    source,
    variant: "real",

    connect: async () => {
      const account = await call<GraphAccount>("/me", { fields: "id,name" });
      pageId = account.id;
    },

    fetch: async () => {
      const page = await call<GraphConversationPage>("/me/conversations", {
        platform,
        fields: `messages.limit(${MESSAGES_PER_CONVERSATION}){id,message,from,created_time}`,
      });
      const messages: RawMessage[] = [];
      let newest = since;
      for (const conversation of page.data) {
        for (const message of conversation.messages?.data ?? []) {
          if (message.from.id === pageId || seen.has(message.id)) continue;
          const raw = toRawMessage(message);
          if (!raw || (raw.receivedAt !== undefined && raw.receivedAt <= since)) continue;
          newest = Math.max(newest, raw.receivedAt ?? newest);
          messages.push(raw);
        }
      }
      return {
        messages,
        commit: async () => {
          for (const raw of messages) {
            if (raw.externalId) seen.add(raw.externalId);
          }
          since = Math.max(since, newest);
        },
      };
    },

    send: async (recipient, content) => {
      await call("/me/messages", {}, {
        method: "POST",
        body: JSON.stringify({
          recipient: { id: recipient },
          message: { text: content },
          messaging_type: "RESPONSE",
        }),
      });
    },
  };
}
