import { createLogger } from "../../logging.js";
import { requestJson } from "../../infra/http.js";
import { AuthenticationError, formatError } from "../../infra/errors.js";
import { RecentIds } from "../recent-ids.js";
import type { RawMessage, SourceTransport } from "../types.js";
import type { GmailHeader, GmailListResponse, GmailMessage, GmailProfile, GmailTransportParams } from "./types.js";

const SOURCE = "gmail";
const log = createLogger("gmail");
const DEFAULT_BASE_URL = "https://gmail.googleapis.com/gmail/v1/users/me";
const UNREAD_QUERY = "is:unread in:inbox";

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
};

function decodeEntities(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|#39);/g, (entity) => HTML_ENTITIES[entity] ?? entity);
}

function header(headers: readonly GmailHeader[] | undefined, name: string): string | undefined {
  const lower = name.toLowerCase();
  return headers?.find((h) => h.name.toLowerCase() === lower)?.value;
}

/** `"Jane Doe" <jane@example.test>` → `jane@example.test`. */
export function extractAddress(from: string): string {
  const match = /<([^>]+)>/.exec(from);
  return (match?.[1] ?? from).trim();
}

export function toRawMessage(message: GmailMessage): RawMessage {
  const headers = message.payload?.headers;
  const from = header(headers, "From") ?? "unknown";
  const subject = header(headers, "Subject")?.trim();
  const snippet = decodeEntities(message.snippet ?? "");
  const receivedAt = message.internalDate ? Number(message.internalDate) : undefined;
  return {
    sender: from,
    content: subject ? `${subject}\n\n${snippet}` : snippet,
    receivedAt: Number.isFinite(receivedAt) ? receivedAt : undefined,
    externalId: message.id,
    replyTo: extractAddress(from),
  };
}

export function encodeRawEmail(params: { from: string; to: string; body: string; subject?: string }): string {
  const lines = [
    `From: ${params.from}`,
    `To: ${params.to}`,
    `Subject: ${params.subject ?? "Re: your message"}`,
    "Content-Type: text/plain; charset=UTF-8",
    "",
    params.body,
  ];
  return Buffer.from(lines.join("\r\n"), "utf-8").toString("base64url");
}

export function createGmailTransport(params: GmailTransportParams): SourceTransport {
  const baseUrl = (params.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
  const maxResults = params.maxResults ?? 10;
  const seen = new RecentIds();
  let ownAddress = "me";

  function call<T>(path: string, init: RequestInit = {}): Promise<T> {
    return requestJson<T>(SOURCE, `${baseUrl}${path}`, {
      ...init,
      headers: {
        Authorization: `Bearer ${params.accessToken}`,
        "Content-Type": "application/json",
      },
      timeoutMs: params.timeoutMs,
      fetchImpl: params.fetchImpl,
    });
  }

  return {
    source: SOURCE,
    variant: "real",

    connect: async () => {
      const profile = await call<GmailProfile>("/profile");
      ownAddress = profile.emailAddress;
    },

    fetch: async () => {
      const query = new URLSearchParams({ q: UNREAD_QUERY, maxResults: String(maxResults) });
      const list = await call<GmailListResponse>(`/messages?${query.toString()}`);
      const messages: RawMessage[] = [];
      const read: string[] = [];
      for (const ref of list.messages ?? []) {
        if (seen.has(ref.id)) continue;
        let full: GmailMessage;
        try {
          full = await call<GmailMessage>(
            `/messages/${encodeURIComponent(ref.id)}?format=metadata&metadataHeaders=From&metadataHeaders=Subject`,
          );
        } catch (err) {
          if (err instanceof AuthenticationError) throw err;
          // Still unread, so the next fetch picks it up.
          log.warn(`Skipping message ${ref.id}: ${formatError(err)}`);
          continue;
        }
        read.push(ref.id);
        messages.push(toRawMessage(full));
      }
      return {
        messages,
        commit: async () => {
          for (const id of read) {
            seen.add(id);
            try {
              await call(`/messages/${encodeURIComponent(id)}/modify`, {
                method: "POST",
                body: JSON.stringify({ removeLabelIds: ["UNREAD"] }),
              });
            } catch (err) {
              log.warn(`Failed to mark message ${id} read: ${formatError(err)}`);
            }
          }
        },
      };
    },

    send: async (recipient, content) => {
      await call("/messages/send", {
        method: "POST",
        body: JSON.stringify({ raw: encodeRawEmail({ from: ownAddress, to: recipient, body: content }) }),
      });
    },
  };
}
