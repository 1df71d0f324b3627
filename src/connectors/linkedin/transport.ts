import { requestJson } from "../../infra/http.js";
import type { RawMessage, SourceTransport } from "../types.js";
import type { LinkedInMessage, LinkedInMessagePage, LinkedInProfile, LinkedInTransportParams } from "./types.js";

const SOURCE = "linkedin";
const DEFAULT_BASE_URL = "https://api.linkedin.com";
const DEFAULT_API_VERSION = "202410";

/** Headline is folded into the sender so role words reach the classifier. */
export function toRawMessage(message: LinkedInMessage): RawMessage {
  const name = message.sender.name ?? message.sender.urn;
  return {
    sender: message.sender.headline ? `${name}, ${message.sender.headline}` : name,
    content: message.body.text,
    receivedAt: message.createdAt,
    externalId: message.id,
    replyTo: message.conversationUrn,
  };
}

export function createLinkedInTransport(params: LinkedInTransportParams): SourceTransport {
  const baseUrl = (params.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
  const headers = {
    Authorization: `Bearer ${params.accessToken}`,
    "Content-Type": "application/json",
    "LinkedIn-Version": params.apiVersion ?? DEFAULT_API_VERSION,
    "X-Restli-Protocol-Version": "2.0.0",
  };
  let selfUrn: string | null = null;
  let createdAfter = Date.now();

  function call<T>(path: string, init: RequestInit = {}): Promise<T> {
    return requestJson<T>(SOURCE, `${baseUrl}${path}`, {
      ...init,
      headers,
      timeoutMs: params.timeoutMs,
      fetchImpl: params.fetchImpl,
    });
  }

  return {
    source: SOURCE,
    variant: "real",

    connect: async () => {
      const profile = await call<LinkedInProfile>("/v2/userinfo");
      selfUrn = `urn:li:person:${profile.sub}`;
    },

    fetch: async () => {
      const page = await call<LinkedInMessagePage>(`/rest/messages?q=inbox&createdAfter=${createdAfter}`);
      const messages: RawMessage[] = [];
      let newest = createdAfter;
      for (const element of page.elements) {
        newest = Math.max(newest, element.createdAt);
        if (element.sender.urn === selfUrn) continue;
        messages.push(toRawMessage(element));
      }
      return {
        messages,
        commit: async () => {
          createdAfter = Math.max(createdAfter, newest);
        },
      };
    },

    send: async (recipient, content) => {
      await call("/rest/messages", {
        method: "POST",
        body: JSON.stringify({ conversationUrn: recipient, body: { text: content } }),
      });
    },
  };
}
