import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createMetaGraphTransport, toRawMessage } from "./transport.js";
import type { GraphMessage } from "./types.js";

function message(id: string, fromId: string, createdTime: string, text?: string): GraphMessage {
  return { id, message: text, created_time: createdTime, from: { id: fromId, name: `user-${fromId}` } };
}

beforeEach(() => {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(new Date("2024-05-01T12:00:00Z"));
});

afterEach(() => {
  vi.useRealTimers();
});

describe("toRawMessage", () => {
  it("maps a Graph message", () => {
    expect(toRawMessage(message("m1", "u1", "2024-05-01T12:30:00Z", "hi"))).toEqual({
      sender: "user-u1",
      content: "hi",
      receivedAt: Date.parse("2024-05-01T12:30:00Z"),
      externalId: "m1",
      replyTo: "u1",
    });
  });

  it("drops attachments without text", () => {
    expect(toRawMessage(message("m2", "u1", "2024-05-01T12:30:00Z"))).toBeNull();
  });
});

describe("createMetaGraphTransport", () => {
  it("returns only new inbound messages", async () => {
    const page = {
      data: [
        {
          id: "c1",
          messages: {
            data: [
              message("m3", "page-1", "2024-05-01T12:05:00Z", "our reply"),
              message("m2", "u1", "2024-05-01T12:04:00Z", "new question"),
              message("m1", "u1", "2024-05-01T11:00:00Z", "old question"),
            ],
          },
        },
      ],
    };
    const fetchImpl = vi.fn(async (url: string | URL | Request, _init?: RequestInit) => {
      const body = String(url).includes("/me/conversations") ? page : { id: "page-1", name: "Shop" };
      return new Response(JSON.stringify(body), { status: 200 });
    });
    const transport = createMetaGraphTransport({ source: "instagram", accessToken: "test-token", fetchImpl });

    await transport.connect();
    const first = await transport.fetch();
    expect(first.messages.map((m) => m.externalId)).toEqual(["m2"]);

    const uncommitted = await transport.fetch();
    expect(uncommitted.messages.map((m) => m.externalId)).toEqual(["m2"]);

    await uncommitted.commit();
    expect((await transport.fetch()).messages).toEqual([]);
    expect(String(fetchImpl.mock.calls[1]?.[0])).toContain("platform=instagram");
  });
});
