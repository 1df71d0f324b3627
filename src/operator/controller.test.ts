import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ConversationController, IDLE_HINT, WELCOME_TEXT, type ControllerRegistry } from "./controller.js";
import { OperatorSessionStore } from "./sessions.js";
import { createSqliteTriageStore } from "../store/sqlite-store.js";
import { openDatabase } from "../store/sqlite.js";
import { createGenerator, GENERATION_FALLBACK_TEXT, type Generator } from "../generation/generator.js";
import { createUnavailableClient } from "../generation/create-client.js";
import { PersistenceError } from "../infra/errors.js";
import type { ConnectorState } from "../connectors/types.js";
import type { NewMessage, TriageStore } from "../store/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const OPERATOR = "1001";
const NOW = 90_000;

function connectorState(overrides: Partial<ConnectorState> & Pick<ConnectorState, "source">): ConnectorState {
  return {
    variant: "real",
    connected: true,
    permanentlyFailed: false,
    lastError: null,
    requestCount: 0,
    rateLimit: { limit: 60, used: 0, windowStartedAt: 0, blockedUntil: null },
    ...overrides,
  };
}

function fakeRegistry(delivered = true, states?: ConnectorState[]) {
  const sendMessage = vi.fn(async (_source: string, _recipient: string, _content: string) => delivered);
  const registry: ControllerRegistry = {
    sendMessage,
    getStates: () =>
      states ?? [
        connectorState({ source: "gmail" }),
        connectorState({ source: "telegram", variant: "simulated", connected: false }),
      ],
  };
  return { registry, sendMessage };
}

function fakeGenerator() {
  const draft = vi.fn(async (_system: string, _user: string, _maxTokens?: number) => "Thursday at 3pm works for me.");
  const revise = vi.fn(async (original: string, feedback: string) => `${original} (${feedback})`);
  const generator: Generator = { draft, revise };
  return { generator, draft, revise };
}

function gmailMessage(overrides: Partial<NewMessage> = {}): NewMessage {
  return {
    source: "gmail",
    sender: "Sam <sam@example.test>",
    content: "Can we meet Thursday?",
    receivedAt: 1_000,
    category: "business",
    replyTo: "sam@example.test",
    ...overrides,
  };
}

describe("ConversationController", () => {
  let store: TriageStore;
  let sessions: OperatorSessionStore;

  beforeEach(() => {
    store = createSqliteTriageStore({ db: openDatabase(":memory:"), now: () => 50_000 });
    sessions = new OperatorSessionStore();
  });

  afterEach(async () => {
    await store.close();
  });

  function controller(overrides: { registry?: ControllerRegistry; generator?: Generator; store?: TriageStore } = {}) {
    return new ConversationController({
      store: overrides.store ?? store,
      sessions,
      registry: overrides.registry ?? fakeRegistry().registry,
      generator: overrides.generator ?? fakeGenerator().generator,
      now: () => NOW,
    });
  }

  // -------------------------------------------------------------------------
  // start / status / free text
  // -------------------------------------------------------------------------

  it("greets on start", async () => {
    expect(await controller().handle(OPERATOR, "/start")).toEqual({ text: WELCOME_TEXT, actions: [] });
  });

  it("reports source status and queue size", async () => {
    await store.addMessage(gmailMessage());
    const reply = await controller().handle(OPERATOR, "/status");
    expect(reply.text).toBe(
      ["📊 Sources", "🟢 Gmail (real)", "🔴 Telegram (simulated)", "", "Queue: 1 pending, 0 in progress"].join("\n"),
    );
  });

  it("shows rate limits and the last error per source", async () => {
    const registry = fakeRegistry(true, [
      connectorState({
        source: "linkedin",
        rateLimit: { limit: 30, used: 30, windowStartedAt: 0, blockedUntil: NOW + 60_000 },
      }),
      connectorState({ source: "gmail", lastError: "[gmail] HTTP 503" }),
      connectorState({
        source: "instagram",
        lastError: "old failure",
        rateLimit: { limit: 40, used: 0, windowStartedAt: 0, blockedUntil: NOW - 1 },
      }),
    ]).registry;

    const reply = await controller({ registry }).handle(OPERATOR, "/status");

    expect(reply.text.split("\n").slice(1, 4)).toEqual([
      "🟢 LinkedIn (real), rate limited until 1970-01-01T00:02:30.000Z",
      "🟢 Gmail (real), last error: [gmail] HTTP 503",
      "🟢 Instagram (real), last error: old failure",
    ]);
  });

  it("answers free text while idle with a hint", async () => {
    expect((await controller().handle(OPERATOR, "hello?")).text).toBe(IDLE_HINT);
  });

  // -------------------------------------------------------------------------
  // next
  // -------------------------------------------------------------------------

  describe("next", () => {
    it("says so when the queue is empty", async () => {
      expect((await controller().handle(OPERATOR, "next")).text).toBe("✅ No pending messages in queue!");
    });

    it("surfaces the oldest pending message and marks it processing", async () => {
      await store.addMessage(gmailMessage({ content: "newer", receivedAt: 2_000 }));
      const older = await store.addMessage(gmailMessage({ content: "older", receivedAt: 1_000 }));

      const reply = await controller().handle(OPERATOR, "/next");

      expect(reply.text).toBe(
        [
          "📨 New message from Gmail",
          "",
          "👤 From: Sam <sam@example.test>",
          "🏷 Category: business",
          "📝 older",
          "",
          "What would you like to do?",
        ].join("\n"),
      );
      expect(reply.actions.flat().map((a) => a.command)).toEqual(["generate:2", "ignore:2", "manual:2"]);
      expect((await store.getMessage(older.id))?.status).toBe("processing");
    });

    it("leaves a pending manual request in place", async () => {
      const message = await store.addMessage(gmailMessage());
      const c = controller();
      await c.handle(OPERATOR, `manual:${message.id}`);
      await c.handle(OPERATOR, "next");
      expect(c.getSession(OPERATOR)).toEqual({ state: "awaitingManualResponse", messageId: message.id });
    });
  });

  // -------------------------------------------------------------------------
  // generate
  // -------------------------------------------------------------------------

  describe("generate", () => {
    it("drafts and persists a generated response", async () => {
      const message = await store.addMessage(gmailMessage());
      const { generator, draft } = fakeGenerator();

      const reply = await controller({ generator }).handle(OPERATOR, `generate:${message.id}`);

      expect(reply.text).toBe("🤖 Generated response:\n\nThursday at 3pm works for me.\n\nWhat would you like to do?");
      expect(reply.actions.flat().map((a) => a.command)).toEqual(["send:1", "edit:1", "manual:1"]);
      expect(draft.mock.calls[0]?.[1]).toContain("Message: Can we meet Thursday?");
      expect(await store.listResponses(message.id)).toEqual([
        expect.objectContaining({ id: 1, kind: "generated", content: "Thursday at 3pm works for me.", isSent: false }),
      ]);
    });

    it("stores the apology text when generation fails", async () => {
      const message = await store.addMessage(gmailMessage());
      const generator = createGenerator({ client: createUnavailableClient("no key") });

      await controller({ generator }).handle(OPERATOR, `generate:${message.id}`);

      expect((await store.getResponse(1))?.content).toBe(GENERATION_FALLBACK_TEXT);
    });

    it("refuses a message that is already closed", async () => {
      const message = await store.addMessage(gmailMessage());
      await store.updateMessageStatus(message.id, "ignored");
      const reply = await controller().handle(OPERATOR, `generate:${message.id}`);
      expect(reply.text).toBe(`Message 1 is already ignored. ${IDLE_HINT}`);
    });

    it("replaces a pending manual request", async () => {
      const message = await store.addMessage(gmailMessage());
      const c = controller();
      await c.handle(OPERATOR, `manual:${message.id}`);
      await c.handle(OPERATOR, `generate:${message.id}`);
      expect(c.getSession(OPERATOR)).toEqual({ state: "idle" });
    });
  });

  // -------------------------------------------------------------------------
  // manual
  // -------------------------------------------------------------------------

  describe("manual", () => {
    it("stores exactly one manual response and returns to idle", async () => {
      const message = await store.addMessage(gmailMessage());
      const c = controller();

      expect((await c.handle(OPERATOR, `manual:${message.id}`)).text).toBe("✍️ Type your reply to Sam <sam@example.test>:");
      const reply = await c.handle(OPERATOR, "hello");

      expect(reply.text).toBe("✍️ Manual response:\n\nhello\n\nWhat would you like to do?");
      expect(await store.listResponses(message.id)).toEqual([
        expect.objectContaining({ kind: "manual", content: "hello" }),
      ]);
      expect(c.getSession(OPERATOR)).toEqual({ state: "idle" });
      expect((await c.handle(OPERATOR, "again")).text).toBe(IDLE_HINT);
      expect(await store.listResponses(message.id)).toHaveLength(1);
    });

    it("lets a second request replace the first", async () => {
      const first = await store.addMessage(gmailMessage({ content: "first" }));
      const second = await store.addMessage(gmailMessage({ content: "second" }));
      const c = controller();

      await c.handle(OPERATOR, `manual:${first.id}`);
      await c.handle(OPERATOR, `manual:${second.id}`);
      await c.handle(OPERATOR, "reply text");

      expect(await store.listResponses(first.id)).toEqual([]);
      expect(await store.listResponses(second.id)).toHaveLength(1);
    });

    it("does not store a reply for a message ignored in the meantime", async () => {
      const message = await store.addMessage(gmailMessage());
      const c = controller();
      await c.handle(OPERATOR, `manual:${message.id}`);
      await store.updateMessageStatus(message.id, "ignored");

      expect((await c.handle(OPERATOR, "hello")).text).toBe(`Message ${message.id} is already ignored. ${IDLE_HINT}`);
      expect(await store.listResponses(message.id)).toEqual([]);
      expect(c.getSession(OPERATOR)).toEqual({ state: "idle" });
    });

    it("keeps sessions per operator", async () => {
      const message = await store.addMessage(gmailMessage());
      const c = controller();
      await c.handle(OPERATOR, `manual:${message.id}`);
      expect((await c.handle("2002", "hello")).text).toBe(IDLE_HINT);
      expect(c.getSession(OPERATOR).state).toBe("awaitingManualResponse");
    });

    it("does not open a request for an unknown message", async () => {
      const c = controller();
      expect((await c.handle(OPERATOR, "manual:9")).text).toBe("Message 9 not found.");
      expect(c.getSession(OPERATOR)).toEqual({ state: "idle" });
    });
  });

  // -------------------------------------------------------------------------
  // ignore
  // -------------------------------------------------------------------------

  describe("ignore", () => {
    it("marks the message ignored without a response", async () => {
      const message = await store.addMessage(gmailMessage());
      const reply = await controller().handle(OPERATOR, `ignore:${message.id}`);

      expect(reply.text).toBe(`✅ Message ignored. ${IDLE_HINT}`);
      const stored = await store.getMessage(message.id);
      expect(stored?.status).toBe("ignored");
      expect(stored?.isIgnored).toBe(true);
      expect(await store.listResponses(message.id)).toEqual([]);
    });

    it("does not reopen an answered message", async () => {
      const message = await store.addMessage(gmailMessage());
      await store.updateMessageStatus(message.id, "answered");
      const reply = await controller().handle(OPERATOR, `ignore:${message.id}`);
      expect(reply.text).toBe("Message 1 was already answered and cannot be ignored.");
      expect((await store.getMessage(message.id))?.status).toBe("answered");
    });
  });

  // -------------------------------------------------------------------------
  // edit
  // -------------------------------------------------------------------------

  describe("edit", () => {
    it("revises the response with the operator's feedback", async () => {
      const message = await store.addMessage(gmailMessage());
      const response = await store.addResponse({ messageId: message.id, content: "Sure.", kind: "generated" });
      const { generator, revise } = fakeGenerator();
      const c = controller({ generator });

      expect((await c.handle(OPERATOR, `edit:${response.id}`)).text).toBe("✏️ Describe how to change the response:");
      const reply = await c.handle(OPERATOR, "mention Thursday");

      expect(revise).toHaveBeenCalledWith("Sure.", "mention Thursday");
      expect(reply.text).toBe("✏️ Revised response:\n\nSure. (mention Thursday)\n\nWhat would you like to do?");
      expect((await store.getResponse(response.id))?.content).toBe("Sure. (mention Thursday)");
      expect(c.getSession(OPERATOR)).toEqual({ state: "idle" });
    });

    it("keeps the original content when revision fails", async () => {
      const message = await store.addMessage(gmailMessage());
      const response = await store.addResponse({ messageId: message.id, content: "Sure.", kind: "generated" });
      const c = controller({ generator: createGenerator({ client: createUnavailableClient("no key") }) });

      await c.handle(OPERATOR, `edit:${response.id}`);
      await c.handle(OPERATOR, "warmer");

      expect((await store.getResponse(response.id))?.content).toBe("Sure.");
    });

    it("refuses to edit a sent response", async () => {
      const message = await store.addMessage(gmailMessage());
      const response = await store.addResponse({ messageId: message.id, content: "Sure.", kind: "generated" });
      await store.markResponseSent(response.id, 60_000);
      const c = controller();

      expect((await c.handle(OPERATOR, `edit:${response.id}`)).text).toBe("Response 1 was already sent.");
      expect(c.getSession(OPERATOR)).toEqual({ state: "idle" });
    });
  });

  // -------------------------------------------------------------------------
  // send
  // -------------------------------------------------------------------------

  describe("send", () => {
    it("delivers the response, then records it as sent and the message as answered", async () => {
      const message = await store.addMessage(gmailMessage());
      await store.updateMessageStatus(message.id, "processing");
      const response = await store.addResponse({ messageId: message.id, content: "See you then.", kind: "manual" });
      const { registry, sendMessage } = fakeRegistry(true);

      const reply = await controller({ registry }).handle(OPERATOR, `send:${response.id}`);

      expect(reply.text).toBe(`✅ Response sent! ${IDLE_HINT}`);
      expect(sendMessage).toHaveBeenCalledWith("gmail", "sam@example.test", "See you then.");
      expect(await store.getResponse(response.id)).toMatchObject({ isSent: true, sentAt: NOW });
      expect(await store.getMessage(message.id)).toMatchObject({ status: "answered", isAnswered: true });
    });

    it("leaves everything unsent when delivery fails", async () => {
      const message = await store.addMessage(gmailMessage());
      await store.updateMessageStatus(message.id, "processing");
      const response = await store.addResponse({ messageId: message.id, content: "See you then.", kind: "manual" });

      const reply = await controller({ registry: fakeRegistry(false).registry }).handle(OPERATOR, `send:${response.id}`);

      expect(reply.text).toBe("❌ Could not send via Gmail. The response was kept; try again later.");
      expect(reply.actions).toEqual([[{ label: "🔁 Retry", command: "send:1" }]]);
      expect(await store.getResponse(response.id)).toMatchObject({ isSent: false, sentAt: null });
      expect((await store.getMessage(message.id))?.status).toBe("processing");
    });

    it("says so when delivery worked but recording it failed", async () => {
      const message = await store.addMessage(gmailMessage());
      const response = await store.addResponse({ messageId: message.id, content: "See you then.", kind: "manual" });
      const failing: TriageStore = {
        ...store,
        markResponseSent: async () => {
          throw new PersistenceError("markResponseSent failed: disk I/O error");
        },
      };
      const { registry, sendMessage } = fakeRegistry(true);

      const reply = await controller({ registry, store: failing }).handle(OPERATOR, `send:${response.id}`);

      expect(sendMessage).toHaveBeenCalledTimes(1);
      expect(reply).toEqual({
        text: "⚠️ Response sent, but not recorded: markResponseSent failed: disk I/O error. Do not send it again.",
        actions: [],
      });
    });

    it("does not send twice", async () => {
      const message = await store.addMessage(gmailMessage());
      const response = await store.addResponse({ messageId: message.id, content: "ok", kind: "manual" });
      const { registry, sendMessage } = fakeRegistry(true);
      const c = controller({ registry });

      await c.handle(OPERATOR, `send:${response.id}`);
      expect((await c.handle(OPERATOR, `send:${response.id}`)).text).toBe("Response 1 was already sent.");
      expect(sendMessage).toHaveBeenCalledTimes(1);
    });

    it("does not send for an ignored message", async () => {
      const message = await store.addMessage(gmailMessage());
      const response = await store.addResponse({ messageId: message.id, content: "ok", kind: "manual" });
      await store.updateMessageStatus(message.id, "ignored");
      const { registry, sendMessage } = fakeRegistry(true);

      expect((await controller({ registry }).handle(OPERATOR, `send:${response.id}`)).text).toBe(
        "Message 1 was ignored; nothing was sent.",
      );
      expect(sendMessage).not.toHaveBeenCalled();
    });
  });

  // -------------------------------------------------------------------------
  // failures
  // -------------------------------------------------------------------------

  it("reports a persistence failure as a reply", async () => {
    const message = await store.addMessage(gmailMessage());
    const c = controller();
    await c.handle(OPERATOR, `manual:${message.id}`);
    await store.close();

    const reply = await c.handle(OPERATOR, "hello");

    expect(reply.text.startsWith("❌ Text failed: getMessage failed:")).toBe(true);
    expect(c.getSession(OPERATOR)).toEqual({ state: "idle" });
  });
});
