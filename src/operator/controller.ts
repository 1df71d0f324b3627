import { createLogger } from "../logging.js";
import { AppError, InvalidTransitionError, errorMessage, formatError } from "../infra/errors.js";
import { capitalize, truncate } from "../utils.js";
import { getSourceMeta } from "../connectors/sources.js";
import type { ConnectorRegistry } from "../connectors/registry.js";
import type { Generator } from "../generation/generator.js";
import { buildSystemPrompt, buildUserPrompt } from "../generation/prompt.js";
import { isTerminal } from "../store/lifecycle.js";
import type { ConnectorState } from "../connectors/types.js";
import type { Message, ResponseRecord, TriageStore } from "../store/types.js";
import { buttonPayload, parseOperatorCommand, type OperatorCommand } from "./commands.js";
import { OperatorSessionStore, type OperatorSession } from "./sessions.js";

const log = createLogger("controller");

const PREVIEW_LENGTH = 500;

export type ReplyAction = {
  readonly label: string;
  readonly command: string;
};

/** What the operator sees: text plus rows of buttons carrying command strings. */
export type OperatorReply = {
  readonly text: string;
  readonly actions: ReadonlyArray<ReadonlyArray<ReplyAction>>;
};

export type ControllerRegistry = Pick<ConnectorRegistry, "sendMessage" | "getStates">;

export type ConversationControllerParams = {
  store: TriageStore;
  registry: ControllerRegistry;
  generator: Generator;
  sessions?: OperatorSessionStore;
  now?: () => number;
  maxResponseLength?: number;
  maxTokens?: number;
  /** Extra line for the status report, e.g. dispatcher state. */
  describeDispatcher?: () => string;
};

export const WELCOME_TEXT = [
  "Welcome to triagedesk.",
  "",
  "Messages from your connected inboxes are queued here.",
  "/next - process the next message in the queue",
  "/status - show source connections",
].join("\n");

export const IDLE_HINT = "Use /next to process the next message.";

function reply(text: string, actions: ReplyAction[][] = []): OperatorReply {
  return { text, actions };
}

function messageActions(messageId: number): ReplyAction[][] {
  return [
    [
      { label: "🤖 Generate response", command: buttonPayload("generate", messageId) },
      { label: "❌ Ignore", command: buttonPayload("ignore", messageId) },
    ],
    [{ label: "✍️ Answer manually", command: buttonPayload("manual", messageId) }],
  ];
}

function responseActions(response: ResponseRecord): ReplyAction[][] {
  return [
    [
      { label: "✅ Send", command: buttonPayload("send", response.id) },
      { label: "✏️ Edit", command: buttonPayload("edit", response.id) },
    ],
    [{ label: "✍️ Answer manually", command: buttonPayload("manual", response.messageId) }],
  ];
}

function describeSource(state: ConnectorState, now: number): string {
  const line = `${state.connected ? "🟢" : "🔴"} ${getSourceMeta(state.source).label} (${state.variant})`;
  const { blockedUntil } = state.rateLimit;
  if (blockedUntil !== null && blockedUntil > now) {
    return `${line}, rate limited until ${new Date(blockedUntil).toISOString()}`;
  }
  return state.lastError ? `${line}, last error: ${state.lastError}` : line;
}

function describeMessage(message: Message): string {
  return [
    `📨 New message from ${getSourceMeta(message.source).label}`,
    "",
    `👤 From: ${message.sender}`,
    `🏷 Category: ${message.category}`,
    `📝 ${truncate(message.content, PREVIEW_LENGTH)}`,
    "",
    "What would you like to do?",
  ].join("\n");
}

/**
 * Per-operator state machine over the persisted queue. Button commands
 * replace whatever request was pending; free text is routed by the
 * current session. Every outcome, including failures, is a reply.
 */
export class ConversationController {
  private readonly store: TriageStore;
  private readonly registry: ControllerRegistry;
  private readonly generator: Generator;
  private readonly sessions: OperatorSessionStore;
  private readonly now: () => number;
  private readonly maxResponseLength: number | undefined;
  private readonly maxTokens: number | undefined;
  private readonly describeDispatcher: (() => string) | undefined;

  constructor(params: ConversationControllerParams) {
    this.store = params.store;
    this.registry = params.registry;
    this.generator = params.generator;
    this.sessions = params.sessions ?? new OperatorSessionStore();
    this.now = params.now ?? Date.now;
    this.maxResponseLength = params.maxResponseLength;
    this.maxTokens = params.maxTokens;
    this.describeDispatcher = params.describeDispatcher;
  }

  getSession(operatorId: string): OperatorSession {
    return this.sessions.get(operatorId);
  }

  async handle(operatorId: string, input: string | OperatorCommand): Promise<OperatorReply> {
    const command = typeof input === "string" ? parseOperatorCommand(input) : input;
    try {
      return await this.dispatch(operatorId, command);
    } catch (err) {
      if (err instanceof AppError) {
        log.warn(`${command.kind} failed for operator ${operatorId}: ${err.message}`);
      } else {
        log.error(`${command.kind} failed for operator ${operatorId}: ${formatError(err)}`);
      }
      return reply(`❌ ${capitalize(command.kind)} failed: ${errorMessage(err)}`);
    }
  }

  private async dispatch(operatorId: string, command: OperatorCommand): Promise<OperatorReply> {
    switch (command.kind) {
      case "start":
        return reply(WELCOME_TEXT);
      case "status":
        return this.status();
      case "next":
        return this.next();
      case "generate":
        this.sessions.clear(operatorId);
        return this.generate(command.messageId);
      case "ignore":
        this.sessions.clear(operatorId);
        return this.ignore(command.messageId);
      case "manual":
        return this.beginManual(operatorId, command.messageId);
      case "edit":
        return this.beginEdit(operatorId, command.responseId);
      case "send":
        this.sessions.clear(operatorId);
        return this.send(command.responseId);
      case "text":
        return this.text(operatorId, command.text);
    }
  }

  private async status(): Promise<OperatorReply> {
    const now = this.now();
    const lines = ["📊 Sources", ...this.registry.getStates().map((state) => describeSource(state, now))];
    const counts = await this.store.countByStatus();
    lines.push("", `Queue: ${counts.pending} pending, ${counts.processing} in progress`);
    if (this.describeDispatcher) {
      lines.push(this.describeDispatcher());
    }
    return reply(lines.join("\n"));
  }

  private async next(): Promise<OperatorReply> {
    const pending = await this.store.getNextPending();
    if (!pending) {
      return reply("✅ No pending messages in queue!");
    }
    const message = await this.store.updateMessageStatus(pending.id, "processing");
    return reply(describeMessage(message), messageActions(message.id));
  }

  private async requireOpenMessage(messageId: number): Promise<Message | OperatorReply> {
    const message = await this.store.getMessage(messageId);
    if (!message) {
      return reply(`Message ${messageId} not found.`);
    }
    if (isTerminal(message.status)) {
      return reply(`Message ${messageId} is already ${message.status}. ${IDLE_HINT}`);
    }
    return message;
  }

  private async generate(messageId: number): Promise<OperatorReply> {
    const message = await this.requireOpenMessage(messageId);
    if (!isMessage(message)) return message;

    const preferences = await this.store.getPreferences();
    const text = await this.generator.draft(
      buildSystemPrompt({ source: message.source, preferences, maxResponseLength: this.maxResponseLength }),
      buildUserPrompt(message),
      this.maxTokens,
    );
    const response = await this.store.addResponse({ messageId, content: text, kind: "generated" });
    return reply(`🤖 Generated response:\n\n${response.content}\n\nWhat would you like to do?`, responseActions(response));
  }

  private async ignore(messageId: number): Promise<OperatorReply> {
    try {
      await this.store.updateMessageStatus(messageId, "ignored");
    } catch (err) {
      if (err instanceof InvalidTransitionError) {
        return reply(`Message ${messageId} was already answered and cannot be ignored.`);
      }
      throw err;
    }
    return reply(`✅ Message ignored. ${IDLE_HINT}`);
  }

  private async beginManual(operatorId: string, messageId: number): Promise<OperatorReply> {
    this.sessions.clear(operatorId);
    const message = await this.requireOpenMessage(messageId);
    if (!isMessage(message)) return message;
    this.sessions.set(operatorId, { state: "awaitingManualResponse", messageId });
    return reply(`✍️ Type your reply to ${message.sender}:`);
  }

  private async beginEdit(operatorId: string, responseId: number): Promise<OperatorReply> {
    this.sessions.clear(operatorId);
    const response = await this.store.getResponse(responseId);
    if (!response) {
      return reply(`Response ${responseId} not found.`);
    }
    if (response.isSent) {
      return reply(`Response ${responseId} was already sent.`);
    }
    this.sessions.set(operatorId, { state: "awaitingEditFeedback", responseId });
    return reply("✏️ Describe how to change the response:");
  }

  private async text(operatorId: string, text: string): Promise<OperatorReply> {
    const session = this.sessions.get(operatorId);
    // Consume the pending request before any await so a failure still returns to idle.
    this.sessions.clear(operatorId);

    switch (session.state) {
      case "idle":
        return reply(IDLE_HINT);
      case "awaitingManualResponse": {
        // The message may have been ignored or answered since the request.
        const message = await this.requireOpenMessage(session.messageId);
        if (!isMessage(message)) return message;
        const response = await this.store.addResponse({
          messageId: session.messageId,
          content: text,
          kind: "manual",
        });
        return reply(`✍️ Manual response:\n\n${response.content}\n\nWhat would you like to do?`, responseActions(response));
      }
      case "awaitingEditFeedback": {
        const current = await this.store.getResponse(session.responseId);
        if (!current) {
          return reply(`Response ${session.responseId} not found.`);
        }
        const revised = await this.generator.revise(current.content, text);
        const response = await this.store.updateResponseContent(current.id, revised);
        return reply(`✏️ Revised response:\n\n${response.content}\n\nWhat would you like to do?`, responseActions(response));
      }
    }
  }

  private async send(responseId: number): Promise<OperatorReply> {
    const response = await this.store.getResponse(responseId);
    if (!response) {
      return reply(`Response ${responseId} not found.`);
    }
    if (response.isSent) {
      return reply(`Response ${responseId} was already sent.`);
    }
    const message = await this.store.getMessage(response.messageId);
    if (!message) {
      return reply(`Message ${response.messageId} not found.`);
    }
    if (message.isIgnored) {
      return reply(`Message ${message.id} was ignored; nothing was sent.`);
    }

    const delivered = await this.registry.sendMessage(message.source, message.replyTo, response.content);
    if (!delivered) {
      const label = getSourceMeta(message.source).label;
      return reply(`❌ Could not send via ${label}. The response was kept; try again later.`, [
        [{ label: "🔁 Retry", command: buttonPayload("send", response.id) }],
      ]);
    }

    try {
      await this.store.markResponseSent(response.id, this.now());
      await this.store.updateMessageStatus(message.id, "answered");
    } catch (err) {
      log.error(`Response ${response.id} was delivered but not recorded: ${formatError(err)}`);
      return reply(`⚠️ Response sent, but not recorded: ${errorMessage(err)}. Do not send it again.`);
    }
    return reply(`✅ Response sent! ${IDLE_HINT}`);
  }
}

function isMessage(value: Message | OperatorReply): value is Message {
  return "id" in value;
}
