import type { MessageCategory } from "../classifier/types.js";
import type { SourceId } from "../connectors/types.js";

export type MessageStatus = "pending" | "processing" | "answered" | "ignored";

export type Message = {
  readonly id: number;
  readonly source: SourceId;
  readonly sender: string;
  readonly content: string;
  readonly receivedAt: number;
  readonly status: MessageStatus;
  readonly category: MessageCategory;
  readonly isAnswered: boolean;
  readonly isIgnored: boolean;
  /** Address replies go to; the sender when the source gave none. */
  readonly replyTo: string;
  readonly externalId: string | null;
};

export type NewMessage = {
  source: SourceId;
  sender: string;
  content: string;
  receivedAt: number;
  category: MessageCategory;
  replyTo?: string;
  externalId?: string;
};

export type ResponseKind = "generated" | "manual";

export type ResponseRecord = {
  readonly id: number;
  readonly messageId: number;
  readonly content: string;
  readonly kind: ResponseKind;
  readonly isSent: boolean;
  readonly sentAt: number | null;
  readonly createdAt: number;
};

export type NewResponse = {
  messageId: number;
  content: string;
  kind: ResponseKind;
};

export type OperatorPreferences = {
  writingStyle: string;
  personalityTraits: string[];
  interests: string[];
  responseRules: string[];
};

export type StatusCounts = Record<MessageStatus, number>;

/**
 * Persistence collaborator shared by the dispatcher and the controller.
 * Each call is one atomic mutation; failures surface as PersistenceError,
 * illegal lifecycle moves as InvalidTransitionError.
 */
export type TriageStore = {
  addMessage: (message: NewMessage) => Promise<Message>;
  getMessage: (id: number) => Promise<Message | null>;
  /** Ordered by receivedAt ascending. */
  listMessagesByStatus: (status: MessageStatus) => Promise<Message[]>;
  getNextPending: () => Promise<Message | null>;
  updateMessageStatus: (id: number, status: MessageStatus) => Promise<Message>;
  countByStatus: () => Promise<StatusCounts>;

  addResponse: (response: NewResponse) => Promise<ResponseRecord>;
  getResponse: (id: number) => Promise<ResponseRecord | null>;
  listResponses: (messageId: number) => Promise<ResponseRecord[]>;
  updateResponseContent: (id: number, content: string) => Promise<ResponseRecord>;
  markResponseSent: (id: number, sentAt: number) => Promise<ResponseRecord>;

  getPreferences: () => Promise<OperatorPreferences>;
  setPreferences: (preferences: Partial<OperatorPreferences>) => Promise<OperatorPreferences>;

  /** Deletes every message, response and preference. */
  reset: () => Promise<void>;
  close: () => Promise<void>;
};
