import { z } from "zod";
import { createLogger } from "../logging.js";
import { AppError, InvalidTransitionError, PersistenceError, errorMessage } from "../infra/errors.js";
import { isMessageCategory } from "../classifier/types.js";
import { isSourceId } from "../connectors/sources.js";
import { TRIAGE_SCHEMA } from "./schema.js";
import { canTransition } from "./lifecycle.js";
import { closeDatabase, openDatabase, withTransaction, type SqliteDb } from "./sqlite.js";
import type {
  Message,
  MessageStatus,
  OperatorPreferences,
  ResponseKind,
  ResponseRecord,
  StatusCounts,
  TriageStore,
} from "./types.js";

const log = createLogger("store");

export const DEFAULT_PREFERENCES: OperatorPreferences = {
  writingStyle: "professional",
  personalityTraits: [],
  interests: [],
  responseRules: [],
};

const PreferencesSchema = z.object({
  writingStyle: z.string().default(DEFAULT_PREFERENCES.writingStyle),
  personalityTraits: z.array(z.string()).default([]),
  interests: z.array(z.string()).default([]),
  responseRules: z.array(z.string()).default([]),
});

type MessageRow = {
  id: number;
  source: string;
  sender: string;
  content: string;
  received_at: number;
  status: string;
  category: string;
  reply_to: string;
  external_id: string | null;
};

type ResponseRow = {
  id: number;
  message_id: number;
  content: string;
  kind: string;
  is_sent: number;
  sent_at: number | null;
  created_at: number;
};

const MESSAGE_COLUMNS = "id, source, sender, content, received_at, status, category, reply_to, external_id";
const RESPONSE_COLUMNS = "id, message_id, content, kind, is_sent, sent_at, created_at";

function isMessageStatus(value: string): value is MessageStatus {
  return value === "pending" || value === "processing" || value === "answered" || value === "ignored";
}

function isResponseKind(value: string): value is ResponseKind {
  return value === "generated" || value === "manual";
}

function toMessage(row: MessageRow): Message {
  const { source, status, category } = row;
  if (!isSourceId(source) || !isMessageStatus(status) || !isMessageCategory(category)) {
    throw new PersistenceError(`Message ${row.id} has an unreadable row (${source}/${status}/${category})`);
  }
  return {
    id: row.id,
    source,
    sender: row.sender,
    content: row.content,
    receivedAt: row.received_at,
    status,
    category,
    isAnswered: status === "answered",
    isIgnored: status === "ignored",
    replyTo: row.reply_to,
    externalId: row.external_id,
  };
}

function toResponse(row: ResponseRow): ResponseRecord {
  const { kind } = row;
  if (!isResponseKind(kind)) {
    throw new PersistenceError(`Response ${row.id} has an unknown kind: ${kind}`);
  }
  return {
    id: row.id,
    messageId: row.message_id,
    content: row.content,
    kind,
    isSent: row.is_sent === 1,
    sentAt: row.sent_at,
    createdAt: row.created_at,
  };
}

/** Runs a store operation, wrapping driver failures in PersistenceError. */
function guard<T>(label: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof AppError) throw err;
    log.error(`${label} failed: ${errorMessage(err)}`);
    throw new PersistenceError(`${label} failed: ${errorMessage(err)}`, err);
  }
}

export type SqliteTriageStoreParams = {
  db: SqliteDb;
  now?: () => number;
};

export function createSqliteTriageStore(params: SqliteTriageStoreParams): TriageStore {
  const { db } = params;
  const now = params.now ?? Date.now;
  db.exec(TRIAGE_SCHEMA);

  const selectMessage = db.prepare<[number], MessageRow>(`SELECT ${MESSAGE_COLUMNS} FROM messages WHERE id = ?`);
  const selectResponse = db.prepare<[number], ResponseRow>(`SELECT ${RESPONSE_COLUMNS} FROM responses WHERE id = ?`);

  function requireMessage(id: number): Message {
    const row = selectMessage.get(id);
    if (!row) throw new PersistenceError(`Message ${id} not found`);
    return toMessage(row);
  }

  function requireResponse(id: number): ResponseRecord {
    const row = selectResponse.get(id);
    if (!row) throw new PersistenceError(`Response ${id} not found`);
    return toResponse(row);
  }

  function readPreferences(): OperatorPreferences {
    const row = db.prepare<[], { data: string }>("SELECT data FROM preferences WHERE id = 1").get();
    if (!row) return { ...DEFAULT_PREFERENCES };
    const parsed = PreferencesSchema.safeParse(JSON.parse(row.data));
    if (!parsed.success) {
      log.warn(`Stored preferences are invalid, using defaults: ${parsed.error.message}`);
      return { ...DEFAULT_PREFERENCES };
    }
    return parsed.data;
  }

  return {
    addMessage: async (message) =>
      guard("addMessage", () => {
        const result = db
          .prepare(
            `INSERT INTO messages (source, sender, content, received_at, status, category, reply_to, external_id, created_at)
             VALUES (?, ?, ?, ?, 'pending', ?, ?, ?, ?)`,
          )
          .run(
            message.source,
            message.sender,
            message.content,
            message.receivedAt,
            message.category,
            message.replyTo ?? message.sender,
            message.externalId ?? null,
            now(),
          );
        return requireMessage(Number(result.lastInsertRowid));
      }),

    getMessage: async (id) =>
      guard("getMessage", () => {
        const row = selectMessage.get(id);
        return row ? toMessage(row) : null;
      }),

    listMessagesByStatus: async (status) =>
      guard("listMessagesByStatus", () =>
        db
          .prepare<[string], MessageRow>(
            `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE status = ? ORDER BY received_at ASC, id ASC`,
          )
          .all(status)
          .map(toMessage),
      ),

    getNextPending: async () =>
      guard("getNextPending", () => {
        const row = db
          .prepare<[], MessageRow>(
            `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE status = 'pending' ORDER BY received_at ASC, id ASC LIMIT 1`,
          )
          .get();
        return row ? toMessage(row) : null;
      }),

    updateMessageStatus: async (id, status) =>
      guard("updateMessageStatus", () =>
        withTransaction(db, () => {
          const current = requireMessage(id);
          if (current.status === status) return current;
          if (!canTransition(current.status, status)) {
            throw new InvalidTransitionError(`Message ${id} cannot move from ${current.status} to ${status}`);
          }
          db.prepare("UPDATE messages SET status = ? WHERE id = ?").run(status, id);
          return requireMessage(id);
        }),
      ),

    countByStatus: async () =>
      guard("countByStatus", () => {
        const counts: StatusCounts = { pending: 0, processing: 0, answered: 0, ignored: 0 };
        const rows = db
          .prepare<[], { status: string; n: number }>("SELECT status, COUNT(*) AS n FROM messages GROUP BY status")
          .all();
        for (const row of rows) {
          if (isMessageStatus(row.status)) counts[row.status] = row.n;
        }
        return counts;
      }),

    addResponse: async (response) =>
      guard("addResponse", () =>
        withTransaction(db, () => {
          requireMessage(response.messageId);
          const result = db
            .prepare("INSERT INTO responses (message_id, content, kind, created_at) VALUES (?, ?, ?, ?)")
            .run(response.messageId, response.content, response.kind, now());
          return requireResponse(Number(result.lastInsertRowid));
        }),
      ),

    getResponse: async (id) =>
      guard("getResponse", () => {
        const row = selectResponse.get(id);
        return row ? toResponse(row) : null;
      }),

    listResponses: async (messageId) =>
      guard("listResponses", () =>
        db
          .prepare<[number], ResponseRow>(
            `SELECT ${RESPONSE_COLUMNS} FROM responses WHERE message_id = ? ORDER BY created_at ASC, id ASC`,
          )
          .all(messageId)
          .map(toResponse),
      ),

    updateResponseContent: async (id, content) =>
      guard("updateResponseContent", () =>
        withTransaction(db, () => {
          const current = requireResponse(id);
          if (current.isSent) {
            throw new InvalidTransitionError(`Response ${id} was already sent`);
          }
          db.prepare("UPDATE responses SET content = ? WHERE id = ?").run(content, id);
          return requireResponse(id);
        }),
      ),

    markResponseSent: async (id, sentAt) =>
      guard("markResponseSent", () =>
        withTransaction(db, () => {
          const current = requireResponse(id);
          if (current.isSent) {
            throw new InvalidTransitionError(`Response ${id} was already sent`);
          }
          db.prepare("UPDATE responses SET is_sent = 1, sent_at = ? WHERE id = ?").run(sentAt, id);
          return requireResponse(id);
        }),
      ),

    getPreferences: async () => guard("getPreferences", readPreferences),

    setPreferences: async (preferences) =>
      guard("setPreferences", () =>
        withTransaction(db, () => {
          const merged: OperatorPreferences = { ...readPreferences(), ...preferences };
          db.prepare(
            "INSERT INTO preferences (id, data) VALUES (1, ?) ON CONFLICT(id) DO UPDATE SET data = excluded.data",
          ).run(JSON.stringify(merged));
          return merged;
        }),
      ),

    reset: async () =>
      guard("reset", () => {
        withTransaction(db, () => {
          db.exec("DELETE FROM responses; DELETE FROM messages; DELETE FROM preferences;");
        });
        log.info("Store reset");
      }),

    close: async () => {
      closeDatabase(db);
    },
  };
}

/** Opens (or creates) the database file and returns a store over it. */
export function openTriageStore(path: string): TriageStore {
  const db = guard("openTriageStore", () => openDatabase(path));
  return createSqliteTriageStore({ db });
}
