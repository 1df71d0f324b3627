import { Bot, InlineKeyboard, type Context } from "grammy";
import { createLogger } from "../logging.js";
import { errorMessage, formatError } from "../infra/errors.js";
import { truncate } from "../utils.js";
import { getSourceMeta } from "../connectors/sources.js";
import type { Message } from "../store/types.js";
import type { ConversationController, OperatorReply } from "./controller.js";

const log = createLogger("operator-bot");

const MAX_MESSAGE_LENGTH = 4000;
const NOTIFICATION_PREVIEW_LENGTH = 100;
const MAX_RECONNECT_ATTEMPTS = 10;
const BASE_RECONNECT_DELAY_MS = 2000;

export type OperatorSurfaceParams = {
  token: string;
  /** Chat that receives new-message notifications. */
  chatId?: string;
  allowFrom?: string[];
  controller: ConversationController;
};

export type OperatorSurfaceHandle = {
  readonly bot: Bot;
  notify: (message: Message) => Promise<void>;
  stop: () => Promise<void>;
};

export function isAllowed(from: { id: number; username?: string }, allowFrom: string[] | undefined): boolean {
  if (!allowFrom || allowFrom.length === 0) return true;
  const idStr = String(from.id);
  return allowFrom.some((entry) => {
    const cleaned = entry.replace(/^@/, "").trim();
    if (!cleaned) return false;
    return cleaned === idStr || (from.username != null && cleaned.toLowerCase() === from.username.toLowerCase());
  });
}

export function toKeyboard(reply: OperatorReply): InlineKeyboard | undefined {
  if (reply.actions.length === 0) return undefined;
  const keyboard = new InlineKeyboard();
  reply.actions.forEach((row, index) => {
    if (index > 0) keyboard.row();
    for (const action of row) {
      keyboard.text(action.label, action.command);
    }
  });
  return keyboard;
}

export function formatNotification(message: Message): string {
  const label = getSourceMeta(message.source).label;
  return [
    `🔔 New ${label} message from ${message.sender}: ${truncate(message.content, NOTIFICATION_PREVIEW_LENGTH)}`,
    "",
    "Use /next to process.",
  ].join("\n");
}

async function send(ctx: Context, reply: OperatorReply): Promise<void> {
  await ctx.reply(truncate(reply.text, MAX_MESSAGE_LENGTH), { reply_markup: toKeyboard(reply) });
}

/**
 * Telegram bot the operator drives the queue from. Commands, button presses
 * and free text all go through the controller; the handle can push
 * notifications to the configured chat.
 */
export async function startOperatorSurface(params: OperatorSurfaceParams): Promise<OperatorSurfaceHandle> {
  const { token, chatId, allowFrom, controller } = params;

  const bot = new Bot(token);
  let stopped = false;

  bot.catch((err) => {
    log.error(`Operator bot error (update ${err.ctx.update.update_id}): ${errorMessage(err.error)}`);
  });

  // Drop updates from anyone outside the allow list before any handler runs.
  bot.use(async (ctx, next) => {
    if (!ctx.from || !isAllowed(ctx.from, allowFrom)) {
      log.warn(`Ignoring update from unauthorised user ${ctx.from?.id ?? "unknown"}`);
      return;
    }
    await next();
  });

  for (const name of ["start", "next", "status"] as const) {
    bot.command(name, async (ctx) => {
      await send(ctx, await controller.handle(String(ctx.from?.id), name));
    });
  }

  bot.on("callback_query:data", async (ctx) => {
    await ctx.answerCallbackQuery();
    await send(ctx, await controller.handle(String(ctx.from.id), ctx.callbackQuery.data));
  });

  bot.on("message:text", async (ctx) => {
    // Unknown slash commands are not free text.
    if (ctx.message.text.startsWith("/")) return;
    await send(ctx, await controller.handle(String(ctx.from.id), { kind: "text", text: ctx.message.text }));
  });

  // Validate token and fetch bot info before starting
  await bot.init();
  log.info(`Operator bot @${bot.botInfo.username} initialized`);

  let reconnectAttempts = 0;
  let reconnectTimer: ReturnType<typeof setTimeout> | undefined;

  const startPolling = (): void => {
    bot
      .start({
        onStart: () => {
          reconnectAttempts = 0;
          log.info("Operator bot polling started");
        },
      })
      .catch((err) => {
        if (stopped) return;
        if (reconnectAttempts < MAX_RECONNECT_ATTEMPTS) {
          const delay = Math.min(BASE_RECONNECT_DELAY_MS * 2 ** reconnectAttempts, 60_000);
          reconnectAttempts++;
          log.warn(
            `Operator bot polling error, reconnecting in ${delay}ms (attempt ${reconnectAttempts}/${MAX_RECONNECT_ATTEMPTS})`,
          );
          reconnectTimer = setTimeout(() => {
            reconnectTimer = undefined;
            if (!stopped) startPolling();
          }, delay);
        } else {
          log.error(`Operator bot reconnection attempts exhausted: ${formatError(err)}`);
        }
      });
  };

  startPolling();

  return {
    bot,

    notify: async (message) => {
      if (!chatId) {
        log.debug(`No operator chat configured; not announcing message ${message.id}`);
        return;
      }
      const keyboard = new InlineKeyboard().text("▶️ Next", "next");
      await bot.api.sendMessage(chatId, formatNotification(message), { reply_markup: keyboard });
    },

    stop: async () => {
      stopped = true;
      if (reconnectTimer != null) {
        clearTimeout(reconnectTimer);
        reconnectTimer = undefined;
      }
      await bot.stop();
    },
  };
}
