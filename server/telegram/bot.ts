/**
 * Telegram Bot Setup
 *
 * Purpose:
 * Builds the grammy Bot and adapts its Context to the channel interfaces
 * BotHandlers works against.
 *
 * Key Flows:
 * 1. Allow-list check on every update
 * 2. /start and /help
 * 3. voice/audio → BotHandlers.handleAudio
 * 4. text (including /cancel) → BotHandlers.handleText
 * 5. callback data → BotHandlers.handleCallback
 *
 * Layer: Telegram (bot wiring)
 */

import { Bot, GrammyError, InlineKeyboard, type Context } from "grammy";
import { isAuthorized, type AppConfig } from "../config/env";
import { getErrorMessage } from "../utils/errorHandler";
import { logWarn, RequestLogger } from "../utils/logger";
import { downloadTelegramFile } from "./download";
import type { BotHandlers, CallbackChannel, ReplyChannel, TelegramUser } from "./handlers";
import { HELP_MESSAGE, startMessage, UNAUTHORIZED_MESSAGE } from "./messages";

function replyChannel(ctx: Context, chatId: number): ReplyChannel {
  return {
    async reply(text, keyboard) {
      const sent = await ctx.reply(text, { reply_markup: keyboard });
      return sent.message_id;
    },
    async edit(messageId, text, keyboard) {
      await ctx.api.editMessageText(chatId, messageId, text, { reply_markup: keyboard });
    },
  };
}

function callbackChannel(ctx: Context): CallbackChannel {
  return {
    async answer(toast) {
      await ctx.answerCallbackQuery({ text: toast });
    },
    async clearButtons() {
      try {
        await ctx.editMessageReplyMarkup({ reply_markup: new InlineKeyboard() });
      } catch (error) {
        // The keyboard may already be gone (message deleted or edited twice).
        if (!(error instanceof GrammyError)) throw error;
        logWarn(`[Telegram] Could not clear buttons: ${error.description}`);
      }
    },
    async reply(text, keyboard) {
      await ctx.reply(text, { reply_markup: keyboard });
    },
  };
}

function toUser(ctx: Context): TelegramUser | null {
  if (!ctx.from) return null;
  return { id: ctx.from.id, username: ctx.from.username };
}

export function createBot(config: AppConfig, handlers: BotHandlers): Bot {
  const bot = new Bot(config.telegramToken);

  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id;
    if (userId !== undefined && isAuthorized(config, userId)) {
      await next();
      return;
    }

    logWarn(`[Telegram] Unauthorized access attempt from ${userId ?? "unknown"}`);
    if (ctx.callbackQuery) {
      await ctx.answerCallbackQuery({ text: UNAUTHORIZED_MESSAGE });
    } else if (ctx.chat) {
      await ctx.reply(UNAUTHORIZED_MESSAGE);
    }
  });

  bot.command("start", async (ctx) => {
    await ctx.reply(startMessage(ctx.from?.first_name ?? "there"));
  });

  bot.command("help", async (ctx) => {
    await ctx.reply(HELP_MESSAGE);
  });

  bot.on("message:voice", async (ctx) => {
    const user = toUser(ctx);
    if (!user) return;
    const voice = ctx.message.voice;
    await handlers.handleAudio(replyChannel(ctx, ctx.chat.id), {
      kind: "voice",
      fileUniqueId: voice.file_unique_id,
      mimeType: voice.mime_type,
      chatId: ctx.chat.id,
      user,
      download: () => downloadTelegramFile(ctx.api, config.telegramToken, voice.file_id),
    });
  });

  bot.on("message:audio", async (ctx) => {
    const user = toUser(ctx);
    if (!user) return;
    const audio = ctx.message.audio;
    await handlers.handleAudio(replyChannel(ctx, ctx.chat.id), {
      kind: "audio",
      fileUniqueId: audio.file_unique_id,
      mimeType: audio.mime_type,
      chatId: ctx.chat.id,
      user,
      download: () => downloadTelegramFile(ctx.api, config.telegramToken, audio.file_id),
    });
  });

  bot.on("message:text", async (ctx) => {
    const user = toUser(ctx);
    if (!user) return;
    await handlers.handleText(replyChannel(ctx, ctx.chat.id), user, ctx.message.text);
  });

  bot.on("callback_query:data", async (ctx) => {
    const user = toUser(ctx);
    if (!user) return;
    await handlers.handleCallback(callbackChannel(ctx), user, ctx.callbackQuery.data);
  });

  bot.catch((err) => {
    const logger = new RequestLogger(err.ctx.chat?.id, err.ctx.from?.id, "update");
    logger.error(`Unhandled error in update ${err.ctx.update.update_id}: ${getErrorMessage(err.error)}`, err.error);
  });

  return bot;
}
