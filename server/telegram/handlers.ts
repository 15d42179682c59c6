/**
 * Telegram update handlers.
 *
 * Purpose:
 * Glue between Telegram updates and the dialog/ingest core. Works against the
 * small channel interfaces below instead of grammy's Context so the flows can
 * be exercised without a bot.
 *
 * Key Flows:
 * 1. Voice/audio → dedupe → claim → download → ingest → result + first question
 * 2. Text → ConversationRouter (contact dialog or general chat)
 * 3. Button press → CallbackActionHandler
 *
 * Layer: Telegram (event handling)
 */

import type { InlineKeyboard } from "grammy";
import type { CallbackActionRegistry } from "../dialog/actionRegistry";
import type { ActionOutcome, CallbackActionHandler } from "../dialog/callbackActions";
import type { ConversationRouter } from "../dialog/conversationRouter";
import type { FingerprintCache } from "../dialog/fingerprintCache";
import type { DialogOutcome } from "../dialog/linkDialog";
import type { QueuePrompt } from "../dialog/pendingLinkQueue";
import type { AudioKind } from "../ingest/filename";
import type { IngestOrchestrator, IngestTicket } from "../ingest/orchestrator";
import { classifyBotError } from "../utils/errorHandler";
import { RequestLogger } from "../utils/logger";
import { buildCorrectionKeyboard, buildReferenceKeyboard } from "./keyboards";
import { downloadingMessage, PROCESSING_MESSAGE, renderIngestResult } from "./messages";

export interface ReplyChannel {
  /** @returns id of the sent message */
  reply(text: string, keyboard?: InlineKeyboard): Promise<number>;
  edit(messageId: number, text: string, keyboard?: InlineKeyboard): Promise<void>;
}

export interface CallbackChannel {
  answer(toast: string): Promise<void>;
  clearButtons(): Promise<void>;
  reply(text: string, keyboard?: InlineKeyboard): Promise<void>;
}

export interface TelegramUser {
  id: number;
  username?: string;
}

export interface IncomingAudio {
  kind: AudioKind;
  fileUniqueId: string;
  mimeType?: string;
  chatId: number;
  user: TelegramUser;
  download: () => Promise<Buffer>;
}

export interface BotHandlerDeps {
  fingerprints: FingerprintCache;
  registry: CallbackActionRegistry;
  orchestrator: IngestOrchestrator;
  router: ConversationRouter;
  callbacks: CallbackActionHandler;
}

const PROMPTING_OUTCOMES: ReadonlySet<DialogOutcome> = new Set(["linked", "created", "skipped", "reprompt"]);
const KEYBOARD_OUTCOMES: ReadonlySet<ActionOutcome> = new Set(["linked", "created", "skipped", "failed"]);

export class BotHandlers {
  constructor(private readonly deps: BotHandlerDeps) {}

  async handleAudio(channel: ReplyChannel, audio: IncomingAudio): Promise<void> {
    const logger = new RequestLogger(audio.chatId, audio.user.id, audio.kind);

    if (this.deps.fingerprints.seen(audio.fileUniqueId)) {
      logger.info("Duplicate file delivery ignored", { fileUniqueId: audio.fileUniqueId });
      return;
    }

    // Claimed before any await so replies during the download skip the old session.
    const ticket = this.deps.orchestrator.begin(audio.user.id);
    try {
      await this.processAudio(channel, audio, ticket, logger);
    } finally {
      this.deps.orchestrator.abandon(ticket);
    }
  }

  private async processAudio(
    channel: ReplyChannel,
    audio: IncomingAudio,
    ticket: IngestTicket,
    logger: RequestLogger,
  ): Promise<void> {
    logger.info(`Received ${audio.kind} from ${audio.user.username ?? "unknown"}`, { mimeType: audio.mimeType });
    const statusId = await channel.reply(downloadingMessage(audio.kind));

    try {
      const bytes = await audio.download();
      logger.debug("Download complete", { bytes: bytes.length });
      await channel.edit(statusId, PROCESSING_MESSAGE);

      const result = await this.deps.orchestrator.ingest(
        {
          kind: audio.kind,
          bytes,
          userId: audio.user.id,
          username: audio.user.username,
          mimeType: audio.mimeType,
        },
        ticket,
      );
      logger.info(`Ingest ${result.status}`, { filename: result.filename });

      const corrections =
        result.status === "completed" ? buildCorrectionKeyboard(this.deps.registry, result.analysis.linked) : null;
      await channel.edit(statusId, renderIngestResult(result), corrections ?? undefined);

      if (result.status === "completed" && result.prompt) {
        await this.sendPrompt(channel, result.prompt.text, result.prompt);
      }
    } catch (error) {
      const classified = classifyBotError(error);
      logger.error(`Error processing ${audio.kind}`, error, { errorType: classified.type });
      await channel.edit(statusId, classified.userMessage);
    }
  }

  async handleText(channel: ReplyChannel, user: TelegramUser, text: string): Promise<void> {
    const result = await this.deps.router.route(user.id, text);

    switch (result.kind) {
      case "control":
      case "chat":
        await channel.reply(result.text);
        return;
      case "dialog": {
        const { reply } = result;
        const prompt = PROMPTING_OUTCOMES.has(reply.outcome) ? reply.prompt : null;
        await this.sendPrompt(channel, reply.text, prompt);
        return;
      }
    }
  }

  async handleCallback(channel: CallbackChannel, user: TelegramUser, token: string): Promise<void> {
    const reply = await this.deps.callbacks.handle(user.id, token);
    await channel.answer(reply.toast);

    if (reply.outcome !== "blocked" && reply.outcome !== "correcting") {
      await channel.clearButtons();
    }

    // Correction prompts are answered by typing only. A failed press spent
    // its keyboard, so the open question gets fresh buttons to retry with.
    const keyboard =
      reply.prompt && KEYBOARD_OUTCOMES.has(reply.outcome)
        ? buildReferenceKeyboard(this.deps.registry, reply.prompt.reference)
        : undefined;
    await channel.reply(reply.text, keyboard);
  }

  private async sendPrompt(channel: ReplyChannel, text: string, prompt: QueuePrompt | null): Promise<void> {
    const keyboard = prompt ? buildReferenceKeyboard(this.deps.registry, prompt.reference) : undefined;
    await channel.reply(text, keyboard);
  }
}
