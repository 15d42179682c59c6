/**
 * Conversation Router
 *
 * Decides what an inbound text message is:
 * 1. A control command (/cancel) → handled here
 * 2. A reply to an open contact question → LinkDialog, exclusively
 * 3. Anything else → general conversation with short-term history
 *
 * While a pending-link session is open nothing falls through to chat, even
 * text that looks like small talk.
 */

import type { ChatCollaborator } from "../clients/chatApi";
import { classifyBotError } from "../utils/errorHandler";
import type { ConversationHistory } from "./conversationHistory";
import type { DialogReply, LinkDialog } from "./linkDialog";
import type { PendingLinkQueue, UserId } from "./pendingLinkQueue";

export const CANCEL_COMMAND = "/cancel";

export type RouteResult =
  | { kind: "dialog"; reply: DialogReply }
  | { kind: "control"; text: string }
  | { kind: "chat"; text: string; ok: boolean };

export interface ConversationRouterDeps {
  queue: PendingLinkQueue;
  dialog: LinkDialog;
  history: ConversationHistory;
  chat: ChatCollaborator;
}

const CHAT_APOLOGY = "😕 Sorry, I couldn't come up with an answer right now. Please try again in a moment.";

export function isControlToken(text: string): boolean {
  const command = text.trim().toLowerCase().split(/[\s@]/)[0];
  return command === CANCEL_COMMAND;
}

export class ConversationRouter {
  constructor(private readonly deps: ConversationRouterDeps) {}

  async route(user: UserId, text: string): Promise<RouteResult> {
    if (isControlToken(text)) {
      return { kind: "control", text: this.cancel(user) };
    }

    if (this.deps.queue.has(user)) {
      return { kind: "dialog", reply: await this.deps.dialog.handle(user, text) };
    }

    return this.chat(user, text);
  }

  private cancel(user: UserId): string {
    return this.deps.queue.discard(user)
      ? "🛑 Stopped. The remaining contacts were left unlinked."
      : "Nothing to cancel.";
  }

  private async chat(user: UserId, text: string): Promise<RouteResult> {
    const history = this.deps.history.get(user);
    try {
      const reply = await this.deps.chat.reply(user, text, history);
      this.deps.history.append(user, { role: "user", content: text }, { role: "assistant", content: reply });
      return { kind: "chat", text: reply, ok: true };
    } catch (error) {
      const classified = classifyBotError(error);
      console.error(`[Router] Chat failed for ${user}: ${classified.errorMessage}`);
      const message = classified.type === "configuration" ? classified.userMessage : CHAT_APOLOGY;
      return { kind: "chat", text: message, ok: false };
    }
  }
}
