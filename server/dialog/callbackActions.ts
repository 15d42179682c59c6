/**
 * Button presses.
 *
 * Buttons bypass the ConversationRouter: the token is looked up in the
 * registry, the action runs once, and if it answers the question currently
 * open in the user's session the session advances as if the user had typed
 * the answer.
 */

import type { PendingReference } from "@shared/schema";
import type { ContactDirectory } from "../clients/intelligenceApi";
import { classifyBotError, ExpiredActionError } from "../utils/errorHandler";
import { decodeToken, type CallbackAction, type CallbackActionRegistry } from "./actionRegistry";
import { splitFullName } from "./linkDialog";
import type { PendingLinkQueue, QueuePrompt, ResolutionOutcome, UserId } from "./pendingLinkQueue";
import { formatCandidate } from "./prompts";

export type ActionOutcome = "linked" | "created" | "skipped" | "correcting" | "blocked" | "expired" | "failed";

export interface ActionReply {
  outcome: ActionOutcome;
  /** Short popup text for the button press */
  toast: string;
  text: string;
  prompt: QueuePrompt | null;
}

function answersReference(action: CallbackAction, reference: PendingReference | undefined): boolean {
  if (!reference || reference.meetingId !== action.meetingId) return false;
  switch (action.kind) {
    case "LINK":
      return reference.candidates.some((candidate) => candidate.id === action.contactId);
    case "CREATE":
    case "SKIP":
      return reference.searchedName === action.searchName;
    case "CORRECT":
      return false;
  }
}

export class CallbackActionHandler {
  constructor(
    private readonly registry: CallbackActionRegistry,
    private readonly queue: PendingLinkQueue,
    private readonly contacts: ContactDirectory,
  ) {}

  async handle(user: UserId, token: string): Promise<ActionReply> {
    // Leave the button usable when it cannot run yet.
    if (decodeToken(token)?.kind === "CORRECT" && this.queue.has(user)) {
      return {
        outcome: "blocked",
        toast: "Answer the open questions first",
        text: "Please finish the open contact questions first (or send /cancel).",
        prompt: this.queue.currentPrompt(user),
      };
    }

    const action = this.registry.consume(token);
    if (!action) {
      const expired = new ExpiredActionError();
      return { outcome: "expired", toast: "This action has expired.", text: classifyBotError(expired).userMessage, prompt: null };
    }

    try {
      return await this.run(user, action);
    } catch (error) {
      const classified = classifyBotError(error);
      console.error(`[Callback] ${action.kind} failed for ${user}: ${classified.errorMessage}`);
      const prompt = this.queue.currentPrompt(user);
      const text = prompt ? `${classified.userMessage}\n\n${prompt.text}` : classified.userMessage;
      return { outcome: "failed", toast: "Failed", text, prompt };
    }
  }

  private async run(user: UserId, action: CallbackAction): Promise<ActionReply> {
    switch (action.kind) {
      case "LINK": {
        const reference = this.queue.current(user);
        const linked = await this.contacts.link(action.meetingId, action.contactId);
        const display = formatCandidate({ name: action.contactName, company: linked.company ?? undefined });
        return this.advance(user, action, reference, `✅ Linked → ${display}`, "linked", {
          kind: "linked",
          contactId: action.contactId,
          contactName: action.contactName,
          company: linked.company ?? undefined,
        });
      }

      case "CREATE": {
        const reference = this.queue.current(user);
        const { firstName, lastName } = splitFullName(action.searchName);
        const created = await this.contacts.create(firstName, lastName, action.meetingId);
        return this.advance(user, action, reference, `➕ Created ${created.name} and linked it.`, "created", {
          kind: "created",
          contactName: created.name,
        });
      }

      case "SKIP": {
        const reference = this.queue.current(user);
        return this.advance(user, action, reference, `⏭ Skipped "${action.searchName}".`, "skipped", { kind: "skipped" });
      }

      case "CORRECT": {
        const prompt = this.queue.startSession(user, [
          { meetingId: action.meetingId, searchedName: action.contactName, candidates: [], mode: "link-or-create" },
        ]);
        const intro = `✏️ "${action.contactName}" was linked automatically. Type the correct full name, or 0 to keep it.`;
        return {
          outcome: "correcting",
          toast: "Type the correct name",
          text: prompt ? `${intro}\n\n${prompt.text}` : intro,
          prompt,
        };
      }
    }
  }

  /**
   * `reference` is what was current before the remote call; the session only
   * advances if it still is.
   */
  private advance(
    user: UserId,
    action: CallbackAction,
    reference: PendingReference | undefined,
    ack: string,
    outcome: ActionOutcome,
    resolution: ResolutionOutcome,
  ): ActionReply {
    const toast = ack.length > 60 ? `${ack.slice(0, 57)}...` : ack;
    // Buttons from an older keyboard act on their own; the open question keeps its keyboard.
    if (!reference || !answersReference(action, reference)) {
      return { outcome, toast, text: ack, prompt: null };
    }

    const result = this.queue.resolve(user, resolution, reference);
    switch (result.status) {
      case "next":
        return { outcome, toast, text: `${ack}\n\n${result.prompt.text}`, prompt: result.prompt };
      case "complete":
        return { outcome, toast, text: `${ack}\n\n${result.text}`, prompt: null };
      case "stale":
        return { outcome, toast, text: ack, prompt: null };
    }
  }
}
