/**
 * Link Dialog
 *
 * Interprets a user's text reply while a pending-link session is open.
 *
 * Input grammar (first match wins):
 * 1. "0"                  → skip the current reference
 * 2. digits in 1..N       → link candidate #n
 *    other digits         → rejected, session unchanged
 * 3. shorter than 2 chars → rejected, session unchanged
 * 4. anything else        → new search term:
 *      hits   → replace candidates, ask again (cursor stays)
 *      none   → create a contact with that name, link it, advance
 *
 * The session is re-read after every remote call; a reply that raced with a
 * new voice memo is reported as stale and never touches the new session.
 */

import type { PendingReference } from "@shared/schema";
import type { ContactDirectory } from "../clients/intelligenceApi";
import { DIALOG_CONSTANTS } from "../config/constants";
import { classifyBotError, ValidationError } from "../utils/errorHandler";
import { formatCandidate, renderSelectionHint } from "./prompts";
import type { PendingLinkQueue, QueuePrompt, ResolveResult, UserId } from "./pendingLinkQueue";

export type DialogOutcome = "linked" | "created" | "skipped" | "reprompt" | "invalid" | "failed" | "stale" | "none";

export interface DialogReply {
  outcome: DialogOutcome;
  text: string;
  /** Prompt now waiting for an answer, if any */
  prompt: QueuePrompt | null;
}

const STALE_TEXT = "⚠️ Those questions were replaced by a newer voice message.";

export function splitFullName(fullName: string): { firstName: string; lastName?: string } {
  const [firstName, ...rest] = fullName.trim().split(/\s+/);
  const lastName = rest.join(" ");
  return lastName ? { firstName, lastName } : { firstName };
}

export class LinkDialog {
  constructor(
    private readonly queue: PendingLinkQueue,
    private readonly contacts: ContactDirectory,
  ) {}

  async handle(user: UserId, input: string): Promise<DialogReply> {
    const reference = this.queue.current(user);
    if (!reference) {
      return { outcome: "none", text: "There are no open contact questions.", prompt: null };
    }

    const text = input.trim();

    if (text === DIALOG_CONSTANTS.SKIP_TOKEN) {
      return this.finish(
        `⏭ Skipped "${reference.searchedName}".`,
        "skipped",
        this.queue.resolve(user, { kind: "skipped" }, reference),
      );
    }

    try {
      if (/^\d+$/.test(text)) {
        return await this.selectCandidate(user, reference, Number(text));
      }
      if (text.length < DIALOG_CONSTANTS.MIN_SEARCH_LENGTH) {
        throw new ValidationError(
          `Please type at least ${DIALOG_CONSTANTS.MIN_SEARCH_LENGTH} characters, or ${DIALOG_CONSTANTS.SKIP_TOKEN} to skip.`,
        );
      }
      return await this.searchByName(user, reference, text);
    } catch (error) {
      return this.failure(user, error);
    }
  }

  private async selectCandidate(user: UserId, reference: PendingReference, choice: number): Promise<DialogReply> {
    const candidate = reference.candidates[choice - 1];
    if (choice < 1 || !candidate) {
      throw new ValidationError(renderSelectionHint(reference.candidates.length));
    }

    const linked = await this.contacts.link(reference.meetingId, candidate.id);
    const company = linked.company ?? candidate.company;
    const name = formatCandidate({ name: candidate.name, company: company ?? undefined });

    return this.finish(
      `✅ Linked "${reference.searchedName}" → ${name}`,
      "linked",
      this.queue.resolve(
        user,
        { kind: "linked", contactId: candidate.id, contactName: candidate.name, company: company ?? undefined },
        reference,
      ),
    );
  }

  private async searchByName(user: UserId, reference: PendingReference, name: string): Promise<DialogReply> {
    const results = await this.contacts.search(name, DIALOG_CONSTANTS.MAX_CANDIDATES);

    if (results.length > 0) {
      const prompt = this.queue.updateCandidates(user, results, name, reference);
      if (!prompt) {
        return { outcome: "stale", text: STALE_TEXT, prompt: this.queue.currentPrompt(user) };
      }
      const noun = results.length === 1 ? "match" : "matches";
      return { outcome: "reprompt", text: `🔎 Found ${results.length} ${noun} for "${name}":\n\n${prompt.text}`, prompt };
    }

    const { firstName, lastName } = splitFullName(name);
    const created = await this.contacts.create(firstName, lastName, reference.meetingId);

    return this.finish(
      `➕ Created ${created.name} and linked it.`,
      "created",
      this.queue.resolve(user, { kind: "created", contactName: created.name }, reference),
    );
  }

  private finish(ack: string, outcome: DialogOutcome, result: ResolveResult): DialogReply {
    switch (result.status) {
      case "next":
        return { outcome, text: `${ack}\n\n${result.prompt.text}`, prompt: result.prompt };
      case "complete":
        return { outcome, text: `${ack}\n\n${result.text}`, prompt: null };
      case "stale":
        return { outcome: "stale", text: `${ack}\n\n${STALE_TEXT}`, prompt: null };
    }
  }

  private failure(user: UserId, error: unknown): DialogReply {
    const classified = classifyBotError(error);
    if (classified.type !== "validation") {
      console.error(`[LinkDialog] ${user}: ${classified.errorMessage}`);
    }
    return {
      outcome: classified.type === "validation" ? "invalid" : "failed",
      text: classified.userMessage,
      prompt: this.queue.currentPrompt(user),
    };
  }
}
