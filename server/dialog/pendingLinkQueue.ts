/**
 * Pending Link Queue
 *
 * Per-user queue of unresolved contact references from one voice memo, with a
 * cursor on the reference currently being asked about.
 *
 * Rules:
 * - at most one session per user; startSession() always replaces the old one
 *   (a new memo wins over an unfinished dialog)
 * - every resolution (link, create, skip) advances the cursor by one
 * - the session is deleted as soon as the cursor passes the last reference
 * - no time-based expiry
 *
 * Callers that awaited a network call must pass the reference they started
 * from as `expected`; if the session was replaced or advanced meanwhile the
 * mutation is refused with a "stale" result.
 */

import type { ContactCandidate, PendingReference } from "@shared/schema";
import { DIALOG_CONSTANTS } from "../config/constants";
import { renderCompletion, renderReferencePrompt, type ResolutionTally } from "./prompts";

export type UserId = number;

export type ResolutionOutcome =
  | { kind: "linked"; contactId: string; contactName: string; company?: string }
  | { kind: "created"; contactName: string }
  | { kind: "skipped" };

export interface QueuePrompt {
  reference: PendingReference;
  /** 1-based position of the reference */
  index: number;
  total: number;
  text: string;
}

export type ResolveResult =
  | { status: "next"; prompt: QueuePrompt }
  | { status: "complete"; tally: ResolutionTally; text: string }
  | { status: "stale" };

interface PendingSession {
  references: PendingReference[];
  cursor: number;
  tally: ResolutionTally;
}

function capCandidates(candidates: ContactCandidate[]): ContactCandidate[] {
  return candidates.slice(0, DIALOG_CONSTANTS.MAX_CANDIDATES);
}

export class PendingLinkQueue {
  private readonly sessions = new Map<UserId, PendingSession>();

  /**
   * Replace any session for `user`. Returns the prompt for the first reference,
   * or null when there is nothing to ask (no session is kept in that case).
   */
  startSession(user: UserId, references: PendingReference[]): QueuePrompt | null {
    this.sessions.delete(user);
    if (references.length === 0) {
      return null;
    }

    const session: PendingSession = {
      references: references.map((reference) => ({
        ...reference,
        candidates: capCandidates(reference.candidates),
      })),
      cursor: 0,
      tally: { linked: 0, created: 0, skipped: 0 },
    };
    this.sessions.set(user, session);
    console.log(`[PendingLinks] Session started for ${user} with ${references.length} reference(s)`);
    return this.promptFor(session);
  }

  current(user: UserId): PendingReference | undefined {
    const session = this.sessions.get(user);
    return session?.references[session.cursor];
  }

  currentPrompt(user: UserId): QueuePrompt | null {
    const session = this.sessions.get(user);
    return session ? this.promptFor(session) : null;
  }

  has(user: UserId): boolean {
    return this.sessions.has(user);
  }

  resolve(user: UserId, outcome: ResolutionOutcome, expected?: PendingReference): ResolveResult {
    const session = this.sessions.get(user);
    const reference = session?.references[session.cursor];
    if (!session || !reference || (expected && reference !== expected)) {
      return { status: "stale" };
    }

    session.tally[outcome.kind] += 1;
    session.cursor += 1;
    console.log(`[PendingLinks] ${user}: "${reference.searchedName}" ${outcome.kind} (${session.cursor}/${session.references.length})`);

    if (session.cursor >= session.references.length) {
      this.sessions.delete(user);
      return { status: "complete", tally: session.tally, text: renderCompletion(session.tally) };
    }
    return { status: "next", prompt: this.promptFor(session) };
  }

  /**
   * Swap the candidate list of the current reference after a new search.
   * The cursor does not move.
   */
  updateCandidates(
    user: UserId,
    candidates: ContactCandidate[],
    newSearchName: string,
    expected?: PendingReference,
  ): QueuePrompt | null {
    const session = this.sessions.get(user);
    const reference = session?.references[session.cursor];
    if (!session || !reference || (expected && reference !== expected)) {
      return null;
    }

    session.references[session.cursor] = {
      ...reference,
      searchedName: newSearchName,
      candidates: capCandidates(candidates),
    };
    return this.promptFor(session);
  }

  discard(user: UserId): boolean {
    const existed = this.sessions.delete(user);
    if (existed) {
      console.log(`[PendingLinks] Session discarded for ${user}`);
    }
    return existed;
  }

  private promptFor(session: PendingSession): QueuePrompt {
    const reference = session.references[session.cursor];
    const index = session.cursor + 1;
    const total = session.references.length;
    return { reference, index, total, text: renderReferencePrompt(reference, index, total) };
  }
}
