import type { ConversationTurn } from "@shared/schema";
import { HISTORY_CONSTANTS } from "../config/constants";
import type { Clock } from "./fingerprintCache";
import type { UserId } from "./pendingLinkQueue";

/**
 * Short-term chat memory per user, capped by count and age.
 * Only the general conversation path reads it.
 */
export class ConversationHistory {
  private readonly turns = new Map<UserId, ConversationTurn[]>();

  constructor(
    private readonly maxTurns: number = HISTORY_CONSTANTS.MAX_TURNS,
    private readonly maxAgeMs: number = HISTORY_CONSTANTS.MAX_AGE_MS,
    private readonly now: Clock = Date.now,
  ) {}

  get(user: UserId): ConversationTurn[] {
    const pruned = this.prune(this.turns.get(user) ?? []);
    if (pruned.length === 0) {
      this.turns.delete(user);
    } else {
      this.turns.set(user, pruned);
    }
    return [...pruned];
  }

  append(user: UserId, ...entries: Array<Omit<ConversationTurn, "at">>): void {
    const at = this.now();
    const next = [...(this.turns.get(user) ?? []), ...entries.map((entry) => ({ ...entry, at }))];
    this.turns.set(user, this.prune(next));
  }

  private prune(turns: ConversationTurn[]): ConversationTurn[] {
    const cutoff = this.now() - this.maxAgeMs;
    return turns.filter((turn) => turn.at > cutoff).slice(-this.maxTurns);
  }
}
