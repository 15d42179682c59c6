/**
 * Callback Action Registry
 *
 * Maps short opaque tokens (Telegram callback data) to one-shot button actions.
 *
 * Token format: one-letter kind prefix + base-36 sequence number, e.g. "l1f".
 * Telegram caps callback data at 64 bytes, so the payload stays server-side and
 * only the token travels with the button.
 *
 * Guarantees:
 * - tokens are never reused within a process lifetime
 * - consume() is at-most-once: a pressed button is removed along with every
 *   sibling button rendered in the same keyboard
 * - entries do not expire; unpressed buttons live until restart
 */

export type CallbackAction =
  | { kind: "LINK"; meetingId: string; contactId: string; contactName: string }
  | { kind: "CREATE"; meetingId: string; searchName: string }
  | { kind: "SKIP"; meetingId: string; searchName: string }
  | { kind: "CORRECT"; meetingId: string; contactId: string | null; contactName: string };

export type CallbackActionKind = CallbackAction["kind"];

const KIND_PREFIX: Record<CallbackActionKind, string> = {
  LINK: "l",
  CREATE: "c",
  SKIP: "s",
  CORRECT: "e",
};

const PREFIX_KIND: Record<string, CallbackActionKind | undefined> = {
  l: "LINK",
  c: "CREATE",
  s: "SKIP",
  e: "CORRECT",
};

const TOKEN_PATTERN = /^([a-z])([0-9a-z]+)$/;

export interface DecodedToken {
  kind: CallbackActionKind;
  sequence: number;
}

/**
 * Validate a raw callback string and recover its kind. Returns null for anything
 * this registry could not have minted.
 */
export function decodeToken(token: string): DecodedToken | null {
  const match = TOKEN_PATTERN.exec(token);
  if (!match) return null;

  const kind = PREFIX_KIND[match[1]];
  if (!kind) return null;

  const sequence = parseInt(match[2], 36);
  if (!Number.isSafeInteger(sequence)) return null;

  return { kind, sequence };
}

interface RegistryEntry {
  action: CallbackAction;
  group: number;
}

export class CallbackActionRegistry {
  private counter = 0;
  private groupCounter = 0;
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly groups = new Map<number, string[]>();

  register(action: CallbackAction): string {
    return this.registerGroup([action])[0];
  }

  /**
   * Register the buttons of one keyboard. Pressing any of them consumes all.
   */
  registerGroup(actions: CallbackAction[]): string[] {
    const group = ++this.groupCounter;
    const tokens = actions.map((action) => {
      const token = `${KIND_PREFIX[action.kind]}${(++this.counter).toString(36)}`;
      this.entries.set(token, { action, group });
      return token;
    });
    this.groups.set(group, tokens);
    return tokens;
  }

  consume(token: string): CallbackAction | null {
    const decoded = decodeToken(token);
    if (!decoded) return null;

    const entry = this.entries.get(token);
    if (!entry || entry.action.kind !== decoded.kind) return null;

    for (const sibling of this.groups.get(entry.group) ?? [token]) {
      this.entries.delete(sibling);
    }
    this.groups.delete(entry.group);
    return entry.action;
  }

  get size(): number {
    return this.entries.size;
  }
}
