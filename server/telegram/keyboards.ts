import { InlineKeyboard } from "grammy";
import type { LinkedContact, PendingReference } from "@shared/schema";
import { DIALOG_CONSTANTS } from "../config/constants";
import type { CallbackAction, CallbackActionRegistry } from "../dialog/actionRegistry";
import { formatCandidate } from "../dialog/prompts";

function assertCallbackSize(token: string): string {
  if (Buffer.byteLength(token, "utf8") > DIALOG_CONSTANTS.CALLBACK_DATA_MAX_BYTES) {
    throw new Error(`Callback token too long: ${token}`);
  }
  return token;
}

/**
 * One button per candidate, then Create and Skip. All buttons share a registry
 * group, so one press retires the whole keyboard.
 */
export function buildReferenceKeyboard(registry: CallbackActionRegistry, reference: PendingReference): InlineKeyboard {
  const candidates = reference.candidates.slice(0, DIALOG_CONSTANTS.MAX_CANDIDATES);
  const actions: CallbackAction[] = [
    ...candidates.map((candidate): CallbackAction => ({
      kind: "LINK",
      meetingId: reference.meetingId,
      contactId: candidate.id,
      contactName: candidate.name,
    })),
    { kind: "CREATE", meetingId: reference.meetingId, searchName: reference.searchedName },
    { kind: "SKIP", meetingId: reference.meetingId, searchName: reference.searchedName },
  ];
  const tokens = registry.registerGroup(actions).map(assertCallbackSize);

  const keyboard = new InlineKeyboard();
  candidates.forEach((candidate, i) => {
    keyboard.text(`${i + 1}. ${formatCandidate(candidate)}`, tokens[i]).row();
  });
  keyboard
    .text(`➕ Create "${reference.searchedName}"`, tokens[candidates.length])
    .text("⏭ Skip", tokens[candidates.length + 1]);
  return keyboard;
}

/**
 * "Not X?" button under each automatically linked contact. Returns null when
 * no contact carries a meeting id to correct against.
 */
export function buildCorrectionKeyboard(
  registry: CallbackActionRegistry,
  linked: LinkedContact[],
): InlineKeyboard | null {
  const keyboard = new InlineKeyboard();
  let buttons = 0;

  for (const contact of linked) {
    if (!contact.meetingId) continue;
    const token = assertCallbackSize(
      registry.register({
        kind: "CORRECT",
        meetingId: contact.meetingId,
        contactId: null,
        contactName: contact.name,
      }),
    );
    if (buttons > 0) keyboard.row();
    keyboard.text(`✏️ Not ${contact.name}?`, token);
    buttons++;
  }

  return buttons > 0 ? keyboard : null;
}
