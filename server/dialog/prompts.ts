/**
 * Text renderings for the disambiguation dialog.
 *
 * Every prompt works without buttons; keyboards are layered on top by the
 * Telegram binding.
 */

import type { ContactCandidate, PendingReference } from "@shared/schema";
import { DIALOG_CONSTANTS } from "../config/constants";

export function formatCandidate(candidate: Pick<ContactCandidate, "name" | "company">): string {
  return candidate.company ? `${candidate.name} (${candidate.company})` : candidate.name;
}

export function renderReferencePrompt(reference: PendingReference, index: number, total: number): string {
  const progress = total > 1 ? ` (${index}/${total})` : "";
  const lines = [`👤 Who is "${reference.searchedName}"?${progress}`];

  const candidates = reference.candidates.slice(0, DIALOG_CONSTANTS.MAX_CANDIDATES);
  if (candidates.length === 0) {
    lines.push("No matching contacts found.");
  }
  candidates.forEach((candidate, i) => {
    lines.push(`${i + 1} = ${formatCandidate(candidate)}`);
  });

  lines.push(`${DIALOG_CONSTANTS.SKIP_TOKEN} = Skip`);
  lines.push("Or type the correct full name.");
  return lines.join("\n");
}

export interface ResolutionTally {
  linked: number;
  created: number;
  skipped: number;
}

export function renderCompletion(tally: ResolutionTally): string {
  const parts: string[] = [];
  if (tally.linked) parts.push(`${tally.linked} linked`);
  if (tally.created) parts.push(`${tally.created} created`);
  if (tally.skipped) parts.push(`${tally.skipped} skipped`);
  return parts.length > 0 ? `🎉 All contacts processed (${parts.join(", ")}).` : "🎉 All contacts processed.";
}

export function renderSelectionHint(candidateCount: number): string {
  if (candidateCount === 0) {
    return `There are no numbered options. Reply ${DIALOG_CONSTANTS.SKIP_TOKEN} to skip or type the correct full name.`;
  }
  return `Please reply with a number between 1 and ${candidateCount}, ${DIALOG_CONSTANTS.SKIP_TOKEN} to skip, or type a name.`;
}
