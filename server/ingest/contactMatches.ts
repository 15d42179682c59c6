/**
 * Turns the analysis pipeline's `contact_matches` into dialog input.
 *
 * Matched entries become display-only linked contacts; unmatched entries become
 * PendingReferences. An unmatched entry without its own `meeting_id` takes the
 * id at its position among the unmatched entries in `meeting_ids`.
 */

import {
  toCandidate,
  type AnalysisResponse,
  type ContactMatchPayload,
  type LinkedContact,
  type PendingReference,
} from "@shared/schema";
import { DIALOG_CONSTANTS } from "../config/constants";

export interface AnalysisResult {
  summary: string;
  transcriptLength: number;
  meetingIds: string[];
  linked: LinkedContact[];
  references: PendingReference[];
}

export function toPendingReferences(matches: ContactMatchPayload[], meetingIds: string[]): PendingReference[] {
  const references: PendingReference[] = [];
  let unmatchedIndex = 0;

  for (const match of matches) {
    if (match.matched) continue;

    const position = unmatchedIndex++;
    const meetingId = match.meeting_id ?? meetingIds[position];
    if (!meetingId) {
      console.warn(`[Ingest] No meeting id for unmatched contact "${match.searched_name}" - skipping`);
      continue;
    }

    references.push({
      meetingId,
      searchedName: match.searched_name,
      candidates: (match.suggestions ?? []).slice(0, DIALOG_CONSTANTS.MAX_CANDIDATES).map(toCandidate),
      mode: "link-or-create",
    });
  }

  return references;
}

export function toLinkedContacts(matches: ContactMatchPayload[]): LinkedContact[] {
  const linked: LinkedContact[] = [];
  for (const match of matches) {
    if (!match.matched || !match.linked_contact) continue;
    linked.push({
      searchedName: match.searched_name,
      meetingId: match.meeting_id ?? null,
      name: match.linked_contact.name,
      ...(match.linked_contact.company ? { company: match.linked_contact.company } : {}),
    });
  }
  return linked;
}

export function extractAnalysis(response: AnalysisResponse): AnalysisResult {
  const details = response.details;
  const matches = details?.contact_matches ?? [];
  const meetingIds = details?.meeting_ids ?? [];

  return {
    summary: response.summary ?? "",
    transcriptLength: details?.transcript_length ?? 0,
    meetingIds,
    linked: toLinkedContacts(matches),
    references: toPendingReferences(matches, meetingIds),
  };
}
