import { z } from "zod";

/**
 * Wire schemas for the collaborators the bot talks to.
 *
 * Everything that crosses a process boundary is parsed through one of these
 * before the dialog engine sees it; field names follow the remote services
 * (snake_case), the inferred domain types below are camelCase.
 */

// ============================================================================
// Fast-path analysis response
// ============================================================================

export const contactCandidateSchema = z.object({
  id: z.coerce.string(),
  name: z.string(),
  company: z.string().nullish(),
});

export const contactMatchSchema = z.object({
  matched: z.boolean(),
  meeting_id: z.coerce.string().nullish(),
  searched_name: z.string(),
  linked_contact: z
    .object({
      name: z.string(),
      company: z.string().nullish(),
    })
    .nullish(),
  suggestions: z.array(contactCandidateSchema).nullish(),
});

export const analysisDetailsSchema = z.object({
  transcript_length: z.number().nonnegative().transform(Math.round).catch(0),
  contact_matches: z.array(contactMatchSchema).default([]),
  meeting_ids: z.array(z.coerce.string()).default([]),
});

export const analysisResponseSchema = z.object({
  status: z.string(),
  summary: z.string().nullish().catch(null),
  details: analysisDetailsSchema.nullish(),
  error: z.string().nullish(),
});

export type ContactMatchPayload = z.infer<typeof contactMatchSchema>;
export type AnalysisResponse = z.infer<typeof analysisResponseSchema>;

// ============================================================================
// Contact operations
// ============================================================================

export const linkContactResponseSchema = z.object({
  company: z.string().nullish(),
});

export const searchContactsResponseSchema = z.union([
  z.array(contactCandidateSchema),
  z.object({ contacts: z.array(contactCandidateSchema) }).transform((body) => body.contacts),
]);

export const createContactResponseSchema = z.object({
  name: z.string(),
  id: z.coerce.string().nullish(),
});

export type LinkContactResponse = z.infer<typeof linkContactResponseSchema>;
export type CreateContactResponse = z.infer<typeof createContactResponseSchema>;

// ============================================================================
// General conversation
// ============================================================================

export const chatResponseSchema = z.object({
  reply: z.string().min(1),
});

// ============================================================================
// Domain types
// ============================================================================

export interface ContactCandidate {
  id: string;
  name: string;
  company?: string;
}

export type ResolutionMode = "link-or-create";

export interface PendingReference {
  meetingId: string;
  searchedName: string;
  candidates: ContactCandidate[];
  mode: ResolutionMode;
}

export interface LinkedContact {
  searchedName: string;
  meetingId: string | null;
  name: string;
  company?: string;
}

export type ChatRole = "user" | "assistant";

export interface ConversationTurn {
  role: ChatRole;
  content: string;
  at: number;
}

export function toCandidate(raw: z.infer<typeof contactCandidateSchema>): ContactCandidate {
  return raw.company ? { id: raw.id, name: raw.name, company: raw.company } : { id: raw.id, name: raw.name };
}
