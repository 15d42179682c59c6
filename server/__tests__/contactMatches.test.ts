import { describe, it, expect, vi } from "vitest";
import { analysisResponseSchema } from "@shared/schema";
import { extractAnalysis, toLinkedContacts, toPendingReferences } from "../ingest/contactMatches";

describe("toPendingReferences", () => {
  it("turns unmatched entries into references", () => {
    const references = toPendingReferences(
      [{ matched: false, meeting_id: "m1", searched_name: "Jon", suggestions: [{ id: "c1", name: "Jon Lee" }] }],
      [],
    );
    expect(references).toEqual([
      { meetingId: "m1", searchedName: "Jon", candidates: [{ id: "c1", name: "Jon Lee" }], mode: "link-or-create" },
    ]);
  });

  it("takes the meeting id by position among unmatched entries", () => {
    const references = toPendingReferences(
      [
        { matched: true, searched_name: "Known" },
        { matched: false, searched_name: "Ann" },
        { matched: false, searched_name: "Bob" },
      ],
      ["m-a", "m-b"],
    );
    expect(references.map((ref) => [ref.searchedName, ref.meetingId])).toEqual([
      ["Ann", "m-a"],
      ["Bob", "m-b"],
    ]);
  });

  it("skips entries without any meeting id", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const references = toPendingReferences([{ matched: false, searched_name: "Ghost" }], []);
    expect(references).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("caps suggestions at five", () => {
    const suggestions = Array.from({ length: 7 }, (_, i) => ({ id: `c${i}`, name: `Name ${i}` }));
    const [reference] = toPendingReferences([{ matched: false, meeting_id: "m1", searched_name: "N", suggestions }], []);
    expect(reference.candidates).toHaveLength(5);
  });
});

describe("toLinkedContacts", () => {
  it("keeps matched entries with a linked contact", () => {
    expect(
      toLinkedContacts([
        { matched: true, meeting_id: "m1", searched_name: "Ann", linked_contact: { name: "Ann Smith", company: "Acme" } },
        { matched: true, searched_name: "Bob", linked_contact: { name: "Bob Jones", company: null } },
        { matched: true, searched_name: "Nobody" },
      ]),
    ).toEqual([
      { searchedName: "Ann", meetingId: "m1", name: "Ann Smith", company: "Acme" },
      { searchedName: "Bob", meetingId: null, name: "Bob Jones" },
    ]);
  });
});

describe("extractAnalysis", () => {
  it("reads a parsed response with numeric ids", () => {
    const response = analysisResponseSchema.parse({
      status: "success",
      summary: "Call with Jon about the pilot.",
      details: {
        transcript_length: 1840,
        meeting_ids: [17],
        contact_matches: [{ matched: false, searched_name: "Jon", suggestions: [{ id: 3, name: "Jon Lee" }] }],
      },
    });

    expect(extractAnalysis(response)).toEqual({
      summary: "Call with Jon about the pilot.",
      transcriptLength: 1840,
      meetingIds: ["17"],
      linked: [],
      references: [
        { meetingId: "17", searchedName: "Jon", candidates: [{ id: "3", name: "Jon Lee" }], mode: "link-or-create" },
      ],
    });
  });

  it("rounds a fractional transcript length and drops a malformed summary", () => {
    const response = analysisResponseSchema.parse({
      status: "success",
      summary: 42,
      details: { transcript_length: 1839.6 },
    });

    expect(extractAnalysis(response)).toEqual({
      summary: "",
      transcriptLength: 1840,
      meetingIds: [],
      linked: [],
      references: [],
    });
  });

  it("tolerates a response without details", () => {
    const analysis = extractAnalysis(analysisResponseSchema.parse({ status: "success" }));
    expect(analysis).toEqual({ summary: "", transcriptLength: 0, meetingIds: [], linked: [], references: [] });
  });
});
