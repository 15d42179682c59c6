import { vi } from "vitest";
import type { PendingReference } from "@shared/schema";
import type { ContactDirectory } from "../clients/intelligenceApi";

export function fakeContacts() {
  const link = vi.fn<ContactDirectory["link"]>(async () => ({}));
  const search = vi.fn<ContactDirectory["search"]>(async () => []);
  const create = vi.fn<ContactDirectory["create"]>(async (firstName, lastName) => ({
    name: lastName ? `${firstName} ${lastName}` : firstName,
  }));
  const directory: ContactDirectory = { link, search, create };
  return { directory, link, search, create };
}

export function pendingReference(
  searchedName: string,
  candidates: PendingReference["candidates"] = [],
  meetingId = "m1",
): PendingReference {
  return { meetingId, searchedName, candidates, mode: "link-or-create" };
}
