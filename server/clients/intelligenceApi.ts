/**
 * Intelligence API client (contacts).
 *
 * Responsibilities:
 * - Link an existing contact to a meeting record
 * - Search contacts by free text
 * - Create a contact and link it in one call
 *
 * This file MUST NOT hold dialog state. Callers decide what a failure means.
 *
 * Layer: Integration (I/O only)
 */

import {
  createContactResponseSchema,
  linkContactResponseSchema,
  searchContactsResponseSchema,
  toCandidate,
  type ContactCandidate,
  type CreateContactResponse,
  type LinkContactResponse,
} from "@shared/schema";
import type { z } from "zod";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { ConfigurationError, ExternalServiceError, getErrorMessage } from "../utils/errorHandler";

export interface ContactDirectory {
  link(meetingId: string, contactId: string): Promise<LinkContactResponse>;
  search(query: string, limit: number): Promise<ContactCandidate[]>;
  create(firstName: string, lastName: string | undefined, meetingId: string): Promise<CreateContactResponse>;
}

export type FetchLike = typeof fetch;

export interface IntelligenceClientOptions {
  baseUrl: string | null;
  apiKey?: string | null;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const SERVICE = "Intelligence API";

export class IntelligenceClient implements ContactDirectory {
  private readonly baseUrl: string | null;
  private readonly apiKey: string | null;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: IntelligenceClientOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey ?? null;
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_CONSTANTS.CONTACT_API_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async link(meetingId: string, contactId: string): Promise<LinkContactResponse> {
    return this.request("/contacts/link", linkContactResponseSchema, {
      method: "POST",
      body: { meeting_id: meetingId, contact_id: contactId },
    });
  }

  async search(query: string, limit: number): Promise<ContactCandidate[]> {
    const params = new URLSearchParams({ q: query, limit: String(limit) });
    const results = await this.request(`/contacts/search?${params.toString()}`, searchContactsResponseSchema, {
      method: "GET",
    });
    return results.slice(0, limit).map(toCandidate);
  }

  async create(firstName: string, lastName: string | undefined, meetingId: string): Promise<CreateContactResponse> {
    return this.request("/contacts", createContactResponseSchema, {
      method: "POST",
      body: { first_name: firstName, last_name: lastName ?? null, meeting_id: meetingId },
    });
  }

  private async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    init: { method: "GET" | "POST"; body?: Record<string, unknown> },
  ): Promise<z.output<S>> {
    if (!this.baseUrl) {
      throw new ConfigurationError("INTELLIGENCE_URL", "Contact linking");
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    if (init.body) headers["Content-Type"] = "application/json";
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: init.method,
        headers,
        body: init.body ? JSON.stringify(init.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new ExternalServiceError(SERVICE, `${init.method} ${path} timed out after ${this.timeoutMs}ms`);
      }
      throw new ExternalServiceError(SERVICE, getErrorMessage(error));
    }

    if (!response.ok) {
      const errorText = await response.text();
      console.error(`[IntelligenceAPI] ${init.method} ${path} failed:`, response.status, errorText);
      throw new ExternalServiceError(SERVICE, `${response.status} ${errorText}`.trim());
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ExternalServiceError(SERVICE, `invalid JSON from ${path}: ${getErrorMessage(error)}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, `unexpected response from ${path}: ${getErrorMessage(parsed.error)}`);
    }
    return parsed.data;
  }
}
