/**
 * General conversation client.
 *
 * Sends free text plus recent history to the chat service and returns its reply.
 *
 * Layer: Integration (I/O only)
 */

import { chatResponseSchema, type ConversationTurn } from "@shared/schema";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { ConfigurationError, ExternalServiceError, getErrorMessage } from "../utils/errorHandler";
import type { FetchLike } from "./intelligenceApi";

export interface ChatCollaborator {
  reply(userId: number, message: string, history: ConversationTurn[]): Promise<string>;
}

export interface ChatClientOptions {
  url: string | null;
  apiKey?: string | null;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const SERVICE = "Chat service";

export class ChatClient implements ChatCollaborator {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ChatClientOptions) {
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_CONSTANTS.CHAT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async reply(userId: number, message: string, history: ConversationTurn[]): Promise<string> {
    if (!this.options.url) {
      throw new ConfigurationError("CHAT_URL", "Chat");
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: "POST",
        headers,
        body: JSON.stringify({
          user_id: userId,
          message,
          history: history.map(({ role, content }) => ({ role, content })),
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new ExternalServiceError(SERVICE, `timed out after ${this.timeoutMs}ms`);
      }
      throw new ExternalServiceError(SERVICE, getErrorMessage(error));
    }

    if (!response.ok) {
      throw new ExternalServiceError(SERVICE, `${response.status} ${await response.text()}`.trim());
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ExternalServiceError(SERVICE, `invalid JSON: ${getErrorMessage(error)}`);
    }

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, getErrorMessage(parsed.error));
    }
    return parsed.data.reply;
  }
}
