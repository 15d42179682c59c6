/**
 * Fast-path audio processing.
 *
 * Posts the raw file to the transcription/analysis endpoint and waits for the
 * structured result. Never throws: every failure is returned as a
 * `recoverable` attempt so the orchestrator can fall back on the tag alone.
 * No retries; one failure is enough to fall back.
 */

import { analysisResponseSchema } from "@shared/schema";
import type { FetchLike } from "../clients/intelligenceApi";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { getErrorMessage } from "../utils/errorHandler";
import { extractAnalysis, type AnalysisResult } from "./contactMatches";

export interface FastPathRequest {
  bytes: Buffer;
  filename: string;
  mimeType: string;
  username: string;
}

export type FastPathAttempt =
  | { outcome: "success"; analysis: AnalysisResult; durationMs: number }
  | { outcome: "recoverable"; reason: string; durationMs: number };

export interface FastPathProcessor {
  process(request: FastPathRequest): Promise<FastPathAttempt>;
}

export interface HttpFastPathOptions {
  url: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class HttpFastPath implements FastPathProcessor {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpFastPathOptions) {
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_CONSTANTS.INGEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async process(request: FastPathRequest): Promise<FastPathAttempt> {
    const startTime = Date.now();
    const recoverable = (reason: string): FastPathAttempt => ({
      outcome: "recoverable",
      reason,
      durationMs: Date.now() - startTime,
    });

    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(request.bytes)], { type: request.mimeType }), request.filename);
    form.append("filename", request.filename);
    form.append("username", request.username);

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: "POST",
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        return recoverable(`timed out after ${this.timeoutMs}ms`);
      }
      return recoverable(`request failed: ${getErrorMessage(error)}`);
    }

    if (!response.ok) {
      return recoverable(`HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return recoverable(`invalid JSON: ${getErrorMessage(error)}`);
    }

    const parsed = analysisResponseSchema.safeParse(body);
    if (!parsed.success) {
      return recoverable(`malformed response: ${getErrorMessage(parsed.error)}`);
    }

    if (parsed.data.status !== "success") {
      const detail = parsed.data.error ? ` (${parsed.data.error})` : "";
      return recoverable(`status "${parsed.data.status}"${detail}`);
    }

    return { outcome: "success", analysis: extractAnalysis(parsed.data), durationMs: Date.now() - startTime };
  }
}
