/**
 * Ingest Orchestrator
 *
 * Purpose:
 * Takes one downloaded voice/audio file and gets it processed, either right
 * away (fast path) or eventually (fallback upload to Drive).
 *
 * Flow:
 * 1. Drop the user's open pending-link session (a new memo always wins).
 *    Handlers call begin() on receipt, before the download, so replies sent
 *    meanwhile no longer reach the old session.
 * 2. Fast path, if configured. Success → start a session for unresolved contacts
 * 3. Anything else → upload to fallback storage and acknowledge as deferred
 *
 * A fallback upload failure is the one fatal case: it is thrown as a
 * StorageWriteError so the memo is never silently lost.
 *
 * Layer: Ingest (orchestration)
 */

import type { BlobStorage, StoredObject } from "../clients/driveStorage";
import type { PendingLinkQueue, QueuePrompt } from "../dialog/pendingLinkQueue";
import { StorageWriteError } from "../utils/errorHandler";
import { logInfo, logWarn } from "../utils/logger";
import type { AnalysisResult } from "./contactMatches";
import type { FastPathProcessor } from "./fastPath";
import { buildUploadFilename, mimeTypeFor, type AudioKind } from "./filename";

export interface IngestEvent {
  kind: AudioKind;
  bytes: Buffer;
  userId: number;
  username?: string | null;
  mimeType?: string | null;
  receivedAt?: Date;
}

export type IngestResult =
  | {
      status: "completed";
      filename: string;
      analysis: AnalysisResult;
      /** First question to ask, null when every contact was matched */
      prompt: QueuePrompt | null;
      /** A newer memo from the same user arrived while this one was processing */
      superseded: boolean;
    }
  | {
      status: "deferred";
      filename: string;
      stored: StoredObject;
      fallbackReason: string;
    };

/** Claim on the user's latest memo; completion checks it is still the latest */
export interface IngestTicket {
  userId: number;
  id: number;
}

export interface IngestOrchestratorDeps {
  queue: PendingLinkQueue;
  storage: BlobStorage;
  containerId: string;
  fastPath: FastPathProcessor | null;
}

export class IngestOrchestrator {
  private sequence = 0;
  private readonly latestIngest = new Map<number, number>();

  constructor(private readonly deps: IngestOrchestratorDeps) {}

  begin(userId: number): IngestTicket {
    this.deps.queue.discard(userId);
    const ticket = { userId, id: ++this.sequence };
    this.latestIngest.set(userId, ticket.id);
    return ticket;
  }

  /** Releases a ticket whose memo never reached ingest (e.g. the download failed). */
  abandon(ticket: IngestTicket): void {
    if (this.latestIngest.get(ticket.userId) === ticket.id) {
      this.latestIngest.delete(ticket.userId);
    }
  }

  async ingest(event: IngestEvent, ticket: IngestTicket = this.begin(event.userId)): Promise<IngestResult> {

    const filename = buildUploadFilename({
      kind: event.kind,
      receivedAt: event.receivedAt ?? new Date(),
      userId: event.userId,
      username: event.username,
      mimeType: event.mimeType,
    });
    const mimeType = mimeTypeFor(event.kind, event.mimeType);

    let fallbackReason = "fast path not configured";
    if (this.deps.fastPath) {
      const attempt = await this.deps.fastPath.process({
        bytes: event.bytes,
        filename,
        mimeType,
        username: event.username || String(event.userId),
      });

      if (attempt.outcome === "success") {
        logInfo("Fast path succeeded", { userId: event.userId, filename, duration: attempt.durationMs });
        return this.complete(event.userId, ticket, filename, attempt.analysis);
      }

      fallbackReason = attempt.reason;
      logWarn("Fast path failed, falling back to storage", {
        userId: event.userId,
        filename,
        reason: attempt.reason,
        duration: attempt.durationMs,
      });
    }

    let stored: StoredObject;
    try {
      stored = await this.deps.storage.upload({
        bytes: event.bytes,
        filename,
        mimeType,
        containerId: this.deps.containerId,
      });
    } catch (error) {
      throw new StorageWriteError(filename, error);
    } finally {
      this.abandon(ticket);
    }

    return { status: "deferred", filename, stored, fallbackReason };
  }

  private complete(userId: number, ticket: IngestTicket, filename: string, analysis: AnalysisResult): IngestResult {
    if (this.latestIngest.get(userId) !== ticket.id) {
      logInfo("Newer memo arrived during processing; not starting a session", { userId, filename });
      return { status: "completed", filename, analysis, prompt: null, superseded: true };
    }

    this.latestIngest.delete(userId);
    const prompt = this.deps.queue.startSession(userId, analysis.references);
    return { status: "completed", filename, analysis, prompt, superseded: false };
  }
}
