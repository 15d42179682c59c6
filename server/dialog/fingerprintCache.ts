/**
 * File Fingerprint Cache
 *
 * In-memory guard against Telegram delivering the same file twice (webhook
 * retries, a user forwarding the same memo). Keyed by Telegram's
 * `file_unique_id`, which is stable across bots and re-sends.
 *
 * Best effort only: the cache is empty after a restart.
 */

import { DEDUPE_CONSTANTS } from "../config/constants";

export type Clock = () => number;

export class FingerprintCache {
  private readonly firstSeen = new Map<string, number>();

  constructor(
    private readonly windowMs: number = DEDUPE_CONSTANTS.FILE_WINDOW_MS,
    private readonly now: Clock = Date.now,
  ) {}

  /**
   * @returns true if `fileId` was already seen inside the window, false if new (and records it)
   */
  seen(fileId: string): boolean {
    const now = this.now();
    this.evictExpired(now);

    if (this.firstSeen.has(fileId)) {
      console.log(`[Dedupe] Duplicate file detected: ${fileId}`);
      return true;
    }

    this.firstSeen.set(fileId, now);
    return false;
  }

  get size(): number {
    return this.firstSeen.size;
  }

  private evictExpired(now: number): void {
    const cutoff = now - this.windowMs;
    this.firstSeen.forEach((timestamp, key) => {
      if (timestamp <= cutoff) this.firstSeen.delete(key);
    });
  }
}
