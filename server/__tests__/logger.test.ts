import { describe, it, expect, vi } from "vitest";
import { RequestLogger } from "../utils/logger";

describe("RequestLogger", () => {
  it("prefixes lines with the level and a correlation id", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    new RequestLogger(10, 20, "voice").info("Received voice");

    const line = String(consoleSpy.mock.calls[0][0]);
    expect(line).toMatch(/^\[INFO\] \[[0-9a-f]{8}\] Received voice \{/);
    expect(line).toContain('"chatId":10');
    expect(line).toContain('"updateKind":"voice"');
  });

  it("keeps the same correlation id across lines", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new RequestLogger(1, 1);

    logger.info("first");
    logger.info("second");

    const ids = consoleSpy.mock.calls.map((call) => /^\[INFO\] \[([0-9a-f]{8})\]/.exec(String(call[0]))?.[1]);
    expect(ids[0]).toBeDefined();
    expect(ids[1]).toBe(ids[0]);
  });

  it("sends errors to stderr with the error message", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    new RequestLogger(1, 1).error("Upload failed", new Error("quota exceeded"));

    expect(String(consoleSpy.mock.calls[0][0])).toContain('"error":"quota exceeded"');
  });
});
