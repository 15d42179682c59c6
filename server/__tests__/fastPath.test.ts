import { describe, it, expect, vi } from "vitest";
import type { FetchLike } from "../clients/intelligenceApi";
import { HttpFastPath, type FastPathRequest } from "../ingest/fastPath";

const request: FastPathRequest = {
  bytes: Buffer.from("OggS-test-bytes"),
  filename: "voice_20240102_030405_alice.ogg",
  mimeType: "audio/ogg",
  username: "alice",
};

function respondWith(body: string, status = 200) {
  return vi.fn<FetchLike>(async () => new Response(body, { status }));
}

describe("HttpFastPath", () => {
  it("posts the file as multipart form data", async () => {
    const fetchImpl = respondWith(JSON.stringify({ status: "success" }));
    await new HttpFastPath({ url: "http://fast.test/process-audio", fetchImpl }).process(request);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://fast.test/process-audio");
    expect(init?.method).toBe("POST");
    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      expect(form.get("filename")).toBe(request.filename);
      expect(form.get("username")).toBe("alice");
      expect(form.get("file")).toBeInstanceOf(Blob);
    }
  });

  it("returns the analysis on a success status", async () => {
    const fetchImpl = respondWith(
      JSON.stringify({
        status: "success",
        summary: "Quick sync",
        details: {
          transcript_length: 120,
          meeting_ids: ["m1"],
          contact_matches: [{ matched: false, searched_name: "Jon", suggestions: [] }],
        },
      }),
    );

    const attempt = await new HttpFastPath({ url: "http://fast.test", fetchImpl }).process(request);

    expect(attempt.outcome).toBe("success");
    if (attempt.outcome === "success") {
      expect(attempt.analysis.summary).toBe("Quick sync");
      expect(attempt.analysis.references).toEqual([
        { meetingId: "m1", searchedName: "Jon", candidates: [], mode: "link-or-create" },
      ]);
    }
  });

  it("keeps a success whose transcript length is null", async () => {
    const fetchImpl = respondWith(
      JSON.stringify({ status: "success", summary: "Quick sync", details: { transcript_length: null } }),
    );

    const attempt = await new HttpFastPath({ url: "http://fast.test", fetchImpl }).process(request);

    expect(attempt.outcome).toBe("success");
    if (attempt.outcome === "success") {
      expect(attempt.analysis.transcriptLength).toBe(0);
    }
  });

  it("treats a non-success status as recoverable", async () => {
    const fetchImpl = respondWith(JSON.stringify({ status: "error", error: "no speech detected" }));
    const attempt = await new HttpFastPath({ url: "http://fast.test", fetchImpl }).process(request);
    expect(attempt).toMatchObject({ outcome: "recoverable", reason: 'status "error" (no speech detected)' });
  });

  it("treats an HTTP error as recoverable", async () => {
    const fetchImpl = respondWith("upstream down", 503);
    const attempt = await new HttpFastPath({ url: "http://fast.test", fetchImpl }).process(request);
    expect(attempt).toMatchObject({ outcome: "recoverable", reason: "HTTP 503" });
  });

  it("treats a timeout as recoverable", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    });
    const attempt = await new HttpFastPath({ url: "http://fast.test", timeoutMs: 50, fetchImpl }).process(request);
    expect(attempt).toMatchObject({ outcome: "recoverable", reason: "timed out after 50ms" });
  });

  it("treats a connection failure as recoverable", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });
    const attempt = await new HttpFastPath({ url: "http://fast.test", fetchImpl }).process(request);
    expect(attempt).toMatchObject({ outcome: "recoverable", reason: "request failed: fetch failed" });
  });

  it("treats unparseable bodies as recoverable", async () => {
    const notJson = await new HttpFastPath({ url: "http://fast.test", fetchImpl: respondWith("<html>") }).process(request);
    expect(notJson.outcome).toBe("recoverable");
    if (notJson.outcome === "recoverable") {
      expect(notJson.reason.startsWith("invalid JSON: ")).toBe(true);
    }

    const wrongShape = await new HttpFastPath({
      url: "http://fast.test",
      fetchImpl: respondWith(JSON.stringify({ summary: "no status" })),
    }).process(request);
    expect(wrongShape.outcome).toBe("recoverable");
    if (wrongShape.outcome === "recoverable") {
      expect(wrongShape.reason.startsWith("malformed response: ")).toBe(true);
    }
  });
});
