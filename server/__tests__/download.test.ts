import { describe, it, expect, vi } from "vitest";
import type { Api } from "grammy";
import type { FetchLike } from "../clients/intelligenceApi";
import { downloadTelegramFile } from "../telegram/download";
import { ExternalServiceError } from "../utils/errorHandler";

function fakeApi(filePath?: string) {
  return {
    getFile: vi.fn<Api["getFile"]>(async (fileId) => ({ file_id: fileId, file_unique_id: "u1", file_path: filePath })),
  };
}

describe("downloadTelegramFile", () => {
  it("fetches the file from the bot file endpoint", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(new Uint8Array([1, 2, 3])));

    const bytes = await downloadTelegramFile(fakeApi("voice/file_7.oga"), "test-token", "f7", fetchImpl);

    expect(fetchImpl.mock.calls[0][0]).toBe("https://api.telegram.org/file/bottest-token/voice/file_7.oga");
    expect([...bytes]).toEqual([1, 2, 3]);
  });

  it("fails when Telegram gives no download path", async () => {
    const fetchImpl = vi.fn<FetchLike>();
    await expect(downloadTelegramFile(fakeApi(), "test-token", "f7", fetchImpl)).rejects.toBeInstanceOf(
      ExternalServiceError,
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("fails on an HTTP error", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("", { status: 404 }));
    await expect(downloadTelegramFile(fakeApi("x.oga"), "test-token", "f7", fetchImpl)).rejects.toThrow(
      "Telegram error: download failed with HTTP 404",
    );
  });
});
