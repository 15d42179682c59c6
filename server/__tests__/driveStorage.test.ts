import { describe, it, expect, vi } from "vitest";
import { ZodError } from "zod";
import { createDriveClient, DriveStorage, type DriveFileApi } from "../clients/driveStorage";
import { ConfigurationError } from "../utils/errorHandler";

const tokenJson = JSON.stringify({
  client_id: "test-client",
  client_secret: "test-secret",
  refresh_token: "test-refresh",
});

describe("createDriveClient", () => {
  it("requires token JSON", () => {
    expect(() => createDriveClient(null)).toThrow(ConfigurationError);
  });

  it("rejects token JSON without a refresh token", () => {
    expect(() => createDriveClient(JSON.stringify({ client_id: "a", client_secret: "b" }))).toThrow(ZodError);
  });

  it("builds a Drive client from authorized-user credentials", () => {
    const drive = createDriveClient(tokenJson);
    expect(typeof drive.files.create).toBe("function");
  });
});

describe("DriveStorage", () => {
  it("fails an upload when Drive is not configured", async () => {
    const storage = new DriveStorage(null);
    await expect(
      storage.upload({ bytes: Buffer.from("x"), filename: "a.ogg", mimeType: "audio/ogg", containerId: "folder-1" }),
    ).rejects.toThrow("Google Drive upload is not configured (GOOGLE_TOKEN_JSON is unset)");
  });

  it("uploads into the folder with a bounded timeout", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const create = vi.fn<DriveFileApi["create"]>(async () => ({ data: { id: "file-1", name: "a.ogg" } }));
    const connect = vi.fn(() => ({ create }));
    const storage = new DriveStorage(tokenJson, connect);

    const stored = await storage.upload({
      bytes: Buffer.from("x"),
      filename: "a.ogg",
      mimeType: "audio/ogg",
      containerId: "folder-1",
    });

    expect(stored).toEqual({ id: "file-1", name: "a.ogg" });
    expect(connect).toHaveBeenCalledWith(tokenJson);
    const [params, options] = create.mock.calls[0];
    expect(params.requestBody).toEqual({ name: "a.ogg", parents: ["folder-1"] });
    expect(params.fields).toBe("id,name");
    expect(options).toEqual({ timeout: 120000 });
  });

  it("rejects a Drive response without a file id", async () => {
    const create = vi.fn<DriveFileApi["create"]>(async () => ({ data: {} }));
    const storage = new DriveStorage(tokenJson, () => ({ create }));

    await expect(
      storage.upload({ bytes: Buffer.from("x"), filename: "a.ogg", mimeType: "audio/ogg", containerId: "folder-1" }),
    ).rejects.toThrow("Drive did not return a file id");
  });
});
