/**
 * Google Drive fallback storage.
 *
 * Files dropped into the watched folder are picked up by the out-of-band
 * processing pipeline, so an upload here is enough for a memo to be processed
 * eventually. Upload failures are thrown unchanged; the orchestrator decides
 * how to surface them.
 *
 * Layer: Integration (I/O only)
 */

import { Readable } from "stream";
import { google, type drive_v3 } from "googleapis";
import { z } from "zod";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { ConfigurationError } from "../utils/errorHandler";

export interface StoredObject {
  id: string;
  name: string;
}

export interface BlobUpload {
  bytes: Buffer;
  filename: string;
  mimeType: string;
  containerId: string;
}

export interface BlobStorage {
  upload(file: BlobUpload): Promise<StoredObject>;
}

/** The slice of `drive.files` used for uploads */
export interface DriveFileApi {
  create(
    params: drive_v3.Params$Resource$Files$Create,
    options: { timeout: number },
  ): Promise<{ data: { id?: string | null; name?: string | null } }>;
}

const SCOPES = ["https://www.googleapis.com/auth/drive"];

const authorizedUserSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  token: z.string().optional(),
  access_token: z.string().optional(),
});

/**
 * Build a Drive client from an authorized-user token JSON
 * (client_id, client_secret, refresh_token).
 */
export function createDriveClient(tokenJson: string | null): drive_v3.Drive {
  if (!tokenJson) {
    throw new ConfigurationError("GOOGLE_TOKEN_JSON", "Google Drive upload");
  }

  const credentials = authorizedUserSchema.parse(JSON.parse(tokenJson));
  const auth = new google.auth.OAuth2(credentials.client_id, credentials.client_secret);
  auth.setCredentials({
    refresh_token: credentials.refresh_token,
    access_token: credentials.access_token ?? credentials.token,
    scope: SCOPES.join(" "),
  });
  return google.drive({ version: "v3", auth });
}

export class DriveStorage implements BlobStorage {
  private files: DriveFileApi | null = null;

  constructor(
    private readonly tokenJson: string | null,
    private readonly connect: (tokenJson: string | null) => DriveFileApi = (json) => createDriveClient(json).files,
  ) {}

  async upload(file: BlobUpload): Promise<StoredObject> {
    const files = this.getFiles();

    const response = await files.create(
      {
        requestBody: {
          name: file.filename,
          parents: [file.containerId],
        },
        media: {
          mimeType: file.mimeType,
          body: Readable.from(file.bytes),
        },
        fields: "id,name",
      },
      { timeout: TIMEOUT_CONSTANTS.DRIVE_UPLOAD_TIMEOUT_MS },
    );

    const id = response.data.id;
    if (!id) {
      throw new Error("Drive did not return a file id");
    }

    console.log(`[Drive] Uploaded ${response.data.name ?? file.filename} (ID: ${id})`);
    return { id, name: response.data.name ?? file.filename };
  }

  private getFiles(): DriveFileApi {
    if (!this.files) {
      this.files = this.connect(this.tokenJson);
    }
    return this.files;
  }
}
