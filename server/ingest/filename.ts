import { format } from "date-fns";
import { UPLOAD_CONSTANTS } from "../config/constants";

export type AudioKind = "voice" | "audio";

export interface UploadNameInput {
  kind: AudioKind;
  receivedAt: Date;
  userId: number;
  username?: string | null;
  mimeType?: string | null;
}

/**
 * Extension from the declared MIME subtype ("audio/ogg" → "ogg"),
 * else the per-kind default.
 */
export function extensionFor(kind: AudioKind, mimeType?: string | null): string {
  const subtype = mimeType?.split(";")[0].split("/").pop()?.trim().toLowerCase();
  if (subtype) {
    return subtype;
  }
  return kind === "voice" ? UPLOAD_CONSTANTS.DEFAULT_VOICE_EXTENSION : UPLOAD_CONSTANTS.DEFAULT_AUDIO_EXTENSION;
}

export function mimeTypeFor(kind: AudioKind, mimeType?: string | null): string {
  if (mimeType) return mimeType;
  return kind === "voice" ? UPLOAD_CONSTANTS.DEFAULT_VOICE_MIME : UPLOAD_CONSTANTS.DEFAULT_AUDIO_MIME;
}

/**
 * `{kind}_{YYYYMMDD_HHMMSS}_{username-or-id}.{ext}`, e.g. `voice_20260115_090507_alice.ogg`
 */
export function buildUploadFilename(input: UploadNameInput): string {
  const timestamp = format(input.receivedAt, "yyyyMMdd_HHmmss");
  const handle = input.username || String(input.userId);
  return `${input.kind}_${timestamp}_${handle}.${extensionFor(input.kind, input.mimeType)}`;
}
