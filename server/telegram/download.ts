import type { Api } from "grammy";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { ExternalServiceError, getErrorMessage } from "../utils/errorHandler";

type FetchLike = typeof fetch;

const TELEGRAM_FILE_BASE = "https://api.telegram.org/file";

export type FileLookup = Pick<Api, "getFile">;

/**
 * Resolve a file id to its download path and fetch the bytes.
 */
export async function downloadTelegramFile(
  api: FileLookup,
  token: string,
  fileId: string,
  fetchImpl: FetchLike = fetch,
): Promise<Buffer> {
  const file = await api.getFile(fileId);
  if (!file.file_path) {
    throw new ExternalServiceError("Telegram", `no download path for file ${fileId}`);
  }

  let response: Response;
  try {
    response = await fetchImpl(`${TELEGRAM_FILE_BASE}/bot${token}/${file.file_path}`, {
      signal: AbortSignal.timeout(TIMEOUT_CONSTANTS.FILE_DOWNLOAD_TIMEOUT_MS),
    });
  } catch (error) {
    throw new ExternalServiceError("Telegram", `download failed: ${getErrorMessage(error)}`);
  }

  if (!response.ok) {
    throw new ExternalServiceError("Telegram", `download failed with HTTP ${response.status}`);
  }
  return Buffer.from(await response.arrayBuffer());
}
