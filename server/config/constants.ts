/**
 * Application Constants
 *
 * Centralized configuration values used across the bot.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

/**
 * Duplicate-delivery guard
 */
export const DEDUPE_CONSTANTS = {
  /**
   * Window during which a repeated file id is treated as a duplicate delivery.
   */
  FILE_WINDOW_MS: 5 * 60 * 1000, // 5 minutes
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Fast-path transcription/analysis ceiling (milliseconds).
   * Long memos can take several minutes to transcribe.
   */
  INGEST_TIMEOUT_MS: 300000, // 5 minutes

  /**
   * Contact link/search/create calls (milliseconds).
   */
  CONTACT_API_TIMEOUT_MS: 30000, // 30 seconds

  /**
   * General conversation round trip (milliseconds).
   */
  CHAT_TIMEOUT_MS: 120000, // 2 minutes

  /**
   * Downloading a file from Telegram (milliseconds).
   */
  FILE_DOWNLOAD_TIMEOUT_MS: 60000, // 1 minute

  /**
   * Fallback upload to Google Drive (milliseconds).
   */
  DRIVE_UPLOAD_TIMEOUT_MS: 120000, // 2 minutes
} as const;

/**
 * Disambiguation dialog
 */
export const DIALOG_CONSTANTS = {
  /**
   * Maximum candidates rendered per reference.
   */
  MAX_CANDIDATES: 5,

  /**
   * Reply that skips the current reference.
   */
  SKIP_TOKEN: "0",

  /**
   * Shortest free-text name accepted as a search term.
   */
  MIN_SEARCH_LENGTH: 2,

  /**
   * Telegram rejects callback data longer than this (bytes).
   */
  CALLBACK_DATA_MAX_BYTES: 64,
} as const;

/**
 * Short-term memory for the general conversation path
 */
export const HISTORY_CONSTANTS = {
  MAX_TURNS: 20,
  MAX_AGE_MS: 30 * 60 * 1000, // 30 minutes
} as const;

/**
 * Fallback upload naming
 */
export const UPLOAD_CONSTANTS = {
  DEFAULT_VOICE_EXTENSION: "ogg",
  DEFAULT_AUDIO_EXTENSION: "mp3",
  DEFAULT_VOICE_MIME: "audio/ogg",
  DEFAULT_AUDIO_MIME: "audio/mpeg",
} as const;
