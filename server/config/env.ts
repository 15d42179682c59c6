/**
 * Centralized environment configuration.
 * Parsed once at startup so a missing token fails fast instead of on the first update.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";

const optionalUrl = z
  .string()
  .trim()
  .transform((value) => value.replace(/\/+$/, ""))
  .pipe(z.string().url().or(z.literal("")))
  .optional()
  .transform((value) => (value ? value : null));

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, "TELEGRAM_BOT_TOKEN not set"),
  GOOGLE_DRIVE_FOLDER_ID: z.string().trim().min(1, "GOOGLE_DRIVE_FOLDER_ID not set"),
  GOOGLE_TOKEN_JSON: optionalString,
  WEBHOOK_URL: optionalUrl,
  PORT: z.coerce.number().int().positive().default(8080),
  ALLOWED_USER_IDS: z
    .string()
    .optional()
    .transform((value, ctx) => {
      const ids: number[] = [];
      for (const part of (value ?? "").split(",")) {
        const trimmed = part.trim();
        if (!trimmed) continue;
        const id = Number(trimmed);
        if (!Number.isInteger(id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid user id "${trimmed}"` });
          return z.NEVER;
        }
        ids.push(id);
      }
      return ids;
    }),
  PROCESS_AUDIO_URL: optionalUrl,
  INTELLIGENCE_URL: optionalUrl,
  INTELLIGENCE_API_KEY: optionalString,
  CHAT_URL: optionalUrl,
  NODE_ENV: z.string().default("development"),
});

export interface AppConfig {
  telegramToken: string;
  driveFolderId: string;
  googleTokenJson: string | null;
  webhookUrl: string | null;
  port: number;
  allowedUserIds: number[];
  processAudioUrl: string | null;
  intelligenceUrl: string | null;
  intelligenceApiKey: string | null;
  chatUrl: string | null;
  nodeEnv: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${fromZodError(parsed.error).message}`);
  }

  const data = parsed.data;
  return {
    telegramToken: data.TELEGRAM_BOT_TOKEN,
    driveFolderId: data.GOOGLE_DRIVE_FOLDER_ID,
    googleTokenJson: data.GOOGLE_TOKEN_JSON,
    webhookUrl: data.WEBHOOK_URL,
    port: data.PORT,
    allowedUserIds: data.ALLOWED_USER_IDS,
    processAudioUrl: data.PROCESS_AUDIO_URL,
    intelligenceUrl: data.INTELLIGENCE_URL,
    intelligenceApiKey: data.INTELLIGENCE_API_KEY,
    chatUrl: data.CHAT_URL,
    nodeEnv: data.NODE_ENV,
  };
}

/**
 * Check if a user may talk to the bot. An empty allow-list admits everyone.
 */
export function isAuthorized(config: Pick<AppConfig, "allowedUserIds">, userId: number): boolean {
  if (config.allowedUserIds.length === 0) {
    return true;
  }
  return config.allowedUserIds.includes(userId);
}
