import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

/**
 * Bad user input (empty name, out-of-range selection). The dialog stays where it was.
 */
export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigurationError extends Error implements AppError {
  statusCode = 503;
  isOperational = true;
  setting: string;
  constructor(setting: string, feature: string) {
    super(`${feature} is not configured (${setting} is unset)`);
    this.name = "ConfigurationError";
    this.setting = setting;
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

export class ExpiredActionError extends Error implements AppError {
  statusCode = 410;
  isOperational = true;
  constructor(message = "This action has expired. Please send the voice message again.") {
    super(message);
    this.name = "ExpiredActionError";
  }
}

/**
 * The fallback upload failed, so the memo exists nowhere but in this request.
 */
export class StorageWriteError extends Error implements AppError {
  statusCode = 500;
  isOperational = false;
  filename: string;
  constructor(filename: string, cause: unknown) {
    super(`Failed to store ${filename}: ${getErrorMessage(cause)}`, { cause });
    this.name = "StorageWriteError";
    this.filename = filename;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

function isAppError(error: unknown): error is AppError {
  return error instanceof Error && "statusCode" in error;
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (isAppError(error) && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

/** The slice of Express's Response that error replies need. */
export interface JsonResponder {
  status(code: number): { json(body: unknown): unknown };
}

export function handleRouteError(res: JsonResponder, error: unknown, context?: string): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}

export interface ClassifiedError {
  type: "storage" | "configuration" | "validation" | "expired" | "external" | "internal";
  userMessage: string;
  errorMessage: string;
}

/**
 * Map an error raised while handling an update to what the user should see.
 */
export function classifyBotError(err: unknown): ClassifiedError {
  const errorMessage = getErrorMessage(err);

  if (err instanceof StorageWriteError) {
    return {
      type: "storage",
      userMessage: `❌ Error: ${errorMessage}`,
      errorMessage,
    };
  }

  if (err instanceof ConfigurationError) {
    return {
      type: "configuration",
      userMessage: `⚠️ ${errorMessage}. Please contact the bot admin.`,
      errorMessage,
    };
  }

  if (err instanceof ValidationError) {
    return { type: "validation", userMessage: `⚠️ ${errorMessage}`, errorMessage };
  }

  if (err instanceof ExpiredActionError) {
    return { type: "expired", userMessage: `⌛ ${errorMessage}`, errorMessage };
  }

  if (err instanceof ExternalServiceError) {
    return {
      type: "external",
      userMessage: "😕 Sorry, the service didn't respond. Please try again in a moment.",
      errorMessage,
    };
  }

  return {
    type: "internal",
    userMessage: "Sorry, I hit an internal error while processing that message.",
    errorMessage,
  };
}
