import type { Express } from "express";
import express from "express";
import { createServer, type Server } from "http";
import type { Update } from "grammy/types";
import { handleRouteError, logError, ValidationError, type JsonResponder } from "./utils/errorHandler";

export type RunMode = "webhook" | "polling";

export interface UpdateSink {
  handleUpdate(update: Update): Promise<void>;
}

export interface WebhookRequest {
  body: unknown;
}

export interface WebhookResponse extends JsonResponder {
  sendStatus(code: number): unknown;
}

function isUpdate(body: unknown): body is Update {
  return typeof body === "object" && body !== null && "update_id" in body && typeof body.update_id === "number";
}

/**
 * Acknowledges the update before running it. A handler can wait minutes on the
 * fast path, and Telegram redelivers any update it has not seen answered.
 */
export function createWebhookHandler(sink: UpdateSink) {
  return (req: WebhookRequest, res: WebhookResponse): void => {
    const update = req.body;
    if (!isUpdate(update)) {
      handleRouteError(res, new ValidationError("Request body is not a Telegram update"), "Webhook");
      return;
    }

    res.sendStatus(200);
    sink.handleUpdate(update).catch((error: unknown) => {
      logError(`Webhook update ${update.update_id}`, error);
    });
  };
}

export function registerRoutes(app: Express, sink: UpdateSink, mode: RunMode): Server {
  app.get("/", (_req, res) => {
    res.json({ status: "ok", mode });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  app.post("/webhook", express.json(), createWebhookHandler(sink));

  return createServer(app);
}
