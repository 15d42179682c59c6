/**
 * Composition root: one instance of every per-process store and client.
 */

import { ChatClient, type ChatCollaborator } from "./clients/chatApi";
import { DriveStorage, type BlobStorage } from "./clients/driveStorage";
import { IntelligenceClient, type ContactDirectory } from "./clients/intelligenceApi";
import type { AppConfig } from "./config/env";
import { TIMEOUT_CONSTANTS } from "./config/constants";
import { CallbackActionRegistry } from "./dialog/actionRegistry";
import { CallbackActionHandler } from "./dialog/callbackActions";
import { ConversationHistory } from "./dialog/conversationHistory";
import { ConversationRouter } from "./dialog/conversationRouter";
import { FingerprintCache } from "./dialog/fingerprintCache";
import { LinkDialog } from "./dialog/linkDialog";
import { PendingLinkQueue } from "./dialog/pendingLinkQueue";
import { HttpFastPath, type FastPathProcessor } from "./ingest/fastPath";
import { IngestOrchestrator } from "./ingest/orchestrator";
import { BotHandlers } from "./telegram/handlers";

export interface ServiceOverrides {
  contacts?: ContactDirectory;
  chat?: ChatCollaborator;
  storage?: BlobStorage;
  fastPath?: FastPathProcessor | null;
}

export interface Services {
  queue: PendingLinkQueue;
  registry: CallbackActionRegistry;
  handlers: BotHandlers;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const queue = new PendingLinkQueue();
  const registry = new CallbackActionRegistry();
  const history = new ConversationHistory();

  const contacts =
    overrides.contacts ??
    new IntelligenceClient({
      baseUrl: config.intelligenceUrl,
      apiKey: config.intelligenceApiKey,
      timeoutMs: TIMEOUT_CONSTANTS.CONTACT_API_TIMEOUT_MS,
    });
  const chat =
    overrides.chat ??
    new ChatClient({ url: config.chatUrl, apiKey: config.intelligenceApiKey, timeoutMs: TIMEOUT_CONSTANTS.CHAT_TIMEOUT_MS });

  const fastPath =
    overrides.fastPath !== undefined
      ? overrides.fastPath
      : config.processAudioUrl
        ? new HttpFastPath({ url: config.processAudioUrl, timeoutMs: TIMEOUT_CONSTANTS.INGEST_TIMEOUT_MS })
        : null;

  const orchestrator = new IngestOrchestrator({
    queue,
    storage: overrides.storage ?? new DriveStorage(config.googleTokenJson),
    containerId: config.driveFolderId,
    fastPath,
  });

  const dialog = new LinkDialog(queue, contacts);
  const router = new ConversationRouter({ queue, dialog, history, chat });
  const callbacks = new CallbackActionHandler(registry, queue, contacts);

  const handlers = new BotHandlers({
    fingerprints: new FingerprintCache(),
    registry,
    orchestrator,
    router,
    callbacks,
  });

  return { queue, registry, handlers };
}
