import path from 'path';
import { createAIAdapter, createDatasetStore } from './adapters/adapter-factory';
import { ChatService } from './chat-service';
import { loadConfig, loadDatasetProfile } from './config';
import { Logger, installProcessHandlers } from './logger';

let servicePromise: Promise<ChatService> | null = null;

async function createChatService(): Promise<ChatService> {
  const config = await loadConfig();
  const logger = new Logger({
    logDir: config.logging.dir === null ? null : path.resolve(process.cwd(), config.logging.dir),
  });
  installProcessHandlers(logger);

  const profile = await loadDatasetProfile(config.dataSource.datasetsPath, config.dataSource.dataset);
  const service = new ChatService({
    store: createDatasetStore(config.dataSource),
    ai: createAIAdapter(config.ai, logger),
    profile,
    query: config.query,
    historyWindow: config.ai.historyWindow,
    logger,
  });

  await logger.info('Chat service ready', {
    dataset: config.dataSource.dataset,
    database: config.dataSource.database.type,
    model: config.ai.model,
  });
  return service;
}

/**
 * Process-wide chat service, built from `config/app.yaml` on first use.
 * A failed build is retried on the next call.
 */
export function getChatService(): Promise<ChatService> {
  if (!servicePromise) {
    servicePromise = createChatService().catch((error: unknown) => {
      servicePromise = null;
      throw error;
    });
  }
  return servicePromise;
}
