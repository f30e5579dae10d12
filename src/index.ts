import { loadConfig } from './config';
import { type ConversationStore, InMemoryConversationStore, JsonlConversationStore } from './conversation/store';
import { createLLMClient } from './core/llm-client';
import { createLogger } from './logger';
import { RagService } from './rag/service';
import { createOllamaEmbedder } from './vector/embeddings';
import { startWebServer } from './web/server';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logging);

  logger.info('Starting product assistant');
  logger.info({ platform: process.platform, node: process.version }, 'System info');

  const embedder = createOllamaEmbedder(config.embedding, logger);
  const llm = createLLMClient(config.generation, logger);

  const conversations: ConversationStore = config.conversations.dataDir
    ? new JsonlConversationStore(config.conversations.dataDir, logger)
    : new InMemoryConversationStore();

  const ragService = new RagService({
    embedder,
    indexPath: config.index.path,
    conversations,
    llm,
    logger,
    topK: config.assistant.topK,
    organization: config.assistant.organization,
  });

  // Requests still fail fast with a clear status if this does not succeed
  const state = await ragService.warmUp();
  if (state.status === 'failed') {
    logger.warn({ error: state.error }, 'Index unavailable; chat requests will be refused until restart with a rebuilt index');
  }

  const server = startWebServer({ config, logger, ragService, conversations });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'Error while closing server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
