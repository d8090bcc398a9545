#!/usr/bin/env node

import 'dotenv/config';
import { config } from './config';
import { logger } from './utils/logger';
import { createRAGService } from './core/rag-service';
import { RAGServer } from './server';

async function main(): Promise<void> {
  // Validate configuration
  config.validate();

  logger.info('Starting document Q&A service');
  logger.info(`Embedding provider: ${config.embeddings.provider} (${config.embeddings.model})`);
  logger.info(`Generation model: ${config.generation.model}`);

  const ragService = createRAGService(config);
  const server = new RAGServer(ragService, config.server);
  await server.start();

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    server
      .stop()
      .then(() => {
        ragService.close();
        process.exit(0);
      })
      .catch(error => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', reason);
  process.exit(1);
});

main().catch(error => {
  logger.error('Failed to start service', error);
  process.exit(1);
});
