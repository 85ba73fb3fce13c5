import { createServer } from 'http';
import { config, validateConfig } from './config/env.js';
import { createApp } from './app.js';
import { createContainer, createDrizzleRepositories } from './container.js';
import { createDatabase, testConnection } from './db/index.js';
import { BullMQEventTransport } from './events/transports/bullmq.js';
import { MemoryEventTransport } from './events/transports/memory.js';
import type { EventTransport } from './events/transport.js';
import { startWorkers, stopWorkers } from './queue/workers.js';
import { logger } from './utils/logger.js';

const { db, pool } = createDatabase();

const transport: EventTransport = config.redis.url
  ? BullMQEventTransport.fromUrl(config.redis.url)
  : new MemoryEventTransport();

const container = createContainer(createDrizzleRepositories(db), transport);
const httpServer = createServer(createApp(container));

// ============================================
// STARTUP
// ============================================

async function start(): Promise<void> {
  logger.info('Starting relaydesk API');

  validateConfig((message) => logger.info(message));

  const dbConnected = await testConnection(pool);
  if (!dbConnected && config.isProd) {
    throw new Error('Database connection failed');
  }

  startWorkers(container);

  httpServer.listen(config.port, () => {
    logger.info({ port: config.port, env: config.nodeEnv }, 'relaydesk API listening');
  });
}

// ============================================
// SHUTDOWN
// ============================================

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down gracefully');

  // Force exit after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();

  await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  await stopWorkers(container);
  await pool.end();

  logger.info('Shutdown complete');
  process.exit(0);
}

function handleSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error({ err: error }, 'Shutdown failed');
    process.exit(1);
  });
}

process.on('SIGTERM', () => handleSignal('SIGTERM'));
process.on('SIGINT', () => handleSignal('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});

start().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
