import express, { type Express } from 'express';
import helmet from 'helmet';
import type { Container } from './container.js';
import { globalErrorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createMessageRouter } from './modules/messages/routes.js';
import { createWebhookRouter } from './modules/webhooks/routes.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('http');

export function createApp(container: Container): Express {
  const app = express();

  // ============================================
  // MIDDLEWARE
  // ============================================

  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API
  }));

  app.use(express.json({ limit: '5mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      log.debug(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - start },
        'Request handled'
      );
    });
    next();
  });

  // ============================================
  // HEALTH CHECK
  // ============================================

  app.get('/health', (_req, res) => {
    const dedupStats = container.dedup.getStats();
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      transport: container.transport.name,
      deduplication: dedupStats,
    });
  });

  // ============================================
  // API ROUTES
  // ============================================

  app.use('/api/webhooks', createWebhookRouter(container.intake));
  app.use('/api/messages', createMessageRouter(container.messages));

  // ============================================
  // ERROR HANDLING
  // ============================================

  app.use(notFoundHandler());
  app.use(globalErrorHandler());

  return app;
}
