import { Router } from 'express';
import { z } from 'zod';
import { MEDIUM_IDS, isPlatform } from '@relaydesk/shared';
import { asyncHandler, sendSuccess } from '../../middleware/error-handler.js';
import type { WebhookEvent } from '../../db/schema.js';
import type { WebhookIntakeService } from './service.js';

const receiveParamsSchema = z.object({
  platform: z.string().min(1).max(50),
  organizationId: z.string().uuid(),
});

const receiveQuerySchema = z.object({
  mediumId: z.coerce.number().int().positive().optional(),
});

const eventParamsSchema = z.object({
  id: z.string().uuid(),
});

function toResponse(event: WebhookEvent) {
  return {
    id: event.id,
    platform: event.platform,
    status: event.status,
    retryCount: event.retryCount,
    errorMessage: event.errorMessage,
    processedAt: event.processedAt,
    createdAt: event.createdAt,
  };
}

export function createWebhookRouter(intake: WebhookIntakeService): Router {
  const router = Router();

  /**
   * POST /webhooks/:platform/:organizationId
   * Provider deliveries. Always stored; processing outcome is in the body.
   */
  router.post('/:platform/:organizationId', asyncHandler(async (req, res) => {
    const { platform, organizationId } = receiveParamsSchema.parse(req.params);
    const { mediumId } = receiveQuerySchema.parse(req.query);

    const event = await intake.receive(
      platform,
      organizationId,
      mediumId ?? (isPlatform(platform) ? MEDIUM_IDS[platform] : 0),
      req.body
    );

    sendSuccess(res, toResponse(event), 202);
  }));

  /**
   * GET /webhooks/events/:id
   */
  router.get('/events/:id', asyncHandler(async (req, res) => {
    const { id } = eventParamsSchema.parse(req.params);
    sendSuccess(res, toResponse(await intake.getEvent(id)));
  }));

  /**
   * POST /webhooks/events/:id/retry
   */
  router.post('/events/:id/retry', asyncHandler(async (req, res) => {
    const { id } = eventParamsSchema.parse(req.params);
    sendSuccess(res, toResponse(await intake.retry(id)));
  }));

  return router;
}
