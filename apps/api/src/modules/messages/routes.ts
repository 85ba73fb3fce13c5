import { Router } from 'express';
import { z } from 'zod';
import { messageStatusName, parseMessageStatus } from '@relaydesk/shared';
import { ValidationError } from '../../errors.js';
import { asyncHandler, sendSuccess } from '../../middleware/error-handler.js';
import type { Message } from '../../db/schema.js';
import type { MessageService } from './service.js';

const messageParamsSchema = z.object({
  messageId: z.string().uuid(),
});

const statusCallbackSchema = z.object({
  status: z.union([z.number().int(), z.string().min(1)]),
  failureReason: z.string().max(1000).optional(),
});

function toResponse(message: Message) {
  return {
    id: message.id,
    conversationId: message.conversationId,
    status: messageStatusName(message.status),
    statusCode: message.status,
    deliveredAt: message.deliveredAt,
    readAt: message.readAt,
    failedAt: message.failedAt,
    failureReason: message.failureReason,
  };
}

export function createMessageRouter(messages: MessageService): Router {
  const router = Router();

  /**
   * GET /messages/:messageId
   */
  router.get('/:messageId', asyncHandler(async (req, res) => {
    const { messageId } = messageParamsSchema.parse(req.params);
    sendSuccess(res, toResponse(await messages.getMessage(messageId)));
  }));

  /**
   * POST /messages/:messageId/status
   * Delivery-status callback. Status is the ordinal code (0-4) or its name.
   */
  router.post('/:messageId/status', asyncHandler(async (req, res) => {
    const { messageId } = messageParamsSchema.parse(req.params);
    const body = statusCallbackSchema.parse(req.body);

    const status = parseMessageStatus(body.status);
    if (!status) {
      throw new ValidationError(`unknown status: ${body.status}`, { status: body.status }, 'INVALID_STATUS');
    }

    const result = await messages.updateStatus(messageId, status, body.failureReason);
    sendSuccess(res, { outcome: result.outcome, message: toResponse(result.message) });
  }));

  return router;
}
