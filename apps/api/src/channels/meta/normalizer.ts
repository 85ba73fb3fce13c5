import { z } from 'zod';
import type { CanonicalMessage, MessageType } from '@relaydesk/shared';
import {
  BaseNormalizer,
  compact,
  isRecord,
  toIsoTimestamp,
  type PayloadValidation,
} from '../base.js';

export type MetaPlatform = 'instagram' | 'facebook';

const PLATFORM_LABELS: Record<MetaPlatform, string> = {
  instagram: 'Instagram',
  facebook: 'Facebook',
};

// ============================================
// MESSENGER PLATFORM WEBHOOK SHAPES
// ============================================

const attachmentSchema = z.object({
  type: z.string(),
  title: z.string().optional(),
  payload: z.object({
    url: z.string().optional(),
    sticker_id: z.union([z.string(), z.number()]).optional(),
  }).nullish(),
});

const messagingSchema = z.object({
  sender: z.object({ id: z.string().min(1) }),
  recipient: z.object({ id: z.string() }).optional(),
  timestamp: z.union([z.string(), z.number()]).optional(),
  message: z.object({
    mid: z.string().optional(),
    text: z.string().optional(),
    is_echo: z.boolean().optional(),
    sticker_id: z.union([z.string(), z.number()]).optional(),
    attachments: z.array(attachmentSchema).optional(),
  }),
});

const entrySchema = z.object({
  id: z.string().optional(),
  messaging: z.array(z.unknown()).optional(),
});

type MessagingEvent = z.infer<typeof messagingSchema>;

/**
 * Instagram and Messenger share the Messenger Platform webhook format:
 * entry[] -> messaging[] -> { sender, recipient, message }
 */
export class MetaNormalizer extends BaseNormalizer {
  private readonly label: string;

  constructor(platform: MetaPlatform) {
    super(platform);
    this.label = PLATFORM_LABELS[platform];
  }

  validate(payload: unknown): PayloadValidation {
    if (!isRecord(payload) || Object.keys(payload).length === 0) {
      return { ok: false, error: `empty ${this.label} payload` };
    }
    if (!Array.isArray(payload.entry)) {
      return { ok: false, error: `invalid ${this.label} payload: missing entry` };
    }
    return { ok: true };
  }

  protected extractUnits(payload: unknown): CanonicalMessage[] {
    if (!isRecord(payload) || !Array.isArray(payload.entry)) return [];

    const results: Array<CanonicalMessage | null> = [];

    for (const rawEntry of payload.entry) {
      const entry = entrySchema.safeParse(rawEntry);
      if (!entry.success) {
        this.skip('malformed entry');
        continue;
      }

      for (const rawEvent of entry.data.messaging ?? []) {
        // Delivery/read receipts and postbacks carry no message
        if (isRecord(rawEvent) && !('message' in rawEvent)) {
          this.log.debug({ platform: this.platform }, 'Ignoring non-message event');
          continue;
        }
        results.push(this.normalizeEvent(rawEvent));
      }
    }

    return compact(results);
  }

  private normalizeEvent(rawEvent: unknown): CanonicalMessage | null {
    const parsed = messagingSchema.safeParse(rawEvent);
    if (!parsed.success) {
      return this.skip('missing sender or message', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }

    const event = parsed.data;
    if (event.message.is_echo) {
      this.log.debug({ platform: this.platform, mid: event.message.mid }, 'Ignoring echo');
      return null;
    }

    const body = this.classify(event);
    const prefix = this.platform;

    return this.canonical({
      origin: event.sender.id,
      content: body.content,
      mediaUrl: body.mediaUrl,
      messageType: body.messageType,
      platformMessageId: event.message.mid,
      metadata: {
        [`${prefix}_sender_id`]: event.sender.id,
        [`${prefix}_message_id`]: event.message.mid,
        [`${prefix}_timestamp`]: toIsoTimestamp(event.timestamp),
        [`${prefix}_recipient_id`]: event.recipient?.id,
      },
    });
  }

  private classify(event: MessagingEvent): {
    messageType: MessageType;
    content: string;
    mediaUrl: string;
  } {
    const msg = event.message;

    if (msg.text) {
      return { messageType: 'text', content: msg.text, mediaUrl: '' };
    }

    const attachment = msg.attachments?.[0];
    if (!attachment) {
      return { messageType: 'text', content: '', mediaUrl: '' };
    }

    const mediaUrl = attachment.payload?.url ?? '';
    switch (attachment.type) {
      case 'image': {
        const isSticker = msg.sticker_id !== undefined || attachment.payload?.sticker_id !== undefined;
        return { messageType: isSticker ? 'sticker' : 'image', content: '', mediaUrl };
      }
      case 'video':
        return { messageType: 'video', content: '', mediaUrl };
      case 'audio':
        return { messageType: 'audio', content: '', mediaUrl };
      case 'file':
        return { messageType: 'document', content: attachment.title ?? '', mediaUrl };
      default:
        return { messageType: 'text', content: attachment.title ?? '[Attachment]', mediaUrl: '' };
    }
  }
}
