import { z } from 'zod';
import type { CanonicalMessage, MessageType } from '@relaydesk/shared';
import {
  BaseNormalizer,
  compact,
  isRecord,
  toIsoTimestamp,
  type PayloadValidation,
} from '../base.js';

// ============================================
// CLOUD API WEBHOOK SHAPES
// ============================================

const mediaSchema = z.object({
  id: z.string().optional(),
  caption: z.string().optional(),
  filename: z.string().optional(),
  mime_type: z.string().optional(),
});

const messageUnitSchema = z.object({
  from: z.string().min(1),
  id: z.string().min(1),
  timestamp: z.union([z.string(), z.number()]).optional(),
  type: z.string().optional(),
  text: z.object({ body: z.string() }).optional(),
  image: mediaSchema.optional(),
  video: mediaSchema.optional(),
  audio: mediaSchema.optional(),
  document: mediaSchema.optional(),
  sticker: mediaSchema.optional(),
});

const changeSchema = z.object({
  value: z.object({
    messages: z.array(z.unknown()).optional(),
    metadata: z.object({ phone_number_id: z.string().optional() }).optional(),
    contacts: z.array(z.object({
      wa_id: z.string().optional(),
      profile: z.object({ name: z.string().optional() }).optional(),
    })).optional(),
  }),
});

const entrySchema = z.object({
  changes: z.array(z.unknown()).optional(),
});

type MessageUnit = z.infer<typeof messageUnitSchema>;
type ChangeValue = z.infer<typeof changeSchema>['value'];

/**
 * WhatsApp Cloud API webhooks: entry[] -> changes[] -> value.messages[]
 */
export class WhatsAppNormalizer extends BaseNormalizer {
  constructor() {
    super('whatsapp');
  }

  validate(payload: unknown): PayloadValidation {
    if (!isRecord(payload) || Object.keys(payload).length === 0) {
      return { ok: false, error: 'empty WhatsApp payload' };
    }
    if (!('entry' in payload)) {
      return { ok: false, error: "invalid WhatsApp payload: missing 'entry' field" };
    }
    if (!Array.isArray(payload.entry)) {
      return { ok: false, error: "invalid WhatsApp payload: 'entry' must be an array" };
    }
    if (payload.entry.length === 0) {
      return { ok: false, error: "invalid WhatsApp payload: 'entry' array is empty" };
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

      for (const rawChange of entry.data.changes ?? []) {
        const change = changeSchema.safeParse(rawChange);
        if (!change.success) {
          this.skip('malformed change');
          continue;
        }

        for (const rawUnit of change.data.value.messages ?? []) {
          results.push(this.normalizeUnit(rawUnit, change.data.value));
        }
      }
    }

    return compact(results);
  }

  private normalizeUnit(rawUnit: unknown, value: ChangeValue): CanonicalMessage | null {
    const parsed = messageUnitSchema.safeParse(rawUnit);
    if (!parsed.success) {
      return this.skip('missing sender or message id', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }

    const unit = parsed.data;
    const body = this.classify(unit);
    if (!body) {
      return this.skip(`unsupported message type ${unit.type ?? 'unknown'}`, {
        platformMessageId: unit.id,
      });
    }

    const contactName = value.contacts?.find((c) => c.wa_id === unit.from)?.profile?.name;

    return this.canonical({
      origin: unit.from,
      content: body.content,
      mediaUrl: body.mediaUrl,
      messageType: body.messageType,
      platformMessageId: unit.id,
      metadata: {
        whatsapp_sender_id: unit.from,
        whatsapp_message_id: unit.id,
        whatsapp_timestamp: toIsoTimestamp(unit.timestamp),
        whatsapp_phone_number_id: value.metadata?.phone_number_id,
        whatsapp_contact_name: contactName,
        whatsapp_media_mime_type: body.mimeType,
      },
    });
  }

  /**
   * Media arrives as an opaque media id; it is carried as the media URL
   * until a downloader resolves it.
   */
  private classify(unit: MessageUnit): {
    messageType: MessageType;
    content: string;
    mediaUrl: string;
    mimeType?: string;
  } | null {
    const type = unit.type ?? (unit.text ? 'text' : undefined);

    switch (type) {
      case 'text':
        return { messageType: 'text', content: unit.text?.body ?? '', mediaUrl: '' };
      case 'image':
      case 'video':
      case 'sticker': {
        const media = unit[type];
        return {
          messageType: type,
          content: media?.caption ?? '',
          mediaUrl: media?.id ?? '',
          mimeType: media?.mime_type,
        };
      }
      case 'audio':
        return {
          messageType: 'audio',
          content: '',
          mediaUrl: unit.audio?.id ?? '',
          mimeType: unit.audio?.mime_type,
        };
      case 'document':
        return {
          messageType: 'document',
          content: unit.document?.filename ?? unit.document?.caption ?? '',
          mediaUrl: unit.document?.id ?? '',
          mimeType: unit.document?.mime_type,
        };
      default:
        return null;
    }
  }
}
