import { z } from 'zod';
import type { CanonicalMessage } from '@relaydesk/shared';
import {
  BaseNormalizer,
  compact,
  isRecord,
  toIsoTimestamp,
  type PayloadValidation,
} from '../base.js';

const emailSchema = z.object({
  email: z.string().optional(),
  from: z.string().optional(),
  sender: z.string().optional(),
  to: z.union([z.string(), z.array(z.string())]).optional(),
  subject: z.string().optional(),
  text: z.string().optional(),
  body: z.string().optional(),
  message: z.string().optional(),
  html: z.string().optional(),
  message_id: z.string().optional(),
  messageId: z.string().optional(),
  timestamp: z.union([z.string(), z.number()]).optional(),
});

type EmailUnit = z.infer<typeof emailSchema>;

/**
 * Inbound email relays post either a single email object or { emails: [...] }
 */
export class EmailNormalizer extends BaseNormalizer {
  constructor() {
    super('email');
  }

  validate(payload: unknown): PayloadValidation {
    if (!isRecord(payload) || Object.keys(payload).length === 0) {
      return { ok: false, error: 'empty email payload' };
    }
    if ('emails' in payload) {
      return Array.isArray(payload.emails)
        ? { ok: true }
        : { ok: false, error: "invalid email payload: 'emails' must be an array" };
    }
    if (!payload.email && !payload.from) {
      return { ok: false, error: 'invalid email payload: missing email or from field' };
    }
    return { ok: true };
  }

  protected extractUnits(payload: unknown): CanonicalMessage[] {
    if (!isRecord(payload)) return [];

    const units: unknown[] = Array.isArray(payload.emails) ? payload.emails : [payload];
    return compact(units.map((unit) => this.normalizeEmail(unit)));
  }

  private normalizeEmail(rawUnit: unknown): CanonicalMessage | null {
    const parsed = emailSchema.safeParse(rawUnit);
    if (!parsed.success) {
      return this.skip('malformed email', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }

    const unit = parsed.data;
    const origin = (unit.email || unit.from || unit.sender || '').trim();
    if (!origin) {
      return this.skip('missing sender address');
    }

    const { body, isHtml } = pickBody(unit);
    const subject = unit.subject?.trim() ?? '';
    const messageId = unit.message_id ?? unit.messageId;

    return this.canonical({
      origin,
      content: composeContent(subject, body),
      messageType: 'text',
      platformMessageId: messageId,
      metadata: {
        email_from: origin,
        email_subject: subject,
        email_message_id: messageId,
        email_timestamp: typeof unit.timestamp === 'number'
          ? toIsoTimestamp(unit.timestamp)
          : unit.timestamp,
        email_to: Array.isArray(unit.to) ? unit.to.join(', ') : unit.to,
        email_content_type: isHtml ? 'html' : undefined,
      },
    });
  }
}

function pickBody(unit: EmailUnit): { body: string; isHtml: boolean } {
  const plain = unit.text || unit.body || unit.message;
  if (plain) return { body: plain, isHtml: false };
  if (unit.html) return { body: unit.html, isHtml: true };
  return { body: '', isHtml: false };
}

export function composeContent(subject: string, body: string): string {
  if (subject && body) return `Subject: ${subject}\n\n${body}`;
  return subject || body;
}
