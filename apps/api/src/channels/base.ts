import {
  MEDIUM_IDS,
  type CanonicalMessage,
  type MessageType,
  type Platform,
} from '@relaydesk/shared';
import { createLogger, type Logger } from '../utils/logger.js';

// ============================================
// NORMALIZER INTERFACE
// ============================================

export type PayloadValidation =
  | { ok: true }
  | { ok: false; error: string };

/**
 * Turns one platform's raw webhook document into canonical messages.
 * Implementations are pure: no I/O beyond logging skipped units.
 */
export interface PlatformNormalizer {
  /** Platform tag the normalizer is registered under */
  readonly platform: Platform;

  /**
   * Check the top-level envelope. A failure here is permanent.
   */
  validate(payload: unknown): PayloadValidation;

  /**
   * Walk the payload and return every well-formed message unit.
   * Malformed inner units are skipped; an invalid envelope yields [].
   */
  extract(payload: unknown): CanonicalMessage[];

  mediumId(): number;
}

// ============================================
// BASE NORMALIZER
// ============================================

export interface CanonicalFields {
  origin: string;
  content?: string;
  mediaUrl?: string;
  messageType: MessageType;
  metadata: Record<string, string | undefined>;
  platformMessageId?: string;
}

/**
 * Shared plumbing for normalizers: medium lookup, unit logging and the
 * final assembly of a CanonicalMessage.
 */
export abstract class BaseNormalizer implements PlatformNormalizer {
  protected readonly log: Logger;

  constructor(public readonly platform: Platform) {
    this.log = createLogger(`normalizer:${platform}`);
  }

  abstract validate(payload: unknown): PayloadValidation;

  protected abstract extractUnits(payload: unknown): CanonicalMessage[];

  extract(payload: unknown): CanonicalMessage[] {
    if (!this.validate(payload).ok) {
      return [];
    }
    return this.extractUnits(payload);
  }

  mediumId(): number {
    return MEDIUM_IDS[this.platform];
  }

  /**
   * Log and drop a unit that cannot be normalized
   */
  protected skip(reason: string, details?: Record<string, unknown>): null {
    this.log.warn({ platform: this.platform, ...details }, `Skipping message unit: ${reason}`);
    return null;
  }

  /**
   * Assemble a canonical message. Units with neither content nor media are dropped.
   */
  protected canonical(fields: CanonicalFields): CanonicalMessage | null {
    const content = fields.content ?? '';
    const mediaUrl = fields.mediaUrl ?? '';

    if (!content && !mediaUrl) {
      return this.skip('no content or media', {
        platformMessageId: fields.platformMessageId,
      });
    }

    const metadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(fields.metadata)) {
      if (value !== undefined && value !== '') {
        metadata[key] = value;
      }
    }

    return {
      origin: fields.origin,
      content,
      mediaUrl,
      messageType: fields.messageType,
      metadata,
      ...(fields.platformMessageId ? { platformMessageId: fields.platformMessageId } : {}),
    };
  }
}

// ============================================
// HELPERS
// ============================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Platform timestamps arrive as epoch seconds or milliseconds, numeric or string
 */
export function toIsoTimestamp(value: string | number | undefined): string | undefined {
  if (value === undefined || value === '') return undefined;
  const ts = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(ts)) return undefined;
  return new Date(ts < 10000000000 ? ts * 1000 : ts).toISOString();
}

export function compact<T>(items: Array<T | null>): T[] {
  return items.filter((item): item is T => item !== null);
}
