import type { Platform } from '@relaydesk/shared';
import type { PlatformNormalizer } from './base.js';
import { WhatsAppNormalizer } from './whatsapp/normalizer.js';
import { MetaNormalizer } from './meta/normalizer.js';
import { EmailNormalizer } from './email/normalizer.js';

/**
 * Lookup by the raw platform tag from the webhook route. Unknown tags miss.
 */
export type NormalizerRegistry = ReadonlyMap<string, PlatformNormalizer>;

/**
 * Build the platform -> normalizer mapping handed to WebhookIntake.
 * The Record type makes a missing platform a compile error.
 */
export function createNormalizerRegistry(
  overrides: Partial<Record<Platform, PlatformNormalizer>> = {}
): NormalizerRegistry {
  const normalizers: Record<Platform, PlatformNormalizer> = {
    whatsapp: new WhatsAppNormalizer(),
    instagram: new MetaNormalizer('instagram'),
    facebook: new MetaNormalizer('facebook'),
    email: new EmailNormalizer(),
    ...overrides,
  };

  return new Map<string, PlatformNormalizer>(Object.entries(normalizers));
}
