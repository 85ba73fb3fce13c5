import { describe, it, expect } from 'vitest';
import { createNormalizerRegistry } from '../registry.js';
import { EmailNormalizer } from '../email/normalizer.js';

describe('createNormalizerRegistry()', () => {
  it('registers every supported platform', () => {
    const registry = createNormalizerRegistry();

    expect([...registry.keys()].sort()).toEqual(['email', 'facebook', 'instagram', 'whatsapp']);
    for (const [platform, normalizer] of registry) {
      expect(normalizer.platform).toBe(platform);
    }
  });

  it('misses unknown platform tags', () => {
    expect(createNormalizerRegistry().get('telegram')).toBeUndefined();
  });

  it('accepts overrides', () => {
    const email = new EmailNormalizer();
    expect(createNormalizerRegistry({ email }).get('email')).toBe(email);
  });
});
