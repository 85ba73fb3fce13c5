import { describe, it, expect } from 'vitest';
import { WhatsAppNormalizer } from '../whatsapp/normalizer.js';

function webhook(messages: unknown[], contacts: unknown[] = []) {
  return {
    object: 'whatsapp_business_account',
    entry: [{
      id: 'waba-1',
      changes: [{
        field: 'messages',
        value: {
          messaging_product: 'whatsapp',
          metadata: { phone_number_id: 'pn-1055' },
          contacts,
          messages,
        },
      }],
    }],
  };
}

describe('WhatsAppNormalizer', () => {
  const normalizer = new WhatsAppNormalizer();

  it('uses medium id 1', () => {
    expect(normalizer.platform).toBe('whatsapp');
    expect(normalizer.mediumId()).toBe(1);
  });

  describe('validate()', () => {
    it('rejects empty payloads', () => {
      expect(normalizer.validate(null)).toEqual({ ok: false, error: 'empty WhatsApp payload' });
      expect(normalizer.validate({})).toEqual({ ok: false, error: 'empty WhatsApp payload' });
    });

    it('requires a non-empty entry array', () => {
      expect(normalizer.validate({ object: 'whatsapp_business_account' })).toEqual({
        ok: false,
        error: "invalid WhatsApp payload: missing 'entry' field",
      });
      expect(normalizer.validate({ entry: 'nope' })).toEqual({
        ok: false,
        error: "invalid WhatsApp payload: 'entry' must be an array",
      });
      expect(normalizer.validate({ entry: [] })).toEqual({
        ok: false,
        error: "invalid WhatsApp payload: 'entry' array is empty",
      });
    });

    it('accepts a cloud api envelope', () => {
      expect(normalizer.validate(webhook([]))).toEqual({ ok: true });
    });
  });

  describe('extract()', () => {
    it('normalizes a text message', () => {
      const payload = webhook(
        [{
          from: '6281234567890',
          id: 'wamid.A1',
          timestamp: '1700000000',
          type: 'text',
          text: { body: 'hello' },
        }],
        [{ wa_id: '6281234567890', profile: { name: 'Budi' } }]
      );

      expect(normalizer.extract(payload)).toEqual([{
        origin: '6281234567890',
        content: 'hello',
        mediaUrl: '',
        messageType: 'text',
        platformMessageId: 'wamid.A1',
        metadata: {
          whatsapp_sender_id: '6281234567890',
          whatsapp_message_id: 'wamid.A1',
          whatsapp_timestamp: '2023-11-14T22:13:20.000Z',
          whatsapp_phone_number_id: 'pn-1055',
          whatsapp_contact_name: 'Budi',
        },
      }]);
    });

    it('carries the media id and caption of an image', () => {
      const [message] = normalizer.extract(webhook([{
        from: '6281234567890',
        id: 'wamid.B2',
        type: 'image',
        image: { id: 'media-77', caption: 'look at this', mime_type: 'image/jpeg' },
      }]));

      expect(message).toMatchObject({
        messageType: 'image',
        content: 'look at this',
        mediaUrl: 'media-77',
      });
      expect(message?.metadata.whatsapp_media_mime_type).toBe('image/jpeg');
      expect(message?.metadata).not.toHaveProperty('whatsapp_timestamp');
    });

    it('uses the filename as document content', () => {
      const [message] = normalizer.extract(webhook([{
        from: '6281234567890',
        id: 'wamid.C3',
        type: 'document',
        document: { id: 'media-9', filename: 'invoice.pdf' },
      }]));

      expect(message).toMatchObject({ messageType: 'document', content: 'invoice.pdf', mediaUrl: 'media-9' });
    });

    it('skips malformed and unsupported units but keeps the rest', () => {
      const messages = normalizer.extract(webhook([
        { id: 'wamid.no-sender', type: 'text', text: { body: 'lost' } },
        { from: '628111', id: 'wamid.loc', type: 'location' },
        { from: '628111', id: 'wamid.empty', type: 'text' },
        { from: '628111', id: 'wamid.ok', type: 'text', text: { body: 'kept' } },
      ]));

      expect(messages).toHaveLength(1);
      expect(messages[0]?.platformMessageId).toBe('wamid.ok');
    });

    it('walks every entry and change', () => {
      const first = webhook([{ from: '1', id: 'a', type: 'text', text: { body: 'one' } }]);
      const second = webhook([{ from: '2', id: 'b', type: 'text', text: { body: 'two' } }]);
      const payload = { entry: [...first.entry, 'garbage', ...second.entry] };

      expect(normalizer.extract(payload).map((m) => m.content)).toEqual(['one', 'two']);
    });

    it('returns nothing for an invalid envelope', () => {
      expect(normalizer.extract({ entry: [] })).toEqual([]);
      expect(normalizer.extract('not json')).toEqual([]);
    });
  });
});
