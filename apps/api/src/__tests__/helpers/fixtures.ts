import { vi } from 'vitest';
import type { Topic } from '@relaydesk/shared';
import type { EventTransport, RawEventHandler } from '../../events/transport.js';

export const ORG_ID = '7c1d2a8e-4b6f-4d35-9f0e-2a1b3c4d5e6f';
export const OTHER_ORG_ID = '0f9e8d7c-6b5a-4c3d-8e2f-1a0b9c8d7e6f';

export interface WhatsAppUnit {
  from: string;
  id: string;
  body: string;
  timestamp?: string;
}

/**
 * Cloud API delivery carrying the given text messages
 */
export function whatsappPayload(units: WhatsAppUnit[], contactName?: string) {
  return {
    object: 'whatsapp_business_account',
    entry: [{
      id: 'waba-1',
      changes: [{
        field: 'messages',
        value: {
          messaging_product: 'whatsapp',
          metadata: { phone_number_id: 'pn-1055' },
          contacts: contactName && units[0]
            ? [{ wa_id: units[0].from, profile: { name: contactName } }]
            : [],
          messages: units.map((unit) => ({
            from: unit.from,
            id: unit.id,
            timestamp: unit.timestamp,
            type: 'text',
            text: { body: unit.body },
          })),
        },
      }],
    }],
  };
}

/**
 * Delivery receipt only: validates but carries no messages
 */
export function whatsappStatusPayload() {
  return {
    object: 'whatsapp_business_account',
    entry: [{
      id: 'waba-1',
      changes: [{
        field: 'messages',
        value: {
          messaging_product: 'whatsapp',
          statuses: [{ id: 'wamid.OUT1', status: 'delivered' }],
        },
      }],
    }],
  };
}

/**
 * Transport whose publish is a mock; subscriptions are accepted and ignored
 */
export class StubTransport implements EventTransport {
  readonly name = 'stub';
  readonly publish = vi.fn<(topic: Topic, eventId: string, payload: object) => Promise<void>>(
    async () => undefined
  );
  readonly handlers = new Map<Topic, RawEventHandler>();

  subscribe(topic: Topic, handler: RawEventHandler): void {
    this.handlers.set(topic, handler);
  }

  async close(): Promise<void> {
    this.handlers.clear();
  }
}
