import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { randomUUID } from 'crypto';
import type { Server } from 'http';
import { createApp } from '../app.js';
import { createContainer, type Container } from '../container.js';
import { MemoryEventTransport } from '../events/transports/memory.js';
import { createMemoryRepositories, type MemoryRepositories } from './helpers/memory-repositories.js';
import { ORG_ID, whatsappPayload } from './helpers/fixtures.js';

let server: Server;
let baseUrl: string;
let repos: MemoryRepositories;
let container: Container;

beforeAll(async () => {
  repos = createMemoryRepositories();
  container = createContainer(repos, new MemoryEventTransport());
  server = createApp(container).listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));

  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  await container.transport.close();
});

async function request(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: response.status, body: await response.json() };
}

describe('GET /health', () => {
  it('reports the transport', async () => {
    const { status, body } = await request('GET', '/health');

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy', transport: 'memory' });
  });
});

describe('webhook routes', () => {
  const payload = whatsappPayload([{ from: '6281234567890', id: 'wamid.R1', body: 'hello' }]);

  it('accepts a delivery and reports the processing outcome', async () => {
    const { status, body } = await request('POST', `/api/webhooks/whatsapp/${ORG_ID}`, payload);

    expect(status).toBe(202);
    expect(body).toMatchObject({ platform: 'whatsapp', status: 'processed', retryCount: 0, errorMessage: null });
    expect([...repos.webhookEvents.rows.values()].at(-1)?.mediumId).toBe(1);
  });

  it('records deliveries for unsupported platforms as failed', async () => {
    const { status, body } = await request('POST', `/api/webhooks/telegram/${ORG_ID}?mediumId=9`, { update_id: 1 });

    expect(status).toBe(202);
    expect(body).toMatchObject({ status: 'failed', errorMessage: 'unsupported platform: telegram' });
    expect([...repos.webhookEvents.rows.values()].at(-1)?.mediumId).toBe(9);
  });

  it('rejects a malformed organization id', async () => {
    const { status, body } = await request('POST', '/api/webhooks/whatsapp/not-a-uuid', payload);

    expect(status).toBe(400);
    expect(body).toMatchObject({ code: 'INVALID_PAYLOAD', errorCode: 40001 });
  });

  it('looks events up and retries them', async () => {
    const created = await request('POST', `/api/webhooks/email/${ORG_ID}`, { from: 'ana@example.test', text: 'hi' });
    const id = expectId(created.body);

    const fetched = await request('GET', `/api/webhooks/events/${id}`);
    const retried = await request('POST', `/api/webhooks/events/${id}/retry`);

    expect(fetched).toMatchObject({ status: 200, body: { id, platform: 'email', status: 'processed' } });
    expect(retried).toMatchObject({ status: 200, body: { id, status: 'processed' } });
  });

  it('returns 404 for unknown events', async () => {
    const { status, body } = await request('GET', `/api/webhooks/events/${randomUUID()}`);

    expect(status).toBe(404);
    expect(body).toMatchObject({ code: 'WEBHOOK_EVENT_NOT_FOUND', errorCode: 40403 });
  });
});

describe('message routes', () => {
  async function createOutbound(): Promise<string> {
    const conversation = repos.conversations.seed({
      organizationId: ORG_ID,
      userId: randomUUID(),
      contactId: randomUUID(),
      mediumId: 1,
    });
    const message = await container.messages.createMessage({
      conversationId: conversation.id,
      organizationId: ORG_ID,
      direction: 'outbound',
      senderType: 'agent',
      messageType: 'text',
      content: 'Your order shipped',
    });
    return message.id;
  }

  it('applies status callbacks by code or name', async () => {
    const id = await createOutbound();

    const delivered = await request('POST', `/api/messages/${id}/status`, { status: 2 });
    const repeated = await request('POST', `/api/messages/${id}/status`, { status: 'delivered' });

    expect(delivered).toMatchObject({
      status: 200,
      body: { outcome: 'updated', message: { id, status: 'delivered', statusCode: 2, readAt: null } },
    });
    expect(repeated).toMatchObject({ status: 200, body: { outcome: 'unchanged' } });
  });

  it('records failure reasons', async () => {
    const id = await createOutbound();

    const { body } = await request('POST', `/api/messages/${id}/status`, {
      status: 'failed',
      failureReason: 'number not on WhatsApp',
    });

    expect(body).toMatchObject({
      outcome: 'updated',
      message: { status: 'failed', statusCode: 4, failureReason: 'number not on WhatsApp' },
    });
  });

  it('rejects unknown statuses', async () => {
    const id = await createOutbound();

    const { status, body } = await request('POST', `/api/messages/${id}/status`, { status: 'bounced' });

    expect(status).toBe(400);
    expect(body).toMatchObject({ code: 'INVALID_STATUS', message: 'unknown status: bounced' });
  });

  it('returns messages and 404s unknown ones', async () => {
    const id = await createOutbound();

    const found = await request('GET', `/api/messages/${id}`);
    const missing = await request('GET', `/api/messages/${randomUUID()}`);

    expect(found).toMatchObject({ status: 200, body: { id, status: 'pending', statusCode: 0 } });
    expect(missing).toMatchObject({ status: 404, body: { code: 'MESSAGE_NOT_FOUND' } });
  });
});

describe('unknown routes', () => {
  it('respond with NOT_FOUND', async () => {
    const { status, body } = await request('GET', '/api/nothing-here');

    expect(status).toBe(404);
    expect(body).toMatchObject({ code: 'NOT_FOUND', message: 'Route GET /api/nothing-here not found' });
  });
});

function expectId(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'string') {
    return body.id;
  }
  throw new Error('response has no id');
}
