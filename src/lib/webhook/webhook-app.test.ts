import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { afterEach, describe, expect, test } from 'vitest';
import { Logger } from '../logger';
import type { PipelineTrigger } from '../pipeline';
import { computeSignature, SIGNATURE_HEADER } from './signature';
import { createWebhookApp } from './webhook-app';
import { WebhookReceiver } from './webhook-receiver';

const SECRET = 'test-secret';

const MAIN_PUSH = JSON.stringify({
  ref: 'refs/heads/main',
  after: 'abc',
  head_commit: { id: 'abc' },
});

async function startApp(options: { secret?: string; bodyLimit?: string } = {}) {
  const { logger } = Logger.createTestOptimizedLogger();
  const triggers: PipelineTrigger[] = [];
  const receiver = new WebhookReceiver(logger, {
    deployBranch: 'main',
    secret: options.secret,
    onTrigger: (trigger) => {
      triggers.push(trigger);
      return Promise.resolve();
    },
  });
  const app = createWebhookApp(receiver, {
    path: '/hooks/push',
    bodyLimit: options.bodyLimit,
  });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    listening.once('error', reject);
  });

  const address: AddressInfo | string | null = server.address();

  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }

  return {
    server,
    receiver,
    triggers,
    baseURL: `http://127.0.0.1:${address.port}`,
  };
}

describe('createWebhookApp', () => {
  const servers: Server[] = [];

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  test('accepts a signed push and starts a run', async () => {
    const { server, receiver, triggers, baseURL } = await startApp({
      secret: SECRET,
    });
    servers.push(server);

    const response = await fetch(`${baseURL}/hooks/push`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-github-event': 'push',
        [SIGNATURE_HEADER]: computeSignature(SECRET, Buffer.from(MAIN_PUSH)),
      },
      body: MAIN_PUSH,
    });

    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({
      accepted: true,
      ref: 'refs/heads/main',
      commit: 'abc',
    });

    await receiver.waitForIdle();

    expect(triggers).toEqual([
      { type: 'webhook', ref: 'refs/heads/main', commit: 'abc' },
    ]);
  });

  test('rejects an unsigned or wrongly signed push with 401', async () => {
    const { server, triggers, baseURL } = await startApp({ secret: SECRET });
    servers.push(server);

    const unsigned = await fetch(`${baseURL}/hooks/push`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: MAIN_PUSH,
    });
    const wronglySigned = await fetch(`${baseURL}/hooks/push`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        [SIGNATURE_HEADER]: computeSignature(
          'other-secret',
          Buffer.from(MAIN_PUSH),
        ),
      },
      body: MAIN_PUSH,
    });

    expect(unsigned.status).toBe(401);
    expect(await unsigned.json()).toEqual({ error: 'invalid signature' });
    expect(wronglySigned.status).toBe(401);
    expect(await wronglySigned.json()).toEqual({ error: 'invalid signature' });
    expect(triggers).toEqual([]);
  });

  test('verifies the signature over the raw bytes, whatever the content type', async () => {
    const { server, baseURL } = await startApp({ secret: SECRET });
    servers.push(server);
    // extra whitespace would be lost if the body were parsed and re-serialized
    const payload = `{ "ref": "refs/heads/main",  "after": "abc" }`;

    const response = await fetch(`${baseURL}/hooks/push`, {
      method: 'POST',
      headers: {
        'content-type': 'text/plain',
        [SIGNATURE_HEADER]: computeSignature(SECRET, Buffer.from(payload)),
      },
      body: payload,
    });

    expect(response.status).toBe(202);
  });

  test('reports health and whether a run is in progress', async () => {
    const { server, baseURL } = await startApp();
    servers.push(server);

    const response = await fetch(`${baseURL}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', busy: false });
  });

  test('refuses bodies over the size limit', async () => {
    const { server, triggers, baseURL } = await startApp({ bodyLimit: '16b' });
    servers.push(server);

    const response = await fetch(`${baseURL}/hooks/push`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: MAIN_PUSH,
    });

    expect(response.status).toBe(413);
    expect(triggers).toEqual([]);
  });
});
