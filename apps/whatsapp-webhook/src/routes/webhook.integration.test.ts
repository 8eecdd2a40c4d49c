import { SimulatedBackendClient, type BackendClient } from '@wa-relay/backend-client';
import { WhatsAppCloudAgent } from '@wa-relay/whatsapp-sdk';
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { AppConfig } from '../config';
import { createServer, type RelayFastifyInstance } from '../server';
import { ConversationManager, type ConversationManagerFactory } from '../services/conversation';
import { InMemoryDeliveryLedger } from '../services/deliveries';
import type { MessagingClient } from '../services/messaging';
import { BackgroundTaskSupervisor } from '../services/tasks/background-tasks';
import { WhatsAppWebhookService } from '../services/webhook';
import { createLogger } from '../telemetry/logger';
import { createMetrics } from '../telemetry/metrics';

const BUSINESS_NUMBER_ID = '1234567890';
const SENDER = '15551234567';

function buildConfig(overrides: { alwaysReturnOk?: boolean } = {}): Pick<AppConfig, 'env' | 'meta' | 'rateLimit'> {
  return {
    env: 'test',
    meta: {
      apiVersion: 'v22.0',
      graphApiBaseUrl: 'https://graph.example.test',
      businessPhoneNumberId: BUSINESS_NUMBER_ID,
      accessToken: 'test-token',
      verifyToken: 'verify-token',
      appSecrets: ['test-secret'],
      alwaysReturnOk: overrides.alwaysReturnOk ?? false,
      simulated: true,
    },
    rateLimit: { max: 100, timeWindow: '1 minute' },
  };
}

function textPayload(body: string, id = 'wamid.1') {
  return {
    object: 'whatsapp_business_account',
    entry: [
      {
        id: 'waba-1',
        changes: [
          {
            field: 'messages',
            value: {
              messaging_product: 'whatsapp',
              metadata: { display_phone_number: '15550000000', phone_number_id: BUSINESS_NUMBER_ID },
              messages: [
                {
                  from: SENDER,
                  id,
                  timestamp: String(Math.floor(Date.now() / 1000)),
                  type: 'text',
                  text: { body },
                },
              ],
            },
          },
        ],
      },
    ],
  };
}

async function buildRelay(
  options: { alwaysReturnOk?: boolean; underMaintenance?: boolean; backend?: BackendClient } = {},
) {
  const config = buildConfig(options);
  const logger = createLogger({ level: 'silent' });
  const metrics = createMetrics({ collectDefaults: false });
  const agent = new WhatsAppCloudAgent({
    appSecrets: config.meta.appSecrets,
    accessToken: config.meta.accessToken,
    phoneNumberId: config.meta.businessPhoneNumberId,
  });
  const backend = options.backend ?? new SimulatedBackendClient(logger, { minLatencyMs: 0, maxLatencyMs: 0 });
  const messaging = {
    sendTypingIndicator: vi.fn().mockResolvedValue(undefined),
    sendMessage: vi.fn().mockResolvedValue(undefined),
  } satisfies MessagingClient;
  const supervisor = new BackgroundTaskSupervisor(logger, metrics);

  const createConversation: ConversationManagerFactory = (context, tasks) =>
    new ConversationManager(
      context,
      tasks,
      { backend, messaging, spawner: supervisor, logger, metrics },
      { retentionHours: 3, typingIntervalMs: 60_000, typingMaxDurationMs: 120_000, processingTimeoutMs: 5_000 },
    );

  const webhookService = new WhatsAppWebhookService(
    agent,
    createConversation,
    new InMemoryDeliveryLedger(),
    metrics,
    logger,
    { underMaintenance: options.underMaintenance ?? false, messageAgeThresholdSeconds: 86_400, filters: [] },
  );

  const server = await createServer({ config, logger, metrics, webhookService, supervisor });

  const post = (payload: unknown, signature?: string) => {
    const body = JSON.stringify(payload);
    return server.inject({
      method: 'POST',
      url: '/whatsapp/v2',
      headers: {
        'content-type': 'application/json',
        'x-hub-signature-256': signature ?? agent.signPayload(body),
      },
      payload: body,
    });
  };

  const settle = async () => {
    await new Promise((resolve) => setImmediate(resolve));
    await supervisor.drain();
  };

  return { server, post, settle, messaging, supervisor };
}

describe('WhatsApp webhook routes', () => {
  let server: RelayFastifyInstance | undefined;

  afterEach(async () => {
    if (server) {
      await server.close();
      server = undefined;
    }
  });

  it('echoes the challenge for a valid verification request', async () => {
    const relay = await buildRelay();
    server = relay.server;

    const response = await server.inject({
      method: 'GET',
      url: '/whatsapp/v2?hub.mode=subscribe&hub.verify_token=verify-token&hub.challenge=challenge-123',
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.body).toBe('challenge-123');
  });

  it('rejects a verification request with the wrong token', async () => {
    const relay = await buildRelay();
    server = relay.server;

    const response = await server.inject({
      method: 'GET',
      url: '/whatsapp/v2?hub.mode=subscribe&hub.verify_token=wrong&hub.challenge=challenge-123',
    });

    expect(response.statusCode).toBe(403);
  });

  it('rejects a verification request without its parameters', async () => {
    const relay = await buildRelay();
    server = relay.server;

    const response = await server.inject({ method: 'GET', url: '/whatsapp/v2?hub.mode=subscribe' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ message: 'Invalid verification request' });
  });

  it('rejects a webhook with a bad signature', async () => {
    const relay = await buildRelay();
    server = relay.server;

    const response = await relay.post(textPayload('Hello there'), 'sha256=00');

    expect(response.statusCode).toBe(403);
    await relay.settle();
    expect(relay.messaging.sendMessage).not.toHaveBeenCalled();
  });

  it('registers a first-time sender and replies in the background', async () => {
    const backend = new SimulatedBackendClient(createLogger({ level: 'silent' }), {
      minLatencyMs: 0,
      maxLatencyMs: 0,
    });
    const relay = await buildRelay({ backend });
    server = relay.server;

    const response = await relay.post(textPayload('Hello there'));

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      success: true,
      message: 'Message processed successfully',
      timestamp: expect.any(Number),
    });

    await relay.settle();

    expect(relay.messaging.sendTypingIndicator).toHaveBeenCalledWith(SENDER, 'wamid.1', {
      signal: expect.any(AbortSignal),
    });
    expect(relay.messaging.sendMessage).toHaveBeenCalledWith(SENDER, [
      "This is a _simulated assistant_ running in test mode. Write 'long' to see a bigger reply.\n\nYour message: Hello there",
    ]);
    await expect(backend.checkUserExists(SENDER)).resolves.toBe(true);
    expect(relay.supervisor.pending).toBe(0);
  });

  it('continues the same thread for a follow-up message', async () => {
    const backend = new SimulatedBackendClient(createLogger({ level: 'silent' }), {
      minLatencyMs: 0,
      maxLatencyMs: 0,
    });
    const relay = await buildRelay({ backend });
    server = relay.server;

    await relay.post(textPayload('First question', 'wamid.1'));
    await relay.settle();
    await relay.post(textPayload('Second question', 'wamid.2'));
    await relay.settle();

    const history = await backend.getThreadHistory(SENDER, 'sim_thread_1');
    expect(history.messages.map((message) => message.content)).toEqual([
      'First question',
      expect.stringContaining('Your message: First question'),
      'Second question',
      expect.stringContaining('Your message: Second question'),
    ]);
  });

  it('acknowledges a redelivered message without replying again', async () => {
    const relay = await buildRelay();
    server = relay.server;

    await relay.post(textPayload('Hello there'));
    await relay.settle();
    const response = await relay.post(textPayload('Hello there'));
    await relay.settle();

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ success: true, error_code: 'DUPLICATE_MESSAGE' });
    expect(relay.messaging.sendMessage).toHaveBeenCalledTimes(1);
  });

  it('returns 200 with the error code when Meta compliance is on', async () => {
    const relay = await buildRelay({ alwaysReturnOk: true, underMaintenance: true });
    server = relay.server;

    const response = await relay.post(textPayload('Hello there'));

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      success: false,
      message: 'Service under maintenance',
      error_code: 'MAINTENANCE_MODE',
    });

    await relay.settle();
    expect(relay.messaging.sendMessage).toHaveBeenCalledWith(SENDER, [
      'This WhatsApp service is down for maintenance. Please try again later.',
    ]);
  });

  it('returns 400 for a body that is not JSON', async () => {
    const relay = await buildRelay();
    server = relay.server;
    const body = '{"object":';

    const response = await server.inject({
      method: 'POST',
      url: '/whatsapp/v2',
      headers: {
        'content-type': 'application/json',
        'x-hub-signature-256': new WhatsAppCloudAgent({
          appSecrets: ['test-secret'],
          accessToken: 'test-token',
          phoneNumberId: BUSINESS_NUMBER_ID,
        }).signPayload(body),
      },
      payload: body,
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ success: false, error_code: 'INVALID_PAYLOAD' });
  });

  it('serves health checks, metrics and correlation ids', async () => {
    const relay = await buildRelay();
    server = relay.server;

    const root = await server.inject({ method: 'GET', url: '/' });
    const healthz = await server.inject({
      method: 'GET',
      url: '/healthz',
      headers: { 'x-request-id': 'req-42' },
    });

    expect(root.json()).toEqual({ status: 'ok' });
    expect(healthz.json()).toEqual({ status: 'ok' });
    expect(healthz.headers['x-request-id']).toBe('req-42');

    await relay.post(textPayload('Hello there'));
    await relay.settle();

    const metrics = await server.inject({ method: 'GET', url: '/metrics' });
    expect(metrics.statusCode).toBe(200);
    expect(metrics.body).toContain('whatsapp_relay_webhook_outcomes_total{outcome="OK"} 1');
  });
});

describe('WhatsApp webhook with a known user', () => {
  let server: RelayFastifyInstance | undefined;

  afterEach(async () => {
    if (server) {
      await server.close();
      server = undefined;
    }
  });

  function createBackend() {
    return {
      registerUser: vi.fn().mockResolvedValue({ status: 'success' }),
      checkUserExists: vi.fn().mockResolvedValue(true),
      createThread: vi.fn().mockResolvedValue({ thread_id: 'thread-new' }),
      getThreadHistory: vi.fn().mockResolvedValue({ thread_id: 'thread-1', messages: [] }),
      getLastThreadInfo: vi
        .fn()
        .mockResolvedValue({ thread_id: 'thread-1', last_message_time: new Date().toISOString() }),
      processMessage: vi.fn().mockResolvedValue('Here is **the answer**.'),
    } satisfies BackendClient;
  }

  it('reuses the fresh thread and stops typing before the reply', async () => {
    const backend = createBackend();
    const relay = await buildRelay({ backend });
    server = relay.server;
    const order: string[] = [];
    relay.messaging.sendTypingIndicator.mockImplementation(async () => {
      order.push('typing');
    });
    relay.messaging.sendMessage.mockImplementation(async () => {
      order.push('message');
    });

    const response = await relay.post(textPayload('What is the answer?'));
    await relay.settle();

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ success: true });
    expect(backend.registerUser).not.toHaveBeenCalled();
    expect(backend.createThread).not.toHaveBeenCalled();
    expect(backend.processMessage).toHaveBeenCalledTimes(1);
    expect(backend.processMessage).toHaveBeenCalledWith(SENDER, 'thread-1', 'What is the answer?', {
      signal: expect.any(AbortSignal),
    });
    expect(relay.messaging.sendMessage).toHaveBeenCalledWith(SENDER, ['Here is *the answer*.']);
    expect(order).toEqual(['typing', 'message']);
    expect(relay.supervisor.pending).toBe(0);
  });

  it('makes no downstream calls for another business number', async () => {
    const backend = createBackend();
    const relay = await buildRelay({ backend });
    server = relay.server;
    const payload = textPayload('Hello there');
    payload.entry[0].changes[0].value.metadata.phone_number_id = '999';

    const response = await relay.post(payload);
    await relay.settle();

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      success: true,
      message: 'Skipping, as this webhook is not intended for our WhatsApp business number',
    });
    expect(backend.checkUserExists).not.toHaveBeenCalled();
    expect(relay.messaging.sendTypingIndicator).not.toHaveBeenCalled();
    expect(relay.messaging.sendMessage).not.toHaveBeenCalled();
  });

  it('rejects an unsigned webhook', async () => {
    const backend = createBackend();
    const relay = await buildRelay({ backend });
    server = relay.server;

    const response = await server.inject({
      method: 'POST',
      url: '/whatsapp/v2',
      headers: { 'content-type': 'application/json' },
      payload: JSON.stringify(textPayload('Hello there')),
    });
    await relay.settle();

    expect(response.statusCode).toBe(403);
    expect(backend.checkUserExists).not.toHaveBeenCalled();
    expect(relay.messaging.sendMessage).not.toHaveBeenCalled();
  });
});
