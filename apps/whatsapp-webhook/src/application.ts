import { readFile } from 'node:fs/promises';

import { BACKEND_OPERATIONS, createBackendClient, type BackendClient } from '@wa-relay/backend-client';
import { WhatsAppCloudAgent } from '@wa-relay/whatsapp-sdk';

import { loadConfig, type AppConfig } from './config';
import { createServer, type RelayFastifyInstance } from './server';
import { ConversationManager, type ConversationManagerFactory } from './services/conversation';
import { InMemoryDeliveryLedger, RedisDeliveryLedger, type DeliveryLedger } from './services/deliveries';
import { CloudMessagingClient, SimulatedMessagingClient, type MessagingClient } from './services/messaging';
import { BackgroundTaskSupervisor } from './services/tasks/background-tasks';
import { WhatsAppWebhookService, createMessageFilters } from './services/webhook';
import { createLogger, type AppLogger } from './telemetry/logger';
import { createMetrics, type RelayMetrics } from './telemetry/metrics';

const SAMPLE_LONG_RESPONSE = new URL('../fixtures/sample-long-response.md', import.meta.url);

export interface Application {
  config: AppConfig;
  logger: AppLogger;
  metrics: RelayMetrics;
  server: RelayFastifyInstance;
  supervisor: BackgroundTaskSupervisor;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Compose the relay: configuration, logging and metrics, the Meta agent,
 * backend and messaging clients (real or simulated), the delivery ledger,
 * the webhook service and the Fastify server.
 */
export async function createApplication(source: NodeJS.ProcessEnv = process.env): Promise<Application> {
  const config = loadConfig(source);
  const logger = createLogger({ level: config.logLevel });
  const metrics = createMetrics();

  const agent = new WhatsAppCloudAgent({
    appSecrets: config.meta.appSecrets,
    accessToken: config.meta.accessToken,
    phoneNumberId: config.meta.businessPhoneNumberId,
    graphApiBaseUrl: config.meta.graphApiBaseUrl,
    graphApiVersion: config.meta.apiVersion,
  });

  const backend = await createBackend(config, logger);
  const messaging: MessagingClient = config.meta.simulated
    ? new SimulatedMessagingClient(logger)
    : new CloudMessagingClient(agent, logger, metrics);
  const deliveries = createDeliveryLedger(config);
  const supervisor = new BackgroundTaskSupervisor(logger, metrics);

  const createConversation: ConversationManagerFactory = (context, tasks) =>
    new ConversationManager(
      context,
      tasks,
      { backend, messaging, spawner: supervisor, logger, metrics },
      {
        retentionHours: config.whatsapp.retentionHours,
        typingIntervalMs: config.whatsapp.typingIntervalSeconds * 1000,
        typingMaxDurationMs: config.whatsapp.typingMaxSeconds * 1000,
        processingTimeoutMs: config.whatsapp.processingTimeoutSeconds * 1000,
      },
    );

  const webhookService = new WhatsAppWebhookService(agent, createConversation, deliveries, metrics, logger, {
    underMaintenance: config.whatsapp.underMaintenance,
    messageAgeThresholdSeconds: config.whatsapp.messageAgeThresholdSeconds,
    filters: createMessageFilters(config.deploymentType, config.whatsapp.devFilterPrefix),
  });

  const server = await createServer({
    config,
    logger,
    metrics,
    webhookService,
    supervisor,
  });

  logger.info(
    {
      deploymentType: config.deploymentType,
      simulatedBackend: config.backend.simulated,
      simulatedMeta: config.meta.simulated,
      deliveryStore: config.deliveries.driver,
      underMaintenance: config.whatsapp.underMaintenance,
    },
    'WhatsApp relay configured',
  );

  return {
    config,
    logger,
    metrics,
    server,
    supervisor,
    start: () => startServer(server, config),
    stop: () => stopApplication(server, supervisor, deliveries, logger),
  };
}

async function startServer(server: RelayFastifyInstance, config: AppConfig): Promise<void> {
  await server.listen({ port: config.port, host: '0.0.0.0' });
}

/**
 * Stop accepting webhooks, end typing loops and let in-flight replies finish,
 * then release the ledger connection. Close failures are logged so a
 * signal-driven shutdown still completes.
 */
async function stopApplication(
  server: RelayFastifyInstance,
  supervisor: BackgroundTaskSupervisor,
  deliveries: DeliveryLedger,
  logger: AppLogger,
): Promise<void> {
  await server.close();

  logger.info({ pending: supervisor.pending }, 'Waiting for background tasks');
  await supervisor.shutdown();

  try {
    await deliveries.close?.();
  } catch (error) {
    logger.warn({ err: error }, 'Failed to close delivery ledger');
  }
}

async function createBackend(config: AppConfig, logger: AppLogger): Promise<BackendClient> {
  if (!config.backend.simulated) {
    return createBackendClient(logger, {
      mode: 'http',
      baseUrl: config.backend.baseUrl,
      apiKey: config.backend.apiKey,
      timeoutMs: config.backend.timeoutMs,
    });
  }

  const rate = config.backend.simulatedErrorRate;
  return createBackendClient(logger, {
    mode: 'simulated',
    errorRates: Object.fromEntries(BACKEND_OPERATIONS.map((operation) => [operation, rate])),
    longResponse: await readFile(SAMPLE_LONG_RESPONSE, 'utf8'),
  });
}

/** The ledger keeps ids as long as a redelivery could still pass the age check. */
function createDeliveryLedger(config: AppConfig): DeliveryLedger {
  const ttlSeconds = config.whatsapp.messageAgeThresholdSeconds;

  if (config.deliveries.driver === 'redis') {
    if (!config.deliveries.redisUrl) {
      throw new Error('DELIVERY_STORE_DRIVER=redis requires REDIS_URL environment variable');
    }

    return new RedisDeliveryLedger({ url: config.deliveries.redisUrl, prefix: 'whatsapp:delivery:', ttlSeconds });
  }

  return new InMemoryDeliveryLedger({ prefix: 'whatsapp:delivery:', ttlSeconds });
}
