import helmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import Fastify, {
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';

import type { AppConfig } from '../config';
import { registerHealthRoutes } from '../routes/health';
import { registerWebhookRoutes } from '../routes/webhook';
import type { BackgroundTaskSupervisor } from '../services/tasks/background-tasks';
import type { WhatsAppWebhookService } from '../services/webhook';
import type { AppLogger } from '../telemetry/logger';
import type { RelayMetrics } from '../telemetry/metrics';
import type { RelayFastifyInstance } from './types';

export interface ServerOptions {
  config: Pick<AppConfig, 'env' | 'meta' | 'rateLimit'>;
  logger: AppLogger;
  metrics: RelayMetrics;
  webhookService: Pick<WhatsAppWebhookService, 'handleWebhook'>;
  supervisor: Pick<BackgroundTaskSupervisor, 'launch'>;
}

/**
 * Build the Fastify server for the webhook, health and metrics routes. JSON
 * bodies are kept as raw bytes so the signature can be checked before they
 * are parsed.
 */
export async function createServer(options: ServerOptions): Promise<RelayFastifyInstance> {
  const app = Fastify<
    RawServerDefault,
    RawRequestDefaultExpression<RawServerDefault>,
    RawReplyDefaultExpression<RawServerDefault>,
    AppLogger
  >({
    logger: options.logger,
    disableRequestLogging: options.config.env === 'production',
  });

  app.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, payload, done) => {
    done(null, Buffer.isBuffer(payload) ? payload : Buffer.from(payload));
  });

  await app.register(helmet, {
    global: true,
  });

  await app.register(fastifyRateLimit, {
    global: false,
    max: options.config.rateLimit.max,
    timeWindow: options.config.rateLimit.timeWindow,
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId =
      firstHeader(request.headers['x-request-id']) ??
      firstHeader(request.headers['x-correlation-id']) ??
      request.id;

    void reply.header('x-request-id', correlationId);
    request.headers['x-correlation-id'] = correlationId;
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: reply.getHeader('x-request-id'),
      },
      'Request completed',
    );
    done();
  });

  await registerHealthRoutes(app);
  await registerWebhookRoutes(app, {
    verifyToken: options.config.meta.verifyToken,
    alwaysReturnOk: options.config.meta.alwaysReturnOk,
    service: options.webhookService,
    supervisor: options.supervisor,
    metrics: options.metrics,
    rateLimit: options.config.rateLimit,
  });

  app.get('/metrics', async (_, reply) => {
    const payload = await options.metrics.registry.metrics();
    return reply.type(options.metrics.registry.contentType).send(payload);
  });

  return app;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const header = Array.isArray(value) ? value[0] : value;
  return header ? header : undefined;
}
