import { SIGNATURE_HEADER } from '@wa-relay/whatsapp-sdk';

import { VerificationRequestError, VerificationTokenError } from '../errors';
import type { RelayFastifyInstance } from '../server/types';
import type { BackgroundTasks, BackgroundTaskSupervisor } from '../services/tasks/background-tasks';
import { buildMetaResponse, type WhatsAppWebhookService } from '../services/webhook';
import type { RelayMetrics } from '../telemetry/metrics';

export const WEBHOOK_PATH = '/whatsapp/v2';

interface VerificationQuery {
  'hub.mode'?: string;
  'hub.verify_token'?: string;
  'hub.challenge'?: string;
}

export interface WebhookRouteContext {
  verifyToken: string;
  alwaysReturnOk: boolean;
  service: Pick<WhatsAppWebhookService, 'handleWebhook'>;
  supervisor: Pick<BackgroundTaskSupervisor, 'launch'>;
  metrics: Pick<RelayMetrics, 'requestCounter' | 'requestDuration'>;
  rateLimit?: {
    max: number;
    timeWindow: string | number;
  };
}

/**
 * Register Meta's GET subscription handshake and the POST intake route. The
 * POST handler answers Meta first; the delivery's background tasks are
 * launched from the route's `onResponse` hook.
 */
export async function registerWebhookRoutes(
  app: RelayFastifyInstance,
  context: WebhookRouteContext,
): Promise<void> {
  const scheduled = new WeakMap<object, BackgroundTasks>();

  app.get<{ Querystring: VerificationQuery }>(
    WEBHOOK_PATH,
    {
      config: {
        rateLimit: context.rateLimit,
      },
    },
    async (request, reply) => {
      const {
        'hub.mode': mode,
        'hub.verify_token': token,
        'hub.challenge': challenge,
      } = request.query;

      if (!mode || !token || !challenge) {
        request.log.warn({ query: request.query }, 'Rejected WhatsApp verification request');
        throw new VerificationRequestError();
      }

      if (mode !== 'subscribe' || token !== context.verifyToken) {
        request.log.warn({ mode }, 'WhatsApp verification token mismatch');
        throw new VerificationTokenError();
      }

      request.log.info('WhatsApp webhook verified');
      return reply.code(200).type('text/plain').send(challenge);
    },
  );

  app.post<{ Body: Buffer }>(
    WEBHOOK_PATH,
    {
      config: {
        rateLimit: context.rateLimit,
      },
      onResponse: async (request) => {
        const tasks = scheduled.get(request);
        if (tasks) {
          scheduled.delete(request);
          context.supervisor.launch(tasks);
        }
      },
    },
    async (request, reply) => {
      const stopTimer = context.metrics.requestDuration.startTimer();
      let statusCode = 200;

      try {
        const signature = request.headers[SIGNATURE_HEADER];
        const { outcome, tasks } = await context.service.handleWebhook({
          rawBody: Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0),
          signatureHeader: typeof signature === 'string' ? signature : undefined,
        });

        const response = buildMetaResponse(outcome, { alwaysReturnOk: context.alwaysReturnOk });
        statusCode = response.statusCode;
        scheduled.set(request, tasks);

        context.metrics.requestCounter.inc({ method: request.method, status: String(statusCode) });
        return reply.code(statusCode).send(response.body);
      } catch (error) {
        statusCode = inferStatusCode(error);
        context.metrics.requestCounter.inc({ method: request.method, status: String(statusCode) });
        throw error;
      } finally {
        stopTimer({ method: request.method, status: String(statusCode) });
      }
    },
  );
}

function inferStatusCode(error: unknown): number {
  if (error && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  return 500;
}
