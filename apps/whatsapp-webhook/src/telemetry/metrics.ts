import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface RelayMetrics {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDuration: Histogram<string>;
  webhookOutcomes: Counter<string>;
  backgroundTaskFailures: Counter<string>;
  backendFailures: Counter<string>;
  outboundMessages: Counter<string>;
}

export interface MetricsOptions {
  prefix?: string;
  registry?: Registry;
  /** Process metrics are skipped in tests to keep registries cheap. */
  collectDefaults?: boolean;
}

export function createMetrics(options: MetricsOptions = {}): RelayMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'whatsapp_relay_';

  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const requestCounter = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of webhook requests processed',
    labelNames: ['method', 'status'],
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'Webhook request duration in seconds',
    labelNames: ['method', 'status'],
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry],
  });

  const webhookOutcomes = new Counter({
    name: `${prefix}webhook_outcomes_total`,
    help: 'Webhook deliveries by outcome code',
    labelNames: ['outcome'],
    registers: [registry],
  });

  const backgroundTaskFailures = new Counter({
    name: `${prefix}background_task_failures_total`,
    help: 'Background tasks that ended with an uncaught error',
    labelNames: ['task'],
    registers: [registry],
  });

  const backendFailures = new Counter({
    name: `${prefix}backend_failures_total`,
    help: 'Failed calls to the chat backend',
    labelNames: ['operation'],
    registers: [registry],
  });

  const outboundMessages = new Counter({
    name: `${prefix}outbound_messages_total`,
    help: 'Total WhatsApp messages and typing indicators sent by the relay',
    labelNames: ['kind', 'status'],
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDuration,
    webhookOutcomes,
    backgroundTaskFailures,
    backendFailures,
    outboundMessages,
  };
}
