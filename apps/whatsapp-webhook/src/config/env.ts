import { z } from 'zod';

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

function booleanFlag(name: string, fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') {
        return fallback;
      }
      const normalised = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalised)) {
        return true;
      }
      if (FALSE_VALUES.has(normalised)) {
        return false;
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid ${name} value: ${value}` });
      return z.NEVER;
    });
}

function positiveNumber(name: string, fallback: number, { integer = true } = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return fallback;
      }
      const parsed = integer ? Number.parseInt(value, 10) : Number.parseFloat(value);
      if (Number.isNaN(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid ${name} value: ${value}` });
        return z.NEVER;
      }
      return parsed;
    });
}

/**
 * Zod schema describing the environment contract of the relay. It enforces
 * the Meta and backend secrets, validates URLs, and normalises numeric and
 * boolean settings.
 */
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default(process.env.NODE_ENV === 'production' ? 'production' : 'development'),
  PORT: positiveNumber('PORT', 8001),
  LOG_LEVEL: z.string().optional(),
  DEPLOYMENT_TYPE: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'local'))
    .pipe(z.enum(['local', 'development', 'staging', 'production'])),

  BACKEND_SERVER_URL: z
    .string()
    .url('BACKEND_SERVER_URL must be a valid URL')
    .default('http://localhost:8000'),
  WHATSAPP_SERVICE_API_KEY: z.string().min(1, 'WHATSAPP_SERVICE_API_KEY is required'),
  BACKEND_REQUEST_TIMEOUT_SECONDS: positiveNumber('BACKEND_REQUEST_TIMEOUT_SECONDS', 60, {
    integer: false,
  }),

  META_API_VERSION: z.string().min(1).default('v22.0'),
  META_GRAPH_API_BASE_URL: z
    .string()
    .url('META_GRAPH_API_BASE_URL must be a valid URL')
    .default('https://graph.facebook.com'),
  META_BUSINESS_PHONE_NUMBER_ID: z.string().min(1, 'META_BUSINESS_PHONE_NUMBER_ID is required'),
  META_ACCESS_TOKEN_FROM_SYS_USER: z.string().min(1, 'META_ACCESS_TOKEN_FROM_SYS_USER is required'),
  META_WEBHOOK_VERIFY_TOKEN: z.string().min(1, 'META_WEBHOOK_VERIFY_TOKEN is required'),
  META_APP_SECRETS: z
    .string({ required_error: 'META_APP_SECRETS is required' })
    .transform((value) =>
      value
        .split(',')
        .map((secret) => secret.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.string()).min(1, 'META_APP_SECRETS must list at least one secret')),
  ALWAYS_RETURN_OK_TO_META: booleanFlag('ALWAYS_RETURN_OK_TO_META', true),

  WHATSAPP_UNDER_MAINTENANCE: booleanFlag('WHATSAPP_UNDER_MAINTENANCE', false),
  WHATSAPP_CHAT_RETENTION_HOURS: positiveNumber('WHATSAPP_CHAT_RETENTION_HOURS', 3, {
    integer: false,
  }),
  WHATSAPP_MESSAGE_AGE_THRESHOLD_SECONDS: positiveNumber(
    'WHATSAPP_MESSAGE_AGE_THRESHOLD_SECONDS',
    86_400,
  ),
  WHATSAPP_DEV_FILTER_PREFIX: z.string().min(1).default('!d '),
  TYPING_INDICATOR_INTERVAL_SECONDS: positiveNumber('TYPING_INDICATOR_INTERVAL_SECONDS', 26),
  TYPING_INDICATOR_MAX_SECONDS: positiveNumber('TYPING_INDICATOR_MAX_SECONDS', 300),
  MESSAGE_PROCESSING_TIMEOUT_SECONDS: positiveNumber('MESSAGE_PROCESSING_TIMEOUT_SECONDS', 300),

  MOCK_BACKEND_CLIENT: booleanFlag('MOCK_BACKEND_CLIENT', false),
  MOCK_META_API: booleanFlag('MOCK_META_API', false),
  MOCK_ERROR_RATE: z
    .string()
    .optional()
    .transform((value) => (value ? Number.parseFloat(value) : 0))
    .pipe(z.number().min(0, 'MOCK_ERROR_RATE must be between 0 and 1').max(1, 'MOCK_ERROR_RATE must be between 0 and 1')),

  DELIVERY_STORE_DRIVER: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'memory'))
    .pipe(z.enum(['memory', 'redis'])),
  REDIS_URL: z.string().url('REDIS_URL must be a valid URL').optional(),

  WEBHOOK_RATE_LIMIT_MAX: positiveNumber('WEBHOOK_RATE_LIMIT_MAX', 600),
  WEBHOOK_RATE_LIMIT_WINDOW: z
    .string()
    .optional()
    .transform((value) => value ?? '1 minute'),
});

export type DeploymentType = z.infer<typeof envSchema>['DEPLOYMENT_TYPE'];
export type DeliveryStoreDriver = z.infer<typeof envSchema>['DELIVERY_STORE_DRIVER'];

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  deploymentType: DeploymentType;
  logLevel?: string;
  backend: {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
    simulated: boolean;
    simulatedErrorRate: number;
  };
  meta: {
    apiVersion: string;
    graphApiBaseUrl: string;
    businessPhoneNumberId: string;
    accessToken: string;
    verifyToken: string;
    appSecrets: string[];
    alwaysReturnOk: boolean;
    simulated: boolean;
  };
  whatsapp: {
    underMaintenance: boolean;
    retentionHours: number;
    messageAgeThresholdSeconds: number;
    devFilterPrefix: string;
    typingIntervalSeconds: number;
    typingMaxSeconds: number;
    processingTimeoutSeconds: number;
  };
  deliveries: {
    driver: DeliveryStoreDriver;
    redisUrl?: string;
  };
  rateLimit: {
    max: number;
    timeWindow: string;
  };
}

/**
 * Parse and validate configuration from the provided environment source,
 * returning a strongly typed settings object or throwing a descriptive error
 * if any required variable is missing or malformed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new Error(firstError?.message ?? 'Invalid environment configuration');
  }

  const env = result.data;

  if (env.DELIVERY_STORE_DRIVER === 'redis' && !env.REDIS_URL) {
    throw new Error('DELIVERY_STORE_DRIVER=redis requires REDIS_URL environment variable');
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    deploymentType: env.DEPLOYMENT_TYPE,
    logLevel: env.LOG_LEVEL,
    backend: {
      baseUrl: env.BACKEND_SERVER_URL,
      apiKey: env.WHATSAPP_SERVICE_API_KEY,
      timeoutMs: Math.round(env.BACKEND_REQUEST_TIMEOUT_SECONDS * 1000),
      simulated: env.MOCK_BACKEND_CLIENT,
      simulatedErrorRate: env.MOCK_ERROR_RATE,
    },
    meta: {
      apiVersion: env.META_API_VERSION,
      graphApiBaseUrl: env.META_GRAPH_API_BASE_URL,
      businessPhoneNumberId: env.META_BUSINESS_PHONE_NUMBER_ID,
      accessToken: env.META_ACCESS_TOKEN_FROM_SYS_USER,
      verifyToken: env.META_WEBHOOK_VERIFY_TOKEN,
      appSecrets: env.META_APP_SECRETS,
      alwaysReturnOk: env.ALWAYS_RETURN_OK_TO_META,
      simulated: env.MOCK_META_API,
    },
    whatsapp: {
      underMaintenance: env.WHATSAPP_UNDER_MAINTENANCE,
      retentionHours: env.WHATSAPP_CHAT_RETENTION_HOURS,
      messageAgeThresholdSeconds: env.WHATSAPP_MESSAGE_AGE_THRESHOLD_SECONDS,
      devFilterPrefix: env.WHATSAPP_DEV_FILTER_PREFIX,
      typingIntervalSeconds: env.TYPING_INDICATOR_INTERVAL_SECONDS,
      typingMaxSeconds: env.TYPING_INDICATOR_MAX_SECONDS,
      processingTimeoutSeconds: env.MESSAGE_PROCESSING_TIMEOUT_SECONDS,
    },
    deliveries: {
      driver: env.DELIVERY_STORE_DRIVER,
      redisUrl: env.REDIS_URL,
    },
    rateLimit: {
      max: env.WEBHOOK_RATE_LIMIT_MAX,
      timeWindow: env.WEBHOOK_RATE_LIMIT_WINDOW,
    },
  };
}
