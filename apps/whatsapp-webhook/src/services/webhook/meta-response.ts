export type WebhookErrorCode =
  | 'INVALID_PAYLOAD'
  | 'STATUS_MESSAGE'
  | 'DUPLICATE_MESSAGE'
  | 'MAINTENANCE_MODE'
  | 'DEV_FILTER'
  | 'MESSAGE_TOO_OLD'
  | 'USER_REGISTRATION_FAILED'
  | 'UNSUPPORTED_MESSAGE_TYPE';

/** What the webhook decided for one delivery, before transport concerns. */
export interface WebhookOutcome {
  success: boolean;
  message: string;
  statusCode: number;
  errorCode?: WebhookErrorCode;
  details?: Record<string, unknown>;
}

/** JSON body returned to Meta. */
export interface MetaResponseBody {
  success: boolean;
  message: string;
  /** Unix seconds. */
  timestamp: number;
  error_code?: WebhookErrorCode;
  details?: Record<string, unknown>;
}

export interface MetaResponseOptions {
  /** Meta treats anything but 200 as a failed delivery and retries it. */
  alwaysReturnOk: boolean;
  now?: () => Date;
}

export function buildMetaResponse(
  outcome: WebhookOutcome,
  options: MetaResponseOptions,
): { statusCode: number; body: MetaResponseBody } {
  const now = options.now?.() ?? new Date();

  const body: MetaResponseBody = {
    success: outcome.success,
    message: outcome.message,
    timestamp: Math.floor(now.getTime() / 1000),
  };

  if (outcome.errorCode) {
    body.error_code = outcome.errorCode;
  }

  if (outcome.details) {
    body.details = outcome.details;
  }

  return {
    statusCode: options.alwaysReturnOk ? 200 : outcome.statusCode,
    body,
  };
}

/** Outcomes the webhook can produce, keyed by what happened. */
export const OUTCOMES = {
  processed: (): WebhookOutcome => ({
    success: true,
    message: 'Message processed successfully',
    statusCode: 200,
  }),
  notTargetNumber: (): WebhookOutcome => ({
    success: true,
    message: 'Skipping, as this webhook is not intended for our WhatsApp business number',
    statusCode: 200,
  }),
  statusMessage: (): WebhookOutcome => ({
    success: true,
    message: 'Status message processed (ignored)',
    statusCode: 200,
    errorCode: 'STATUS_MESSAGE',
  }),
  duplicate: (): WebhookOutcome => ({
    success: true,
    message: 'Duplicate delivery ignored',
    statusCode: 200,
    errorCode: 'DUPLICATE_MESSAGE',
  }),
  invalidPayload: (error: string): WebhookOutcome => ({
    success: false,
    message: 'Error processing webhook payload',
    statusCode: 400,
    errorCode: 'INVALID_PAYLOAD',
    details: { error },
  }),
  maintenance: (): WebhookOutcome => ({
    success: false,
    message: 'Service under maintenance',
    statusCode: 503,
    errorCode: 'MAINTENANCE_MODE',
  }),
  devFilter: (): WebhookOutcome => ({
    success: false,
    message: 'Message filtered for local development',
    statusCode: 202,
    errorCode: 'DEV_FILTER',
  }),
  tooOld: (): WebhookOutcome => ({
    success: false,
    message: 'Message too old, notified user',
    statusCode: 422,
    errorCode: 'MESSAGE_TOO_OLD',
  }),
  registrationFailed: (): WebhookOutcome => ({
    success: false,
    message: 'User registration failed',
    statusCode: 500,
    errorCode: 'USER_REGISTRATION_FAILED',
  }),
  unsupportedType: (): WebhookOutcome => ({
    success: false,
    message: 'Unsupported message type handled',
    statusCode: 415,
    errorCode: 'UNSUPPORTED_MESSAGE_TYPE',
  }),
} as const;
