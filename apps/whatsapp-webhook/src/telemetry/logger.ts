import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  level?: string;
  name?: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

const SECRET_HEADER_PATHS = ['req.headers["x-hub-signature-256"]', 'req.headers.authorization'];

/** Log fields that carry a WhatsApp user's phone number. */
const PHONE_FIELDS = ['phone', 'recipientPhone'];

/** Create a Pino logger instance tuned for the relay defaults. */
export function createLogger(config: LoggerConfig = {}): AppLogger {
  const options: LoggerOptions = {
    name: config.name ?? 'whatsapp-webhook',
    level: config.level ?? inferDefaultLevel(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: [...SECRET_HEADER_PATHS, ...PHONE_FIELDS],
      censor: (value: unknown, path: string[]) =>
        PHONE_FIELDS.includes(path.join('.')) ? maskPhoneNumber(value) : '[Redacted]',
    },
  };

  return config.destination ? pino(options, config.destination) : pino(options);
}

/** Keep the last four digits so log lines for one user can still be matched up. */
export function maskPhoneNumber(value: unknown): string {
  if (typeof value !== 'string' || value.length <= 4) {
    return '[Redacted]';
  }

  return `${'*'.repeat(value.length - 4)}${value.slice(-4)}`;
}

/** Choose a default log level based on the current environment. */
function inferDefaultLevel(): string {
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}
