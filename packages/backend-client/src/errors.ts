export const BACKEND_OPERATIONS = [
  'registerUser',
  'checkUserExists',
  'createThread',
  'getThreadHistory',
  'getLastThreadInfo',
  'processMessage',
] as const;

export type BackendOperation = (typeof BACKEND_OPERATIONS)[number];

export interface BackendErrorOptions {
  status?: number;
  cause?: unknown;
}

/** Base class for every failure reported by a backend client. */
export class BackendClientError extends Error {
  readonly status?: number;

  constructor(
    readonly operation: BackendOperation,
    message: string,
    options: BackendErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'BackendClientError';
    this.status = options.status;
  }
}

export class UserRegistrationError extends BackendClientError {
  constructor(message: string, options?: BackendErrorOptions) {
    super('registerUser', message, options);
    this.name = 'UserRegistrationError';
  }
}

export class UserExistsCheckError extends BackendClientError {
  constructor(message: string, options?: BackendErrorOptions) {
    super('checkUserExists', message, options);
    this.name = 'UserExistsCheckError';
  }
}

export class ThreadCreationError extends BackendClientError {
  constructor(message: string, options?: BackendErrorOptions) {
    super('createThread', message, options);
    this.name = 'ThreadCreationError';
  }
}

export class ThreadHistoryError extends BackendClientError {
  constructor(message: string, options?: BackendErrorOptions) {
    super('getThreadHistory', message, options);
    this.name = 'ThreadHistoryError';
  }
}

export class ThreadInfoError extends BackendClientError {
  constructor(message: string, options?: BackendErrorOptions) {
    super('getLastThreadInfo', message, options);
    this.name = 'ThreadInfoError';
  }
}

export class MessageProcessingError extends BackendClientError {
  constructor(message: string, options?: BackendErrorOptions) {
    super('processMessage', message, options);
    this.name = 'MessageProcessingError';
  }
}

type BackendErrorConstructor = new (message: string, options?: BackendErrorOptions) => BackendClientError;

export const BACKEND_ERRORS: Record<BackendOperation, BackendErrorConstructor> = {
  registerUser: UserRegistrationError,
  checkUserExists: UserExistsCheckError,
  createThread: ThreadCreationError,
  getThreadHistory: ThreadHistoryError,
  getLastThreadInfo: ThreadInfoError,
  processMessage: MessageProcessingError,
};
