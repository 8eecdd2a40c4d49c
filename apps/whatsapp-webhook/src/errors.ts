/** Error thrown when the Meta request signature check fails. */
export class SignatureVerificationError extends Error {
  readonly statusCode = 403;

  constructor(message = 'Invalid webhook signature') {
    super(message);
    this.name = 'SignatureVerificationError';
  }
}

/** Raised when Meta's GET verification request specifies an invalid token. */
export class VerificationTokenError extends Error {
  readonly statusCode = 403;

  constructor(message = 'Invalid verification token') {
    super(message);
    this.name = 'VerificationTokenError';
  }
}

/** Raised when the GET verification request is missing its parameters. */
export class VerificationRequestError extends Error {
  readonly statusCode = 400;

  constructor(message = 'Invalid verification request') {
    super(message);
    this.name = 'VerificationRequestError';
  }
}
