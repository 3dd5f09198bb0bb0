/**
 * Error taxonomy shared by the scheduler, the credential store and the token manager.
 *
 * Every error carries a stable `code` and the HTTP status the routes answer with.
 * `publicMessage` is what a caller is allowed to see; `message` may carry detail for logs.
 */

export const ErrorCode = {
  // Credentials and tokens
  EXPIRED: 'expired',
  INVALID: 'invalid',
  BAD_SIGNATURE: 'bad_signature',
  MALFORMED: 'malformed',
  WRONG_KIND: 'wrong_kind',
  REVOKED: 'revoked',
  RATE_LIMITED: 'rate_limited',

  // Delivery and storage
  DISPATCH_FAILED: 'dispatch_failed',
  REPOSITORY_UNAVAILABLE: 'repository_unavailable',

  // Domain
  UNAUTHENTICATED: 'unauthenticated',
  ILLEGAL_TRANSITION: 'illegal_transition',
  NOT_FOUND: 'not_found',
  VALIDATION: 'validation',
  CONFLICT: 'conflict',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly publicMessage: string;

  constructor(code: ErrorCode, status: number, message: string, publicMessage: string = message) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
    this.publicMessage = publicMessage;
  }
}

// ============ TOKENS ============

export class TokenError extends AppError {
  constructor(code: ErrorCode, message: string) {
    super(code, 401, message, 'Invalid or expired token');
    this.name = 'TokenError';
  }
}

export class ExpiredError extends TokenError {
  constructor(message = 'Token expired') {
    super(ErrorCode.EXPIRED, message);
    this.name = 'ExpiredError';
  }
}

export class BadSignatureError extends TokenError {
  constructor(message = 'Token signature does not verify') {
    super(ErrorCode.BAD_SIGNATURE, message);
    this.name = 'BadSignatureError';
  }
}

export class MalformedTokenError extends TokenError {
  constructor(message = 'Token is malformed') {
    super(ErrorCode.MALFORMED, message);
    this.name = 'MalformedTokenError';
  }
}

export class WrongTokenKindError extends TokenError {
  constructor(expected: string, actual: string) {
    super(ErrorCode.WRONG_KIND, `Expected a ${expected} token, got ${actual}`);
    this.name = 'WrongTokenKindError';
  }
}

export class RevokedTokenError extends TokenError {
  constructor(message = 'Token has been revoked') {
    super(ErrorCode.REVOKED, message);
    this.name = 'RevokedTokenError';
  }
}

// ============ EPHEMERAL CREDENTIALS ============

export type InvalidReason = 'missing' | 'mismatch' | 'expired';

/** Uniform rejection for OTP and reset-token redemption. `reason` is for logs only. */
export class InvalidCredentialError extends AppError {
  readonly reason: InvalidReason;

  constructor(reason: InvalidReason, publicMessage = 'Invalid or expired code') {
    super(ErrorCode.INVALID, 400, `Credential rejected: ${reason}`, publicMessage);
    this.name = 'InvalidCredentialError';
    this.reason = reason;
  }
}

export class RateLimitedError extends AppError {
  constructor(message = 'Too many attempts. Please try again later.') {
    super(ErrorCode.RATE_LIMITED, 429, message);
    this.name = 'RateLimitedError';
  }
}

// ============ DELIVERY / STORAGE ============

export class DispatchError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.DISPATCH_FAILED, 502, message, 'Notification delivery failed');
    this.name = 'DispatchError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class RepositoryUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.REPOSITORY_UNAVAILABLE, 503, message, 'Storage unavailable');
    this.name = 'RepositoryUnavailableError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

// ============ DOMAIN ============

export class IllegalTransitionError extends AppError {
  constructor(state: string, event: string) {
    super(ErrorCode.ILLEGAL_TRANSITION, 409, `Cannot apply ${event} to a reminder in state ${state}`);
    this.name = 'IllegalTransitionError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Invalid username or password') {
    super(ErrorCode.UNAUTHENTICATED, 401, message);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, 404, message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(ErrorCode.VALIDATION, 400, message);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(ErrorCode.CONFLICT, 409, message);
    this.name = 'ConflictError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
