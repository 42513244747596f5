export type ErrorDetails = Record<string, unknown> | Array<Record<string, unknown>>;

/**
 * Base class of every error the service reports to callers. `name` doubles as
 * the error kind shown in API responses.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: ErrorDetails;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = statusCode < 500;
    Error.captureStackTrace(this, new.target);
  }

  get kind(): string {
    return this.name;
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication failed') {
    super(message, 401, 'AUTHENTICATION_FAILED');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

export type StateErrorCode =
  | 'VOTING_NOT_OPEN'
  | 'VOTING_WINDOW_CLOSED'
  | 'VOTING_ENDED'
  | 'EVENT_ALREADY_ENDED';

export class StateError extends AppError {
  declare readonly code: StateErrorCode;

  constructor(message: string, code: StateErrorCode) {
    super(message, 409, code);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class IdempotencyViolation extends AppError {
  constructor(message: string = 'Voter has already cast a ballot for this event', code: string = 'ALREADY_VOTED') {
    super(message, 409, code);
  }
}

/**
 * Lost the race on the (event, voter) constraint: another submission by the
 * same voter committed first while this one was being encrypted.
 */
export class ConcurrencyConflict extends IdempotencyViolation {
  constructor(message: string = 'A concurrent ballot submission for this voter was recorded first') {
    super(message, 'CONCURRENT_SUBMISSION');
  }
}

export type CryptoOperation =
  | 'buildManifest'
  | 'performKeyCeremony'
  | 'encryptBallot'
  | 'deriveVerificationCode'
  | 'aggregateAndDecrypt'
  | 'verifyBallot';

export class CryptoEngineError extends AppError {
  public readonly operation: CryptoOperation;
  public readonly timedOut: boolean;

  constructor(operation: CryptoOperation, message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    const timedOut = options.timedOut ?? false;
    super(message, timedOut ? 504 : 502, timedOut ? 'CRYPTO_ENGINE_TIMEOUT' : 'CRYPTO_ENGINE_FAILURE');
    this.operation = operation;
    this.timedOut = timedOut;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
