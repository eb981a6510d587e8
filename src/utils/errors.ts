import { StatusCodes } from 'http-status-codes';
import { LedgerError, LedgerErrorKind } from '../models/ledger';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = StatusCodes.INTERNAL_SERVER_ERROR,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, StatusCodes.NOT_FOUND, 'NOT_FOUND');
  }
}

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request') {
    super(message, StatusCodes.BAD_REQUEST, 'BAD_REQUEST');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, StatusCodes.UNAUTHORIZED, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, StatusCodes.FORBIDDEN, 'FORBIDDEN');
  }
}

export class ValidationError extends AppError {
  public readonly errors: Record<string, string[]>;

  constructor(message: string = 'Validation failed', errors: Record<string, string[]> = {}) {
    super(message, StatusCodes.UNPROCESSABLE_ENTITY, 'VALIDATION_ERROR');
    this.errors = errors;
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service unavailable') {
    super(message, StatusCodes.SERVICE_UNAVAILABLE, 'SERVICE_UNAVAILABLE');
  }
}

export class TicketNotFoundError extends NotFoundError {
  constructor(ticketId: number) {
    super(`Ticket with ID ${ticketId} not found`);
  }
}

const LEDGER_ERROR_STATUS: Record<LedgerErrorKind, number> = {
  [LedgerErrorKind.NOT_FOUND]: StatusCodes.NOT_FOUND,
  [LedgerErrorKind.INVALID_PARAMETERS]: StatusCodes.BAD_REQUEST,
  [LedgerErrorKind.EVENT_EXPIRED]: StatusCodes.GONE,
  [LedgerErrorKind.EVENT_NOT_ACTIVE]: StatusCodes.CONFLICT,
  [LedgerErrorKind.SOLD_OUT]: StatusCodes.CONFLICT,
  [LedgerErrorKind.INSUFFICIENT_PAYMENT]: StatusCodes.PAYMENT_REQUIRED,
  [LedgerErrorKind.NOT_TICKET_OWNER]: StatusCodes.FORBIDDEN,
  [LedgerErrorKind.TRANSFER_NOT_ALLOWED]: StatusCodes.CONFLICT,
  [LedgerErrorKind.PAYMENT_FAILED]: StatusCodes.BAD_GATEWAY,
};

/**
 * A ledger operation was rejected; the ledger was left untouched.
 */
export class LedgerRejectedError extends AppError {
  public readonly kind: LedgerErrorKind;

  constructor(error: LedgerError) {
    super(error.message, LEDGER_ERROR_STATUS[error.kind], error.kind);
    this.kind = error.kind;
  }
}

/**
 * Ledger data breaks one of its own invariants (e.g. an event with no supply).
 * Never expected from valid operations.
 */
export class LedgerInvariantError extends AppError {
  constructor(message: string) {
    super(message, StatusCodes.INTERNAL_SERVER_ERROR, 'LEDGER_INVARIANT_VIOLATION', false);
  }
}

export class ReplayDivergenceError extends AppError {
  public readonly sequence: number;

  constructor(sequence: number, reason: string) {
    super(
      `Journal replay diverged at sequence ${sequence}: ${reason}`,
      StatusCodes.INTERNAL_SERVER_ERROR,
      'REPLAY_DIVERGENCE',
      false
    );
    this.sequence = sequence;
  }
}

export const toAppError = (error: LedgerError): LedgerRejectedError => new LedgerRejectedError(error);
