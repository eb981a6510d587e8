import { LedgerErrorKind } from '../../../src/models/ledger';
import {
  AppError,
  LedgerInvariantError,
  LedgerRejectedError,
  NotFoundError,
  ReplayDivergenceError,
  TicketNotFoundError,
  toAppError,
} from '../../../src/utils/errors';

describe('errors', () => {
  it('keeps the subclass chain for instanceof checks', () => {
    const error = new TicketNotFoundError(12);

    expect(error).toBeInstanceOf(TicketNotFoundError);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('TicketNotFoundError');
    expect(error.message).toBe('Ticket with ID 12 not found');
    expect(error.statusCode).toBe(404);
  });

  it.each([
    [LedgerErrorKind.NOT_FOUND, 404],
    [LedgerErrorKind.INVALID_PARAMETERS, 400],
    [LedgerErrorKind.EVENT_EXPIRED, 410],
    [LedgerErrorKind.EVENT_NOT_ACTIVE, 409],
    [LedgerErrorKind.SOLD_OUT, 409],
    [LedgerErrorKind.INSUFFICIENT_PAYMENT, 402],
    [LedgerErrorKind.NOT_TICKET_OWNER, 403],
    [LedgerErrorKind.TRANSFER_NOT_ALLOWED, 409],
    [LedgerErrorKind.PAYMENT_FAILED, 502],
  ])('maps %s to HTTP %i', (kind, statusCode) => {
    const error = toAppError({ kind, message: 'rejected' });

    expect(error).toBeInstanceOf(LedgerRejectedError);
    expect(error.statusCode).toBe(statusCode);
    expect(error.code).toBe(kind);
    expect(error.isOperational).toBe(true);
  });

  it('marks invariant and replay failures as non-operational', () => {
    const invariant = new LedgerInvariantError('Event 1 has no ticket supply');
    const divergence = new ReplayDivergenceError(7, 'TRANSFER_TICKET rejected with NOT_FOUND');

    expect(invariant.isOperational).toBe(false);
    expect(invariant.code).toBe('LEDGER_INVARIANT_VIOLATION');
    expect(divergence.isOperational).toBe(false);
    expect(divergence.sequence).toBe(7);
    expect(divergence.message).toBe(
      'Journal replay diverged at sequence 7: TRANSFER_TICKET rejected with NOT_FOUND'
    );
  });
});
