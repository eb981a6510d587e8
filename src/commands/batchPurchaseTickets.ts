import { eventPublisher } from '../events/publisher';
import { getLedgerRuntime } from '../ledger/runtime';
import { JournalOperation } from '../models/journal';
import {
  AccountId,
  BatchPurchaseReceipt,
  BatchPurchaseTicketsCommand,
  Ticket,
} from '../models/ledger';
import { LedgerInvariantError, toAppError } from '../utils/errors';
import logger from '../utils/logger';
import { assertJournalWritable, journalCommitted } from './journaling';

export interface BatchPurchaseTicketsResult {
  receipt: BatchPurchaseReceipt;
  tickets: Ticket[];
}

export const batchPurchaseTicketsHandler = async (
  caller: AccountId,
  command: BatchPurchaseTicketsCommand,
  correlationId?: string
): Promise<BatchPurchaseTicketsResult> => {
  logger.info('Executing BatchPurchaseTickets command', {
    caller,
    eventId: command.eventId,
    quantity: command.quantity,
    correlationId,
  });

  assertJournalWritable();

  const { engine, clock } = getLedgerRuntime();
  const height = clock.currentHeight();
  const result = engine.batchPurchaseTickets(caller, command);

  if (!result.ok) {
    logger.warn('BatchPurchaseTickets command rejected', {
      caller,
      eventId: command.eventId,
      kind: result.error.kind,
    });
    throw toAppError(result.error);
  }

  const receipt = result.value;
  const tickets: Ticket[] = [];
  for (let offset = 0; offset < receipt.quantity; offset++) {
    const ticket = engine.getTicket(receipt.firstTicketId + offset);
    if (!ticket) {
      throw new LedgerInvariantError(`Ticket ${receipt.firstTicketId + offset} missing after commit`);
    }
    tickets.push(ticket);
  }
  const event = engine.getEvent(command.eventId);
  if (!event) {
    throw new LedgerInvariantError(`Event ${command.eventId} missing after commit`);
  }

  const availableSupply = event.availableSupply;
  await journalCommitted(
    {
      operation: JournalOperation.BATCH_PURCHASE_TICKETS,
      caller,
      height,
      payload: command,
    },
    ({ sequence }) =>
      eventPublisher.publishTicketsBatchPurchased(
        event.id,
        caller,
        tickets,
        availableSupply,
        receipt.discountRate,
        receipt.totalPaid,
        sequence,
        correlationId
      )
  );

  logger.info('BatchPurchaseTickets command executed successfully', {
    firstTicketId: receipt.firstTicketId,
    quantity: receipt.quantity,
    totalPaid: receipt.totalPaid,
  });
  return { receipt, tickets };
};

export default batchPurchaseTicketsHandler;
