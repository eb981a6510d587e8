import { eventPublisher } from '../events/publisher';
import { getLedgerRuntime } from '../ledger/runtime';
import { JournalOperation } from '../models/journal';
import { AccountId, PurchaseReceipt, PurchaseTicketCommand, Ticket } from '../models/ledger';
import { LedgerInvariantError, toAppError } from '../utils/errors';
import logger from '../utils/logger';
import { assertJournalWritable, journalCommitted } from './journaling';

export interface PurchaseTicketResult {
  ticket: Ticket;
  receipt: PurchaseReceipt;
}

export const purchaseTicketHandler = async (
  caller: AccountId,
  command: PurchaseTicketCommand,
  correlationId?: string
): Promise<PurchaseTicketResult> => {
  logger.info('Executing PurchaseTicket command', { caller, command, correlationId });

  assertJournalWritable();

  const { engine, clock } = getLedgerRuntime();
  const height = clock.currentHeight();
  const result = engine.purchaseTicket(caller, command);

  if (!result.ok) {
    logger.warn('PurchaseTicket command rejected', {
      caller,
      eventId: command.eventId,
      kind: result.error.kind,
    });
    throw toAppError(result.error);
  }

  const receipt = result.value;
  const ticket = engine.getTicket(receipt.ticketId);
  const event = engine.getEvent(command.eventId);
  if (!ticket || !event) {
    throw new LedgerInvariantError(`Ticket ${receipt.ticketId} missing after commit`);
  }

  const availableSupply = event.availableSupply;
  await journalCommitted(
    {
      operation: JournalOperation.PURCHASE_TICKET,
      caller,
      height,
      payload: command,
    },
    ({ sequence }) =>
      eventPublisher.publishTicketPurchased(
        ticket,
        availableSupply,
        receipt.fee,
        receipt.totalPaid,
        sequence,
        correlationId
      )
  );

  logger.info('PurchaseTicket command executed successfully', {
    ticketId: ticket.id,
    totalPaid: receipt.totalPaid,
  });
  return { ticket, receipt };
};

export default purchaseTicketHandler;
