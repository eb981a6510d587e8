import { eventPublisher } from '../events/publisher';
import { getLedgerRuntime } from '../ledger/runtime';
import { JournalOperation } from '../models/journal';
import { AccountId, TransferReceipt, TransferTicketCommand } from '../models/ledger';
import { toAppError } from '../utils/errors';
import logger from '../utils/logger';
import { assertJournalWritable, journalCommitted } from './journaling';

export const transferTicketHandler = async (
  caller: AccountId,
  command: TransferTicketCommand,
  correlationId?: string
): Promise<TransferReceipt> => {
  logger.info('Executing TransferTicket command', { caller, command, correlationId });

  assertJournalWritable();

  const { engine, clock } = getLedgerRuntime();
  const height = clock.currentHeight();
  const result = engine.transferTicket(caller, command);

  if (!result.ok) {
    logger.warn('TransferTicket command rejected', {
      caller,
      ticketId: command.ticketId,
      kind: result.error.kind,
    });
    throw toAppError(result.error);
  }

  const receipt = result.value;

  await journalCommitted(
    {
      operation: JournalOperation.TRANSFER_TICKET,
      caller,
      height,
      payload: command,
    },
    ({ sequence }) => eventPublisher.publishTicketTransferred(receipt, sequence, correlationId)
  );

  logger.info('TransferTicket command executed successfully', {
    ticketId: receipt.ticketId,
    newOwner: receipt.newOwner,
  });
  return receipt;
};

export default transferTicketHandler;
