import { eventPublisher } from '../events/publisher';
import { getLedgerRuntime } from '../ledger/runtime';
import { JournalOperation } from '../models/journal';
import { AccountId, CreateEventCommand, LedgerEvent } from '../models/ledger';
import { LedgerInvariantError, toAppError } from '../utils/errors';
import logger from '../utils/logger';
import { assertJournalWritable, journalCommitted } from './journaling';

export interface CreateEventResult {
  event: LedgerEvent;
}

export const createEventHandler = async (
  caller: AccountId,
  command: CreateEventCommand,
  correlationId?: string
): Promise<CreateEventResult> => {
  logger.info('Executing CreateEvent command', { caller, command, correlationId });

  assertJournalWritable();

  const { engine, clock } = getLedgerRuntime();
  const height = clock.currentHeight();
  const result = engine.createEvent(caller, command);

  if (!result.ok) {
    logger.warn('CreateEvent command rejected', { caller, kind: result.error.kind });
    throw toAppError(result.error);
  }

  const event = engine.getEvent(result.value);
  if (!event) {
    throw new LedgerInvariantError(`Event ${result.value} missing after commit`);
  }

  await journalCommitted(
    {
      operation: JournalOperation.CREATE_EVENT,
      caller,
      height,
      payload: command,
    },
    ({ sequence }) => eventPublisher.publishEventCreated(event, sequence, correlationId)
  );

  logger.info('CreateEvent command executed successfully', { eventId: event.id });
  return { event };
};

export default createEventHandler;
