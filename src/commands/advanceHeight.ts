import { getLedgerRuntime } from '../ledger/runtime';
import { JournalOperation } from '../models/journal';
import { AccountId, AdvanceHeightCommand } from '../models/ledger';
import { BadRequestError } from '../utils/errors';
import logger from '../utils/logger';
import { assertJournalWritable, journalCommitted } from './journaling';

export interface AdvanceHeightResult {
  previousHeight: number;
  height: number;
}

export const advanceHeightHandler = async (
  caller: AccountId,
  command: AdvanceHeightCommand
): Promise<AdvanceHeightResult> => {
  assertJournalWritable();

  const { clock } = getLedgerRuntime();
  const previousHeight = clock.currentHeight();

  if (!clock.advanceTo(command.height)) {
    throw new BadRequestError(`height ${command.height} is behind current height ${previousHeight}`);
  }

  await journalCommitted({
    operation: JournalOperation.ADVANCE_HEIGHT,
    caller,
    height: previousHeight,
    payload: command,
  });

  logger.info('Ledger height advanced', { caller, previousHeight, height: command.height });
  return { previousHeight, height: command.height };
};

export default advanceHeightHandler;
