import ledgerJournal from '../infrastructure/database/journal';
import { JournalEntry, JournalRecord } from '../models/journal';
import { ServiceUnavailableError } from '../utils/errors';
import logger from '../utils/logger';

export type PublishCommitted = (record: JournalRecord) => Promise<void>;

interface JournalHalt {
  sequence: number;
  reason: string;
}

// Writes run one at a time in sequence order; the chain never rejects.
let tail: Promise<void> = Promise.resolve();
let halt: JournalHalt | null = null;

const unavailable = (failed: JournalHalt): ServiceUnavailableError =>
  new ServiceUnavailableError(
    `Ledger journal write failed at sequence ${failed.sequence}; commands are refused until restart`
  );

/**
 * The failed write that stopped the journal, if any.
 */
export const journalHalt = (): JournalHalt | null => halt;

/**
 * Refuse new commands once a journal write has failed. The engine already
 * holds state the journal lacks, so accepting more would build on it.
 */
export const assertJournalWritable = (): void => {
  if (halt) {
    throw unavailable(halt);
  }
};

export const resetJournalWriter = (): void => {
  tail = Promise.resolve();
  halt = null;
};

async function persist(record: JournalRecord, publish?: PublishCommitted): Promise<void> {
  if (halt) {
    throw unavailable(halt);
  }

  try {
    await ledgerJournal.append(record);
  } catch (error) {
    halt = {
      sequence: record.sequence,
      reason: error instanceof Error ? error.message : String(error),
    };
    logger.error('Failed to append ledger journal entry; ledger halted', { record, error });
    throw unavailable(halt);
  }

  if (!publish) {
    return;
  }

  try {
    await publish(record);
  } catch (error) {
    logger.error('Failed to publish ledger domain event', {
      sequence: record.sequence,
      operation: record.entry.operation,
      error,
    });
  }
}

/**
 * Journal an operation the engine has already committed, then publish its
 * domain event.
 *
 * Must be called in the same tick as the engine call: the sequence number is
 * taken before the first await. Appends and publishes run strictly in
 * sequence order. A failed append halts the journal: this call and every
 * write queued behind it reject with a 503, and `assertJournalWritable`
 * refuses new commands, so the journal never carries a gap.
 */
export const journalCommitted = (
  entry: JournalEntry,
  publish?: PublishCommitted
): Promise<JournalRecord> => {
  const record = ledgerJournal.sequence(entry);
  const write = tail.then(() => persist(record, publish));

  // The caller sees the failure through `write`
  tail = write.then(
    () => undefined,
    () => undefined
  );

  return write.then(() => record);
};
