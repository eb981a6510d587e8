import { JournalEntry, JournalRecord, journalEntrySchema } from '../../models/journal';
import logger from '../../utils/logger';
import writeDb from './writeDb';

interface JournalRow {
  sequence: string;
  operation: string;
  caller: string;
  height: string;
  payload: unknown;
}

let nextSequence = 1;

/**
 * Append-only log of committed ledger operations, replayed on startup.
 *
 * Sequence numbers are handed out synchronously, right after the engine
 * commits, so journal order matches commit order even when the inserts
 * themselves complete out of order.
 */
export const ledgerJournal = {
  sequence: (entry: JournalEntry): JournalRecord => {
    const record = { sequence: nextSequence, entry };
    nextSequence += 1;
    return record;
  },

  append: async (record: JournalRecord): Promise<void> => {
    const { entry } = record;
    await writeDb.query(
      `INSERT INTO ledger_journal (sequence, operation, caller, height, payload)
       VALUES ($1, $2, $3, $4, $5)`,
      [record.sequence, entry.operation, entry.caller, entry.height, JSON.stringify(entry.payload)]
    );
  },

  load: async (): Promise<JournalRecord[]> => {
    const rows = await writeDb.query<JournalRow>(
      `SELECT sequence, operation, caller, height, payload
       FROM ledger_journal
       ORDER BY sequence ASC`
    );

    const records = rows.map((row) => ({
      sequence: parseInt(row.sequence, 10),
      entry: journalEntrySchema.parse({
        operation: row.operation,
        caller: row.caller,
        height: parseInt(row.height, 10),
        payload: row.payload,
      }),
    }));

    logger.info('Ledger journal loaded', { entries: records.length });
    return records;
  },

  /**
   * Continue numbering after the last replayed record.
   */
  resume: (records: JournalRecord[]): void => {
    nextSequence = records.reduce((max, record) => Math.max(max, record.sequence), 0) + 1;
  },
};

export default ledgerJournal;
