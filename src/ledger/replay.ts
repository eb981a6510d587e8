import { JournalEntry, JournalOperation, JournalRecord } from '../models/journal';
import { LedgerResult } from '../models/ledger';
import { ReplayDivergenceError } from '../utils/errors';
import { ManualClock } from './clock';
import { LedgerEngine } from './engine';

const rejection = (result: LedgerResult<unknown>): string | null =>
  result.ok ? null : `rejected with ${result.error.kind}`;

// Returns why the entry did not commit, or null when it did.
function execute(engine: LedgerEngine, clock: ManualClock, entry: JournalEntry): string | null {
  switch (entry.operation) {
    case JournalOperation.CREATE_EVENT:
      return rejection(engine.createEvent(entry.caller, entry.payload));
    case JournalOperation.PURCHASE_TICKET:
      return rejection(engine.purchaseTicket(entry.caller, entry.payload));
    case JournalOperation.BATCH_PURCHASE_TICKETS:
      return rejection(engine.batchPurchaseTickets(entry.caller, entry.payload));
    case JournalOperation.TRANSFER_TICKET:
      return rejection(engine.transferTicket(entry.caller, entry.payload));
    case JournalOperation.ADVANCE_HEIGHT:
      return clock.advanceTo(entry.payload.height)
        ? null
        : `height ${entry.payload.height} is behind clock height ${clock.currentHeight()}`;
  }
}

/**
 * Re-run journaled operations, in sequence order, against an engine built on
 * the same starting balances. Sequences must run 1, 2, 3 ... without a gap,
 * and every entry committed once, so every entry must commit again; anything
 * else means the journal and the ledger disagree.
 */
export function replayJournal(
  engine: LedgerEngine,
  clock: ManualClock,
  records: JournalRecord[]
): number {
  const ordered = [...records].sort((a, b) => a.sequence - b.sequence);

  let expected = 1;
  for (const { sequence, entry } of ordered) {
    if (sequence !== expected) {
      throw new ReplayDivergenceError(sequence, `expected sequence ${expected}`);
    }
    expected += 1;

    if (!clock.advanceTo(entry.height)) {
      throw new ReplayDivergenceError(
        sequence,
        `entry height ${entry.height} is behind clock height ${clock.currentHeight()}`
      );
    }

    const reason = execute(engine, clock, entry);
    if (reason) {
      throw new ReplayDivergenceError(sequence, `${entry.operation} ${reason}`);
    }
  }

  return ordered.length;
}
