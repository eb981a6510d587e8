import { config } from '../config';
import { AccountId } from '../models/ledger';
import { ManualClock } from './clock';
import { LedgerEngine } from './engine';
import { BalanceBook, loadAccountBalances } from './payments';

export interface LedgerRuntime {
  engine: LedgerEngine;
  clock: ManualClock;
  payments: BalanceBook;
}

export interface LedgerRuntimeOptions {
  balances: Record<AccountId, number>;
  treasuryAccount: AccountId;
  initialHeight: number;
}

export const createLedgerRuntime = (options: LedgerRuntimeOptions): LedgerRuntime => {
  const clock = new ManualClock(options.initialHeight);
  const payments = new BalanceBook(options.balances);
  const engine = new LedgerEngine({
    payments,
    clock,
    treasuryAccount: options.treasuryAccount,
  });

  return { engine, clock, payments };
};

let runtime: LedgerRuntime | null = null;

export const getLedgerRuntime = (): LedgerRuntime => {
  if (runtime) {
    return runtime;
  }

  runtime = createLedgerRuntime({
    balances: loadAccountBalances(config.ledger.accountsFile),
    treasuryAccount: config.ledger.treasuryAccount,
    initialHeight: config.ledger.initialHeight,
  });
  return runtime;
};

export const setLedgerRuntime = (next: LedgerRuntime | null): void => {
  runtime = next;
};
