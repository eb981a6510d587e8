import fs from 'fs';
import { z } from 'zod';
import { AccountId } from '../models/ledger';

/**
 * Balance collaborator consulted and debited by purchase operations.
 */
export interface PaymentGateway {
  getBalance(account: AccountId): number;
  /** Move `amount` from one account to another; `false` means nothing moved. */
  transfer(amount: number, from: AccountId, to: AccountId): boolean;
}

const accountBalancesSchema = z.record(z.string().min(1), z.number().int().nonnegative());

/**
 * Read starting balances from a JSON object of `account: amount`.
 */
export function loadAccountBalances(filePath: string): Record<AccountId, number> {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return accountBalancesSchema.parse(raw);
}

/**
 * In-process balance table.
 */
export class BalanceBook implements PaymentGateway {
  private readonly balances = new Map<AccountId, number>();

  constructor(initialBalances: Record<AccountId, number> = {}) {
    for (const [account, balance] of Object.entries(initialBalances)) {
      this.balances.set(account, balance);
    }
  }

  getBalance(account: AccountId): number {
    return this.balances.get(account) ?? 0;
  }

  transfer(amount: number, from: AccountId, to: AccountId): boolean {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      return false;
    }

    const fromBalance = this.getBalance(from);
    if (fromBalance < amount) {
      return false;
    }

    if (from !== to) {
      this.balances.set(from, fromBalance - amount);
      this.balances.set(to, this.getBalance(to) + amount);
    }
    return true;
  }
}
