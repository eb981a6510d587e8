import { LedgerEvent, Ticket } from '../models/ledger';

export const MAX_BATCH_QUANTITY = 10;

// Keeps every derived amount (uplift, discounted batch, fee) a safe integer.
export const MAX_AMOUNT = Math.floor(Number.MAX_SAFE_INTEGER / 1000);

export function isPurchasable(event: Readonly<LedgerEvent>, nowHeight: number): boolean {
  return event.active && event.eventHeight > nowHeight && event.availableSupply > 0;
}

export function isPositiveAmount(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0 && value <= MAX_AMOUNT;
}

export function isValidHeight(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function isValidBatchQuantity(quantity: number): boolean {
  return Number.isInteger(quantity) && quantity >= 1 && quantity <= MAX_BATCH_QUANTITY;
}

export function isTransferable(ticket: Readonly<Ticket>): boolean {
  return ticket.transferable && !ticket.used;
}
