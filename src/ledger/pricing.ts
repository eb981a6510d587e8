import { BatchQuote, LedgerEvent, PriceQuote } from '../models/ledger';
import { LedgerInvariantError } from '../utils/errors';

export const PLATFORM_FEE_PERCENT = 5;

// Uplift reaches half of the base price when the event is fully sold.
const DEMAND_UPLIFT_DIVISOR = 200;

const GROUP_DISCOUNT_TIERS: ReadonlyArray<{ minQuantity: number; rate: number }> = [
  { minQuantity: 10, rate: 15 },
  { minQuantity: 5, rate: 10 },
];

function assertSupply(event: Readonly<LedgerEvent>): void {
  if (event.totalSupply <= 0) {
    throw new LedgerInvariantError(`Event ${event.id} has no ticket supply`);
  }
  if (event.availableSupply < 0 || event.availableSupply > event.totalSupply) {
    throw new LedgerInvariantError(
      `Event ${event.id} has ${event.availableSupply} available out of ${event.totalSupply}`
    );
  }
}

/**
 * Percentage of the supply already sold, truncated.
 */
export function demandMultiplier(event: Readonly<LedgerEvent>): number {
  assertSupply(event);
  const sold = event.totalSupply - event.availableSupply;
  return Math.floor((sold * 100) / event.totalSupply);
}

/**
 * Current unit price of an event's tickets.
 *
 * The base price is raised by `demandMultiplier / 200` of itself, so an
 * untouched event sells at its base price and the last ticket at 150% of it.
 */
export function price(event: Readonly<LedgerEvent>): number {
  const uplift = Math.floor((event.basePrice * demandMultiplier(event)) / DEMAND_UPLIFT_DIVISOR);
  return event.basePrice + uplift;
}

export function platformFee(amount: number): number {
  return Math.floor((amount * PLATFORM_FEE_PERCENT) / 100);
}

export function groupDiscountRate(quantity: number, applyGroupDiscount: boolean): number {
  if (!applyGroupDiscount) {
    return 0;
  }
  const tier = GROUP_DISCOUNT_TIERS.find((t) => quantity >= t.minQuantity);
  return tier ? tier.rate : 0;
}

export function applyDiscount(unitPrice: number, discountRate: number): number {
  return unitPrice - Math.floor((unitPrice * discountRate) / 100);
}

export function quote(event: Readonly<LedgerEvent>): PriceQuote {
  const unitPrice = price(event);
  const fee = platformFee(unitPrice);

  return {
    eventId: event.id,
    sold: event.totalSupply - event.availableSupply,
    demandMultiplier: demandMultiplier(event),
    unitPrice,
    fee,
    total: unitPrice + fee,
  };
}

/**
 * Price a batch against the event as it stands before the batch: the unit
 * price is frozen for every ticket in it.
 */
export function batchQuote(
  event: Readonly<LedgerEvent>,
  quantity: number,
  applyGroupDiscount: boolean
): BatchQuote {
  const unitPrice = price(event);
  const discountRate = groupDiscountRate(quantity, applyGroupDiscount);
  const discountedUnitPrice = applyDiscount(unitPrice, discountRate);
  const subtotal = discountedUnitPrice * quantity;
  const fee = platformFee(subtotal);

  return {
    eventId: event.id,
    quantity,
    unitPrice,
    discountRate,
    discountedUnitPrice,
    subtotal,
    fee,
    total: subtotal + fee,
  };
}
