import {
  AccountId,
  BatchPurchaseReceipt,
  BatchPurchaseTicketsCommand,
  BatchQuote,
  CreateEventCommand,
  LedgerErrorKind,
  LedgerEvent,
  LedgerResult,
  LedgerSnapshot,
  LedgerStats,
  PriceQuote,
  PurchaseReceipt,
  PurchaseTicketCommand,
  Ticket,
  TransferReceipt,
  TransferTicketCommand,
} from '../models/ledger';
import { ClockSource } from './clock';
import { PaymentGateway } from './payments';
import { batchQuote, platformFee, price, quote } from './pricing';
import { LedgerStore } from './store';
import {
  MAX_BATCH_QUANTITY,
  isPositiveAmount,
  isPurchasable,
  isTransferable,
  isValidBatchQuantity,
  isValidHeight,
} from './validation';

export interface LedgerEngineOptions {
  payments: PaymentGateway;
  clock: ClockSource;
  treasuryAccount: AccountId;
  store?: LedgerStore;
}

const fail = (kind: LedgerErrorKind, message: string): LedgerResult<never> => ({
  ok: false,
  error: { kind, message },
});

const succeed = <T>(value: T): LedgerResult<T> => ({ ok: true, value });

/**
 * Single entry point for every ledger mutation.
 *
 * Each operation checks all of its preconditions against the current state
 * first and only then opens a store transaction; the payment is the last step
 * inside it, so a refused payment discards the staged writes. Operations are
 * synchronous and must be called from one writer at a time.
 */
export class LedgerEngine {
  private readonly store: LedgerStore;
  private readonly payments: PaymentGateway;
  private readonly clock: ClockSource;
  private readonly treasuryAccount: AccountId;

  constructor(options: LedgerEngineOptions) {
    this.store = options.store ?? new LedgerStore();
    this.payments = options.payments;
    this.clock = options.clock;
    this.treasuryAccount = options.treasuryAccount;
  }

  createEvent(caller: AccountId, command: CreateEventCommand): LedgerResult<number> {
    const now = this.clock.currentHeight();

    if (!isPositiveAmount(command.totalTickets)) {
      return fail(LedgerErrorKind.INVALID_PARAMETERS, 'totalTickets must be a positive integer');
    }
    if (!isPositiveAmount(command.basePrice)) {
      return fail(LedgerErrorKind.INVALID_PARAMETERS, 'basePrice must be a positive integer');
    }
    if (!isValidHeight(command.eventDate)) {
      return fail(LedgerErrorKind.INVALID_PARAMETERS, 'eventDate must be a non-negative integer height');
    }
    if (command.eventDate <= now) {
      return fail(
        LedgerErrorKind.EVENT_EXPIRED,
        `eventDate ${command.eventDate} is not after current height ${now}`
      );
    }

    return this.store.transaction((tx) => {
      const eventId = tx.allocateEventId();

      tx.putEvent({
        id: eventId,
        name: command.name,
        description: command.description,
        venue: command.venue,
        eventType: command.eventType,
        eventHeight: command.eventDate,
        totalSupply: command.totalTickets,
        availableSupply: command.totalTickets,
        basePrice: command.basePrice,
        creator: caller,
        active: true,
      });

      return succeed(eventId);
    });
  }

  purchaseTicket(caller: AccountId, command: PurchaseTicketCommand): LedgerResult<PurchaseReceipt> {
    const event = this.store.getEvent(command.eventId);
    if (!event) {
      return fail(LedgerErrorKind.NOT_FOUND, `Event ${command.eventId} not found`);
    }

    const now = this.clock.currentHeight();
    const unitPrice = price(event);
    const fee = platformFee(unitPrice);
    const total = unitPrice + fee;

    if (!isPurchasable(event, now)) {
      return fail(LedgerErrorKind.EVENT_NOT_ACTIVE, `Event ${event.id} is not open for purchase`);
    }
    if (this.payments.getBalance(caller) < total) {
      return fail(LedgerErrorKind.INSUFFICIENT_PAYMENT, `Purchase requires ${total}`);
    }

    return this.store.transaction((tx) => {
      const ticketId = tx.allocateTicketIds(1);

      tx.putTicket({
        id: ticketId,
        eventId: event.id,
        owner: caller,
        pricePaid: unitPrice,
        purchaseHeight: now,
        used: false,
        transferable: true,
        seatInfo: command.seatInfo,
      });
      tx.putEvent({ ...event, availableSupply: event.availableSupply - 1 });
      tx.addPlatformRevenue(fee);

      if (!this.payments.transfer(total, caller, this.treasuryAccount)) {
        return fail(LedgerErrorKind.PAYMENT_FAILED, `Payment of ${total} was refused`);
      }

      return succeed({ ticketId, pricePaid: unitPrice, fee, totalPaid: total });
    });
  }

  batchPurchaseTickets(
    caller: AccountId,
    command: BatchPurchaseTicketsCommand
  ): LedgerResult<BatchPurchaseReceipt> {
    const event = this.store.getEvent(command.eventId);
    if (!event) {
      return fail(LedgerErrorKind.NOT_FOUND, `Event ${command.eventId} not found`);
    }

    const now = this.clock.currentHeight();
    const { quantity, seatInfos } = command;

    if (!isPurchasable(event, now)) {
      return fail(LedgerErrorKind.EVENT_NOT_ACTIVE, `Event ${event.id} is not open for purchase`);
    }
    if (!isValidBatchQuantity(quantity)) {
      return fail(
        LedgerErrorKind.INVALID_PARAMETERS,
        `quantity must be between 1 and ${MAX_BATCH_QUANTITY}`
      );
    }
    if (event.availableSupply < quantity) {
      return fail(
        LedgerErrorKind.SOLD_OUT,
        `Only ${event.availableSupply} tickets left for event ${event.id}`
      );
    }
    if (seatInfos.length !== quantity) {
      return fail(
        LedgerErrorKind.INVALID_PARAMETERS,
        `Expected ${quantity} seat entries, got ${seatInfos.length}`
      );
    }

    const batch = batchQuote(event, quantity, command.applyGroupDiscount);
    if (this.payments.getBalance(caller) < batch.total) {
      return fail(LedgerErrorKind.INSUFFICIENT_PAYMENT, `Purchase requires ${batch.total}`);
    }

    return this.store.transaction((tx) => {
      const firstTicketId = tx.allocateTicketIds(quantity);

      seatInfos.forEach((seatInfo, offset) => {
        tx.putTicket({
          id: firstTicketId + offset,
          eventId: event.id,
          owner: caller,
          pricePaid: batch.discountedUnitPrice,
          purchaseHeight: now,
          used: false,
          transferable: true,
          seatInfo,
        });
      });
      tx.putEvent({ ...event, availableSupply: event.availableSupply - quantity });
      tx.addPlatformRevenue(batch.fee);

      if (!this.payments.transfer(batch.total, caller, this.treasuryAccount)) {
        return fail(LedgerErrorKind.PAYMENT_FAILED, `Payment of ${batch.total} was refused`);
      }

      return succeed({
        firstTicketId,
        quantity,
        totalPaid: batch.total,
        discountRate: batch.discountRate,
      });
    });
  }

  transferTicket(caller: AccountId, command: TransferTicketCommand): LedgerResult<TransferReceipt> {
    const ticket = this.store.getTicket(command.ticketId);
    if (!ticket) {
      return fail(LedgerErrorKind.NOT_FOUND, `Ticket ${command.ticketId} not found`);
    }
    if (ticket.owner !== caller) {
      return fail(LedgerErrorKind.NOT_TICKET_OWNER, `Ticket ${ticket.id} is not owned by caller`);
    }
    if (!isTransferable(ticket)) {
      return fail(LedgerErrorKind.TRANSFER_NOT_ALLOWED, `Ticket ${ticket.id} cannot be transferred`);
    }
    if (!command.newOwner) {
      return fail(LedgerErrorKind.INVALID_PARAMETERS, 'newOwner is required');
    }

    return this.store.transaction((tx) => {
      tx.putTicket({ ...ticket, owner: command.newOwner });

      return succeed({
        ticketId: ticket.id,
        eventId: ticket.eventId,
        previousOwner: ticket.owner,
        newOwner: command.newOwner,
      });
    });
  }

  getEvent(eventId: number): LedgerEvent | undefined {
    return this.store.getEvent(eventId);
  }

  getTicket(ticketId: number): Ticket | undefined {
    return this.store.getTicket(ticketId);
  }

  getTicketsByOwner(owner: AccountId): Ticket[] {
    return this.store.listTicketsByOwner(owner).sort((a, b) => a.id - b.id);
  }

  quoteEvent(eventId: number): LedgerResult<PriceQuote> {
    const event = this.store.getEvent(eventId);
    if (!event) {
      return fail(LedgerErrorKind.NOT_FOUND, `Event ${eventId} not found`);
    }
    return succeed(quote(event));
  }

  quoteBatch(eventId: number, quantity: number, applyGroupDiscount: boolean): LedgerResult<BatchQuote> {
    const event = this.store.getEvent(eventId);
    if (!event) {
      return fail(LedgerErrorKind.NOT_FOUND, `Event ${eventId} not found`);
    }
    if (!isValidBatchQuantity(quantity)) {
      return fail(
        LedgerErrorKind.INVALID_PARAMETERS,
        `quantity must be between 1 and ${MAX_BATCH_QUANTITY}`
      );
    }
    return succeed(batchQuote(event, quantity, applyGroupDiscount));
  }

  getStats(): LedgerStats {
    return {
      nextEventId: this.store.nextEventId,
      nextTicketId: this.store.nextTicketId,
      totalPlatformRevenue: this.store.totalPlatformRevenue,
      eventCount: this.store.eventCount,
      ticketCount: this.store.ticketCount,
      currentHeight: this.clock.currentHeight(),
    };
  }

  snapshot(): LedgerSnapshot {
    return this.store.snapshot();
  }
}
