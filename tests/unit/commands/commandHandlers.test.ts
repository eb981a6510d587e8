jest.mock('../../../src/infrastructure/database/journal', () => {
  const mockJournal = {
    sequence: jest.fn((entry: unknown) => ({ sequence: 1, entry })),
    append: jest.fn(),
    load: jest.fn(),
    resume: jest.fn(),
  };
  return { __esModule: true, default: mockJournal, ledgerJournal: mockJournal };
});

jest.mock('../../../src/events/publisher', () => ({
  eventPublisher: {
    publishEventCreated: jest.fn(),
    publishTicketPurchased: jest.fn(),
    publishTicketsBatchPurchased: jest.fn(),
    publishTicketTransferred: jest.fn(),
  },
}));

import ledgerJournal from '../../../src/infrastructure/database/journal';
import { eventPublisher } from '../../../src/events/publisher';
import {
  advanceHeightHandler,
  batchPurchaseTicketsHandler,
  createEventHandler,
  purchaseTicketHandler,
  transferTicketHandler,
} from '../../../src/commands';
import { journalHalt, resetJournalWriter } from '../../../src/commands/journaling';
import { createLedgerRuntime, setLedgerRuntime, LedgerRuntime } from '../../../src/ledger/runtime';
import { JournalOperation } from '../../../src/models/journal';
import { CreateEventCommand, LedgerErrorKind } from '../../../src/models/ledger';
import { BadRequestError, LedgerRejectedError, ServiceUnavailableError } from '../../../src/utils/errors';

const concert: CreateEventCommand = {
  name: 'Harbour Lights',
  description: 'Open air concert',
  venue: 'Pier 4',
  eventType: 'concert',
  eventDate: 100,
  totalTickets: 4,
  basePrice: 1000,
};

describe('Ledger command handlers', () => {
  let runtime: LedgerRuntime;

  beforeEach(async () => {
    resetJournalWriter();
    runtime = createLedgerRuntime({
      balances: { alice: 5000, bob: 100, treasury: 0 },
      treasuryAccount: 'treasury',
      initialHeight: 10,
    });
    setLedgerRuntime(runtime);
    await createEventHandler('organizer', concert, 'corr-setup');
    jest.clearAllMocks();
  });

  afterAll(() => {
    setLedgerRuntime(null);
  });

  describe('createEventHandler', () => {
    it('returns the stored event and journals the command', async () => {
      const { event } = await createEventHandler('organizer', { ...concert, name: 'Encore' }, 'corr-1');

      expect(event.id).toBe(2);
      expect(event.name).toBe('Encore');
      expect(ledgerJournal.sequence).toHaveBeenCalledWith({
        operation: JournalOperation.CREATE_EVENT,
        caller: 'organizer',
        height: 10,
        payload: { ...concert, name: 'Encore' },
      });
      expect(ledgerJournal.append).toHaveBeenCalledTimes(1);
      expect(eventPublisher.publishEventCreated).toHaveBeenCalledWith(event, 1, 'corr-1');
    });

    it('maps an expired event date to a 410', async () => {
      await expect(
        createEventHandler('organizer', { ...concert, eventDate: 5 })
      ).rejects.toMatchObject({ statusCode: 410, code: LedgerErrorKind.EVENT_EXPIRED });
      expect(ledgerJournal.append).not.toHaveBeenCalled();
    });
  });

  describe('purchaseTicketHandler', () => {
    it('sells a ticket, journals and publishes it', async () => {
      const { ticket, receipt } = await purchaseTicketHandler(
        'alice',
        { eventId: 1, seatInfo: 'A1' },
        'corr-2'
      );

      expect(receipt).toEqual({ ticketId: 1, pricePaid: 1000, fee: 50, totalPaid: 1050 });
      expect(ticket.owner).toBe('alice');
      expect(ledgerJournal.sequence).toHaveBeenCalledWith({
        operation: JournalOperation.PURCHASE_TICKET,
        caller: 'alice',
        height: 10,
        payload: { eventId: 1, seatInfo: 'A1' },
      });
      expect(eventPublisher.publishTicketPurchased).toHaveBeenCalledWith(ticket, 3, 50, 1050, 1, 'corr-2');
      expect(runtime.payments.getBalance('treasury')).toBe(1050);
    });

    it('rejects an unknown event without journaling', async () => {
      const promise = purchaseTicketHandler('alice', { eventId: 9, seatInfo: 'A1' });

      await expect(promise).rejects.toBeInstanceOf(LedgerRejectedError);
      await expect(promise).rejects.toMatchObject({ statusCode: 404, kind: LedgerErrorKind.NOT_FOUND });
      expect(ledgerJournal.sequence).not.toHaveBeenCalled();
      expect(eventPublisher.publishTicketPurchased).not.toHaveBeenCalled();
    });

    it('rejects a buyer without funds with a 402', async () => {
      await expect(
        purchaseTicketHandler('bob', { eventId: 1, seatInfo: 'B1' })
      ).rejects.toMatchObject({ statusCode: 402, code: LedgerErrorKind.INSUFFICIENT_PAYMENT });
    });

    it('keeps the sale when publishing fails', async () => {
      jest.mocked(eventPublisher.publishTicketPurchased).mockRejectedValueOnce(new Error('broker down'));

      const { receipt } = await purchaseTicketHandler('alice', { eventId: 1, seatInfo: 'A1' });

      expect(receipt.ticketId).toBe(1);
      expect(runtime.engine.getTicket(1)?.owner).toBe('alice');
    });

    it('journals and publishes concurrent purchases in commit order', async () => {
      jest
        .mocked(ledgerJournal.append)
        .mockImplementationOnce(() => new Promise<void>((resolve) => setImmediate(resolve)));

      await Promise.all([
        purchaseTicketHandler('alice', { eventId: 1, seatInfo: 'A1' }),
        purchaseTicketHandler('alice', { eventId: 1, seatInfo: 'A2' }),
      ]);

      const append = jest.mocked(ledgerJournal.append).mock;
      const publish = jest.mocked(eventPublisher.publishTicketPurchased).mock;
      expect(publish.calls.map(([ticket]) => ticket.seatInfo)).toEqual(['A1', 'A2']);
      expect(append.invocationCallOrder[0]).toBeLessThan(publish.invocationCallOrder[0]);
      expect(publish.invocationCallOrder[0]).toBeLessThan(append.invocationCallOrder[1]);
      expect(append.invocationCallOrder[1]).toBeLessThan(publish.invocationCallOrder[1]);
    });

    it('halts the ledger when the journal insert fails', async () => {
      jest.mocked(ledgerJournal.append).mockRejectedValueOnce(new Error('connection reset'));

      const failed = purchaseTicketHandler('alice', { eventId: 1, seatInfo: 'A1' });

      await expect(failed).rejects.toBeInstanceOf(ServiceUnavailableError);
      await expect(failed).rejects.toMatchObject({ statusCode: 503, code: 'SERVICE_UNAVAILABLE' });
      expect(eventPublisher.publishTicketPurchased).not.toHaveBeenCalled();
      expect(journalHalt()).toEqual({ sequence: 1, reason: 'connection reset' });

      await expect(
        purchaseTicketHandler('alice', { eventId: 1, seatInfo: 'A2' })
      ).rejects.toMatchObject({ statusCode: 503 });
      await expect(
        transferTicketHandler('alice', { ticketId: 1, newOwner: 'bob' })
      ).rejects.toBeInstanceOf(ServiceUnavailableError);
      await expect(advanceHeightHandler('admin', { height: 50 })).rejects.toBeInstanceOf(
        ServiceUnavailableError
      );

      // refused commands never reach the engine or the journal
      expect(runtime.engine.getTicket(1)?.owner).toBe('alice');
      expect(runtime.engine.getStats().ticketCount).toBe(1);
      expect(runtime.clock.currentHeight()).toBe(10);
      expect(ledgerJournal.append).toHaveBeenCalledTimes(1);
    });

    it('fails writes queued behind a failed insert without appending them', async () => {
      jest.mocked(ledgerJournal.append).mockRejectedValueOnce(new Error('connection reset'));

      const [first, second] = await Promise.allSettled([
        purchaseTicketHandler('alice', { eventId: 1, seatInfo: 'A1' }),
        purchaseTicketHandler('alice', { eventId: 1, seatInfo: 'A2' }),
      ]);

      expect(first).toMatchObject({ status: 'rejected', reason: { statusCode: 503 } });
      expect(second).toMatchObject({ status: 'rejected', reason: { statusCode: 503 } });
      expect(ledgerJournal.append).toHaveBeenCalledTimes(1);
      expect(eventPublisher.publishTicketPurchased).not.toHaveBeenCalled();
    });
  });

  describe('batchPurchaseTicketsHandler', () => {
    it('returns every minted ticket', async () => {
      const { receipt, tickets } = await batchPurchaseTicketsHandler(
        'alice',
        { eventId: 1, quantity: 2, seatInfos: ['C1', 'C2'], applyGroupDiscount: false },
        'corr-3'
      );

      expect(receipt).toEqual({ firstTicketId: 1, quantity: 2, totalPaid: 2100, discountRate: 0 });
      expect(tickets.map((ticket) => ticket.seatInfo)).toEqual(['C1', 'C2']);
      expect(eventPublisher.publishTicketsBatchPurchased).toHaveBeenCalledWith(
        1,
        'alice',
        tickets,
        2,
        0,
        2100,
        1,
        'corr-3'
      );
    });

    it('reports an out of range quantity as a 400 from the ledger', async () => {
      await expect(
        batchPurchaseTicketsHandler('alice', {
          eventId: 1,
          quantity: 11,
          seatInfos: [],
          applyGroupDiscount: false,
        })
      ).rejects.toMatchObject({ statusCode: 400, code: LedgerErrorKind.INVALID_PARAMETERS });
    });

    it('reports a short seat list as a 400 from the ledger', async () => {
      await expect(
        batchPurchaseTicketsHandler('alice', {
          eventId: 1,
          quantity: 2,
          seatInfos: ['C1'],
          applyGroupDiscount: false,
        })
      ).rejects.toMatchObject({ statusCode: 400, code: LedgerErrorKind.INVALID_PARAMETERS });
    });

    it('checks the event is open before the quantity', async () => {
      runtime.clock.advanceTo(100);

      await expect(
        batchPurchaseTicketsHandler('alice', {
          eventId: 1,
          quantity: 11,
          seatInfos: [],
          applyGroupDiscount: false,
        })
      ).rejects.toMatchObject({ statusCode: 409, code: LedgerErrorKind.EVENT_NOT_ACTIVE });
    });

    it('rejects a batch beyond the remaining supply with a 409', async () => {
      await expect(
        batchPurchaseTicketsHandler('alice', {
          eventId: 1,
          quantity: 5,
          seatInfos: ['', '', '', '', ''],
          applyGroupDiscount: true,
        })
      ).rejects.toMatchObject({ statusCode: 409, code: LedgerErrorKind.SOLD_OUT });
    });
  });

  describe('transferTicketHandler', () => {
    beforeEach(async () => {
      await purchaseTicketHandler('alice', { eventId: 1, seatInfo: 'A1' });
      jest.clearAllMocks();
    });

    it('hands the ticket over', async () => {
      const receipt = await transferTicketHandler('alice', { ticketId: 1, newOwner: 'bob' }, 'corr-4');

      expect(receipt).toEqual({ ticketId: 1, eventId: 1, previousOwner: 'alice', newOwner: 'bob' });
      expect(eventPublisher.publishTicketTransferred).toHaveBeenCalledWith(receipt, 1, 'corr-4');
      expect(runtime.engine.getTicket(1)?.owner).toBe('bob');
    });

    it('forbids transfers by anyone but the owner', async () => {
      await expect(
        transferTicketHandler('bob', { ticketId: 1, newOwner: 'bob' })
      ).rejects.toMatchObject({ statusCode: 403, code: LedgerErrorKind.NOT_TICKET_OWNER });
    });
  });

  describe('advanceHeightHandler', () => {
    it('moves the clock forward and journals the change', async () => {
      const result = await advanceHeightHandler('admin', { height: 50 });

      expect(result).toEqual({ previousHeight: 10, height: 50 });
      expect(runtime.clock.currentHeight()).toBe(50);
      expect(ledgerJournal.sequence).toHaveBeenCalledWith({
        operation: JournalOperation.ADVANCE_HEIGHT,
        caller: 'admin',
        height: 10,
        payload: { height: 50 },
      });
    });

    it('refuses to move the clock backwards', async () => {
      await expect(advanceHeightHandler('admin', { height: 3 })).rejects.toBeInstanceOf(BadRequestError);
      expect(runtime.clock.currentHeight()).toBe(10);
      expect(ledgerJournal.append).not.toHaveBeenCalled();
    });
  });
});
