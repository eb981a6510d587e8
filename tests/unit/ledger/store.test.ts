import { LedgerStore } from '../../../src/ledger/store';
import { LedgerErrorKind, LedgerEvent } from '../../../src/models/ledger';

const makeEvent = (id: number): LedgerEvent => ({
  id,
  name: `Event ${id}`,
  description: '',
  venue: 'Hall',
  eventType: 'talk',
  eventHeight: 100,
  totalSupply: 5,
  availableSupply: 5,
  basePrice: 200,
  creator: 'organizer',
  active: true,
});

describe('LedgerStore', () => {
  let store: LedgerStore;

  beforeEach(() => {
    store = new LedgerStore();
  });

  it('starts both id counters at 1', () => {
    expect(store.nextEventId).toBe(1);
    expect(store.nextTicketId).toBe(1);
    expect(store.totalPlatformRevenue).toBe(0);
  });

  it('applies staged writes when the callback succeeds', () => {
    const result = store.transaction((tx) => {
      const id = tx.allocateEventId();
      tx.putEvent(makeEvent(id));
      tx.addPlatformRevenue(12);
      return { ok: true, value: id };
    });

    expect(result).toEqual({ ok: true, value: 1 });
    expect(store.getEvent(1)?.name).toBe('Event 1');
    expect(store.nextEventId).toBe(2);
    expect(store.totalPlatformRevenue).toBe(12);
  });

  it('discards staged writes when the callback fails', () => {
    const result = store.transaction((tx) => {
      tx.putEvent(makeEvent(tx.allocateEventId()));
      tx.addPlatformRevenue(12);
      return { ok: false, error: { kind: LedgerErrorKind.PAYMENT_FAILED, message: 'refused' } };
    });

    expect(result.ok).toBe(false);
    expect(store.eventCount).toBe(0);
    expect(store.nextEventId).toBe(1);
    expect(store.totalPlatformRevenue).toBe(0);
  });

  it('discards staged writes when the callback throws', () => {
    expect(() =>
      store.transaction((tx) => {
        tx.putEvent(makeEvent(tx.allocateEventId()));
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(store.eventCount).toBe(0);
    expect(store.nextEventId).toBe(1);
  });

  it('lets reads inside a transaction see staged writes', () => {
    store.transaction((tx) => {
      tx.putEvent(makeEvent(tx.allocateEventId()));
      expect(tx.getEvent(1)?.availableSupply).toBe(5);
      expect(store.getEvent(1)).toBeUndefined();
      return { ok: true, value: null };
    });
  });

  it('hands out consecutive ticket ids', () => {
    store.transaction((tx) => {
      expect(tx.allocateTicketIds(3)).toBe(1);
      expect(tx.allocateTicketIds(1)).toBe(4);
      return { ok: true, value: null };
    });

    expect(store.nextTicketId).toBe(5);
  });

  it('returns copies that cannot change stored state', () => {
    store.transaction((tx) => {
      tx.putEvent(makeEvent(tx.allocateEventId()));
      return { ok: true, value: null };
    });

    const copy = store.getEvent(1);
    if (copy) {
      copy.availableSupply = 0;
    }

    expect(store.getEvent(1)?.availableSupply).toBe(5);
  });

  it('orders snapshots by id', () => {
    store.transaction((tx) => {
      tx.putEvent(makeEvent(2));
      tx.putEvent(makeEvent(1));
      return { ok: true, value: null };
    });

    expect(store.snapshot().events.map((event) => event.id)).toEqual([1, 2]);
  });
});
