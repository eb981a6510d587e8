jest.mock('../../../src/infrastructure/database/readDb', () => ({
  __esModule: true,
  default: { query: jest.fn(), queryOne: jest.fn() },
}));

jest.mock('../../../src/infrastructure/cache/redis', () => {
  const actual = jest.requireActual('../../../src/infrastructure/cache/redis');
  const mockRedis = { get: jest.fn(), set: jest.fn(), del: jest.fn(), delPattern: jest.fn() };
  return { ...actual, __esModule: true, default: mockRedis, redis: mockRedis };
});

import { EachMessagePayload } from 'kafkajs';
import readDb from '../../../src/infrastructure/database/readDb';
import redis from '../../../src/infrastructure/cache/redis';
import { ledgerProjector } from '../../../src/projections/ledgerProjector';
import { LedgerEventType } from '../../../src/events/types';

const EVENT_ID = '8d2f6a0e-3c1b-4f5e-9a7d-2b6c4e1f0a93';
const TIMESTAMP = '2026-03-01T12:00:00.000Z';

const payloadFor = (value: string | null): EachMessagePayload => ({
  topic: 'ledger-events',
  partition: 0,
  message: {
    key: Buffer.from('1'),
    value: value === null ? null : Buffer.from(value),
    timestamp: '0',
    attributes: 0,
    offset: '42',
    headers: {},
  },
  heartbeat: async () => undefined,
  pause: () => () => undefined,
});

const envelope = (eventType: LedgerEventType, payload: object, sequence = 1) =>
  JSON.stringify({
    eventId: EVENT_ID,
    eventType,
    aggregateId: '1',
    aggregateType: 'Event',
    sequence,
    timestamp: TIMESTAMP,
    version: 1,
    correlationId: 'corr-1',
    payload,
  });

const ticket = {
  id: 1,
  eventId: 1,
  owner: 'alice',
  pricePaid: 1000,
  purchaseHeight: 10,
  used: false,
  transferable: true,
  seatInfo: 'A1',
};

describe('ledgerProjector', () => {
  const query = jest.mocked(readDb.query);

  it('inserts created events into the read model', async () => {
    await ledgerProjector.processMessage(
      payloadFor(
        envelope(LedgerEventType.EVENT_CREATED, {
          id: 1,
          name: 'Harbour Lights',
          description: '',
          venue: 'Pier 4',
          eventType: 'concert',
          eventHeight: 100,
          totalSupply: 4,
          availableSupply: 4,
          basePrice: 1000,
          creator: 'organizer',
          active: true,
        })
      )
    );

    expect(query).toHaveBeenCalledTimes(2);
    expect(query.mock.calls[0][0]).toContain('INSERT INTO events_view');
    expect(query.mock.calls[0][1]).toEqual([
      1,
      'Harbour Lights',
      '',
      'Pier 4',
      'concert',
      100,
      4,
      4,
      1000,
      'organizer',
      true,
      new Date(TIMESTAMP),
    ]);
    expect(query.mock.calls[1][1]).toEqual(['ledger_projector', EVENT_ID]);
  });

  it('records a purchase and clears the buyer cache', async () => {
    await ledgerProjector.processMessage(
      payloadFor(
        envelope(
          LedgerEventType.TICKET_PURCHASED,
          { ticket, availableSupply: 3, fee: 50, totalPaid: 1050 },
          2
        )
      )
    );

    expect(query.mock.calls[0][0]).toContain('INSERT INTO tickets_view');
    expect(query.mock.calls[0][1]).toEqual([1, 1, 'alice', 1000, 10, 'A1', false, true, 2, new Date(TIMESTAMP)]);
    expect(query.mock.calls[1][0]).toContain('LEAST(available_supply, $1)');
    expect(query.mock.calls[1][1]).toEqual([3, 1]);
    expect(redis.delPattern).toHaveBeenCalledWith('owner:alice:tickets:*');
  });

  it('records every ticket of a batch', async () => {
    await ledgerProjector.processMessage(
      payloadFor(
        envelope(
          LedgerEventType.TICKETS_BATCH_PURCHASED,
          {
            eventId: 1,
            owner: 'alice',
            tickets: [ticket, { ...ticket, id: 2, seatInfo: 'A2' }],
            availableSupply: 2,
            discountRate: 0,
            totalPaid: 2100,
          },
          3
        )
      )
    );

    // two inserts, one availability update, one checkpoint
    expect(query).toHaveBeenCalledTimes(4);
    expect(query.mock.calls[1][1]).toEqual([2, 1, 'alice', 1000, 10, 'A2', false, true, 3, new Date(TIMESTAMP)]);
    expect(query.mock.calls[2][1]).toEqual([2, 1]);
  });

  const transfer = (previousOwner: string, newOwner: string, sequence: number) =>
    payloadFor(
      envelope(
        LedgerEventType.TICKET_TRANSFERRED,
        { ticketId: 1, eventId: 1, previousOwner, newOwner },
        sequence
      )
    );

  it('moves ownership and clears both owners', async () => {
    query.mockResolvedValueOnce([{ id: '1' }]);

    await ledgerProjector.processMessage(transfer('alice', 'bob', 4));

    expect(query.mock.calls[0][0]).toContain('WHERE id = $2 AND last_sequence < $3');
    expect(query.mock.calls[0][1]).toEqual(['bob', 1, 4]);
    expect(redis.del).toHaveBeenCalledWith('ticket:1');
    expect(redis.delPattern).toHaveBeenCalledWith('owner:alice:tickets:*');
    expect(redis.delPattern).toHaveBeenCalledWith('owner:bob:tickets:*');
  });

  it('keeps the newer owner when an older transfer arrives late', async () => {
    // alice -> bob (sequence 4) is delivered after bob -> carol (sequence 5)
    query.mockResolvedValueOnce([{ id: '1' }]);
    await ledgerProjector.processMessage(transfer('bob', 'carol', 5));
    jest.clearAllMocks();

    query.mockResolvedValueOnce([]);
    await ledgerProjector.processMessage(transfer('alice', 'bob', 4));

    expect(query.mock.calls[0][1]).toEqual(['bob', 1, 4]);
    expect(redis.del).not.toHaveBeenCalled();
    expect(redis.delPattern).not.toHaveBeenCalled();
    // the checkpoint still advances past the stale message
    expect(query).toHaveBeenCalledTimes(2);
    expect(query.mock.calls[1][1]).toEqual(['ledger_projector', EVENT_ID]);
  });

  it('skips messages that are not ledger events', async () => {
    await ledgerProjector.processMessage(payloadFor(JSON.stringify({ eventType: 'SOMETHING_ELSE' })));
    await ledgerProjector.processMessage(payloadFor(null));

    expect(query).not.toHaveBeenCalled();
  });
});
