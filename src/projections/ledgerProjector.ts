import { EachMessagePayload } from 'kafkajs';
import readDb from '../infrastructure/database/readDb';
import redis, { cacheKeys } from '../infrastructure/cache/redis';
import {
  LedgerEventType,
  EventCreatedEvent,
  TicketPurchasedEvent,
  TicketsBatchPurchasedEvent,
  TicketTransferredEvent,
  ledgerEventSchema,
} from '../events/types';
import { Ticket } from '../models/ledger';
import logger from '../utils/logger';

/**
 * Ledger Projector - keeps the read model in step with committed ledger events
 */
export const ledgerProjector = {
  processMessage: async (payload: EachMessagePayload): Promise<void> => {
    const { topic, partition, message } = payload;

    if (!message.value) {
      logger.warn('Received empty message', { topic, partition });
      return;
    }

    const parsed = ledgerEventSchema.safeParse(JSON.parse(message.value.toString()));
    if (!parsed.success) {
      logger.warn('Skipping unrecognised ledger message', {
        topic,
        offset: message.offset,
        issues: parsed.error.issues.length,
      });
      return;
    }

    const event = parsed.data;
    logger.info('Processing event for projection', {
      eventType: event.eventType,
      aggregateId: event.aggregateId,
    });

    switch (event.eventType) {
      case LedgerEventType.EVENT_CREATED:
        await handleEventCreated(event);
        break;
      case LedgerEventType.TICKET_PURCHASED:
        await handleTicketPurchased(event);
        break;
      case LedgerEventType.TICKETS_BATCH_PURCHASED:
        await handleTicketsBatchPurchased(event);
        break;
      case LedgerEventType.TICKET_TRANSFERRED:
        await handleTicketTransferred(event);
        break;
    }

    await updateCheckpoint(event.eventId);
  },
};

async function handleEventCreated(event: EventCreatedEvent): Promise<void> {
  const { payload } = event;

  await readDb.query(
    `INSERT INTO events_view (
      id, name, description, venue, event_type, event_height,
      total_supply, available_supply, base_price, creator, active, created_at
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
    ON CONFLICT (id) DO NOTHING`,
    [
      payload.id,
      payload.name,
      payload.description,
      payload.venue,
      payload.eventType,
      payload.eventHeight,
      payload.totalSupply,
      payload.availableSupply,
      payload.basePrice,
      payload.creator,
      payload.active,
      event.timestamp,
    ]
  );

  logger.info('Projected EventCreated event', { eventId: payload.id });
}

async function handleTicketPurchased(event: TicketPurchasedEvent): Promise<void> {
  const { ticket, availableSupply } = event.payload;

  await insertTicket(ticket, event.sequence, event.timestamp);
  await updateAvailability(ticket.eventId, availableSupply);
  await redis.delPattern(cacheKeys.ownerTicketsPattern(ticket.owner));

  logger.info('Projected TicketPurchased event', { ticketId: ticket.id });
}

async function handleTicketsBatchPurchased(event: TicketsBatchPurchasedEvent): Promise<void> {
  const { payload } = event;

  for (const ticket of payload.tickets) {
    await insertTicket(ticket, event.sequence, event.timestamp);
  }
  await updateAvailability(payload.eventId, payload.availableSupply);
  await redis.delPattern(cacheKeys.ownerTicketsPattern(payload.owner));

  logger.info('Projected TicketsBatchPurchased event', {
    eventId: payload.eventId,
    count: payload.tickets.length,
  });
}

async function handleTicketTransferred(event: TicketTransferredEvent): Promise<void> {
  const { payload } = event;

  // Ownership only moves forward in journal order; a redelivered or late
  // transfer must not overwrite a newer owner.
  const updated = await readDb.query<{ id: string }>(
    `UPDATE tickets_view
     SET owner = $1, last_sequence = $3
     WHERE id = $2 AND last_sequence < $3
     RETURNING id`,
    [payload.newOwner, payload.ticketId, event.sequence]
  );

  if (updated.length === 0) {
    logger.warn('Skipped stale TicketTransferred event', {
      ticketId: payload.ticketId,
      sequence: event.sequence,
    });
    return;
  }

  await redis.del(cacheKeys.ticketDetails(payload.ticketId));
  await redis.delPattern(cacheKeys.ownerTicketsPattern(payload.previousOwner));
  await redis.delPattern(cacheKeys.ownerTicketsPattern(payload.newOwner));

  logger.info('Projected TicketTransferred event', { ticketId: payload.ticketId });
}

async function insertTicket(ticket: Ticket, sequence: number, createdAt: Date): Promise<void> {
  await readDb.query(
    `INSERT INTO tickets_view (
      id, event_id, owner, price_paid, purchase_height, seat_info, used, transferable,
      last_sequence, created_at
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
    ON CONFLICT (id) DO NOTHING`,
    [
      ticket.id,
      ticket.eventId,
      ticket.owner,
      ticket.pricePaid,
      ticket.purchaseHeight,
      ticket.seatInfo,
      ticket.used,
      ticket.transferable,
      sequence,
      createdAt,
    ]
  );
}

// Availability only ever shrinks, so a late message never raises it back
async function updateAvailability(eventId: number, availableSupply: number): Promise<void> {
  await readDb.query(
    `UPDATE events_view
     SET available_supply = LEAST(available_supply, $1)
     WHERE id = $2`,
    [availableSupply, eventId]
  );
}

async function updateCheckpoint(eventId: string): Promise<void> {
  await readDb.query(
    `INSERT INTO projection_checkpoints (projection_name, last_processed_event_id, last_processed_at)
     VALUES ($1, $2, NOW())
     ON CONFLICT (projection_name) DO UPDATE SET
       last_processed_event_id = EXCLUDED.last_processed_event_id,
       last_processed_at = NOW()`,
    ['ledger_projector', eventId]
  );
}

export default ledgerProjector;
