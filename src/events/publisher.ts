import { v4 as uuidv4 } from 'uuid';
import { publishEvent, KAFKA_TOPICS } from '../infrastructure/messaging/kafka';
import {
  LedgerEventType,
  EventCreatedEvent,
  TicketPurchasedEvent,
  TicketsBatchPurchasedEvent,
  TicketTransferredEvent,
} from './types';
import { LedgerEvent, Ticket, TransferReceipt } from '../models/ledger';
import logger from '../utils/logger';

// Every ledger event is keyed by its ticketed event, so one partition carries
// an event's creation, sales and transfers in order. `sequence` is the
// journal sequence of the committed operation.
const createBaseEvent = (
  ledgerEventId: number,
  sequence: number,
  correlationId?: string
) => ({
  eventId: uuidv4(),
  aggregateId: String(ledgerEventId),
  aggregateType: 'Event',
  sequence,
  timestamp: new Date(),
  version: 1,
  correlationId,
});

export const eventPublisher = {
  publishEventCreated: async (
    event: LedgerEvent,
    sequence: number,
    correlationId?: string
  ): Promise<void> => {
    const domainEvent: EventCreatedEvent = {
      ...createBaseEvent(event.id, sequence, correlationId),
      eventType: LedgerEventType.EVENT_CREATED,
      payload: { ...event },
    };

    await publishEvent(KAFKA_TOPICS.LEDGER_EVENTS, domainEvent);
    logger.info('EventCreated event published', { eventId: event.id });
  },

  publishTicketPurchased: async (
    ticket: Ticket,
    availableSupply: number,
    fee: number,
    totalPaid: number,
    sequence: number,
    correlationId?: string
  ): Promise<void> => {
    const domainEvent: TicketPurchasedEvent = {
      ...createBaseEvent(ticket.eventId, sequence, correlationId),
      eventType: LedgerEventType.TICKET_PURCHASED,
      payload: {
        ticket,
        availableSupply,
        fee,
        totalPaid,
      },
    };

    await publishEvent(KAFKA_TOPICS.LEDGER_EVENTS, domainEvent);
    logger.info('TicketPurchased event published', { ticketId: ticket.id });
  },

  publishTicketsBatchPurchased: async (
    eventId: number,
    owner: string,
    tickets: Ticket[],
    availableSupply: number,
    discountRate: number,
    totalPaid: number,
    sequence: number,
    correlationId?: string
  ): Promise<void> => {
    const domainEvent: TicketsBatchPurchasedEvent = {
      ...createBaseEvent(eventId, sequence, correlationId),
      eventType: LedgerEventType.TICKETS_BATCH_PURCHASED,
      payload: {
        eventId,
        owner,
        tickets,
        availableSupply,
        discountRate,
        totalPaid,
      },
    };

    await publishEvent(KAFKA_TOPICS.LEDGER_EVENTS, domainEvent);
    logger.info('TicketsBatchPurchased event published', { eventId, count: tickets.length });
  },

  publishTicketTransferred: async (
    receipt: TransferReceipt,
    sequence: number,
    correlationId?: string
  ): Promise<void> => {
    const domainEvent: TicketTransferredEvent = {
      ...createBaseEvent(receipt.eventId, sequence, correlationId),
      eventType: LedgerEventType.TICKET_TRANSFERRED,
      payload: { ...receipt },
    };

    await publishEvent(KAFKA_TOPICS.LEDGER_EVENTS, domainEvent);
    logger.info('TicketTransferred event published', {
      ticketId: receipt.ticketId,
      newOwner: receipt.newOwner,
    });
  },
};

export default eventPublisher;
