import { z } from 'zod';

// Domain Event Types
export enum LedgerEventType {
  EVENT_CREATED = 'EVENT_CREATED',
  TICKET_PURCHASED = 'TICKET_PURCHASED',
  TICKETS_BATCH_PURCHASED = 'TICKETS_BATCH_PURCHASED',
  TICKET_TRANSFERRED = 'TICKET_TRANSFERRED',
}

const ticketSchema = z.object({
  id: z.number().int(),
  eventId: z.number().int(),
  owner: z.string(),
  pricePaid: z.number().int(),
  purchaseHeight: z.number().int(),
  used: z.boolean(),
  transferable: z.boolean(),
  seatInfo: z.string(),
});

// Fields shared by every event on the wire; timestamp travels as an ISO string
const baseEventFields = {
  eventId: z.string().uuid(),
  aggregateId: z.string(),
  aggregateType: z.string(),
  sequence: z.number().int().positive(),
  timestamp: z.coerce.date(),
  version: z.number().int(),
  correlationId: z.string().optional(),
};

export const eventCreatedEventSchema = z.object({
  ...baseEventFields,
  eventType: z.literal(LedgerEventType.EVENT_CREATED),
  payload: z.object({
    id: z.number().int(),
    name: z.string(),
    description: z.string(),
    venue: z.string(),
    eventType: z.string(),
    eventHeight: z.number().int(),
    totalSupply: z.number().int(),
    availableSupply: z.number().int(),
    basePrice: z.number().int(),
    creator: z.string(),
    active: z.boolean(),
  }),
});

export const ticketPurchasedEventSchema = z.object({
  ...baseEventFields,
  eventType: z.literal(LedgerEventType.TICKET_PURCHASED),
  payload: z.object({
    ticket: ticketSchema,
    availableSupply: z.number().int(),
    fee: z.number().int(),
    totalPaid: z.number().int(),
  }),
});

export const ticketsBatchPurchasedEventSchema = z.object({
  ...baseEventFields,
  eventType: z.literal(LedgerEventType.TICKETS_BATCH_PURCHASED),
  payload: z.object({
    eventId: z.number().int(),
    owner: z.string(),
    tickets: z.array(ticketSchema),
    availableSupply: z.number().int(),
    discountRate: z.number().int(),
    totalPaid: z.number().int(),
  }),
});

export const ticketTransferredEventSchema = z.object({
  ...baseEventFields,
  eventType: z.literal(LedgerEventType.TICKET_TRANSFERRED),
  payload: z.object({
    ticketId: z.number().int(),
    eventId: z.number().int(),
    previousOwner: z.string(),
    newOwner: z.string(),
  }),
});

export const ledgerEventSchema = z.discriminatedUnion('eventType', [
  eventCreatedEventSchema,
  ticketPurchasedEventSchema,
  ticketsBatchPurchasedEventSchema,
  ticketTransferredEventSchema,
]);

export type EventCreatedEvent = z.infer<typeof eventCreatedEventSchema>;
export type TicketPurchasedEvent = z.infer<typeof ticketPurchasedEventSchema>;
export type TicketsBatchPurchasedEvent = z.infer<typeof ticketsBatchPurchasedEventSchema>;
export type TicketTransferredEvent = z.infer<typeof ticketTransferredEventSchema>;
export type LedgerDomainEvent = z.infer<typeof ledgerEventSchema>;

// Base Event Interface
export interface DomainEvent {
  eventId: string;
  eventType: string;
  aggregateId: string;
  aggregateType: string;
  sequence: number;
  timestamp: Date;
  version: number;
  correlationId?: string;
}

// Kafka Topics
export const KAFKA_TOPICS = {
  LEDGER_EVENTS: 'ledger-events',
} as const;
