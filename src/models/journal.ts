import { z } from 'zod';

export enum JournalOperation {
  CREATE_EVENT = 'CREATE_EVENT',
  PURCHASE_TICKET = 'PURCHASE_TICKET',
  BATCH_PURCHASE_TICKETS = 'BATCH_PURCHASE_TICKETS',
  TRANSFER_TICKET = 'TRANSFER_TICKET',
  ADVANCE_HEIGHT = 'ADVANCE_HEIGHT',
}

const height = z.number().int().nonnegative();
const id = z.number().int().positive();

const entryBase = {
  caller: z.string().min(1),
  height,
};

export const journalEntrySchema = z.discriminatedUnion('operation', [
  z.object({
    ...entryBase,
    operation: z.literal(JournalOperation.CREATE_EVENT),
    payload: z.object({
      name: z.string(),
      description: z.string(),
      venue: z.string(),
      eventType: z.string(),
      eventDate: height,
      totalTickets: z.number().int(),
      basePrice: z.number().int(),
    }),
  }),
  z.object({
    ...entryBase,
    operation: z.literal(JournalOperation.PURCHASE_TICKET),
    payload: z.object({
      eventId: id,
      seatInfo: z.string(),
    }),
  }),
  z.object({
    ...entryBase,
    operation: z.literal(JournalOperation.BATCH_PURCHASE_TICKETS),
    payload: z.object({
      eventId: id,
      quantity: z.number().int(),
      seatInfos: z.array(z.string()),
      applyGroupDiscount: z.boolean(),
    }),
  }),
  z.object({
    ...entryBase,
    operation: z.literal(JournalOperation.TRANSFER_TICKET),
    payload: z.object({
      ticketId: id,
      newOwner: z.string(),
    }),
  }),
  z.object({
    ...entryBase,
    operation: z.literal(JournalOperation.ADVANCE_HEIGHT),
    payload: z.object({ height }),
  }),
]);

/** One committed ledger operation, with the caller and height it ran under. */
export type JournalEntry = z.infer<typeof journalEntrySchema>;

export interface JournalRecord {
  sequence: number;
  entry: JournalEntry;
}
