import { z } from 'zod';
import { TicketView } from '../models/ledger';

// Shape of a cached ticket view; dates come back from JSON as strings
export const ticketViewSchema = z.object({
  id: z.number().int(),
  eventId: z.number().int(),
  eventName: z.string().nullable(),
  venue: z.string().nullable(),
  eventHeight: z.number().int().nullable(),
  owner: z.string(),
  pricePaid: z.number().int(),
  purchaseHeight: z.number().int(),
  seatInfo: z.string(),
  used: z.boolean(),
  transferable: z.boolean(),
  createdAt: z.coerce.date(),
});

export const ticketViewPageSchema = z.object({
  data: z.array(ticketViewSchema),
  total: z.number().int(),
  page: z.number().int(),
  limit: z.number().int(),
  totalPages: z.number().int(),
});

export const TICKET_VIEW_COLUMNS = `
  t.id, t.event_id, e.name AS event_name, e.venue, e.event_height,
  t.owner, t.price_paid, t.purchase_height, t.seat_info,
  t.used, t.transferable, t.created_at
`;

// BIGINT columns arrive from pg as strings
export interface TicketViewRow {
  id: string;
  event_id: string;
  event_name: string | null;
  venue: string | null;
  event_height: string | null;
  owner: string;
  price_paid: string;
  purchase_height: string;
  seat_info: string;
  used: boolean;
  transferable: boolean;
  created_at: string;
}

export function mapRowToTicketView(row: TicketViewRow): TicketView {
  return {
    id: parseInt(row.id, 10),
    eventId: parseInt(row.event_id, 10),
    eventName: row.event_name,
    venue: row.venue,
    eventHeight: row.event_height === null ? null : parseInt(row.event_height, 10),
    owner: row.owner,
    pricePaid: parseInt(row.price_paid, 10),
    purchaseHeight: parseInt(row.purchase_height, 10),
    seatInfo: row.seat_info,
    used: row.used,
    transferable: row.transferable,
    createdAt: new Date(row.created_at),
  };
}
