export type AccountId = string;

// Event Entity (Write Model)
export interface LedgerEvent {
  id: number;
  name: string;
  description: string;
  venue: string;
  eventType: string;
  eventHeight: number;
  totalSupply: number;
  availableSupply: number;
  basePrice: number;
  creator: AccountId;
  active: boolean;
}

// Ticket Entity (Write Model)
export interface Ticket {
  id: number;
  eventId: number;
  owner: AccountId;
  pricePaid: number;
  purchaseHeight: number;
  used: boolean;
  transferable: boolean;
  seatInfo: string;
}

// Error kinds returned by ledger operations
export enum LedgerErrorKind {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_PARAMETERS = 'INVALID_PARAMETERS',
  EVENT_EXPIRED = 'EVENT_EXPIRED',
  EVENT_NOT_ACTIVE = 'EVENT_NOT_ACTIVE',
  SOLD_OUT = 'SOLD_OUT',
  INSUFFICIENT_PAYMENT = 'INSUFFICIENT_PAYMENT',
  NOT_TICKET_OWNER = 'NOT_TICKET_OWNER',
  TRANSFER_NOT_ALLOWED = 'TRANSFER_NOT_ALLOWED',
  PAYMENT_FAILED = 'PAYMENT_FAILED',
}

export interface LedgerError {
  kind: LedgerErrorKind;
  message: string;
}

export type LedgerResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LedgerError };

// Command DTOs
export interface CreateEventCommand {
  name: string;
  description: string;
  venue: string;
  eventType: string;
  eventDate: number;
  totalTickets: number;
  basePrice: number;
}

export interface PurchaseTicketCommand {
  eventId: number;
  seatInfo: string;
}

export interface BatchPurchaseTicketsCommand {
  eventId: number;
  quantity: number;
  seatInfos: string[];
  applyGroupDiscount: boolean;
}

export interface TransferTicketCommand {
  ticketId: number;
  newOwner: AccountId;
}

export interface AdvanceHeightCommand {
  height: number;
}

// Command results
export interface PurchaseReceipt {
  ticketId: number;
  pricePaid: number;
  fee: number;
  totalPaid: number;
}

export interface BatchPurchaseReceipt {
  firstTicketId: number;
  quantity: number;
  totalPaid: number;
  discountRate: number;
}

export interface TransferReceipt {
  ticketId: number;
  eventId: number;
  previousOwner: AccountId;
  newOwner: AccountId;
}

// Pricing views
export interface PriceQuote {
  eventId: number;
  sold: number;
  demandMultiplier: number;
  unitPrice: number;
  fee: number;
  total: number;
}

export interface BatchQuote {
  eventId: number;
  quantity: number;
  unitPrice: number;
  discountRate: number;
  discountedUnitPrice: number;
  subtotal: number;
  fee: number;
  total: number;
}

export interface LedgerStats {
  nextEventId: number;
  nextTicketId: number;
  totalPlatformRevenue: number;
  eventCount: number;
  ticketCount: number;
  currentHeight: number;
}

export interface LedgerSnapshot {
  events: LedgerEvent[];
  tickets: Ticket[];
  nextEventId: number;
  nextTicketId: number;
  totalPlatformRevenue: number;
}

// Ticket View (Read Model)
export interface TicketView {
  id: number;
  eventId: number;
  eventName: string | null;
  venue: string | null;
  eventHeight: number | null;
  owner: AccountId;
  pricePaid: number;
  purchaseHeight: number;
  seatInfo: string;
  used: boolean;
  transferable: boolean;
  createdAt: Date;
}

// Query DTOs
export interface GetOwnerTicketsQuery {
  owner: AccountId;
  eventId?: number;
  page?: number;
  limit?: number;
}

export interface GetTicketDetailsQuery {
  ticketId: number;
  caller: AccountId;
}

export interface GetEventDetailsQuery {
  eventId: number;
}

export interface GetBatchQuoteQuery {
  eventId: number;
  quantity: number;
  applyGroupDiscount: boolean;
}

// Paginated Response
export interface PaginatedResult<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}
