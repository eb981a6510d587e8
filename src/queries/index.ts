export { getOwnerTicketsHandler } from './getOwnerTickets';
export { getTicketDetailsHandler } from './getTicketDetails';
export { getEventDetailsHandler, getBatchQuoteHandler } from './getEventDetails';
export { getLedgerStatsHandler } from './getLedgerStats';
