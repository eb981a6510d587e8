export { createEventHandler } from './createEvent';
export { purchaseTicketHandler } from './purchaseTicket';
export { batchPurchaseTicketsHandler } from './batchPurchaseTickets';
export { transferTicketHandler } from './transferTicket';
export { advanceHeightHandler } from './advanceHeight';
