import { getLedgerRuntime } from '../ledger/runtime';
import { isPurchasable } from '../ledger/validation';
import {
  BatchQuote,
  GetBatchQuoteQuery,
  GetEventDetailsQuery,
  LedgerErrorKind,
  LedgerEvent,
  PriceQuote,
} from '../models/ledger';
import { toAppError } from '../utils/errors';
import logger from '../utils/logger';

export interface EventDetails {
  event: LedgerEvent;
  quote: PriceQuote;
  purchasable: boolean;
}

/**
 * Live event state and price, read straight from the ledger rather than the
 * projected read model so the quote matches what a purchase would charge.
 */
export const getEventDetailsHandler = async (
  query: GetEventDetailsQuery
): Promise<EventDetails> => {
  const { engine, clock } = getLedgerRuntime();
  const event = engine.getEvent(query.eventId);

  if (!event) {
    throw toAppError({ kind: LedgerErrorKind.NOT_FOUND, message: `Event ${query.eventId} not found` });
  }

  const quote = engine.quoteEvent(event.id);
  if (!quote.ok) {
    throw toAppError(quote.error);
  }

  logger.debug('GetEventDetails query executed', { eventId: event.id, unitPrice: quote.value.unitPrice });

  return {
    event,
    quote: quote.value,
    purchasable: isPurchasable(event, clock.currentHeight()),
  };
};

export const getBatchQuoteHandler = async (query: GetBatchQuoteQuery): Promise<BatchQuote> => {
  const { engine } = getLedgerRuntime();
  const result = engine.quoteBatch(query.eventId, query.quantity, query.applyGroupDiscount);

  if (!result.ok) {
    throw toAppError(result.error);
  }
  return result.value;
};

export default getEventDetailsHandler;
