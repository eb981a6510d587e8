import readDb from '../infrastructure/database/readDb';
import redis, { cacheKeys } from '../infrastructure/cache/redis';
import { GetTicketDetailsQuery, TicketView } from '../models/ledger';
import { BadRequestError, ForbiddenError, TicketNotFoundError } from '../utils/errors';
import logger from '../utils/logger';
import {
  TicketViewRow,
  TICKET_VIEW_COLUMNS,
  mapRowToTicketView,
  ticketViewSchema,
} from './ticketView';

const CACHE_TTL_SECONDS = 300; // 5 minutes cache

export const getTicketDetailsHandler = async (
  query: GetTicketDetailsQuery
): Promise<TicketView> => {
  logger.info('Executing GetTicketDetails query', { query });

  validateQuery(query);

  const cacheKey = cacheKeys.ticketDetails(query.ticketId);
  const cached = await redis.get(cacheKey, ticketViewSchema);

  if (cached) {
    if (cached.owner !== query.caller) {
      throw new ForbiddenError('You are not authorized to view this ticket');
    }
    logger.debug('Cache hit for ticket details', { ticketId: query.ticketId });
    return cached;
  }

  const row = await readDb.queryOne<TicketViewRow>(
    `SELECT ${TICKET_VIEW_COLUMNS}
     FROM tickets_view t
     LEFT JOIN events_view e ON e.id = t.event_id
     WHERE t.id = $1`,
    [query.ticketId]
  );

  if (!row) {
    throw new TicketNotFoundError(query.ticketId);
  }

  if (row.owner !== query.caller) {
    throw new ForbiddenError('You are not authorized to view this ticket');
  }

  const ticket = mapRowToTicketView(row);

  await redis.set(cacheKey, ticket, CACHE_TTL_SECONDS);

  logger.info('GetTicketDetails query executed', { ticketId: query.ticketId });

  return ticket;
};

function validateQuery(query: GetTicketDetailsQuery): void {
  if (!Number.isInteger(query.ticketId) || query.ticketId < 1) {
    throw new BadRequestError('ticketId must be a positive integer');
  }
  if (!query.caller) {
    throw new BadRequestError('caller is required');
  }
}

export default getTicketDetailsHandler;
