import readDb from '../infrastructure/database/readDb';
import redis, { cacheKeys } from '../infrastructure/cache/redis';
import { GetOwnerTicketsQuery, PaginatedResult, TicketView } from '../models/ledger';
import { BadRequestError } from '../utils/errors';
import logger from '../utils/logger';
import {
  TicketViewRow,
  TICKET_VIEW_COLUMNS,
  mapRowToTicketView,
  ticketViewPageSchema,
} from './ticketView';

const DEFAULT_PAGE = 1;
const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;
const CACHE_TTL_SECONDS = 60; // 1 minute cache

export const getOwnerTicketsHandler = async (
  query: GetOwnerTicketsQuery
): Promise<PaginatedResult<TicketView>> => {
  logger.info('Executing GetOwnerTickets query', { query });

  validateQuery(query);

  const page = query.page || DEFAULT_PAGE;
  const limit = Math.min(query.limit || DEFAULT_LIMIT, MAX_LIMIT);
  const offset = (page - 1) * limit;
  const cacheKey = cacheKeys.ownerTicketsPage({ owner: query.owner, eventId: query.eventId, page, limit });

  const cached = await redis.get(cacheKey, ticketViewPageSchema);
  if (cached) {
    logger.debug('Cache hit for owner tickets', { owner: query.owner });
    return cached;
  }

  const filters = ['t.owner = $1'];
  const params: unknown[] = [query.owner];

  if (query.eventId !== undefined) {
    params.push(query.eventId);
    filters.push(`t.event_id = $${params.length}`);
  }

  const where = filters.join(' AND ');

  const countResult = await readDb.queryOne<{ count: string }>(
    `SELECT COUNT(*) FROM tickets_view t WHERE ${where}`,
    params
  );
  const total = parseInt(countResult?.count || '0', 10);

  const rows = await readDb.query<TicketViewRow>(
    `SELECT ${TICKET_VIEW_COLUMNS}
     FROM tickets_view t
     LEFT JOIN events_view e ON e.id = t.event_id
     WHERE ${where}
     ORDER BY t.id DESC
     LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
    [...params, limit, offset]
  );

  const result: PaginatedResult<TicketView> = {
    data: rows.map(mapRowToTicketView),
    total,
    page,
    limit,
    totalPages: Math.ceil(total / limit),
  };

  await redis.set(cacheKey, result, CACHE_TTL_SECONDS);

  logger.info('GetOwnerTickets query executed', {
    owner: query.owner,
    total,
    returned: result.data.length,
  });

  return result;
};

function validateQuery(query: GetOwnerTicketsQuery): void {
  if (!query.owner) {
    throw new BadRequestError('owner is required');
  }
  if (query.page !== undefined && query.page < 1) {
    throw new BadRequestError('page must be at least 1');
  }
  if (query.limit !== undefined && query.limit < 1) {
    throw new BadRequestError('limit must be at least 1');
  }
}

export default getOwnerTicketsHandler;
