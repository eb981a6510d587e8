import { Router, Request, Response, NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import { authenticate, callerOf } from '../middleware/auth';
import { validate, schemas } from '../middleware/validate';
import {
  getOwnerTicketsHandler,
  getTicketDetailsHandler,
  getEventDetailsHandler,
  getBatchQuoteHandler,
  getLedgerStatsHandler,
} from '../queries';

const router = Router();

/**
 * GET /ledger/queries/events/:eventId
 * Event state with its live price quote
 */
router.get(
  '/events/:eventId',
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { eventId } = validate(schemas.eventParams, req.params);
      const details = await getEventDetailsHandler({ eventId });

      res.status(StatusCodes.OK).json({
        success: true,
        data: details,
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * GET /ledger/queries/events/:eventId/batch-quote
 * Price a batch purchase without making it
 */
router.get(
  '/events/:eventId/batch-quote',
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { eventId } = validate(schemas.eventParams, req.params);
      const { quantity, applyGroupDiscount } = validate(schemas.batchQuote, req.query);
      const quote = await getBatchQuoteHandler({ eventId, quantity, applyGroupDiscount });

      res.status(StatusCodes.OK).json({
        success: true,
        data: quote,
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * GET /ledger/queries/my-tickets
 * Current caller's tickets, optionally for one event
 */
router.get(
  '/my-tickets',
  authenticate,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = validate(schemas.getOwnerTickets, req.query);
      const result = await getOwnerTicketsHandler({ owner: callerOf(req), ...filters });

      res.status(StatusCodes.OK).json({
        success: true,
        data: result.data,
        pagination: {
          page: result.page,
          limit: result.limit,
          total: result.total,
          totalPages: result.totalPages,
        },
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * GET /ledger/queries/tickets/:ticketId
 * One of the caller's tickets
 */
router.get(
  '/tickets/:ticketId',
  authenticate,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { ticketId } = validate(schemas.ticketParams, req.params);
      const ticket = await getTicketDetailsHandler({ ticketId, caller: callerOf(req) });

      res.status(StatusCodes.OK).json({
        success: true,
        data: ticket,
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * GET /ledger/queries/stats
 * Counters and accrued platform revenue
 */
router.get(
  '/stats',
  async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await getLedgerStatsHandler();

      res.status(StatusCodes.OK).json({
        success: true,
        data: stats,
      });
    } catch (error) {
      next(error);
    }
  }
);

export default router;
