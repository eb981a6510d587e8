import { Router, Request, Response, NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import { v4 as uuidv4 } from 'uuid';
import { authenticate, authorize, callerOf } from '../middleware/auth';
import { validate, schemas } from '../middleware/validate';
import {
  createEventHandler,
  purchaseTicketHandler,
  batchPurchaseTicketsHandler,
  transferTicketHandler,
  advanceHeightHandler,
} from '../commands';

const router = Router();

const correlationIdOf = (req: Request): string => req.get('x-correlation-id') || uuidv4();

/**
 * POST /ledger/commands/events
 * Create an event with a fixed ticket supply and base price
 */
router.post(
  '/events',
  authenticate,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const correlationId = correlationIdOf(req);
      const body = validate(schemas.createEvent, req.body);

      const result = await createEventHandler(callerOf(req), body, correlationId);

      res.status(StatusCodes.CREATED).json({
        success: true,
        data: result.event,
        meta: { correlationId },
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * POST /ledger/commands/purchase
 * Buy one ticket at the current demand price
 */
router.post(
  '/purchase',
  authenticate,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const correlationId = correlationIdOf(req);
      const body = validate(schemas.purchaseTicket, req.body);

      const result = await purchaseTicketHandler(callerOf(req), body, correlationId);

      res.status(StatusCodes.CREATED).json({
        success: true,
        data: result,
        meta: { correlationId },
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * POST /ledger/commands/batch-purchase
 * Buy up to ten tickets at one frozen unit price, optionally with a group discount
 */
router.post(
  '/batch-purchase',
  authenticate,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const correlationId = correlationIdOf(req);
      const body = validate(schemas.batchPurchaseTickets, req.body);

      const result = await batchPurchaseTicketsHandler(callerOf(req), body, correlationId);

      res.status(StatusCodes.CREATED).json({
        success: true,
        data: result,
        meta: { correlationId },
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * POST /ledger/commands/transfer
 * Hand a ticket to another account
 */
router.post(
  '/transfer',
  authenticate,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const correlationId = correlationIdOf(req);
      const body = validate(schemas.transferTicket, req.body);

      const receipt = await transferTicketHandler(callerOf(req), body, correlationId);

      res.status(StatusCodes.OK).json({
        success: true,
        data: receipt,
        meta: { correlationId },
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * POST /ledger/commands/height
 * Advance the logical height the ledger runs at (admin only)
 */
router.post(
  '/height',
  authenticate,
  authorize('ADMIN'),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validate(schemas.advanceHeight, req.body);

      const result = await advanceHeightHandler(callerOf(req), body);

      res.status(StatusCodes.OK).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }
);

export default router;
