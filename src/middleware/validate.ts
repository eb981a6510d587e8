import { z, ZodError, ZodTypeAny } from 'zod';
import { ValidationError } from '../utils/errors';
import { MAX_AMOUNT } from '../ledger/validation';

/**
 * Parse request input against a Zod schema, raising a ValidationError that
 * lists the messages per field path.
 */
export const validate = <S extends ZodTypeAny>(schema: S, data: unknown): z.infer<S> => {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const validationErrors: Record<string, string[]> = {};

      error.errors.forEach((err) => {
        const path = err.path.join('.') || '_';
        if (!validationErrors[path]) {
          validationErrors[path] = [];
        }
        validationErrors[path].push(err.message);
      });

      throw new ValidationError('Validation failed', validationErrors);
    }
    throw error;
  }
};

const account = z.string().trim().min(1, 'Account is required').max(128);
const ledgerId = z.coerce.number().int().positive();
const amount = z.number().int().positive().max(MAX_AMOUNT);
const height = z.number().int().nonnegative();
const seatInfo = z.string().max(50);

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const schemas = {
  // Command bodies
  createEvent: z.object({
    name: z.string().min(1).max(100),
    description: z.string().max(500),
    venue: z.string().min(1).max(100),
    eventType: z.string().min(1).max(50),
    eventDate: height,
    totalTickets: amount,
    basePrice: amount,
  }),

  purchaseTicket: z.object({
    eventId: ledgerId,
    seatInfo,
  }),

  // Quantity range and seat count are ledger rules; the engine checks them in
  // its own order, after the event lookup and activity check.
  batchPurchaseTickets: z.object({
    eventId: ledgerId,
    quantity: z.number().int(),
    seatInfos: z.array(seatInfo),
    applyGroupDiscount: z.boolean().default(false),
  }),

  transferTicket: z.object({
    ticketId: ledgerId,
    newOwner: account,
  }),

  advanceHeight: z.object({
    height,
  }),

  // Query strings and params
  eventParams: z.object({
    eventId: ledgerId,
  }),

  ticketParams: z.object({
    ticketId: ledgerId,
  }),

  batchQuote: z.object({
    quantity: z.coerce.number().int(),
    applyGroupDiscount: booleanFlag,
  }),

  getOwnerTickets: z.object({
    eventId: ledgerId.optional(),
    page: z.coerce.number().int().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(100).optional(),
  }),
};

export default validate;
