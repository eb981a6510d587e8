import { Request, Response, NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import { AppError, LedgerRejectedError, ValidationError } from '../utils/errors';
import logger from '../utils/logger';
import { config } from '../config';

interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  stack?: string;
}

interface RenderedError {
  status: number;
  body: ErrorResponse;
}

// body-parser marks its failures with a `type` and an HTTP status
const BODY_PARSER_ERRORS: Record<string, { status: number; code: string; message: string }> = {
  'entity.parse.failed': {
    status: StatusCodes.BAD_REQUEST,
    code: 'INVALID_JSON',
    message: 'Request body is not valid JSON',
  },
  'entity.too.large': {
    status: StatusCodes.REQUEST_TOO_LONG,
    code: 'PAYLOAD_TOO_LARGE',
    message: 'Request body is too large',
  },
};

const bodyParserErrorOf = (err: Error) => {
  if (!('type' in err) || typeof err.type !== 'string') {
    return undefined;
  }
  return BODY_PARSER_ERRORS[err.type];
};

export const renderError = (err: Error): RenderedError => {
  if (err instanceof AppError) {
    const body: ErrorResponse = {
      success: false,
      error: { code: err.code, message: err.message },
    };

    if (err instanceof ValidationError && Object.keys(err.errors).length > 0) {
      body.error.details = { validationErrors: err.errors };
    }

    return { status: err.statusCode, body };
  }

  const bodyParserError = bodyParserErrorOf(err);
  if (bodyParserError) {
    return {
      status: bodyParserError.status,
      body: {
        success: false,
        error: { code: bodyParserError.code, message: bodyParserError.message },
      },
    };
  }

  return {
    status: StatusCodes.INTERNAL_SERVER_ERROR,
    body: {
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: config.env === 'production' ? 'An unexpected error occurred' : err.message,
      },
    },
  };
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const { status, body } = renderError(err);
  const context = {
    error: err.message,
    code: body.error.code,
    path: req.path,
    method: req.method,
    account: req.user?.account,
  };

  // Ledger rejections are expected outcomes, not faults
  if (err instanceof LedgerRejectedError) {
    logger.info('Ledger operation rejected', context);
  } else if (status < StatusCodes.INTERNAL_SERVER_ERROR) {
    logger.warn('Request rejected', context);
  } else {
    logger.error('Error occurred', { ...context, stack: err.stack });
  }

  if (config.env === 'development') {
    body.stack = err.stack;
  }

  res.status(status).json(body);
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  res.status(StatusCodes.NOT_FOUND).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
};
