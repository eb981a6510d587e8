import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { config } from './config';
import routes from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import logger from './utils/logger';

const rateLimitExceeded = {
  success: false,
  error: {
    code: 'RATE_LIMIT_EXCEEDED',
    message: 'Too many requests, please try again later',
  },
};

/**
 * Express application with the ledger routes mounted under /api.
 */
export const createApp = (): Application => {
  const app = express();

  // Behind one load balancer hop; rate limits key on the client address
  app.set('trust proxy', 1);

  app.use(helmet());
  app.use(cors({
    origin: config.env === 'production' ? config.corsOrigins : '*',
    credentials: true,
  }));

  app.use(express.json({ limit: '10kb' }));
  app.use(compression());

  app.use(morgan('combined', {
    stream: {
      write: (message: string) => logger.http(message.trim()),
    },
  }));

  app.use('/api', rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 300,
    message: rateLimitExceeded,
    standardHeaders: true,
    legacyHeaders: false,
  }));

  // Every ledger write goes through the single writer, so commands get a tighter budget
  app.use('/api/ledger/commands', rateLimit({
    windowMs: 60 * 1000,
    max: 30,
    message: rateLimitExceeded,
    standardHeaders: true,
    legacyHeaders: false,
  }));

  app.use('/api', routes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createApp;
