import winston from 'winston';
import { config } from '../config';

const isProduction = config.env === 'production';

const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.env === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: 'ticket-ledger-service',
    environment: config.env,
  },
  transports: [
    new winston.transports.Console({
      format: isProduction
        ? winston.format.json()
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ level, message, timestamp, service, environment: _environment, ...meta }) => {
              const metaStr = Object.keys(meta).length > 0
                ? ` ${JSON.stringify(meta)}`
                : '';
              return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
            })
          ),
    }),
  ],
  exitOnError: false,
});

export default logger;
