import { Server } from 'http';
import { config } from './config';
import { createApp } from './app';
import logger from './utils/logger';
import writeDb from './infrastructure/database/writeDb';
import readDb from './infrastructure/database/readDb';
import ledgerJournal from './infrastructure/database/journal';
import redis from './infrastructure/cache/redis';
import { disconnectKafka, createTopics, KAFKA_TOPICS, createConsumer } from './infrastructure/messaging/kafka';
import ledgerProjector from './projections/ledgerProjector';
import { getLedgerRuntime } from './ledger/runtime';
import { replayJournal } from './ledger/replay';

const ENDPOINTS = [
  'POST /api/ledger/commands/events',
  'POST /api/ledger/commands/purchase',
  'POST /api/ledger/commands/batch-purchase',
  'POST /api/ledger/commands/transfer',
  'POST /api/ledger/commands/height',
  'GET  /api/ledger/queries/events/:eventId',
  'GET  /api/ledger/queries/events/:eventId/batch-quote',
  'GET  /api/ledger/queries/my-tickets',
  'GET  /api/ledger/queries/tickets/:ticketId',
  'GET  /api/ledger/queries/stats',
  'GET  /api/health',
  'GET  /api/health/ready',
  'GET  /api/health/live',
];

let server: Server | null = null;

/**
 * Rebuild the in-memory ledger from the journal before any command is served.
 */
const restoreLedger = async (): Promise<void> => {
  const { engine, clock } = getLedgerRuntime();
  const records = await ledgerJournal.load();
  const replayed = replayJournal(engine, clock, records);
  ledgerJournal.resume(records);

  logger.info('Ledger restored from journal', {
    entries: replayed,
    ...engine.getStats(),
  });
};

const gracefulShutdown = async (signal: string): Promise<void> => {
  logger.info(`${signal} received, starting graceful shutdown...`);

  try {
    if (server) {
      const closing = server;
      await new Promise<void>((resolve, reject) => {
        closing.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info('HTTP server closed');
    }

    await disconnectKafka();
    await redis.close();

    // Journal inserts still in flight finish before the pool drains
    await writeDb.close();
    await readDb.close();
    logger.info('Database connections closed');

    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', error);
    process.exit(1);
  }
};

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

const startServer = async (): Promise<void> => {
  try {
    logger.info('Creating Kafka topics...');
    await createTopics([KAFKA_TOPICS.LEDGER_EVENTS]);

    logger.info('Replaying ledger journal...');
    await restoreLedger();

    logger.info('Starting ledger projector consumer...');
    await createConsumer(
      `${config.kafka.groupId}-projector`,
      [KAFKA_TOPICS.LEDGER_EVENTS],
      ledgerProjector.processMessage
    );

    const app = createApp();
    server = app.listen(config.port, config.host, () => {
      logger.info('🚀 Ticket Ledger Service started', {
        port: config.port,
        host: config.host,
        env: config.env,
      });
      logger.info('📖 API Endpoints:');
      ENDPOINTS.forEach((endpoint) => logger.info(`   ${endpoint}`));
    });
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
};

void startServer();
