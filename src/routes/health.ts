import { Router, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import writeDb from '../infrastructure/database/writeDb';
import readDb from '../infrastructure/database/readDb';
import redis from '../infrastructure/cache/redis';
import { journalHalt } from '../commands/journaling';
import { getLedgerRuntime } from '../ledger/runtime';
import logger from '../utils/logger';

const router = Router();

const SERVICE_NAME = 'ticket-ledger-service';

interface HealthCheck {
  name: string;
  status: 'pass' | 'fail';
  message?: string;
  latency?: number;
}

interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  service: string;
  version: string;
  ledger: {
    height: number;
    events: number;
    tickets: number;
  };
  checks: HealthCheck[];
}

const runCheck = async (name: string, probe: () => Promise<void>): Promise<HealthCheck> => {
  const start = Date.now();
  try {
    await probe();
    return { name, status: 'pass', latency: Date.now() - start };
  } catch (error) {
    return {
      name,
      status: 'fail',
      message: error instanceof Error ? error.message : 'Unknown error',
    };
  }
};

/**
 * GET /health
 * Basic health check
 */
router.get('/', (_req: Request, res: Response) => {
  res.status(StatusCodes.OK).json({
    status: 'healthy',
    service: SERVICE_NAME,
    timestamp: new Date().toISOString(),
  });
});

/**
 * GET /health/live
 * Liveness probe; the ledger lives in this process
 */
router.get('/live', (_req: Request, res: Response) => {
  res.status(StatusCodes.OK).json({
    status: 'alive',
    height: getLedgerRuntime().clock.currentHeight(),
    timestamp: new Date().toISOString(),
  });
});

/**
 * GET /health/ready
 * Readiness probe. Commands need the journal database; the read database and
 * cache only back queries, so losing them degrades rather than fails.
 */
router.get('/ready', async (_req: Request, res: Response) => {
  const [journal, readModel, cache] = await Promise.all([
    runCheck('journal-database', async () => {
      const halt = journalHalt();
      if (halt) {
        throw new Error(`Journal halted at sequence ${halt.sequence}: ${halt.reason}`);
      }
      await writeDb.query('SELECT 1');
    }),
    runCheck('read-database', async () => {
      await readDb.query('SELECT 1');
    }),
    runCheck('cache', async () => {
      if (!(await redis.ping())) {
        throw new Error('Redis did not answer PING');
      }
    }),
  ]);

  const stats = getLedgerRuntime().engine.getStats();
  const healthStatus: HealthStatus = {
    status:
      journal.status === 'fail'
        ? 'unhealthy'
        : readModel.status === 'fail' || cache.status === 'fail'
          ? 'degraded'
          : 'healthy',
    timestamp: new Date().toISOString(),
    service: SERVICE_NAME,
    version: process.env.npm_package_version || '1.0.0',
    ledger: {
      height: stats.currentHeight,
      events: stats.eventCount,
      tickets: stats.ticketCount,
    },
    checks: [journal, readModel, cache],
  };

  if (healthStatus.status !== 'healthy') {
    logger.warn('Health check failed', healthStatus);
  }

  res
    .status(healthStatus.status === 'unhealthy' ? StatusCodes.SERVICE_UNAVAILABLE : StatusCodes.OK)
    .json(healthStatus);
});

export default router;
