import { createClient } from 'redis';
import { ZodType, ZodTypeDef } from 'zod';
import { config } from '../../config';
import logger from '../../utils/logger';

const SCAN_BATCH_SIZE = 100;

const buildClient = () =>
  createClient({
    socket: {
      host: config.redis.host,
      port: config.redis.port,
    },
    password: config.redis.password,
  });

type CacheClient = ReturnType<typeof buildClient>;

let client: CacheClient | null = null;
let connecting: Promise<CacheClient> | null = null;

const connect = async (): Promise<CacheClient> => {
  const next = buildClient();

  next.on('error', (err) => {
    logger.error('Redis Client Error', err);
  });

  next.on('ready', () => {
    logger.info('Redis Client Ready');
  });

  await next.connect();
  client = next;
  return next;
};

/**
 * Shared client; concurrent callers during the first connect wait on the
 * same attempt.
 */
export const getRedisClient = (): Promise<CacheClient> => {
  if (client && client.isOpen) {
    return Promise.resolve(client);
  }
  if (!connecting) {
    connecting = connect().finally(() => {
      connecting = null;
    });
  }
  return connecting;
};

/**
 * Read-model cache. Every method degrades to a miss or a no-op when Redis is
 * unavailable, so queries fall through to the read database.
 */
export const redis = {
  /**
   * Cached value checked against `schema`; entries that no longer match are
   * dropped and reported as a miss.
   */
  get: async <T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> => {
    try {
      const redisClient = await getRedisClient();
      const raw = await redisClient.get(key);
      if (raw === null) {
        return null;
      }

      const parsed = schema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        logger.warn('Dropping stale cache entry', { key });
        await redisClient.del(key);
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.error('Redis GET error', { key, error });
      return null;
    }
  },

  set: async <T>(key: string, value: T, ttlSeconds: number): Promise<void> => {
    try {
      const redisClient = await getRedisClient();
      await redisClient.setEx(key, ttlSeconds, JSON.stringify(value));
    } catch (error) {
      logger.error('Redis SET error', { key, error });
    }
  },

  del: async (key: string): Promise<void> => {
    try {
      const redisClient = await getRedisClient();
      await redisClient.del(key);
    } catch (error) {
      logger.error('Redis DEL error', { key, error });
    }
  },

  // SCAN rather than KEYS so a large keyspace does not block the server
  delPattern: async (pattern: string): Promise<void> => {
    try {
      const redisClient = await getRedisClient();
      const keys: string[] = [];
      for await (const key of redisClient.scanIterator({ MATCH: pattern, COUNT: SCAN_BATCH_SIZE })) {
        keys.push(key);
      }
      if (keys.length > 0) {
        await redisClient.del(keys);
      }
    } catch (error) {
      logger.error('Redis DEL pattern error', { pattern, error });
    }
  },

  ping: async (): Promise<boolean> => {
    try {
      const redisClient = await getRedisClient();
      return (await redisClient.ping()) === 'PONG';
    } catch (error) {
      logger.error('Redis PING error', { error });
      return false;
    }
  },

  close: async (): Promise<void> => {
    if (client && client.isOpen) {
      await client.quit();
      logger.info('Redis connection closed');
    }
    client = null;
  },
};

export default redis;

export interface OwnerTicketsPageKey {
  owner: string;
  eventId?: number;
  page: number;
  limit: number;
}

export const cacheKeys = {
  ownerTicketsPage: ({ owner, eventId, page, limit }: OwnerTicketsPageKey) =>
    `owner:${owner}:tickets:event:${eventId ?? 'all'}:page:${page}:limit:${limit}`,
  // Matches every cached page of one owner's tickets
  ownerTicketsPattern: (owner: string) => `owner:${owner}:tickets:*`,
  ticketDetails: (ticketId: number) => `ticket:${ticketId}`,
};
