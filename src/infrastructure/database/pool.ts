import { Pool } from 'pg';
import logger from '../../utils/logger';

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface Database {
  query: <T>(text: string, params?: unknown[]) => Promise<T[]>;
  queryOne: <T>(text: string, params?: unknown[]) => Promise<T | null>;
  pool: Pool;
  close: () => Promise<void>;
}

export const createDatabase = (label: string, dbConfig: DatabaseConfig, maxConnections: number): Database => {
  const pool = new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    user: dbConfig.user,
    password: dbConfig.password,
    database: dbConfig.database,
    max: maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('connect', () => {
    logger.debug(`New client connected to ${label}`);
  });

  pool.on('error', (err) => {
    logger.error(`Unexpected error on ${label} idle client`, err);
  });

  const query = async <T>(text: string, params?: unknown[]): Promise<T[]> => {
    const start = Date.now();
    try {
      const result = await pool.query(text, params);
      const duration = Date.now() - start;
      logger.debug('Executed query', { db: label, text: text.substring(0, 100), duration, rows: result.rowCount });
      return result.rows as T[];
    } catch (error) {
      logger.error('Query error', { db: label, text: text.substring(0, 100), error });
      throw error;
    }
  };

  return {
    query,

    queryOne: async <T>(text: string, params?: unknown[]): Promise<T | null> => {
      const rows = await query<T>(text, params);
      return rows[0] ?? null;
    },

    pool,

    close: async (): Promise<void> => {
      await pool.end();
      logger.info(`${label} pool closed`);
    },
  };
};
