import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const env = (name: string, fallback: string): string => process.env[name] || fallback;

const intEnv = (name: string, fallback: number): number =>
  parseInt(env(name, String(fallback)), 10);

const listEnv = (name: string, fallback: string): string[] =>
  env(name, fallback)
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

// POSTGRES_<ROLE>_HOST, POSTGRES_<ROLE>_PORT, ...
const postgres = (role: 'WRITE' | 'READ', database: string) => ({
  host: env(`POSTGRES_${role}_HOST`, 'localhost'),
  port: intEnv(`POSTGRES_${role}_PORT`, 5435),
  user: env(`POSTGRES_${role}_USER`, 'ledger'),
  password: env(`POSTGRES_${role}_PASSWORD`, 'ledger'),
  database: env(`POSTGRES_${role}_DB`, database),
});

export const config = {
  // Server
  env: env('NODE_ENV', 'development'),
  port: intEnv('PORT', 3002),
  host: env('HOST', '0.0.0.0'),
  corsOrigins: listEnv('CORS_ORIGINS', 'http://localhost:3000'),

  // Journal lives in the write database, projections in the read database
  writeDb: postgres('WRITE', 'ledger_write'),
  readDb: postgres('READ', 'ledger_read'),

  redis: {
    host: env('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD || undefined,
  },

  kafka: {
    brokers: listEnv('KAFKA_BROKERS', 'localhost:9092'),
    clientId: env('KAFKA_CLIENT_ID', 'ticket-ledger-service'),
    groupId: env('KAFKA_GROUP_ID', 'ticket-ledger-service-group'),
    topicPartitions: intEnv('KAFKA_TOPIC_PARTITIONS', 3),
    replicationFactor: intEnv('KAFKA_REPLICATION_FACTOR', 1),
  },

  jwt: {
    secret: env('JWT_SECRET', 'dev-secret-change-me'),
    issuer: env('JWT_ISSUER', 'ledger-auth'),
  },

  ledger: {
    treasuryAccount: env('LEDGER_TREASURY_ACCOUNT', 'treasury'),
    initialHeight: intEnv('LEDGER_INITIAL_HEIGHT', 0),
    accountsFile: path.resolve(process.cwd(), env('LEDGER_ACCOUNTS_FILE', 'data/accounts.json')),
  },

  logLevel: env('LOG_LEVEL', 'debug'),
} as const;

export type Config = typeof config;
