import { Pool } from 'pg';
import { config } from '../../config';
import { DatabaseConfig } from './pool';

// Write Database Schema
const writeDbSchema = `
-- Ledger journal: every committed operation, in commit order
CREATE TABLE IF NOT EXISTS ledger_journal (
    sequence BIGINT PRIMARY KEY,
    operation VARCHAR(40) NOT NULL,
    caller VARCHAR(128) NOT NULL,
    height BIGINT NOT NULL,
    payload JSONB NOT NULL,
    recorded_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_ledger_journal_operation ON ledger_journal(operation);
CREATE INDEX IF NOT EXISTS idx_ledger_journal_caller ON ledger_journal(caller);
`;

// Read Database Schema (CQRS Read Model)
const readDbSchema = `
CREATE TABLE IF NOT EXISTS events_view (
    id BIGINT PRIMARY KEY,
    name VARCHAR(100) NOT NULL,
    description VARCHAR(500) NOT NULL,
    venue VARCHAR(100) NOT NULL,
    event_type VARCHAR(50) NOT NULL,
    event_height BIGINT NOT NULL,
    total_supply BIGINT NOT NULL,
    available_supply BIGINT NOT NULL,
    base_price BIGINT NOT NULL,
    creator VARCHAR(128) NOT NULL,
    active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS tickets_view (
    id BIGINT PRIMARY KEY,
    event_id BIGINT NOT NULL,
    owner VARCHAR(128) NOT NULL,
    price_paid BIGINT NOT NULL,
    purchase_height BIGINT NOT NULL,
    seat_info VARCHAR(50) NOT NULL,
    used BOOLEAN NOT NULL DEFAULT FALSE,
    transferable BOOLEAN NOT NULL DEFAULT TRUE,
    last_sequence BIGINT NOT NULL DEFAULT 0,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_tickets_view_owner ON tickets_view(owner);
CREATE INDEX IF NOT EXISTS idx_tickets_view_owner_event ON tickets_view(owner, event_id);

-- Projection tracking (to track which events have been processed)
CREATE TABLE IF NOT EXISTS projection_checkpoints (
    projection_name VARCHAR(100) PRIMARY KEY,
    last_processed_event_id UUID,
    last_processed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE OR REPLACE FUNCTION update_updated_at_column()
RETURNS TRIGGER AS $$
BEGIN
    NEW.updated_at = CURRENT_TIMESTAMP;
    RETURN NEW;
END;
$$ language 'plpgsql';

DROP TRIGGER IF EXISTS update_events_view_updated_at ON events_view;
CREATE TRIGGER update_events_view_updated_at
    BEFORE UPDATE ON events_view
    FOR EACH ROW
    EXECUTE FUNCTION update_updated_at_column();

DROP TRIGGER IF EXISTS update_tickets_view_updated_at ON tickets_view;
CREATE TRIGGER update_tickets_view_updated_at
    BEFORE UPDATE ON tickets_view
    FOR EACH ROW
    EXECUTE FUNCTION update_updated_at_column();
`;

const connect = (dbConfig: DatabaseConfig, database: string): Pool =>
  new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    user: dbConfig.user,
    password: dbConfig.password,
    database,
  });

async function createDatabase(dbConfig: DatabaseConfig): Promise<void> {
  // Connect to default database first
  const pool = connect(dbConfig, 'postgres');

  try {
    const result = await pool.query(
      `SELECT 1 FROM pg_database WHERE datname = $1`,
      [dbConfig.database]
    );

    if (result.rows.length === 0) {
      await pool.query(`CREATE DATABASE ${dbConfig.database}`);
      console.log(`Database ${dbConfig.database} created successfully`);
    } else {
      console.log(`Database ${dbConfig.database} already exists`);
    }
  } finally {
    await pool.end();
  }
}

async function runMigration(dbConfig: DatabaseConfig, schema: string, dbType: string): Promise<void> {
  const pool = connect(dbConfig, dbConfig.database);

  try {
    await pool.query(schema);
    console.log(`${dbType} database migration completed successfully`);
  } finally {
    await pool.end();
  }
}

async function migrate(): Promise<void> {
  console.log('Starting database migrations...\n');

  try {
    await createDatabase(config.writeDb);
    await createDatabase(config.readDb);

    await runMigration(config.writeDb, writeDbSchema, 'Write');
    await runMigration(config.readDb, readDbSchema, 'Read');

    console.log('\nAll migrations completed successfully');
  } catch (error) {
    console.error('\nMigration failed:', error);
    process.exit(1);
  }
}

void migrate();
