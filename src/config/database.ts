import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { loadEnvironment } from './environment.js';
import { logger } from './logger.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS search_runs (
    id TEXT PRIMARY KEY,
    category TEXT NOT NULL,
    location TEXT NOT NULL,
    requested_limit INTEGER NOT NULL,
    executed_at TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'in_progress'
      CHECK (status IN ('in_progress', 'completed', 'partial', 'failed')),
    result_count INTEGER NOT NULL DEFAULT 0,
    qualified_count INTEGER NOT NULL DEFAULT 0,
    dropped_count INTEGER NOT NULL DEFAULT 0,
    failed_count INTEGER NOT NULL DEFAULT 0,
    completed_at TEXT,
    error_message TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_search_runs_executed_at ON search_runs (executed_at DESC);

  -- identity_key is UNIQUE so deduplication holds even if two writers race
  CREATE TABLE IF NOT EXISTS businesses (
    id TEXT PRIMARY KEY,
    identity_key TEXT NOT NULL UNIQUE,
    place_id TEXT,
    name TEXT NOT NULL,
    normalized_name TEXT NOT NULL,
    address TEXT,
    normalized_address TEXT,
    phone TEXT,
    category TEXT NOT NULL,
    location TEXT NOT NULL,
    rating REAL,
    review_count INTEGER,
    web_presence TEXT NOT NULL CHECK (web_presence IN ('none', 'social_only', 'has_website')),
    website TEXT,
    maps_url TEXT,
    latitude REAL,
    longitude REAL,
    primary_type TEXT,
    raw_payload TEXT NOT NULL,
    lead_score INTEGER NOT NULL CHECK (lead_score BETWEEN 0 AND 100),
    qualifies INTEGER NOT NULL DEFAULT 0,
    first_seen_at TEXT NOT NULL,
    last_seen_at TEXT NOT NULL,
    search_run_id TEXT NOT NULL REFERENCES search_runs (id)
  );

  CREATE INDEX IF NOT EXISTS idx_businesses_place_id ON businesses (place_id);
  CREATE INDEX IF NOT EXISTS idx_businesses_name_address ON businesses (normalized_name, normalized_address);
  CREATE INDEX IF NOT EXISTS idx_businesses_score ON businesses (lead_score DESC);

  CREATE TABLE IF NOT EXISTS score_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    business_id TEXT NOT NULL REFERENCES businesses (id),
    search_run_id TEXT REFERENCES search_runs (id),
    lead_score INTEGER NOT NULL,
    qualifies INTEGER NOT NULL,
    rating REAL,
    review_count INTEGER,
    web_presence TEXT NOT NULL,
    recorded_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_score_history_business ON score_history (business_id, recorded_at);
  CREATE INDEX IF NOT EXISTS idx_score_history_run ON score_history (search_run_id);
`;

/**
 * Open a SQLite database and apply the schema. Pass ':memory:' for a
 * throwaway database.
 */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ':memory:') {
    mkdirSync(dirname(filename), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 30000');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

let database: Database.Database | undefined;

export function getDatabase(): Database.Database {
  if (!database) {
    const { DATABASE_PATH } = loadEnvironment();
    database = openDatabase(DATABASE_PATH);
    logger.info(`[Database] SQLite connected: ${DATABASE_PATH}`);
  }
  return database;
}

export function closeDatabase(): void {
  if (database) {
    database.close();
    database = undefined;
  }
}
