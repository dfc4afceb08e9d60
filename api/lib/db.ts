import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from './config';
import { createLogger } from './logger';

const log = createLogger('DB');

let db: Database.Database | null = null;

export interface OpenDbOptions {
  /** How long a connection waits on another process's write lock */
  busyTimeoutMs?: number;
}

function ensureDataDir(file: string): void {
  if (file === ':memory:') return;
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Create the tables if they do not exist yet.
 *
 * queue.seq is the FIFO tie-breaker inside a priority tier; running has a
 * unique index on id so a simulation can be bound to at most one simulator.
 */
export function createSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS simulation (
      id          TEXT PRIMARY KEY,
      topology    TEXT NOT NULL,
      destination INTEGER NOT NULL,
      repetitions INTEGER NOT NULL,
      min_delay   INTEGER NOT NULL,
      max_delay   INTEGER NOT NULL,
      threshold   INTEGER NOT NULL,
      stubs_file  TEXT NOT NULL,
      seed        INTEGER,
      reportnodes BOOLEAN
    )
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS simulator (
      id             TEXT PRIMARY KEY,
      registered_at  TEXT NOT NULL,
      last_heartbeat TEXT
    )
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS queue (
      id       TEXT PRIMARY KEY,
      priority INTEGER NOT NULL,
      seq      INTEGER NOT NULL UNIQUE,
      FOREIGN KEY (id) REFERENCES simulation(id) ON DELETE CASCADE
    )
  `);

  // Simulators may not be deleted while runs reference them
  database.exec(`
    CREATE TABLE IF NOT EXISTS running (
      simulator_id TEXT NOT NULL,
      id           TEXT NOT NULL,
      priority     INTEGER NOT NULL,
      claimed_at   TEXT NOT NULL,
      PRIMARY KEY (simulator_id, id),
      FOREIGN KEY (simulator_id) REFERENCES simulator(id) ON DELETE NO ACTION,
      FOREIGN KEY (id) REFERENCES simulation(id) ON DELETE CASCADE
    )
  `);
  database.exec(`CREATE UNIQUE INDEX IF NOT EXISTS idx_running_id ON running(id)`);

  database.exec(`
    CREATE TABLE IF NOT EXISTS complete (
      simulator_id    TEXT NOT NULL,
      id              TEXT NOT NULL,
      finish_datetime TEXT NOT NULL,
      PRIMARY KEY (simulator_id, id),
      FOREIGN KEY (simulator_id) REFERENCES simulator(id) ON DELETE NO ACTION,
      FOREIGN KEY (id) REFERENCES simulation(id) ON DELETE CASCADE
    )
  `);
  database.exec(`CREATE INDEX IF NOT EXISTS idx_complete_id ON complete(id)`);
  database.exec(`CREATE INDEX IF NOT EXISTS idx_queue_order ON queue(priority DESC, seq ASC)`);
}

/**
 * Open a connection to a simulations database file, creating it and its
 * tables when missing. Several processes may open the same file.
 */
export function openDb(file: string, options: OpenDbOptions = {}): Database.Database {
  ensureDataDir(file);
  const database = new Database(file, { timeout: options.busyTimeoutMs ?? 5000 });

  // Foreign keys are off by default in SQLite
  database.pragma('foreign_keys = ON');
  database.pragma('journal_mode = WAL');
  // Every committed transition must survive a crash right after it returns
  database.pragma('synchronous = FULL');

  createSchema(database);
  return database;
}

/** Process-wide connection to the configured database. */
export function getDb(): Database.Database {
  if (db) return db;
  const config = loadConfig();
  db = openDb(config.dbPath, { busyTimeoutMs: config.busyTimeoutMs });
  log.info('Opened simulations database', { path: config.dbPath });
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
