import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'fs';
import path from 'path';
import * as schema from './schema.js';

export type KioskDb = BetterSQLite3Database<typeof schema>;

export interface KioskDatabase {
  db: KioskDb;
  sqlite: Database.Database;
  close(): void;
}

export const IN_MEMORY = ':memory:';

/**
 * Open (or create) the local kiosk database.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): KioskDatabase {
  if (dbPath !== IN_MEMORY) {
    // Ensure data directory exists with restrictive permissions
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  runMigrations(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => {
      if (sqlite.open) {
        sqlite.close();
      }
    },
  };
}

function runMigrations(sqlite: Database.Database) {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS employees (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      card_id TEXT NOT NULL UNIQUE,
      login_name TEXT UNIQUE,
      first_name TEXT NOT NULL,
      last_name TEXT NOT NULL,
      role TEXT NOT NULL DEFAULT 'worker',
      department TEXT,
      language TEXT NOT NULL DEFAULT 'de',
      is_active INTEGER NOT NULL DEFAULT 1,
      permissions TEXT,
      last_login TEXT,
      login_count INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_employees_active ON employees(is_active);

    CREATE TABLE IF NOT EXISTS time_tracking (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      employee_id INTEGER NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
      station TEXT NOT NULL,
      clock_in TEXT NOT NULL,
      clock_out TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_time_employee ON time_tracking(employee_id);
    CREATE INDEX IF NOT EXISTS idx_time_clock_in ON time_tracking(clock_in);
  `);
}

export { schema };
