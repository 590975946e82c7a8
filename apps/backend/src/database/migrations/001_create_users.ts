import type { SqliteConnection } from '../sqlite-connection';

/**
 * Migration 001: users
 */
export const up = (db: SqliteConnection): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id            INTEGER PRIMARY KEY AUTOINCREMENT,
      username      TEXT NOT NULL UNIQUE,
      full_name     TEXT NOT NULL,
      email         TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      role          TEXT NOT NULL DEFAULT 'user',
      is_active     INTEGER NOT NULL DEFAULT 1,
      created_at    TEXT NOT NULL,
      updated_at    TEXT NOT NULL
    )
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_users_role ON users(role)');
};

export const down = (db: SqliteConnection): void => {
  db.exec('DROP INDEX IF EXISTS idx_users_role');
  db.exec('DROP TABLE IF EXISTS users');
};
