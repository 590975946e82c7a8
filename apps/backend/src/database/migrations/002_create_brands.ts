import type { SqliteConnection } from '../sqlite-connection';

/**
 * Migration 002: brands
 */
export const up = (db: SqliteConnection): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS brands (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      name        TEXT NOT NULL UNIQUE COLLATE NOCASE,
      description TEXT,
      is_active   INTEGER NOT NULL DEFAULT 1,
      created_at  TEXT NOT NULL,
      updated_at  TEXT NOT NULL
    )
  `);
};

export const down = (db: SqliteConnection): void => {
  db.exec('DROP TABLE IF EXISTS brands');
};
