import type { SqliteConnection } from '../sqlite-connection';

/**
 * Migration 003: cars
 *
 * Deleting an owner removes their cars; a brand cannot be deleted while
 * cars reference it.
 */
export const up = (db: SqliteConnection): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS cars (
      id           INTEGER PRIMARY KEY AUTOINCREMENT,
      car_type     TEXT NOT NULL,
      model        TEXT NOT NULL,
      factory_year INTEGER NOT NULL,
      model_year   INTEGER NOT NULL,
      color        TEXT NOT NULL,
      fuel_type    TEXT NOT NULL,
      transmission TEXT NOT NULL,
      condition    TEXT NOT NULL,
      status       TEXT NOT NULL DEFAULT 'available',
      mileage      INTEGER NOT NULL,
      plate        TEXT NOT NULL UNIQUE,
      price        REAL NOT NULL,
      description  TEXT,
      brand_id     INTEGER NOT NULL REFERENCES brands(id) ON DELETE RESTRICT,
      owner_id     INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      created_at   TEXT NOT NULL,
      updated_at   TEXT NOT NULL
    )
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_cars_owner ON cars(owner_id)');
  db.exec('CREATE INDEX IF NOT EXISTS idx_cars_brand ON cars(brand_id)');
  db.exec('CREATE INDEX IF NOT EXISTS idx_cars_status ON cars(status)');
};

export const down = (db: SqliteConnection): void => {
  db.exec('DROP INDEX IF EXISTS idx_cars_status');
  db.exec('DROP INDEX IF EXISTS idx_cars_brand');
  db.exec('DROP INDEX IF EXISTS idx_cars_owner');
  db.exec('DROP TABLE IF EXISTS cars');
};
