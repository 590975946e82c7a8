import type { LoggerService } from '@nestjs/common';
import { readText } from '../sql-row';
import type { SqliteConnection } from '../sqlite-connection';
import * as createUsers from './001_create_users';
import * as createBrands from './002_create_brands';
import * as createCars from './003_create_cars';

/**
 * Versioned schema migrations, tracked in a `_migrations` table.
 */
export interface Migration {
  readonly version: string;
  readonly name: string;
  readonly up: (db: SqliteConnection) => void;
  readonly down: (db: SqliteConnection) => void;
}

export const migrations: readonly Migration[] = [
  { version: '001', name: 'create_users', ...createUsers },
  { version: '002', name: 'create_brands', ...createBrands },
  { version: '003', name: 'create_cars', ...createCars },
];

const ensureMigrationsTable = (db: SqliteConnection): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version     TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      applied_at  INTEGER NOT NULL
    )
  `);
};

const getAppliedVersions = (db: SqliteConnection): Set<string> => {
  const versions = db.all(
    'SELECT version FROM _migrations ORDER BY version',
    [],
    (row) => readText(row, 'version'),
  );
  return new Set(versions);
};

/**
 * Apply every pending migration. Returns how many were applied.
 */
export const migrateUp = (
  db: SqliteConnection,
  logger: LoggerService,
): number => {
  ensureMigrationsTable(db);
  const applied = getAppliedVersions(db);
  let count = 0;

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    logger.log(`Applying migration ${migration.version}: ${migration.name}`);
    db.transaction(() => {
      migration.up(db);
      db.run(
        'INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)',
        [migration.version, migration.name, Date.now()],
      );
    });
    count++;
  }

  if (count === 0) {
    logger.debug?.('No pending migrations');
  } else {
    logger.log(`Applied ${count} migration(s)`);
  }

  return count;
};

/**
 * Roll back the last applied migration. Returns its version, or null when
 * nothing is applied.
 */
export const migrateDown = (
  db: SqliteConnection,
  logger: LoggerService,
): string | null => {
  ensureMigrationsTable(db);

  const lastApplied = db.get(
    'SELECT version FROM _migrations ORDER BY version DESC LIMIT 1',
    [],
    (row) => readText(row, 'version'),
  );

  if (!lastApplied) {
    logger.log('No migrations to roll back');
    return null;
  }

  const migration = migrations.find((m) => m.version === lastApplied);
  if (!migration) {
    logger.error(`Migration ${lastApplied} not found in migration files`);
    return null;
  }

  logger.log(`Rolling back migration ${migration.version}: ${migration.name}`);
  db.transaction(() => {
    migration.down(db);
    db.run('DELETE FROM _migrations WHERE version = ?', [migration.version]);
  });

  return migration.version;
};
