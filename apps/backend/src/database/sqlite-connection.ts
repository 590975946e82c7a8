import type { BindParams, Database, SqlValue } from 'sql.js';
import { toDatabaseError } from './database.errors';
import { readInteger, RowMapper } from './sql-row';

/**
 * Positional (`?`) values, or named values for `@name` placeholders given
 * without the `@`.
 */
export type SqlParams = SqlValue[] | Record<string, SqlValue>;

export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

const toBindParams = (params: SqlParams): BindParams => {
  if (Array.isArray(params)) return params;
  return Object.fromEntries(
    Object.entries(params).map(([name, value]) => [`@${name}`, value]),
  );
};

/**
 * Synchronous query helpers over an in-process sql.js database.
 *
 * When `persist` is given, the whole database image is handed to it after
 * every write that is not inside a transaction, and once on commit.
 */
export class SqliteConnection {
  private transactionDepth = 0;

  constructor(
    private readonly db: Database,
    private readonly persist?: (image: Uint8Array) => void,
  ) {
    this.enableForeignKeys();
  }

  exec(sql: string): void {
    this.write(() => this.db.exec(sql));
  }

  run(sql: string, params: SqlParams = []): RunResult {
    this.write(() => this.db.run(sql, toBindParams(params)));
    return {
      changes: this.db.getRowsModified(),
      lastInsertRowid:
        this.get('SELECT last_insert_rowid() AS id', [], (row) =>
          readInteger(row, 'id'),
        ) ?? 0,
    };
  }

  all<T>(sql: string, params: SqlParams, map: RowMapper<T>): T[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(toBindParams(params));
      const rows: T[] = [];
      while (statement.step()) {
        rows.push(map(statement.getAsObject()));
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  get<T>(sql: string, params: SqlParams, map: RowMapper<T>): T | undefined {
    return this.all(sql, params, map)[0];
  }

  /**
   * Runs `work` between BEGIN and COMMIT, rolling back if it throws.
   */
  transaction<T>(work: () => T): T {
    this.db.exec('BEGIN');
    this.transactionDepth++;
    try {
      const result = work();
      this.db.exec('COMMIT');
      this.transactionDepth--;
      this.flush();
      return result;
    } catch (error) {
      this.transactionDepth--;
      this.db.exec('ROLLBACK');
      throw error;
    }
  }

  close(): void {
    this.db.close();
  }

  private write(statement: () => void): void {
    try {
      statement();
    } catch (error) {
      throw toDatabaseError(error);
    }
    if (this.transactionDepth === 0) {
      this.flush();
    }
  }

  private flush(): void {
    if (!this.persist) return;
    const image = this.db.export();
    // export() reopens the database, which resets pragmas
    this.enableForeignKeys();
    this.persist(image);
  }

  private enableForeignKeys(): void {
    this.db.exec('PRAGMA foreign_keys = ON');
  }
}
