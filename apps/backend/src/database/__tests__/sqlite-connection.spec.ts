import initSqlJs, { SqlJsStatic } from 'sql.js';
import { UniqueConstraintError } from '../database.errors';
import { readCount, readInteger, readText } from '../sql-row';
import { SqliteConnection } from '../sqlite-connection';

describe('SqliteConnection', () => {
  let SQL: SqlJsStatic;

  const schema = `
    CREATE TABLE owners (id INTEGER PRIMARY KEY, email TEXT NOT NULL UNIQUE);
    CREATE TABLE pets (
      id INTEGER PRIMARY KEY,
      owner_id INTEGER NOT NULL REFERENCES owners(id)
    );
  `;

  beforeAll(async () => {
    SQL = await initSqlJs();
  });

  it('should bind named and positional parameters', () => {
    const db = new SqliteConnection(new SQL.Database());
    db.exec(schema);

    const first = db.run('INSERT INTO owners (email) VALUES (@email)', {
      email: 'one@example.com',
      unused: 'ignored',
    });
    db.run('INSERT INTO owners (email) VALUES (?)', ['two@example.com']);

    expect(first).toEqual({ changes: 1, lastInsertRowid: 1 });
    expect(
      db.all('SELECT email FROM owners ORDER BY id', [], (row) =>
        readText(row, 'email'),
      ),
    ).toEqual(['one@example.com', 'two@example.com']);
    expect(
      db.get('SELECT id FROM owners WHERE email = ?', ['missing'], (row) =>
        readInteger(row, 'id'),
      ),
    ).toBeUndefined();
  });

  it('should report the violated column of a UNIQUE index', () => {
    const db = new SqliteConnection(new SQL.Database());
    db.exec(schema);
    db.run('INSERT INTO owners (email) VALUES (?)', ['one@example.com']);

    let thrown: unknown;
    try {
      db.run('INSERT INTO owners (email) VALUES (?)', ['one@example.com']);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(UniqueConstraintError);
    expect(thrown).toMatchObject({ columns: ['owners.email'] });
  });

  it('should roll back a failed transaction', () => {
    const db = new SqliteConnection(new SQL.Database());
    db.exec(schema);

    expect(() =>
      db.transaction(() => {
        db.run('INSERT INTO owners (email) VALUES (?)', ['one@example.com']);
        db.run('INSERT INTO pets (owner_id) VALUES (?)', [99]);
      }),
    ).toThrow(/FOREIGN KEY/);
    expect(db.get('SELECT COUNT(*) AS total FROM owners', [], readCount)).toBe(
      0,
    );
  });

  it('should hand the image to persist after each write and keep foreign keys on', () => {
    const persist = jest.fn();
    const db = new SqliteConnection(new SQL.Database(), persist);
    db.exec(schema);
    db.run('INSERT INTO owners (email) VALUES (?)', ['one@example.com']);

    expect(persist).toHaveBeenCalledTimes(2);
    expect(() =>
      db.run('INSERT INTO pets (owner_id) VALUES (?)', [99]),
    ).toThrow(/FOREIGN KEY/);

    const restored = new SqliteConnection(
      new SQL.Database(persist.mock.calls[1][0]),
    );
    expect(
      restored.get('SELECT email FROM owners', [], (row) =>
        readText(row, 'email'),
      ),
    ).toBe('one@example.com');
  });
});
