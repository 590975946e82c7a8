import type { ParamsObject } from 'sql.js';

export type SqlRow = ParamsObject;

export type RowMapper<T> = (row: SqlRow) => T;

const columnError = (column: string, expected: string): Error =>
  new Error(`Column ${column} is not ${expected}`);

export const readInteger = (row: SqlRow, column: string): number => {
  const value = row[column];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw columnError(column, 'an integer');
  }
  return value;
};

export const readNumber = (row: SqlRow, column: string): number => {
  const value = row[column];
  if (typeof value !== 'number') {
    throw columnError(column, 'a number');
  }
  return value;
};

export const readText = (row: SqlRow, column: string): string => {
  const value = row[column];
  if (typeof value !== 'string') {
    throw columnError(column, 'text');
  }
  return value;
};

export const readNullableText = (
  row: SqlRow,
  column: string,
): string | null => (row[column] === null ? null : readText(row, column));

// Booleans are stored as 0/1
export const readFlag = (row: SqlRow, column: string): boolean =>
  readInteger(row, column) === 1;

export const readDate = (row: SqlRow, column: string): Date =>
  new Date(readText(row, column));

export const readEnum = <T extends string>(
  row: SqlRow,
  column: string,
  values: readonly T[],
): T => {
  const value = row[column];
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw columnError(column, `one of ${values.join(', ')}`);
  }
  return match;
};

export const readCount: RowMapper<number> = (row) =>
  readInteger(row, 'total');
