const UNIQUE_VIOLATION = /^UNIQUE constraint failed: (.+)$/;

/**
 * A write hit a UNIQUE index. `columns` holds the `table.column` names
 * SQLite reports, e.g. `['users.email']`.
 */
export class UniqueConstraintError extends Error {
  constructor(
    readonly columns: readonly string[],
    cause?: unknown,
  ) {
    super(`UNIQUE constraint failed: ${columns.join(', ')}`, { cause });
    this.name = 'UniqueConstraintError';
  }

  violates(column: string): boolean {
    return this.columns.includes(column);
  }
}

export const toDatabaseError = (error: unknown): unknown => {
  if (!(error instanceof Error)) return error;
  const match = UNIQUE_VIOLATION.exec(error.message);
  if (!match) return error;
  return new UniqueConstraintError(
    match[1].split(',').map((column) => column.trim()),
    error,
  );
};
