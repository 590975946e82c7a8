import { BadRequestException, Injectable } from '@nestjs/common';
import type { SqlValue } from 'sql.js';
import { Role } from '../../common/enums/role.enum';
import { DatabaseService } from '../../common/services/database.service';
import { likePattern } from '../../common/utils/pagination';
import { UniqueConstraintError } from '../../database/database.errors';
import {
  readCount,
  readDate,
  readEnum,
  readFlag,
  readInteger,
  readText,
  SqlRow,
} from '../../database/sql-row';
import type {
  UserLookup,
  UserRecord,
} from '../auth/interfaces/user-lookup.interface';
import type {
  NewUser,
  User,
  UserPatch,
  UserSearch,
} from './interfaces/user.interface';

const COLUMNS: ReadonlyArray<readonly [keyof UserPatch, string]> = [
  ['username', 'username'],
  ['fullName', 'full_name'],
  ['email', 'email'],
  ['passwordHash', 'password_hash'],
  ['role', 'role'],
  ['isActive', 'is_active'],
];

const ROLES = Object.values(Role);

const toUser = (row: SqlRow): User => ({
  id: readInteger(row, 'id'),
  username: readText(row, 'username'),
  fullName: readText(row, 'full_name'),
  email: readText(row, 'email'),
  passwordHash: readText(row, 'password_hash'),
  role: readEnum(row, 'role', ROLES),
  isActive: readFlag(row, 'is_active'),
  createdAt: readDate(row, 'created_at'),
  updatedAt: readDate(row, 'updated_at'),
});

const toId = (row: SqlRow): number => readInteger(row, 'id');

const toRecord = (user: User): UserRecord => ({
  reference: user.id,
  passwordHash: user.passwordHash,
  role: user.role,
  isActive: user.isActive,
});

const toSqlValue = (value: UserPatch[keyof UserPatch]): SqlValue => {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value ?? null;
};

/**
 * SQLite-backed user store. Also serves as the authentication core's
 * user lookup, keyed by email and numeric id.
 */
@Injectable()
export class UsersRepository implements UserLookup {
  constructor(private readonly database: DatabaseService) {}

  async findByIdentifier(email: string): Promise<UserRecord | null> {
    const user = await this.findByEmail(email);
    return user ? toRecord(user) : null;
  }

  async findByReference(reference: number): Promise<UserRecord | null> {
    const user = await this.findById(reference);
    return user ? toRecord(user) : null;
  }

  async findById(id: number): Promise<User | null> {
    return (
      this.database.db.get('SELECT * FROM users WHERE id = ?', [id], toUser) ??
      null
    );
  }

  async findByEmail(email: string): Promise<User | null> {
    return (
      this.database.db.get(
        'SELECT * FROM users WHERE email = ?',
        [email.toLowerCase()],
        toUser,
      ) ?? null
    );
  }

  async existsWithUsername(
    username: string,
    excludeId?: number,
  ): Promise<boolean> {
    const id = this.database.db.get(
      'SELECT id FROM users WHERE username = ? AND id != ?',
      [username, excludeId ?? 0],
      toId,
    );
    return id !== undefined;
  }

  async existsWithEmail(email: string, excludeId?: number): Promise<boolean> {
    const id = this.database.db.get(
      'SELECT id FROM users WHERE email = ? AND id != ?',
      [email.toLowerCase(), excludeId ?? 0],
      toId,
    );
    return id !== undefined;
  }

  async countByRole(role: Role): Promise<number> {
    return (
      this.database.db.get(
        'SELECT COUNT(*) AS total FROM users WHERE role = ?',
        [role],
        readCount,
      ) ?? 0
    );
  }

  async findMany({
    search,
    limit,
    offset,
  }: UserSearch): Promise<{ rows: User[]; total: number }> {
    const where = search
      ? "WHERE username LIKE @term ESCAPE '\\' OR full_name LIKE @term ESCAPE '\\' OR email LIKE @term ESCAPE '\\'"
      : '';
    const params: Record<string, SqlValue> = search
      ? { term: likePattern(search) }
      : {};

    const rows = this.database.db.all(
      `SELECT * FROM users ${where} ORDER BY id LIMIT @limit OFFSET @offset`,
      { ...params, limit, offset },
      toUser,
    );
    const total = this.database.db.get(
      `SELECT COUNT(*) AS total FROM users ${where}`,
      params,
      readCount,
    );

    return { rows, total: total ?? 0 };
  }

  async create(data: NewUser): Promise<User> {
    const now = new Date().toISOString();
    const result = this.write(() =>
      this.database.db.run(
        `INSERT INTO users (username, full_name, email, password_hash, role, is_active, created_at, updated_at)
         VALUES (@username, @fullName, @email, @passwordHash, @role, @isActive, @now, @now)`,
        {
          username: data.username,
          fullName: data.fullName,
          email: data.email.toLowerCase(),
          passwordHash: data.passwordHash,
          role: data.role,
          isActive: data.isActive ? 1 : 0,
          now,
        },
      ),
    );

    return this.getOrFail(result.lastInsertRowid);
  }

  async update(id: number, patch: UserPatch): Promise<User> {
    const assignments: string[] = [];
    const params: Record<string, SqlValue> = {
      id,
      updatedAt: new Date().toISOString(),
    };

    for (const [key, column] of COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      assignments.push(`${column} = @${key}`);
      params[key] = toSqlValue(value);
    }

    this.write(() =>
      this.database.db.run(
        `UPDATE users SET ${[...assignments, 'updated_at = @updatedAt'].join(', ')} WHERE id = @id`,
        params,
      ),
    );

    return this.getOrFail(id);
  }

  async delete(id: number): Promise<boolean> {
    const result = this.database.db.run('DELETE FROM users WHERE id = ?', [id]);
    return result.changes > 0;
  }

  // A concurrent request can claim a username or email between the
  // service's uniqueness check and this write
  private write<T>(statement: () => T): T {
    try {
      return statement();
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        if (error.violates('users.username')) {
          throw new BadRequestException('Username already registered');
        }
        if (error.violates('users.email')) {
          throw new BadRequestException('Email already registered');
        }
      }
      throw error;
    }
  }

  private async getOrFail(id: number): Promise<User> {
    const user = await this.findById(id);
    if (!user) {
      throw new Error(`User ${id} vanished after write`);
    }
    return user;
  }
}
