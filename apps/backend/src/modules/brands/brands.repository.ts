import { BadRequestException, Injectable } from '@nestjs/common';
import type { SqlValue } from 'sql.js';
import { DatabaseService } from '../../common/services/database.service';
import { likePattern } from '../../common/utils/pagination';
import { UniqueConstraintError } from '../../database/database.errors';
import {
  readCount,
  readDate,
  readFlag,
  readInteger,
  readNullableText,
  readText,
  SqlRow,
} from '../../database/sql-row';
import type {
  Brand,
  BrandPatch,
  BrandSearch,
} from './interfaces/brand.interface';

const toBrand = (row: SqlRow): Brand => ({
  id: readInteger(row, 'id'),
  name: readText(row, 'name'),
  description: readNullableText(row, 'description'),
  isActive: readFlag(row, 'is_active'),
  createdAt: readDate(row, 'created_at'),
  updatedAt: readDate(row, 'updated_at'),
});

@Injectable()
export class BrandsRepository {
  constructor(private readonly database: DatabaseService) {}

  async findById(id: number): Promise<Brand | null> {
    return (
      this.database.db.get('SELECT * FROM brands WHERE id = ?', [id], toBrand) ??
      null
    );
  }

  // Brand names are unique regardless of case
  async existsWithName(name: string, excludeId?: number): Promise<boolean> {
    const id = this.database.db.get(
      'SELECT id FROM brands WHERE name = ? COLLATE NOCASE AND id != ?',
      [name, excludeId ?? 0],
      (row) => readInteger(row, 'id'),
    );
    return id !== undefined;
  }

  async findMany({
    search,
    isActive,
    limit,
    offset,
  }: BrandSearch): Promise<{ rows: Brand[]; total: number }> {
    const conditions: string[] = [];
    const params: Record<string, SqlValue> = {};

    if (search) {
      conditions.push("name LIKE @term ESCAPE '\\'");
      params.term = likePattern(search);
    }
    if (isActive !== undefined) {
      conditions.push('is_active = @isActive');
      params.isActive = isActive ? 1 : 0;
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.database.db.all(
      `SELECT * FROM brands ${where} ORDER BY name LIMIT @limit OFFSET @offset`,
      { ...params, limit, offset },
      toBrand,
    );
    const total = this.database.db.get(
      `SELECT COUNT(*) AS total FROM brands ${where}`,
      params,
      readCount,
    );

    return { rows, total: total ?? 0 };
  }

  async create(name: string, description: string | null): Promise<Brand> {
    const now = new Date().toISOString();
    const result = this.write(() =>
      this.database.db.run(
        'INSERT INTO brands (name, description, is_active, created_at, updated_at) VALUES (?, ?, 1, ?, ?)',
        [name, description, now, now],
      ),
    );
    return this.getOrFail(result.lastInsertRowid);
  }

  async update(id: number, patch: BrandPatch): Promise<Brand> {
    const assignments = ['updated_at = @updatedAt'];
    const params: Record<string, SqlValue> = {
      id,
      updatedAt: new Date().toISOString(),
    };

    if (patch.name !== undefined) {
      assignments.push('name = @name');
      params.name = patch.name;
    }
    if (patch.description !== undefined) {
      assignments.push('description = @description');
      params.description = patch.description;
    }
    if (patch.isActive !== undefined) {
      assignments.push('is_active = @isActive');
      params.isActive = patch.isActive ? 1 : 0;
    }

    this.write(() =>
      this.database.db.run(
        `UPDATE brands SET ${assignments.join(', ')} WHERE id = @id`,
        params,
      ),
    );
    return this.getOrFail(id);
  }

  async countCars(id: number): Promise<number> {
    return (
      this.database.db.get(
        'SELECT COUNT(*) AS total FROM cars WHERE brand_id = ?',
        [id],
        readCount,
      ) ?? 0
    );
  }

  async delete(id: number): Promise<boolean> {
    const result = this.database.db.run('DELETE FROM brands WHERE id = ?', [id]);
    return result.changes > 0;
  }

  private write<T>(statement: () => T): T {
    try {
      return statement();
    } catch (error) {
      if (
        error instanceof UniqueConstraintError &&
        error.violates('brands.name')
      ) {
        throw new BadRequestException('Brand name already registered');
      }
      throw error;
    }
  }

  private async getOrFail(id: number): Promise<Brand> {
    const brand = await this.findById(id);
    if (!brand) {
      throw new Error(`Brand ${id} vanished after write`);
    }
    return brand;
  }
}
