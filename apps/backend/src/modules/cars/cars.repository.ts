import { BadRequestException, Injectable } from '@nestjs/common';
import type { SqlValue } from 'sql.js';
import {
  CarColor,
  CarCondition,
  CarStatus,
  CarType,
  FuelType,
  TransmissionType,
} from '../../common/enums/app.enums';
import { DatabaseService } from '../../common/services/database.service';
import { likePattern } from '../../common/utils/pagination';
import { UniqueConstraintError } from '../../database/database.errors';
import {
  readCount,
  readDate,
  readEnum,
  readFlag,
  readInteger,
  readNullableText,
  readNumber,
  readText,
  SqlRow,
} from '../../database/sql-row';
import type {
  Car,
  CarAttributes,
  CarPatch,
  CarSearch,
} from './interfaces/car.interface';

const SELECT_CARS = `
  SELECT c.*,
         b.name AS brand_name, b.description AS brand_description,
         b.is_active AS brand_is_active, b.created_at AS brand_created_at,
         b.updated_at AS brand_updated_at,
         u.username AS owner_username, u.full_name AS owner_full_name,
         u.email AS owner_email
    FROM cars c
    JOIN brands b ON b.id = c.brand_id
    JOIN users u ON u.id = c.owner_id`;

const COLUMNS: ReadonlyArray<readonly [keyof CarAttributes, string]> = [
  ['carType', 'car_type'],
  ['model', 'model'],
  ['factoryYear', 'factory_year'],
  ['modelYear', 'model_year'],
  ['color', 'color'],
  ['fuelType', 'fuel_type'],
  ['transmission', 'transmission'],
  ['condition', 'condition'],
  ['status', 'status'],
  ['mileage', 'mileage'],
  ['plate', 'plate'],
  ['price', 'price'],
  ['description', 'description'],
  ['brandId', 'brand_id'],
  ['ownerId', 'owner_id'],
];

// Exact-match filters: query field -> column
const EQUALITY_FILTERS: ReadonlyArray<readonly [keyof CarSearch, string]> = [
  ['carType', 'c.car_type'],
  ['color', 'c.color'],
  ['fuelType', 'c.fuel_type'],
  ['transmission', 'c.transmission'],
  ['condition', 'c.condition'],
  ['status', 'c.status'],
  ['brandId', 'c.brand_id'],
  ['ownerId', 'c.owner_id'],
];

const toCar = (row: SqlRow): Car => ({
  id: readInteger(row, 'id'),
  carType: readEnum(row, 'car_type', Object.values(CarType)),
  model: readText(row, 'model'),
  factoryYear: readInteger(row, 'factory_year'),
  modelYear: readInteger(row, 'model_year'),
  color: readEnum(row, 'color', Object.values(CarColor)),
  fuelType: readEnum(row, 'fuel_type', Object.values(FuelType)),
  transmission: readEnum(
    row,
    'transmission',
    Object.values(TransmissionType),
  ),
  condition: readEnum(row, 'condition', Object.values(CarCondition)),
  status: readEnum(row, 'status', Object.values(CarStatus)),
  mileage: readInteger(row, 'mileage'),
  plate: readText(row, 'plate'),
  price: readNumber(row, 'price'),
  description: readNullableText(row, 'description'),
  brandId: readInteger(row, 'brand_id'),
  ownerId: readInteger(row, 'owner_id'),
  createdAt: readDate(row, 'created_at'),
  updatedAt: readDate(row, 'updated_at'),
  brand: {
    id: readInteger(row, 'brand_id'),
    name: readText(row, 'brand_name'),
    description: readNullableText(row, 'brand_description'),
    isActive: readFlag(row, 'brand_is_active'),
    createdAt: readDate(row, 'brand_created_at'),
    updatedAt: readDate(row, 'brand_updated_at'),
  },
  owner: {
    id: readInteger(row, 'owner_id'),
    username: readText(row, 'owner_username'),
    fullName: readText(row, 'owner_full_name'),
    email: readText(row, 'owner_email'),
  },
});

@Injectable()
export class CarsRepository {
  constructor(private readonly database: DatabaseService) {}

  async findById(id: number): Promise<Car | null> {
    return (
      this.database.db.get(`${SELECT_CARS} WHERE c.id = ?`, [id], toCar) ??
      null
    );
  }

  async existsWithPlate(plate: string, excludeId?: number): Promise<boolean> {
    const id = this.database.db.get(
      'SELECT id FROM cars WHERE plate = ? AND id != ?',
      [plate, excludeId ?? 0],
      (row) => readInteger(row, 'id'),
    );
    return id !== undefined;
  }

  async findMany(
    search: CarSearch,
  ): Promise<{ rows: Car[]; total: number }> {
    const conditions: string[] = [];
    const params: Record<string, SqlValue> = {};

    if (search.search) {
      conditions.push(
        "(c.model LIKE @term ESCAPE '\\' OR c.color LIKE @term ESCAPE '\\' OR c.plate LIKE @term ESCAPE '\\')",
      );
      params.term = likePattern(search.search);
    }
    for (const [key, column] of EQUALITY_FILTERS) {
      const value = search[key];
      if (value === undefined) continue;
      conditions.push(`${column} = @${key}`);
      params[key] = value;
    }
    if (search.minYear !== undefined) {
      conditions.push('c.model_year >= @minYear');
      params.minYear = search.minYear;
    }
    if (search.maxYear !== undefined) {
      conditions.push('c.model_year <= @maxYear');
      params.maxYear = search.maxYear;
    }
    if (search.minPrice !== undefined) {
      conditions.push('c.price >= @minPrice');
      params.minPrice = search.minPrice;
    }
    if (search.maxPrice !== undefined) {
      conditions.push('c.price <= @maxPrice');
      params.maxPrice = search.maxPrice;
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.database.db.all(
      `${SELECT_CARS} ${where} ORDER BY c.id DESC LIMIT @limit OFFSET @offset`,
      { ...params, limit: search.limit, offset: search.offset },
      toCar,
    );
    const total = this.database.db.get(
      `SELECT COUNT(*) AS total FROM cars c ${where}`,
      params,
      readCount,
    );

    return { rows, total: total ?? 0 };
  }

  async create(data: CarAttributes): Promise<Car> {
    const now = new Date().toISOString();
    const params: Record<string, SqlValue> = { now };
    for (const [key] of COLUMNS) {
      params[key] = data[key];
    }

    const result = this.write(() =>
      this.database.db.run(
        `INSERT INTO cars (${COLUMNS.map(([, column]) => column).join(', ')}, created_at, updated_at)
         VALUES (${COLUMNS.map(([key]) => `@${key}`).join(', ')}, @now, @now)`,
        params,
      ),
    );
    return this.getOrFail(result.lastInsertRowid);
  }

  async update(id: number, patch: CarPatch): Promise<Car> {
    const assignments = ['updated_at = @updatedAt'];
    const params: Record<string, SqlValue> = {
      id,
      updatedAt: new Date().toISOString(),
    };

    for (const [key, column] of COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      assignments.push(`${column} = @${key}`);
      params[key] = value;
    }

    this.write(() =>
      this.database.db.run(
        `UPDATE cars SET ${assignments.join(', ')} WHERE id = @id`,
        params,
      ),
    );
    return this.getOrFail(id);
  }

  async delete(id: number): Promise<boolean> {
    const result = this.database.db.run('DELETE FROM cars WHERE id = ?', [id]);
    return result.changes > 0;
  }

  private write<T>(statement: () => T): T {
    try {
      return statement();
    } catch (error) {
      if (
        error instanceof UniqueConstraintError &&
        error.violates('cars.plate')
      ) {
        throw new BadRequestException('Plate already registered');
      }
      throw error;
    }
  }

  private async getOrFail(id: number): Promise<Car> {
    const car = await this.findById(id);
    if (!car) {
      throw new Error(`Car ${id} vanished after write`);
    }
    return car;
  }
}
