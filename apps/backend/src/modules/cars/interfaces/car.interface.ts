import type {
  CarColor,
  CarCondition,
  CarStatus,
  CarType,
  FuelType,
  TransmissionType,
} from '../../../common/enums/app.enums';
import type { Brand } from '../../brands/interfaces/brand.interface';

export interface CarAttributes {
  carType: CarType;
  model: string;
  factoryYear: number;
  modelYear: number;
  color: CarColor;
  fuelType: FuelType;
  transmission: TransmissionType;
  condition: CarCondition;
  status: CarStatus;
  mileage: number;
  plate: string;
  price: number;
  description: string | null;
  brandId: number;
  ownerId: number;
}

export interface CarOwner {
  id: number;
  username: string;
  fullName: string;
  email: string;
}

export interface Car extends CarAttributes {
  id: number;
  createdAt: Date;
  updatedAt: Date;
  brand: Brand;
  owner: CarOwner;
}

export type CarPatch = Partial<CarAttributes>;

export interface CarFilters {
  search?: string;
  carType?: CarType;
  color?: CarColor;
  fuelType?: FuelType;
  transmission?: TransmissionType;
  condition?: CarCondition;
  status?: CarStatus;
  brandId?: number;
  ownerId?: number;
  minYear?: number;
  maxYear?: number;
  minPrice?: number;
  maxPrice?: number;
}

export interface CarSearch extends CarFilters {
  limit: number;
  offset: number;
}
