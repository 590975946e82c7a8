import {
  BadRequestException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CarStatus } from '../../common/enums/app.enums';
import { Role } from '../../common/enums/role.enum';
import { AppLoggerService } from '../../common/services/app-logger.service';
import {
  Paginated,
  resolvePage,
  toPaginated,
} from '../../common/utils/pagination';
import type { AuthenticatedPrincipal } from '../auth/interfaces/authenticated-principal.interface';
import { AccessControlService } from '../auth/services/access-control.service';
import { BrandsRepository } from '../brands/brands.repository';
import { UsersRepository } from '../users/users.repository';
import { CarsRepository } from './cars.repository';
import type { CreateCarDto } from './dto/create-car.dto';
import type { UpdateCarDto } from './dto/update-car.dto';
import type {
  Car,
  CarAttributes,
  CarFilters,
  CarPatch,
} from './interfaces/car.interface';

type ValidatedFields = Pick<
  CarAttributes,
  'factoryYear' | 'modelYear' | 'price' | 'mileage'
>;

interface MarketplaceLimits {
  minFactoryYear: number;
  maxFutureYear: number;
  maxPrice: number;
  maxMileage: number;
}

@Injectable()
export class CarsService {
  private readonly limits: MarketplaceLimits;

  constructor(
    private readonly carsRepository: CarsRepository,
    private readonly brandsRepository: BrandsRepository,
    private readonly usersRepository: UsersRepository,
    private readonly accessControl: AccessControlService,
    private readonly configService: ConfigService,
    private readonly logger: AppLoggerService,
  ) {
    this.limits = {
      minFactoryYear: this.configService.get<number>(
        'marketplace.minFactoryYear',
        1950,
      ),
      maxFutureYear: this.configService.get<number>(
        'marketplace.maxFutureYear',
        1,
      ),
      maxPrice: this.configService.get<number>('marketplace.maxPrice', 10000000),
      maxMileage: this.configService.get<number>(
        'marketplace.maxMileage',
        1000000,
      ),
    };
  }

  async create(dto: CreateCarDto, ownerId: number): Promise<Car> {
    const attributes: CarAttributes = {
      carType: dto.carType,
      model: dto.model,
      factoryYear: dto.factoryYear,
      modelYear: dto.modelYear,
      color: dto.color,
      fuelType: dto.fuelType,
      transmission: dto.transmission,
      condition: dto.condition,
      status: dto.status ?? CarStatus.AVAILABLE,
      mileage: dto.mileage,
      plate: dto.plate,
      price: dto.price,
      description: dto.description || null,
      brandId: dto.brandId,
      ownerId,
    };

    this.assertRules(attributes);
    await this.assertReferences(attributes.brandId, ownerId);
    if (await this.carsRepository.existsWithPlate(attributes.plate)) {
      throw new BadRequestException('Plate already registered');
    }

    const car = await this.carsRepository.create(attributes);
    this.logger.logBusiness('create', 'car', car.id, { userId: ownerId });
    return car;
  }

  async findAll(
    query: CarFilters & { page?: number; limit?: number },
  ): Promise<Paginated<Car>> {
    const window = resolvePage(query);
    const { rows, total } = await this.carsRepository.findMany({
      search: query.search || undefined,
      carType: query.carType,
      color: query.color,
      fuelType: query.fuelType,
      transmission: query.transmission,
      condition: query.condition,
      status: query.status,
      brandId: query.brandId,
      ownerId: query.ownerId,
      minYear: query.minYear,
      maxYear: query.maxYear,
      minPrice: query.minPrice,
      maxPrice: query.maxPrice,
      limit: window.limit,
      offset: window.offset,
    });
    return toPaginated(rows, total, window);
  }

  async findOne(id: number): Promise<Car> {
    const car = await this.carsRepository.findById(id);
    if (!car) {
      throw new NotFoundException('Car not found');
    }
    return car;
  }

  /**
   * Owner or admin. The merged record is re-validated, so changing only the
   * factory year still has to agree with the stored model year.
   */
  async update(
    id: number,
    dto: UpdateCarDto,
    principal: AuthenticatedPrincipal,
  ): Promise<Car> {
    const car = await this.findOne(id);
    this.assertOwnerOrAdmin(principal, car);

    const patch: CarPatch = {
      carType: dto.carType,
      model: dto.model,
      factoryYear: dto.factoryYear,
      modelYear: dto.modelYear,
      color: dto.color,
      fuelType: dto.fuelType,
      transmission: dto.transmission,
      condition: dto.condition,
      status: dto.status,
      mileage: dto.mileage,
      plate: dto.plate,
      price: dto.price,
      description:
        dto.description === undefined ? undefined : dto.description || null,
      brandId: dto.brandId,
    };

    this.assertRules({
      factoryYear: patch.factoryYear ?? car.factoryYear,
      modelYear: patch.modelYear ?? car.modelYear,
      price: patch.price ?? car.price,
      mileage: patch.mileage ?? car.mileage,
    });
    if (patch.brandId !== undefined) {
      await this.assertReferences(patch.brandId);
    }
    if (
      patch.plate !== undefined &&
      (await this.carsRepository.existsWithPlate(patch.plate, id))
    ) {
      throw new BadRequestException('Plate already registered');
    }

    const updated = await this.carsRepository.update(id, patch);
    this.logger.logBusiness('update', 'car', id, {
      userId: principal.reference,
    });
    return updated;
  }

  async remove(id: number, principal: AuthenticatedPrincipal): Promise<void> {
    const car = await this.findOne(id);
    this.assertOwnerOrAdmin(principal, car);
    await this.carsRepository.delete(id);
    this.logger.logBusiness('delete', 'car', id, {
      userId: principal.reference,
    });
  }

  async setStatus(id: number, status: CarStatus): Promise<Car> {
    await this.findOne(id);
    const car = await this.carsRepository.update(id, { status });
    this.logger.logBusiness('change status', 'car', id, { status });
    return car;
  }

  private assertOwnerOrAdmin(principal: AuthenticatedPrincipal, car: Car): void {
    if (principal.role !== Role.ADMIN) {
      this.accessControl.requireOwnership(principal, car.ownerId);
    }
  }

  private assertRules(car: ValidatedFields): void {
    const maxYear = new Date().getFullYear() + this.limits.maxFutureYear;

    if (
      car.factoryYear < this.limits.minFactoryYear ||
      car.factoryYear > maxYear
    ) {
      throw new BadRequestException(
        `factoryYear must be between ${this.limits.minFactoryYear} and ${maxYear}`,
      );
    }
    if (car.modelYear < car.factoryYear) {
      throw new BadRequestException(
        'modelYear cannot be earlier than factoryYear',
      );
    }
    if (car.modelYear > maxYear) {
      throw new BadRequestException(`modelYear cannot be later than ${maxYear}`);
    }
    if (car.price > this.limits.maxPrice) {
      throw new BadRequestException(
        `price cannot exceed ${this.limits.maxPrice}`,
      );
    }
    if (car.mileage > this.limits.maxMileage) {
      throw new BadRequestException(
        `mileage cannot exceed ${this.limits.maxMileage}`,
      );
    }
  }

  private async assertReferences(
    brandId: number,
    ownerId?: number,
  ): Promise<void> {
    if (!(await this.brandsRepository.findById(brandId))) {
      throw new BadRequestException('Brand not found');
    }
    if (
      ownerId !== undefined &&
      !(await this.usersRepository.findById(ownerId))
    ) {
      throw new BadRequestException('Owner not found');
    }
  }
}
