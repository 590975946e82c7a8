import { BadRequestException } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { CommonModule } from '../../../common/common.module';
import configuration from '../../../common/config/configuration';
import {
  CarColor,
  CarCondition,
  CarStatus,
  CarType,
  FuelType,
  TransmissionType,
} from '../../../common/enums/app.enums';
import { Role } from '../../../common/enums/role.enum';
import { ForbiddenError } from '../../auth/errors/auth.errors';
import type { AuthenticatedPrincipal } from '../../auth/interfaces/authenticated-principal.interface';
import { BrandsService } from '../../brands/brands.service';
import { UsersService } from '../../users/users.service';
import { CarsModule } from '../cars.module';
import { CarsRepository } from '../cars.repository';
import { CarsService } from '../cars.service';
import type { CreateCarDto } from '../dto/create-car.dto';

describe('CarsService', () => {
  let module: TestingModule;
  let service: CarsService;
  let brandId: number;
  let seller: AuthenticatedPrincipal;
  let stranger: AuthenticatedPrincipal;
  let admin: AuthenticatedPrincipal;
  const maxYear = new Date().getFullYear() + 1;

  const listing = (overrides: Partial<CreateCarDto> = {}): CreateCarDto => ({
    carType: CarType.HATCH,
    model: 'Onix LT',
    factoryYear: 2019,
    modelYear: 2020,
    color: CarColor.RED,
    fuelType: FuelType.FLEX,
    transmission: TransmissionType.MANUAL,
    condition: CarCondition.USED,
    mileage: 42000,
    plate: 'QWE1R23',
    price: 61000,
    brandId,
    ...overrides,
  });

  const principalOf = (id: number, role: Role): AuthenticatedPrincipal => ({
    reference: id,
    role,
    isActive: true,
  });

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, load: [configuration] }),
        CommonModule,
        CarsModule,
      ],
    }).compile();
    await module.init();

    service = module.get<CarsService>(CarsService);
    const users = module.get(UsersService);
    brandId = (await module.get(BrandsService).create({ name: 'Chevrolet' }))
      .id;

    const register = async (username: string): Promise<number> =>
      (
        await users.register({
          username,
          fullName: `${username} tester`,
          email: `${username}@example.com`,
          password: 'secret123',
        })
      ).id;

    seller = principalOf(await register('seller'), Role.USER);
    stranger = principalOf(await register('stranger'), Role.USER);
    admin = principalOf(await register('boss'), Role.ADMIN);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('create', () => {
    it('should store the listing with its brand and owner', async () => {
      const car = await service.create(listing(), seller.reference);

      expect(car).toEqual(
        expect.objectContaining({
          model: 'Onix LT',
          status: CarStatus.AVAILABLE,
          description: null,
          ownerId: seller.reference,
          brand: expect.objectContaining({ name: 'Chevrolet' }),
          owner: expect.objectContaining({ username: 'seller' }),
        }),
      );
    });

    it.each([
      [{ factoryYear: 1949, modelYear: 1950 }, `factoryYear must be between 1950 and ${maxYear}`],
      [{ factoryYear: 2020, modelYear: 2019 }, 'modelYear cannot be earlier than factoryYear'],
      [{ factoryYear: maxYear, modelYear: maxYear + 1 }, `modelYear cannot be later than ${maxYear}`],
      [{ price: 10000001 }, 'price cannot exceed 10000000'],
      [{ mileage: 1000001 }, 'mileage cannot exceed 1000000'],
    ])('should reject %p', async (overrides, message) => {
      await expect(
        service.create(listing(overrides), seller.reference),
      ).rejects.toThrow(new BadRequestException(message));
    });

    it('should reject an unknown brand', async () => {
      await expect(
        service.create(listing({ brandId: 999 }), seller.reference),
      ).rejects.toThrow('Brand not found');
    });

    it('should reject an unknown owner', async () => {
      await expect(service.create(listing(), 999)).rejects.toThrow(
        'Owner not found',
      );
    });

    it('should reject a plate already in use', async () => {
      await service.create(listing(), seller.reference);

      await expect(
        service.create(listing(), stranger.reference),
      ).rejects.toThrow('Plate already registered');
    });
  });

  it('should reject a duplicate plate that reaches the write', async () => {
    await service.create(listing(), seller.reference);

    await expect(
      module.get(CarsRepository).create({
        ...listing(),
        status: CarStatus.AVAILABLE,
        description: null,
        ownerId: stranger.reference,
      }),
    ).rejects.toThrow(new BadRequestException('Plate already registered'));
  });

  describe('update', () => {
    it('should let the owner edit the listing', async () => {
      const car = await service.create(listing(), seller.reference);

      const updated = await service.update(car.id, { price: 59000 }, seller);

      expect(updated.price).toBe(59000);
    });

    it('should let an administrator edit any listing', async () => {
      const car = await service.create(listing(), seller.reference);

      const updated = await service.update(
        car.id,
        { status: CarStatus.RESERVED },
        admin,
      );

      expect(updated.status).toBe(CarStatus.RESERVED);
    });

    it('should forbid other users', async () => {
      const car = await service.create(listing(), seller.reference);

      await expect(
        service.update(car.id, { price: 1 }, stranger),
      ).rejects.toThrow(ForbiddenError);
    });

    it('should check a partial year change against the stored year', async () => {
      const car = await service.create(listing(), seller.reference);

      await expect(
        service.update(car.id, { factoryYear: 2021 }, seller),
      ).rejects.toThrow('modelYear cannot be earlier than factoryYear');
    });

    it("should allow keeping the listing's own plate", async () => {
      const car = await service.create(listing(), seller.reference);

      await expect(
        service.update(car.id, { plate: 'QWE1R23' }, seller),
      ).resolves.toEqual(expect.objectContaining({ plate: 'QWE1R23' }));
    });
  });

  describe('remove', () => {
    it('should forbid other users and keep the listing', async () => {
      const car = await service.create(listing(), seller.reference);

      await expect(service.remove(car.id, stranger)).rejects.toThrow(
        'You do not have permission to modify this resource',
      );
      await expect(service.findOne(car.id)).resolves.toEqual(
        expect.objectContaining({ id: car.id }),
      );
    });

    it('should delete for the owner', async () => {
      const car = await service.create(listing(), seller.reference);

      await service.remove(car.id, seller);

      await expect(service.findOne(car.id)).rejects.toThrow('Car not found');
    });
  });

  describe('findAll', () => {
    it('should filter by price range and status', async () => {
      await service.create(listing(), seller.reference);
      const premium = await service.create(
        listing({ plate: 'ZXC9V87', model: 'Tracker', price: 140000 }),
        seller.reference,
      );
      await service.setStatus(premium.id, CarStatus.SOLD);

      const cheap = await service.findAll({ maxPrice: 100000 });
      const sold = await service.findAll({ status: CarStatus.SOLD });

      expect(cheap.data.map((car) => car.model)).toEqual(['Onix LT']);
      expect(sold.data.map((car) => car.model)).toEqual(['Tracker']);
      expect(sold.meta.total).toBe(1);
    });
  });
});
