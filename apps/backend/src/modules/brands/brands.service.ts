import {
  BadRequestException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppLoggerService } from '../../common/services/app-logger.service';
import {
  Paginated,
  resolvePage,
  toPaginated,
} from '../../common/utils/pagination';
import { BrandsRepository } from './brands.repository';
import { BrandQueryDto } from './dto/brand-query.dto';
import { CreateBrandDto } from './dto/create-brand.dto';
import { UpdateBrandDto } from './dto/update-brand.dto';
import type { Brand } from './interfaces/brand.interface';

@Injectable()
export class BrandsService {
  private readonly maxDescriptionLength: number;

  constructor(
    private readonly brandsRepository: BrandsRepository,
    private readonly configService: ConfigService,
    private readonly logger: AppLoggerService,
  ) {
    this.maxDescriptionLength = this.configService.get<number>(
      'marketplace.maxBrandDescription',
      500,
    );
  }

  async findAll(query: BrandQueryDto): Promise<Paginated<Brand>> {
    const window = resolvePage(query);
    const { rows, total } = await this.brandsRepository.findMany({
      search: query.search || undefined,
      isActive: query.isActive ?? true,
      limit: window.limit,
      offset: window.offset,
    });
    return toPaginated(rows, total, window);
  }

  async findOne(id: number): Promise<Brand> {
    const brand = await this.brandsRepository.findById(id);
    if (!brand) {
      throw new NotFoundException('Brand not found');
    }
    return brand;
  }

  async create(dto: CreateBrandDto): Promise<Brand> {
    this.assertDescription(dto.description);
    if (await this.brandsRepository.existsWithName(dto.name)) {
      throw new BadRequestException('Brand name already registered');
    }

    const brand = await this.brandsRepository.create(
      dto.name,
      dto.description || null,
    );
    this.logger.logBusiness('create', 'brand', brand.id);
    return brand;
  }

  async update(id: number, dto: UpdateBrandDto): Promise<Brand> {
    await this.findOne(id);
    this.assertDescription(dto.description);
    if (
      dto.name !== undefined &&
      (await this.brandsRepository.existsWithName(dto.name, id))
    ) {
      throw new BadRequestException('Brand name already registered');
    }

    const brand = await this.brandsRepository.update(id, {
      name: dto.name,
      description:
        dto.description === undefined ? undefined : dto.description || null,
    });
    this.logger.logBusiness('update', 'brand', id);
    return brand;
  }

  async setActive(id: number, isActive: boolean): Promise<Brand> {
    await this.findOne(id);
    const brand = await this.brandsRepository.update(id, { isActive });
    this.logger.logBusiness(isActive ? 'activate' : 'deactivate', 'brand', id);
    return brand;
  }

  async remove(id: number): Promise<void> {
    await this.findOne(id);
    const cars = await this.brandsRepository.countCars(id);
    if (cars > 0) {
      throw new BadRequestException(
        `Brand has ${cars} car(s) registered and cannot be deleted`,
      );
    }
    await this.brandsRepository.delete(id);
    this.logger.logBusiness('delete', 'brand', id);
  }

  private assertDescription(description?: string): void {
    if (description && description.length > this.maxDescriptionLength) {
      throw new BadRequestException(
        `description must be at most ${this.maxDescriptionLength} characters`,
      );
    }
  }
}
