import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { publicDecorator } from '../../common/decorators/public.decorator';
import type { Paginated } from '../../common/utils/pagination';
import { BrandsService } from './brands.service';
import { BrandQueryDto } from './dto/brand-query.dto';
import type { Brand } from './interfaces/brand.interface';

@ApiTags('Brands')
@publicDecorator()
@Controller('brands')
export class BrandsController {
  constructor(private readonly brandsService: BrandsService) {}

  @Get()
  @ApiOperation({ summary: 'List brands' })
  async findAll(@Query() query: BrandQueryDto): Promise<Paginated<Brand>> {
    return await this.brandsService.findAll(query);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a brand' })
  @ApiResponse({ status: 404, description: 'Brand not found' })
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<Brand> {
    return await this.brandsService.findOne(id);
  }
}
