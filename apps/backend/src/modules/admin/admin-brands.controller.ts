import {
  Body,
  Controller,
  Delete,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AdminOnly } from '../../common/decorators/admin-only.decorator';
import { BrandsService } from '../brands/brands.service';
import { CreateBrandDto } from '../brands/dto/create-brand.dto';
import { UpdateBrandDto } from '../brands/dto/update-brand.dto';
import type { Brand } from '../brands/interfaces/brand.interface';

@ApiTags('Admin Management')
@AdminOnly()
@Controller('admin/brands')
export class AdminBrandsController {
  constructor(private readonly brandsService: BrandsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a brand' })
  @ApiResponse({ status: 400, description: 'Validation error or duplicate' })
  async create(@Body() createBrandDto: CreateBrandDto): Promise<Brand> {
    return await this.brandsService.create(createBrandDto);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update a brand' })
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateBrandDto: UpdateBrandDto,
  ): Promise<Brand> {
    return await this.brandsService.update(id, updateBrandDto);
  }

  @Patch(':id/activate')
  @ApiOperation({ summary: 'Activate a brand' })
  async activate(@Param('id', ParseIntPipe) id: number): Promise<Brand> {
    return await this.brandsService.setActive(id, true);
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate a brand' })
  async deactivate(@Param('id', ParseIntPipe) id: number): Promise<Brand> {
    return await this.brandsService.setActive(id, false);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a brand without cars' })
  @ApiResponse({ status: 400, description: 'Brand still has cars' })
  @ApiResponse({ status: 404, description: 'Brand not found' })
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.brandsService.remove(id);
  }
}
