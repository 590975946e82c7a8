import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AdminOnly } from '../../common/decorators/admin-only.decorator';
import { currentUser } from '../../common/decorators/current-user.decorator';
import { CarStatus } from '../../common/enums/app.enums';
import type { Paginated } from '../../common/utils/pagination';
import type { AuthenticatedPrincipal } from '../auth/interfaces/authenticated-principal.interface';
import { CarsService } from '../cars/cars.service';
import { AdminCreateCarDto } from '../cars/dto/admin-create-car.dto';
import { AdminCarQueryDto } from '../cars/dto/car-query.dto';
import { UpdateCarStatusDto } from '../cars/dto/update-car-status.dto';
import type { Car } from '../cars/interfaces/car.interface';

@ApiTags('Admin Management')
@AdminOnly()
@Controller('admin/cars')
export class AdminCarsController {
  constructor(private readonly carsService: CarsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a car for any owner' })
  @ApiResponse({
    status: 400,
    description: 'Validation error, unknown brand or owner, duplicate plate',
  })
  async create(@Body() createCarDto: AdminCreateCarDto): Promise<Car> {
    return await this.carsService.create(createCarDto, createCarDto.ownerId);
  }

  @Get()
  @ApiOperation({ summary: 'List cars, optionally by status' })
  async findAll(@Query() query: AdminCarQueryDto): Promise<Paginated<Car>> {
    return await this.carsService.findAll(query);
  }

  @Patch(':id/status')
  @ApiOperation({ summary: 'Change the status of a car' })
  async setStatus(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateCarStatusDto: UpdateCarStatusDto,
  ): Promise<Car> {
    return await this.carsService.setStatus(id, updateCarStatusDto.status);
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Mark a car as unavailable' })
  async deactivate(@Param('id', ParseIntPipe) id: number): Promise<Car> {
    return await this.carsService.setStatus(id, CarStatus.UNAVAILABLE);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete any car' })
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @currentUser() user: AuthenticatedPrincipal,
  ): Promise<void> {
    await this.carsService.remove(id, user);
  }
}
