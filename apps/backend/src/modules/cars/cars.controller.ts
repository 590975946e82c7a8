import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Authenticated } from '../../common/decorators/authenticated.decorator';
import { currentUser } from '../../common/decorators/current-user.decorator';
import { publicDecorator } from '../../common/decorators/public.decorator';
import type { Paginated } from '../../common/utils/pagination';
import type { AuthenticatedPrincipal } from '../auth/interfaces/authenticated-principal.interface';
import { CarsService } from './cars.service';
import { CarQueryDto } from './dto/car-query.dto';
import { CreateCarDto } from './dto/create-car.dto';
import { UpdateCarDto } from './dto/update-car.dto';
import type { Car } from './interfaces/car.interface';

@ApiTags('Cars')
@Controller('cars')
export class CarsController {
  constructor(private readonly carsService: CarsService) {}

  @Post()
  @Authenticated()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'List a car owned by the caller' })
  @ApiResponse({
    status: 400,
    description: 'Validation error, unknown brand or duplicate plate',
  })
  async create(
    @Body() createCarDto: CreateCarDto,
    @currentUser() user: AuthenticatedPrincipal,
  ): Promise<Car> {
    return await this.carsService.create(createCarDto, user.reference);
  }

  @publicDecorator()
  @Get()
  @ApiOperation({ summary: 'Search cars' })
  async findAll(@Query() query: CarQueryDto): Promise<Paginated<Car>> {
    return await this.carsService.findAll(query);
  }

  @publicDecorator()
  @Get(':id')
  @ApiOperation({ summary: 'Get a car' })
  @ApiResponse({ status: 404, description: 'Car not found' })
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<Car> {
    return await this.carsService.findOne(id);
  }

  @Put(':id')
  @Authenticated()
  @ApiOperation({ summary: 'Update a car (owner or admin)' })
  @ApiResponse({ status: 403, description: 'Caller is not the owner' })
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateCarDto: UpdateCarDto,
    @currentUser() user: AuthenticatedPrincipal,
  ): Promise<Car> {
    return await this.carsService.update(id, updateCarDto, user);
  }

  @Delete(':id')
  @Authenticated()
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a car (owner or admin)' })
  @ApiResponse({ status: 403, description: 'Caller is not the owner' })
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @currentUser() user: AuthenticatedPrincipal,
  ): Promise<void> {
    await this.carsService.remove(id, user);
  }
}
