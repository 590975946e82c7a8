import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { BrandsModule } from '../brands/brands.module';
import { UsersModule } from '../users/users.module';
import { CarsController } from './cars.controller';
import { CarsRepository } from './cars.repository';
import { CarsService } from './cars.service';

@Module({
  imports: [AuthModule, BrandsModule, UsersModule],
  controllers: [CarsController],
  providers: [CarsRepository, CarsService],
  exports: [CarsService],
})
export class CarsModule {}
