import { Module } from '@nestjs/common';
import { BrandsModule } from '../brands/brands.module';
import { CarsModule } from '../cars/cars.module';
import { UsersModule } from '../users/users.module';
import { AdminBrandsController } from './admin-brands.controller';
import { AdminCarsController } from './admin-cars.controller';
import { AdminUsersController } from './admin-users.controller';
import { AdminSeedService } from './admin-seed.service';

@Module({
  imports: [UsersModule, BrandsModule, CarsModule],
  controllers: [AdminUsersController, AdminBrandsController, AdminCarsController],
  providers: [AdminSeedService],
})
export class AdminModule {}
