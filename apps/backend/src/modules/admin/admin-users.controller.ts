import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AdminOnly } from '../../common/decorators/admin-only.decorator';
import type { Paginated } from '../../common/utils/pagination';
import { UpdateRoleDto } from '../users/dto/update-role.dto';
import { UserQueryDto } from '../users/dto/user-query.dto';
import type { PublicUser } from '../users/interfaces/user.interface';
import { UsersService } from '../users/users.service';

@ApiTags('Admin Management')
@AdminOnly()
@Controller('admin/users')
export class AdminUsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  @ApiOperation({ summary: 'List users with search and pagination' })
  async findAll(@Query() query: UserQueryDto): Promise<Paginated<PublicUser>> {
    return await this.usersService.findAll(query);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a user' })
  @ApiResponse({ status: 404, description: 'User not found' })
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<PublicUser> {
    return await this.usersService.findOne(id);
  }

  @Patch(':id/activate')
  @ApiOperation({ summary: 'Activate a user' })
  async activate(@Param('id', ParseIntPipe) id: number): Promise<PublicUser> {
    return await this.usersService.setActive(id, true);
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate a user; their tokens stop working' })
  async deactivate(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<PublicUser> {
    return await this.usersService.setActive(id, false);
  }

  @Patch(':id/role')
  @ApiOperation({ summary: 'Change the role of a user' })
  async changeRole(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateRoleDto: UpdateRoleDto,
  ): Promise<PublicUser> {
    return await this.usersService.setRole(id, updateRoleDto.role);
  }
}
