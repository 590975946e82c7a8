import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Put,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Authenticated } from '../../common/decorators/authenticated.decorator';
import { currentUser } from '../../common/decorators/current-user.decorator';
import { publicDecorator } from '../../common/decorators/public.decorator';
import type { AuthenticatedPrincipal } from '../auth/interfaces/authenticated-principal.interface';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import type { PublicUser } from './interfaces/user.interface';
import { UsersService } from './users.service';

@ApiTags('Users')
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @publicDecorator()
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Register a new user' })
  @ApiResponse({ status: 201, description: 'User registered successfully' })
  @ApiResponse({
    status: 400,
    description: 'Bad request - validation errors or user already exists',
  })
  async register(@Body() createUserDto: CreateUserDto): Promise<PublicUser> {
    return await this.usersService.register(createUserDto);
  }

  @Get('me')
  @Authenticated()
  @ApiOperation({ summary: 'Get current user profile' })
  async getProfile(
    @currentUser() user: AuthenticatedPrincipal,
  ): Promise<PublicUser> {
    return await this.usersService.findOne(user.reference);
  }

  @Put('me')
  @Authenticated()
  @ApiOperation({ summary: 'Update current user profile' })
  @ApiResponse({ status: 400, description: 'Validation error or duplicate' })
  async updateProfile(
    @currentUser() user: AuthenticatedPrincipal,
    @Body() updateUserDto: UpdateUserDto,
  ): Promise<PublicUser> {
    return await this.usersService.update(user.reference, updateUserDto);
  }

  @Delete('me')
  @Authenticated()
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete current user and their cars' })
  async removeProfile(
    @currentUser() user: AuthenticatedPrincipal,
  ): Promise<void> {
    await this.usersService.remove(user.reference);
  }
}
