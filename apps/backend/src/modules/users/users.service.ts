import {
  BadRequestException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { Role } from '../../common/enums/role.enum';
import { AppLoggerService } from '../../common/services/app-logger.service';
import { PasswordHasherService } from '../../common/services/password-hasher.service';
import {
  Paginated,
  resolvePage,
  toPaginated,
} from '../../common/utils/pagination';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { UserQueryDto } from './dto/user-query.dto';
import type { PublicUser, User, UserPatch } from './interfaces/user.interface';
import { UsersRepository } from './users.repository';

export const toPublicUser = ({
  passwordHash: _passwordHash,
  ...user
}: User): PublicUser => user;

@Injectable()
export class UsersService {
  constructor(
    private readonly usersRepository: UsersRepository,
    private readonly passwordHasher: PasswordHasherService,
    private readonly logger: AppLoggerService,
  ) {}

  async register(dto: CreateUserDto): Promise<PublicUser> {
    return this.createAccount(dto, Role.USER);
  }

  /**
   * Creates an account with the given role. Used by registration and by
   * the initial administrator seed.
   */
  async createAccount(dto: CreateUserDto, role: Role): Promise<PublicUser> {
    await this.assertUnique(dto.username, dto.email);

    const user = await this.usersRepository.create({
      username: dto.username,
      fullName: dto.fullName,
      email: dto.email,
      passwordHash: await this.passwordHasher.hash(dto.password),
      role,
      isActive: true,
    });

    this.logger.logBusiness('create', 'user', user.id, { role });
    return toPublicUser(user);
  }

  async findOne(id: number): Promise<PublicUser> {
    return toPublicUser(await this.getUser(id));
  }

  async findAll(query: UserQueryDto): Promise<Paginated<PublicUser>> {
    const window = resolvePage(query);
    const { rows, total } = await this.usersRepository.findMany({
      search: query.search || undefined,
      limit: window.limit,
      offset: window.offset,
    });
    return toPaginated(rows.map(toPublicUser), total, window);
  }

  async update(id: number, dto: UpdateUserDto): Promise<PublicUser> {
    await this.getUser(id);
    await this.assertUnique(dto.username, dto.email, id);

    const patch: UserPatch = {
      username: dto.username,
      fullName: dto.fullName,
      email: dto.email,
    };
    if (dto.password !== undefined) {
      patch.passwordHash = await this.passwordHasher.hash(dto.password);
    }

    const user = await this.usersRepository.update(id, patch);
    this.logger.logBusiness('update', 'user', id);
    return toPublicUser(user);
  }

  async remove(id: number): Promise<void> {
    const deleted = await this.usersRepository.delete(id);
    if (!deleted) {
      throw new NotFoundException('User not found');
    }
    this.logger.logBusiness('delete', 'user', id);
  }

  async setActive(id: number, isActive: boolean): Promise<PublicUser> {
    await this.getUser(id);
    const user = await this.usersRepository.update(id, { isActive });
    this.logger.logBusiness(isActive ? 'activate' : 'deactivate', 'user', id);
    return toPublicUser(user);
  }

  async setRole(id: number, role: Role): Promise<PublicUser> {
    await this.getUser(id);
    const user = await this.usersRepository.update(id, { role });
    this.logger.logBusiness('change role', 'user', id, { role });
    return toPublicUser(user);
  }

  async hasAdministrator(): Promise<boolean> {
    return (await this.usersRepository.countByRole(Role.ADMIN)) > 0;
  }

  private async getUser(id: number): Promise<User> {
    const user = await this.usersRepository.findById(id);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return user;
  }

  private async assertUnique(
    username?: string,
    email?: string,
    excludeId?: number,
  ): Promise<void> {
    if (
      username !== undefined &&
      (await this.usersRepository.existsWithUsername(username, excludeId))
    ) {
      throw new BadRequestException('Username already registered');
    }
    if (
      email !== undefined &&
      (await this.usersRepository.existsWithEmail(email, excludeId))
    ) {
      throw new BadRequestException('Email already registered');
    }
  }
}
