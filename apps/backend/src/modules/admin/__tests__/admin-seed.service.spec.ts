import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { Role } from '../../../common/enums/role.enum';
import { UsersService } from '../../users/users.service';
import { AdminSeedService } from '../admin-seed.service';

describe('AdminSeedService', () => {
  let service: AdminSeedService;
  let settings: Record<string, string | undefined>;
  const usersService = {
    hasAdministrator: jest.fn(),
    createAccount: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    settings = {
      'seed.adminEmail': 'Root@Example.com',
      'seed.adminPassword': 'admin-secret',
      'seed.adminUsername': 'administrator',
    };
    usersService.hasAdministrator.mockResolvedValue(false);
    usersService.createAccount.mockImplementation(async (dto) => ({
      id: 1,
      email: dto.email,
    }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdminSeedService,
        { provide: UsersService, useValue: usersService },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn(
              (key: string, fallback?: string) => settings[key] ?? fallback,
            ),
          },
        },
      ],
    }).compile();

    service = module.get<AdminSeedService>(AdminSeedService);
  });

  it('should create the first administrator', async () => {
    await expect(service.seed()).resolves.toBe(true);

    expect(usersService.createAccount).toHaveBeenCalledWith(
      {
        username: 'administrator',
        fullName: 'Administrator',
        email: 'root@example.com',
        password: 'admin-secret',
      },
      Role.ADMIN,
    );
  });

  it('should do nothing when an administrator exists', async () => {
    usersService.hasAdministrator.mockResolvedValue(true);

    await expect(service.seed()).resolves.toBe(false);
    expect(usersService.createAccount).not.toHaveBeenCalled();
  });

  it('should skip when credentials are not configured', async () => {
    settings['seed.adminPassword'] = undefined;

    await expect(service.seed()).resolves.toBe(false);
    expect(usersService.hasAdministrator).not.toHaveBeenCalled();
  });
});
