import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { AuthService } from '../auth.service';
import { AUTH_CLOCK, AUTH_SETTINGS, USER_LOOKUP } from '../auth.constants';
import {
  InvalidCredentialsError,
  TokenExpiredError,
  TokenInvalidError,
  TokenKindMismatchError,
} from '../errors/auth.errors';
import type { AuthSettings } from '../interfaces/auth-settings.interface';
import type { Clock } from '../interfaces/clock.interface';
import { TokenKind } from '../interfaces/token-claims.interface';
import type {
  UserLookup,
  UserRecord,
} from '../interfaces/user-lookup.interface';
import { TokenCodecService } from '../services/token-codec.service';
import { Role } from '../../../common/enums/role.enum';
import { AppLoggerService } from '../../../common/services/app-logger.service';
import { PasswordHasherService } from '../../../common/services/password-hasher.service';

const settings: AuthSettings = {
  signingSecret: 'test-secret-signing-key',
  signingAlgorithm: 'HS256',
  accessTokenTtlSeconds: 1800,
  refreshTokenTtlSeconds: 86400,
};

const hashSettings: Record<string, number> = {
  'passwordHash.memoryCost': 4096,
  'passwordHash.timeCost': 2,
};

class InMemoryUserLookup implements UserLookup {
  readonly byEmail = new Map<string, UserRecord>();

  add(email: string, record: UserRecord): void {
    this.byEmail.set(email, record);
  }

  async findByIdentifier(email: string): Promise<UserRecord | null> {
    return this.byEmail.get(email) ?? null;
  }

  async findByReference(reference: number): Promise<UserRecord | null> {
    for (const record of this.byEmail.values()) {
      if (record.reference === reference) return record;
    }
    return null;
  }
}

describe('AuthService', () => {
  let service: AuthService;
  let codec: TokenCodecService;
  let hasher: PasswordHasherService;
  let users: InMemoryUserLookup;
  let now: Date;
  let logSecurity: jest.Mock;

  const clock: Clock = { now: () => now };

  beforeEach(async () => {
    users = new InMemoryUserLookup();
    now = new Date('2030-01-01T00:00:00Z');
    logSecurity = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      imports: [JwtModule.register({})],
      providers: [
        AuthService,
        TokenCodecService,
        PasswordHasherService,
        { provide: USER_LOOKUP, useValue: users },
        { provide: AUTH_SETTINGS, useValue: settings },
        { provide: AUTH_CLOCK, useValue: clock },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => hashSettings[key]) },
        },
        {
          provide: AppLoggerService,
          useValue: { logSecurity, logBusiness: jest.fn() },
        },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
    codec = module.get<TokenCodecService>(TokenCodecService);
    hasher = module.get<PasswordHasherService>(PasswordHasherService);

    users.add('driver@example.com', {
      reference: 42,
      passwordHash: await hasher.hash('secret123'),
      role: Role.USER,
      isActive: true,
    });
  });

  describe('login', () => {
    it('should issue an access/refresh pair for valid credentials', async () => {
      const result = await service.login('driver@example.com', 'secret123');

      expect(result.token_type).toBe('bearer');
      expect(codec.decode(result.access_token, TokenKind.ACCESS)).toEqual(
        expect.objectContaining({ subject: 42, role: Role.USER }),
      );
      expect(codec.decode(result.refresh_token, TokenKind.REFRESH)).toEqual(
        expect.objectContaining({ subject: 42, kind: TokenKind.REFRESH }),
      );
    });

    it('should reject an unknown email, an inactive account and a wrong password alike', async () => {
      users.add('idle@example.com', {
        reference: 43,
        passwordHash: await hasher.hash('secret123'),
        role: Role.USER,
        isActive: false,
      });

      const attempts: Array<[string, string]> = [
        ['ghost@example.com', 'secret123'],
        ['idle@example.com', 'secret123'],
        ['driver@example.com', 'wrong999'],
      ];

      for (const [email, password] of attempts) {
        const attempt = service.login(email, password);
        await expect(attempt).rejects.toBeInstanceOf(InvalidCredentialsError);
        await expect(attempt).rejects.toThrow('Invalid email or password');
      }
      expect(logSecurity).toHaveBeenCalledWith('Login rejected', {
        reason: 'user_not_found',
      });
      expect(logSecurity).toHaveBeenCalledWith('Login rejected', {
        reason: 'user_inactive',
        userId: 43,
      });
      expect(logSecurity).toHaveBeenCalledWith('Login rejected', {
        reason: 'wrong_password',
        userId: 42,
      });
    });
  });

  describe('refresh', () => {
    it('should issue an access token carrying the current role', async () => {
      const { refresh_token } = await service.login(
        'driver@example.com',
        'secret123',
      );
      users.add('driver@example.com', {
        reference: 42,
        passwordHash: 'unchanged',
        role: Role.ADMIN,
        isActive: true,
      });

      const result = await service.refresh(refresh_token);

      expect(result).toEqual({
        access_token: expect.any(String),
        token_type: 'bearer',
      });
      expect(codec.decode(result.access_token, TokenKind.ACCESS).role).toBe(
        Role.ADMIN,
      );
    });

    it('should keep the refresh token usable after refreshing', async () => {
      const { refresh_token } = await service.login(
        'driver@example.com',
        'secret123',
      );

      await service.refresh(refresh_token);

      await expect(service.refresh(refresh_token)).resolves.toEqual(
        expect.objectContaining({ token_type: 'bearer' }),
      );
    });

    it('should refuse an access token', async () => {
      const { access_token } = await service.login(
        'driver@example.com',
        'secret123',
      );

      await expect(service.refresh(access_token)).rejects.toBeInstanceOf(
        TokenKindMismatchError,
      );
      expect(logSecurity).toHaveBeenCalledWith('Refresh rejected', {
        reason: 'token_kind_mismatch',
      });
    });

    it('should refuse an expired refresh token', async () => {
      const { refresh_token } = await service.login(
        'driver@example.com',
        'secret123',
      );
      now = new Date(now.getTime() + 86400 * 1000);

      await expect(service.refresh(refresh_token)).rejects.toBeInstanceOf(
        TokenExpiredError,
      );
    });

    it('should refuse a garbage token', async () => {
      await expect(service.refresh('garbage')).rejects.toBeInstanceOf(
        TokenInvalidError,
      );
    });

    it('should refuse a refresh token whose user was deactivated', async () => {
      const { refresh_token } = await service.login(
        'driver@example.com',
        'secret123',
      );
      users.add('driver@example.com', {
        reference: 42,
        passwordHash: 'unchanged',
        role: Role.USER,
        isActive: false,
      });

      await expect(service.refresh(refresh_token)).rejects.toBeInstanceOf(
        InvalidCredentialsError,
      );
    });

    it('should refuse a refresh token whose user no longer exists', async () => {
      const { refresh_token } = await service.login(
        'driver@example.com',
        'secret123',
      );
      users.byEmail.clear();

      await expect(service.refresh(refresh_token)).rejects.toBeInstanceOf(
        InvalidCredentialsError,
      );
      expect(logSecurity).toHaveBeenCalledWith('Refresh rejected', {
        reason: 'user_not_found',
        userId: 42,
      });
    });
  });
});
