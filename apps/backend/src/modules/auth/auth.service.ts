import { Inject, Injectable } from '@nestjs/common';
import { tokens } from '../../common/constants/app.constants';
import { AppLoggerService } from '../../common/services/app-logger.service';
import { PasswordHasherService } from '../../common/services/password-hasher.service';
import { USER_LOOKUP } from './auth.constants';
import { InvalidCredentialsError, TokenError } from './errors/auth.errors';
import type {
  LoginResponse,
  RefreshResponse,
} from './interfaces/auth-response.interface';
import { TokenKind } from './interfaces/token-claims.interface';
import type { UserLookup } from './interfaces/user-lookup.interface';
import { TokenCodecService } from './services/token-codec.service';

@Injectable()
export class AuthService {
  constructor(
    @Inject(USER_LOOKUP) private readonly users: UserLookup,
    private readonly passwordHasher: PasswordHasherService,
    private readonly tokenCodec: TokenCodecService,
    private readonly logger: AppLoggerService,
  ) {}

  async login(email: string, password: string): Promise<LoginResponse> {
    const user = await this.users.findByIdentifier(email);

    if (!user) {
      this.logger.logSecurity('Login rejected', { reason: 'user_not_found' });
      throw new InvalidCredentialsError();
    }

    if (!user.isActive) {
      this.logger.logSecurity('Login rejected', {
        reason: 'user_inactive',
        userId: user.reference,
      });
      throw new InvalidCredentialsError();
    }

    const isPasswordValid = await this.passwordHasher.verify(
      password,
      user.passwordHash,
    );
    if (!isPasswordValid) {
      this.logger.logSecurity('Login rejected', {
        reason: 'wrong_password',
        userId: user.reference,
      });
      throw new InvalidCredentialsError();
    }

    const accessToken = this.tokenCodec.encode({
      kind: TokenKind.ACCESS,
      subject: user.reference,
      role: user.role,
    });
    const refreshToken = this.tokenCodec.encode({
      kind: TokenKind.REFRESH,
      subject: user.reference,
    });

    this.logger.logBusiness('login', 'user', user.reference);

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
      token_type: tokens.TYPE,
    };
  }

  /**
   * Issues a new access token from a refresh token. The refresh token itself
   * stays valid until it expires.
   */
  async refresh(refreshToken: string): Promise<RefreshResponse> {
    let subject: number;
    try {
      subject = this.tokenCodec.decode(refreshToken, TokenKind.REFRESH).subject;
    } catch (error) {
      if (error instanceof TokenError) {
        this.logger.logSecurity('Refresh rejected', { reason: error.reason });
      }
      throw error;
    }

    const user = await this.users.findByReference(subject);
    if (!user || !user.isActive) {
      this.logger.logSecurity('Refresh rejected', {
        reason: user ? 'user_inactive' : 'user_not_found',
        userId: subject,
      });
      throw new InvalidCredentialsError();
    }

    const accessToken = this.tokenCodec.encode({
      kind: TokenKind.ACCESS,
      subject: user.reference,
      role: user.role,
    });

    this.logger.logBusiness('refresh', 'user', user.reference);

    return { access_token: accessToken, token_type: tokens.TYPE };
  }
}
