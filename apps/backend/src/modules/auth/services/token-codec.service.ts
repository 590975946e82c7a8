import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { isRole } from '../../../common/enums/role.enum';
import { AUTH_CLOCK, AUTH_SETTINGS } from '../auth.constants';
import {
  TokenExpiredError,
  TokenInvalidError,
  TokenKindMismatchError,
} from '../errors/auth.errors';
import type { AuthSettings } from '../interfaces/auth-settings.interface';
import type { Clock } from '../interfaces/clock.interface';
import type { JwtPayload } from '../interfaces/jwt-payload.interface';
import {
  AccessTokenClaims,
  RefreshTokenClaims,
  TokenClaims,
  TokenKind,
  UnsignedTokenClaims,
} from '../interfaces/token-claims.interface';

const SUBJECT_PATTERN = /^[1-9]\d*$/;

const isTokenKind = (value: unknown): value is TokenKind =>
  Object.values(TokenKind).some((kind) => kind === value);

const isTimestamp = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

/**
 * Signs and verifies the access/refresh JWT pair.
 *
 * Lifecycle of a token: encoded here with the injected clock's "now", then
 * decoded into either typed claims or one of the three token errors. The
 * kind is checked on every decode, so a refresh token is never accepted
 * where an access token is expected and vice versa.
 */
@Injectable()
export class TokenCodecService {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(AUTH_SETTINGS) private readonly settings: AuthSettings,
    @Inject(AUTH_CLOCK) private readonly clock: Clock,
  ) {}

  encode(claims: UnsignedTokenClaims): string {
    const issuedAt = this.nowSeconds();
    const ttl =
      claims.kind === TokenKind.ACCESS
        ? this.settings.accessTokenTtlSeconds
        : this.settings.refreshTokenTtlSeconds;

    const payload: JwtPayload = {
      sub: String(claims.subject),
      ...(claims.kind === TokenKind.ACCESS ? { role: claims.role } : {}),
      type: claims.kind,
      iat: issuedAt,
      exp: issuedAt + ttl,
    };

    return this.jwtService.sign(payload, {
      secret: this.settings.signingSecret,
      algorithm: this.settings.signingAlgorithm,
    });
  }

  decode(token: string, expectedKind: TokenKind.ACCESS): AccessTokenClaims;
  decode(token: string, expectedKind: TokenKind.REFRESH): RefreshTokenClaims;
  decode(token: string, expectedKind: TokenKind): TokenClaims;
  decode(token: string, expectedKind: TokenKind): TokenClaims {
    const claims = this.toClaims(this.verify(token));

    if (claims.kind !== expectedKind) {
      throw new TokenKindMismatchError();
    }

    return claims;
  }

  private verify(token: string): Record<string, unknown> {
    try {
      return this.jwtService.verify<Record<string, unknown>>(token, {
        secret: this.settings.signingSecret,
        algorithms: [this.settings.signingAlgorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TokenExpiredError') {
        throw new TokenExpiredError(error);
      }
      throw new TokenInvalidError(error);
    }
  }

  private toClaims(payload: Record<string, unknown>): TokenClaims {
    if (typeof payload !== 'object' || payload === null) {
      throw new TokenInvalidError();
    }

    const { sub, role, type, iat, exp } = payload;
    if (
      typeof sub !== 'string' ||
      !SUBJECT_PATTERN.test(sub) ||
      !isTokenKind(type) ||
      !isTimestamp(iat) ||
      !isTimestamp(exp)
    ) {
      throw new TokenInvalidError();
    }

    const subject = Number(sub);
    if (!Number.isSafeInteger(subject)) {
      throw new TokenInvalidError();
    }

    const issuedAt = new Date(iat * 1000);
    const expiresAt = new Date(exp * 1000);

    if (type === TokenKind.ACCESS) {
      if (!isRole(role)) {
        throw new TokenInvalidError();
      }
      return { kind: TokenKind.ACCESS, subject, role, issuedAt, expiresAt };
    }

    // refresh tokens never carry a role
    if (role !== undefined) {
      throw new TokenInvalidError();
    }
    return { kind: TokenKind.REFRESH, subject, issuedAt, expiresAt };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock.now().getTime() / 1000);
  }
}
