import type { Role } from '../../../common/enums/role.enum';

export enum TokenKind {
  ACCESS = 'access',
  REFRESH = 'refresh',
}

export interface AccessTokenClaims {
  readonly kind: TokenKind.ACCESS;
  readonly subject: number;
  readonly role: Role;
  readonly issuedAt: Date;
  readonly expiresAt: Date;
}

export interface RefreshTokenClaims {
  readonly kind: TokenKind.REFRESH;
  readonly subject: number;
  readonly issuedAt: Date;
  readonly expiresAt: Date;
}

export type TokenClaims = AccessTokenClaims | RefreshTokenClaims;

/**
 * What a caller hands to the codec; timestamps are stamped at encode time.
 */
export type UnsignedTokenClaims =
  | Pick<AccessTokenClaims, 'kind' | 'subject' | 'role'>
  | Pick<RefreshTokenClaims, 'kind' | 'subject'>;
