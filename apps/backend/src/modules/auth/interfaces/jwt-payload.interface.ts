import type { Role } from '../../../common/enums/role.enum';
import type { TokenKind } from './token-claims.interface';

/**
 * Claims as they travel inside the signed token.
 */
export interface JwtPayload {
  sub: string; // decimal user id
  role?: Role; // access tokens only
  type: TokenKind;
  iat: number; // seconds
  exp: number; // seconds
}
