import { Inject, Injectable } from '@nestjs/common';
import { Role } from '../../../common/enums/role.enum';
import { USER_LOOKUP } from '../auth.constants';
import {
  ForbiddenError,
  TokenError,
  UnauthenticatedError,
} from '../errors/auth.errors';
import type { AuthenticatedPrincipal } from '../interfaces/authenticated-principal.interface';
import { TokenKind } from '../interfaces/token-claims.interface';
import type { UserLookup } from '../interfaces/user-lookup.interface';
import { TokenCodecService } from './token-codec.service';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * Per-request authentication and the role/ownership decisions built on it.
 *
 * `authenticate` always re-reads the user, so a deactivation or role change
 * takes effect on the next request even while older access tokens are
 * still unexpired. The decision helpers are pure and compose: "owner or
 * admin" is a role check followed by `requireOwnership`.
 */
@Injectable()
export class AccessControlService {
  constructor(
    private readonly tokenCodec: TokenCodecService,
    @Inject(USER_LOOKUP) private readonly users: UserLookup,
  ) {}

  async authenticate(token: string): Promise<AuthenticatedPrincipal> {
    let subject: number;
    try {
      subject = this.tokenCodec.decode(token, TokenKind.ACCESS).subject;
    } catch (error) {
      if (error instanceof TokenError) {
        throw new UnauthenticatedError(error.reason, error);
      }
      throw error;
    }

    const user = await this.users.findByReference(subject);
    if (!user) {
      throw new UnauthenticatedError('user_not_found');
    }
    if (!user.isActive) {
      throw new UnauthenticatedError('user_inactive');
    }

    return { reference: user.reference, role: user.role, isActive: true };
  }

  async authenticateHeader(
    authorization?: string,
  ): Promise<AuthenticatedPrincipal> {
    const match = authorization ? BEARER_PATTERN.exec(authorization) : null;
    if (!match) {
      throw new UnauthenticatedError('missing_token');
    }
    return this.authenticate(match[1]);
  }

  requireRole(principal: AuthenticatedPrincipal, role: Role): void {
    if (principal.role !== role) {
      throw new ForbiddenError(
        'role_required',
        role === Role.ADMIN
          ? 'Administrator privileges required'
          : `Role '${role}' required`,
        role,
      );
    }
  }

  requireOwnership(
    principal: AuthenticatedPrincipal,
    ownerReference: number,
  ): void {
    if (principal.reference !== ownerReference) {
      throw new ForbiddenError(
        'ownership_required',
        'You do not have permission to modify this resource',
      );
    }
  }
}
