import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import type { Role } from '../../../common/enums/role.enum';
import {
  CREDENTIALS_MESSAGE,
  INVALID_LOGIN_MESSAGE,
} from '../auth.constants';

export type TokenErrorReason =
  | 'token_invalid'
  | 'token_expired'
  | 'token_kind_mismatch';

export type UnauthenticatedReason =
  | TokenErrorReason
  | 'missing_token'
  | 'user_not_found'
  | 'user_inactive';

export type ForbiddenReason = 'role_required' | 'ownership_required';

/**
 * Login or refresh failed. Unknown account, inactive account and wrong
 * password are indistinguishable to the caller.
 */
export class InvalidCredentialsError extends UnauthorizedException {
  constructor() {
    super(INVALID_LOGIN_MESSAGE);
  }
}

export abstract class TokenError extends UnauthorizedException {
  abstract readonly reason: TokenErrorReason;

  constructor(cause?: unknown) {
    super(CREDENTIALS_MESSAGE, { cause });
  }
}

export class TokenInvalidError extends TokenError {
  readonly reason = 'token_invalid';
}

export class TokenExpiredError extends TokenError {
  readonly reason = 'token_expired';
}

export class TokenKindMismatchError extends TokenError {
  readonly reason = 'token_kind_mismatch';
}

export class UnauthenticatedError extends UnauthorizedException {
  constructor(
    readonly reason: UnauthenticatedReason,
    cause?: unknown,
  ) {
    super(CREDENTIALS_MESSAGE, { cause });
  }
}

/** `requiredRole` is set when `reason` is `role_required`. */
export class ForbiddenError extends ForbiddenException {
  constructor(
    readonly reason: ForbiddenReason,
    message: string,
    readonly requiredRole?: Role,
  ) {
    super(message);
  }
}
