import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticatedPrincipal } from '../../modules/auth/interfaces/authenticated-principal.interface';
import { UnauthenticatedError } from '../../modules/auth/errors/auth.errors';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

export const currentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedPrincipal => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new UnauthenticatedError('missing_token');
    }
    return request.user;
  },
);
