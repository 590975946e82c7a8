import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { isPublicKey } from '../decorators/public.decorator';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';
import { AppLoggerService } from '../services/app-logger.service';
import type { AuthenticatedPrincipal } from '../../modules/auth/interfaces/authenticated-principal.interface';
import { UnauthenticatedError } from '../../modules/auth/errors/auth.errors';
import { AccessControlService } from '../../modules/auth/services/access-control.service';

/**
 * Resolves the bearer token of every non-public route into a principal
 * and attaches it to `request.user`.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly accessControl: AccessControlService,
    private readonly logger: AppLoggerService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(
      isPublicKey,
      [context.getHandler(), context.getClass()],
    );
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    let principal: AuthenticatedPrincipal;
    try {
      principal = await this.accessControl.authenticateHeader(
        request.headers.authorization,
      );
    } catch (error) {
      if (error instanceof UnauthenticatedError) {
        this.logger.logSecurity('Authentication rejected', {
          reason: error.reason,
          method: request.method,
          url: request.originalUrl,
        });
      }
      throw error;
    }

    request.user = principal;
    return true;
  }
}
