import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { REQUIRED_ROLE_KEY } from '../decorators/roles.decorator';
import { Role } from '../enums/role.enum';
import { AccessControlService } from '../../modules/auth/services/access-control.service';
import { UnauthenticatedError } from '../../modules/auth/errors/auth.errors';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

@Injectable()
export class RolesGuard implements CanActivate {
  private readonly logger = new Logger(RolesGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly accessControl: AccessControlService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRole = this.reflector.getAllAndOverride<Role | undefined>(
      REQUIRED_ROLE_KEY,
      [context.getHandler(), context.getClass()],
    );

    // No role requirement on this route
    if (!requiredRole) {
      return true;
    }

    // Set by JwtAuthGuard, which runs first
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = request.user;
    if (!user) {
      this.logger.warn(
        'RolesGuard: No user found in request. Make sure JwtAuthGuard runs before RolesGuard.',
      );
      throw new UnauthenticatedError('missing_token');
    }

    try {
      this.accessControl.requireRole(user, requiredRole);
    } catch (error) {
      this.logger.warn(
        `RolesGuard: User ${user.reference} with role '${user.role}' attempted to access resource requiring role '${requiredRole}'`,
      );
      throw error;
    }

    return true;
  }
}
