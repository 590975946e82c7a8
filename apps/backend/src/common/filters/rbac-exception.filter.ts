import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  ForbiddenException,
  Logger,
} from '@nestjs/common';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';
import type { Response } from 'express';
import { ForbiddenError } from '../../modules/auth/errors/auth.errors';
import { Role } from '../enums/role.enum';

export type RbacErrorCode =
  | 'RBAC_ADMIN_REQUIRED'
  | 'RBAC_ROLE_REQUIRED'
  | 'RBAC_OWNERSHIP_REQUIRED'
  | 'RBAC_ACCESS_DENIED';

/** Shape of `details` in every 403 body, shared with the OpenAPI docs. */
export const rbacDetailsSchema = {
  type: 'object',
  properties: {
    currentRole: { type: 'string', example: 'user' },
    action: { type: 'string', example: 'read' },
  },
} as const;

@Catch(ForbiddenException)
export class RbacExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RbacExceptionFilter.name);

  catch(exception: ForbiddenException, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<AuthenticatedRequest>();
    const status = exception.getStatus();

    const user = request.user;
    const method = request.method;
    const url = request.url;
    const timestamp = new Date().toISOString();

    const reason =
      exception instanceof ForbiddenError ? exception.reason : undefined;
    const errorCode = this.toErrorCode(exception);

    // Log the access denial for security monitoring
    this.logger.warn(
      `Access denied: User ${user?.reference ?? 'unknown'} (${
        user?.role ?? 'unknown'
      }) attempted ${method} ${url} [${reason ?? 'forbidden'}]`,
    );

    response.status(status).json({
      statusCode: status,
      timestamp,
      path: url,
      method,
      error: 'Forbidden',
      message: exception.message,
      errorCode,
      details: {
        currentRole: user?.role ?? 'unknown',
        action: this.extractActionFromMethod(method),
      },
      help: this.getHelpMessage(errorCode),
    });
  }

  private toErrorCode(exception: ForbiddenException): RbacErrorCode {
    if (!(exception instanceof ForbiddenError)) {
      return 'RBAC_ACCESS_DENIED';
    }
    switch (exception.reason) {
      case 'role_required':
        return exception.requiredRole === Role.ADMIN
          ? 'RBAC_ADMIN_REQUIRED'
          : 'RBAC_ROLE_REQUIRED';
      case 'ownership_required':
        return 'RBAC_OWNERSHIP_REQUIRED';
      default:
        return 'RBAC_ACCESS_DENIED';
    }
  }

  private extractActionFromMethod(method: string): string {
    const actionMap: Record<string, string> = {
      GET: 'read',
      POST: 'create',
      PUT: 'update',
      PATCH: 'update',
      DELETE: 'delete',
    };
    return actionMap[method] ?? 'unknown';
  }

  private getHelpMessage(errorCode: RbacErrorCode): string {
    switch (errorCode) {
      case 'RBAC_ADMIN_REQUIRED':
        return 'This endpoint requires administrator privileges. Contact your system administrator if you need access.';
      case 'RBAC_ROLE_REQUIRED':
        return 'Your role does not grant access to this endpoint.';
      case 'RBAC_OWNERSHIP_REQUIRED':
        return 'Only the owner of this resource or an administrator can change it.';
      default:
        return 'Access denied. Please check your permissions or contact support.';
    }
  }
}
