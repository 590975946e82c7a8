import { applyDecorators } from '@nestjs/common';
import { ApiBearerAuth, ApiResponse } from '@nestjs/swagger';
import { Role } from '../enums/role.enum';
import { rbacDetailsSchema } from '../filters/rbac-exception.filter';
import { unauthorizedResponse } from './authenticated.decorator';
import { RequiredRole } from './roles.decorator';

/**
 * Composite decorator for admin-only endpoints
 * Combines the role requirement and API documentation
 *
 * @example
 * ```typescript
 * @AdminOnly()
 * @Get('users')
 * getUsers() {
 *   return this.usersService.findAll(query);
 * }
 * ```
 */
export function AdminOnly() {
  return applyDecorators(
    RequiredRole(Role.ADMIN),
    ApiBearerAuth(),
    unauthorizedResponse,
    ApiResponse({
      status: 403,
      description: 'Forbidden - insufficient permissions',
      schema: {
        type: 'object',
        properties: {
          statusCode: { type: 'number', example: 403 },
          message: {
            type: 'string',
            example: 'Administrator privileges required',
          },
          errorCode: { type: 'string', example: 'RBAC_ADMIN_REQUIRED' },
          details: rbacDetailsSchema,
          help: {
            type: 'string',
            example:
              'This endpoint requires administrator privileges. Contact your system administrator if you need access.',
          },
        },
      },
    }),
  );
}
