import { SetMetadata } from '@nestjs/common';
import { Role } from '../enums/role.enum';

export const REQUIRED_ROLE_KEY = 'requiredRole';

/**
 * Restrict an endpoint (or every endpoint of a controller) to one role.
 *
 * @example
 * ```typescript
 * @RequiredRole(Role.ADMIN)
 * @Get('admin-only')
 * adminOnlyEndpoint() {
 *   return 'Admin only content';
 * }
 * ```
 */
export const RequiredRole = (role: Role) =>
  SetMetadata(REQUIRED_ROLE_KEY, role);
