import { applyDecorators } from '@nestjs/common';
import { ApiBearerAuth, ApiResponse } from '@nestjs/swagger';

export const unauthorizedResponse = ApiResponse({
  status: 401,
  description: 'Unauthorized - invalid or missing token',
  schema: {
    type: 'object',
    properties: {
      statusCode: { type: 'number', example: 401 },
      error: { type: 'string', example: 'Unauthorized' },
      message: { type: 'string', example: 'Could not validate credentials' },
    },
  },
});

/**
 * API documentation for endpoints that require a valid access token.
 * Authentication itself is enforced by the global JwtAuthGuard.
 *
 * @example
 * ```typescript
 * @Authenticated()
 * @Get('me')
 * getProfile(@currentUser() user: AuthenticatedPrincipal) {
 *   return this.usersService.findOne(user.reference);
 * }
 * ```
 */
export function Authenticated() {
  return applyDecorators(ApiBearerAuth(), unauthorizedResponse);
}
