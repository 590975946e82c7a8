import type { Role } from '../../../common/enums/role.enum';

export interface AuthenticatedPrincipal {
  readonly reference: number;
  readonly role: Role;
  readonly isActive: boolean;
}
