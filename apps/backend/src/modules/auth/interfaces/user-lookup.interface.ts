import type { Role } from '../../../common/enums/role.enum';

/**
 * The slice of a stored user that authentication decisions need.
 */
export interface UserRecord {
  reference: number;
  passwordHash: string;
  role: Role;
  isActive: boolean;
}

export interface UserLookup {
  findByIdentifier(email: string): Promise<UserRecord | null>;
  findByReference(reference: number): Promise<UserRecord | null>;
}
