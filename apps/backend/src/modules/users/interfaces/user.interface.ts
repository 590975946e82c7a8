import type { Role } from '../../../common/enums/role.enum';

export interface User {
  id: number;
  username: string;
  fullName: string;
  email: string;
  passwordHash: string;
  role: Role;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export interface NewUser {
  username: string;
  fullName: string;
  email: string;
  passwordHash: string;
  role: Role;
  isActive: boolean;
}

export type UserPatch = Partial<NewUser>;

export interface UserSearch {
  search?: string;
  limit: number;
  offset: number;
}
