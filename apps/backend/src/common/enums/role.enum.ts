export enum Role {
  USER = 'user',
  ADMIN = 'admin',
}

export const isRole = (value: unknown): value is Role =>
  Object.values(Role).some((role) => role === value);
