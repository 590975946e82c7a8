import type { TransformFnParams } from 'class-transformer';

export const trim = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim() : value;

export const trimLowercase = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

// ABC-1234 / abc1d23 -> ABC1234 / ABC1D23
export const normalizePlate = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.replace(/-/g, '').trim().toUpperCase() : value;

// Reads the raw query value; implicit conversion would turn 'false' into true
export const toBoolean = ({ obj, key }: TransformFnParams): unknown => {
  const value: unknown = obj[key];
  if (value === 'true' || value === true) return true;
  if (value === 'false' || value === false) return false;
  return value;
};
