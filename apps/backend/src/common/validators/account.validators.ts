import { ValidateBy, ValidationOptions } from 'class-validator';
import { accounts } from '../constants/app.constants';

const RESERVED_USERNAMES: readonly string[] = accounts.RESERVED_USERNAMES;
const DISPOSABLE_EMAIL_DOMAINS: readonly string[] =
  accounts.DISPOSABLE_EMAIL_DOMAINS;

export const isReservedUsername = (value: string): boolean =>
  RESERVED_USERNAMES.includes(value.toLowerCase());

export const isDisposableEmail = (value: string): boolean => {
  const domain = value.slice(value.lastIndexOf('@') + 1).toLowerCase();
  return DISPOSABLE_EMAIL_DOMAINS.includes(domain);
};

export function IsNotReservedUsername(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isNotReservedUsername',
      validator: {
        validate: (value: unknown) =>
          typeof value === 'string' && !isReservedUsername(value),
        defaultMessage: () => 'This username is reserved',
      },
    },
    validationOptions,
  );
}

export function IsNotDisposableEmail(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isNotDisposableEmail',
      validator: {
        validate: (value: unknown) =>
          typeof value === 'string' && !isDisposableEmail(value),
        defaultMessage: () => 'Disposable email addresses are not allowed',
      },
    },
    validationOptions,
  );
}
