import { ValidateBy, ValidationOptions } from 'class-validator';
import { plates } from '../constants/app.constants';

export const isVehiclePlate = (value: string): boolean =>
  plates.LEGACY_PATTERN.test(value) || plates.MERCOSUL_PATTERN.test(value);

/**
 * Brazilian plate, either the legacy AAA0000 layout or Mercosul AAA0A00.
 * Expects the value already normalised (no hyphen, uppercase).
 */
export function IsVehiclePlate(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isVehiclePlate',
      validator: {
        validate: (value: unknown) =>
          typeof value === 'string' && isVehiclePlate(value),
        defaultMessage: () =>
          'plate must match the AAA0000 or AAA0A00 format',
      },
    },
    validationOptions,
  );
}
