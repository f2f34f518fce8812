/**
 * Validators for loosely typed grade fields
 */

import { ValidateBy, type ValidationOptions, buildMessage } from 'class-validator';

export function IsStringOrNumber(options?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isStringOrNumber',
      validator: {
        validate: (value: unknown) =>
          typeof value === 'string' || typeof value === 'number',
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a string or a number`,
          options,
        ),
      },
    },
    options,
  );
}
