import { registerDecorator, ValidationArguments, ValidationOptions } from 'class-validator';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Token declarations: non-empty token strings mapped to arrays of class names
 */
export function IsTokenClassRecord(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isTokenClassRecord',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown) {
          if (!isPlainRecord(value) || Object.keys(value).length === 0) {
            return false;
          }
          return Object.entries(value).every(
            ([token, classes]) =>
              token.length > 0 &&
              Array.isArray(classes) &&
              classes.every((tokenClass) => typeof tokenClass === 'string'),
          );
        },
        defaultMessage(args: ValidationArguments) {
          return `${args.property} must map non-empty token strings to arrays of class names`;
        },
      },
    });
  };
}

/**
 * Object whose values are all strings, e.g. compact rules mapped to productions
 */
export function IsStringRecord(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isStringRecord',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown) {
          return (
            isPlainRecord(value) &&
            Object.values(value).every((entry) => typeof entry === 'string')
          );
        },
        defaultMessage(args: ValidationArguments) {
          return `${args.property} must be an object of strings`;
        },
      },
    });
  };
}
