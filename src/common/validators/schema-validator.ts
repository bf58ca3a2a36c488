import Ajv, { ErrorObject, SchemaObject } from 'ajv';
import { ExceptionContext, ValidationException, ValidationIssue } from '../exceptions';

/**
 * Validates plain data against JSON Schema
 */
export class SchemaValidator {
  private readonly ajv: Ajv;

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      strict: false,
    });
  }

  /**
   * Validate data against a JSON Schema
   * @returns the data, typed by the schema
   * @throws ValidationException if validation fails
   */
  validate<T>(schema: SchemaObject, data: unknown, context?: ExceptionContext): T {
    // compiled functions are cached per schema object
    const validate = this.ajv.compile<T>(schema);

    if (validate(data)) {
      return data;
    }

    throw new ValidationException(
      'Schema validation failed',
      this.formatValidationErrors(validate.errors ?? []),
      context,
    );
  }

  /**
   * Format AJV validation errors into structured format
   */
  private formatValidationErrors(errors: ErrorObject[]): ValidationIssue[] {
    return errors.map((error) => {
      const path = error.instancePath || 'root';
      let message = error.message || 'Validation error';

      const { missingProperty, additionalProperty, allowedValues } = error.params;
      if (typeof missingProperty === 'string') {
        message = `Missing required property: ${missingProperty}`;
      } else if (typeof additionalProperty === 'string') {
        message = `Unexpected property: ${additionalProperty}`;
      } else if (Array.isArray(allowedValues)) {
        message = `Value must be one of: ${allowedValues.join(', ')}`;
      }

      return { path, message };
    });
  }
}
