import { SchemaValidator } from './schema-validator';
import { ValidationException, ValidationIssue } from '../exceptions';

describe('SchemaValidator', () => {
  const validator = new SchemaValidator();
  const schema = {
    type: 'object',
    required: ['name'],
    properties: { name: { type: 'string' } },
    additionalProperties: false,
  };

  const issuesOf = (data: unknown): ValidationIssue[] => {
    try {
      validator.validate(schema, data);
    } catch (error) {
      if (error instanceof ValidationException) {
        return error.validationErrors;
      }
      throw error;
    }
    return [];
  };

  it('should return valid data', () => {
    const data = { name: 'test' };
    expect(validator.validate<{ name: string }>(schema, data)).toBe(data);
  });

  it('should throw ValidationException on invalid data', () => {
    expect(() => validator.validate(schema, {})).toThrow('Validation failed: Schema validation failed');
  });

  it('should describe missing and unexpected properties', () => {
    expect(issuesOf({})).toEqual([{ path: 'root', message: 'Missing required property: name' }]);
    expect(issuesOf({ name: 'test', extra: 1 })).toEqual([
      { path: 'root', message: 'Unexpected property: extra' },
    ]);
  });

  it('should point at the offending value', () => {
    expect(issuesOf({ name: 1 })).toEqual([{ path: '/name', message: 'must be string' }]);
  });
});
