import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Exception thrown when transliterator settings fail validation
 */
export class ValidationException extends BaseException {
  public readonly validationErrors: ValidationIssue[];

  constructor(
    message: string,
    validationErrors?: ValidationIssue[],
    context?: ExceptionContext,
  ) {
    super(
      `Validation failed: ${message}`,
      HttpStatus.BAD_REQUEST,
      'VALIDATION_ERROR',
      {
        validation_errors: validationErrors || [],
        ...context,
      },
    );
    this.validationErrors = validationErrors || [];
  }
}
