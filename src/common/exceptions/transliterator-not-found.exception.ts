import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

/**
 * Exception thrown when a stored transliterator is not found
 */
export class TransliteratorNotFoundException extends BaseException {
  constructor(transliteratorId: string, context?: ExceptionContext) {
    super(
      `Transliterator with ID '${transliteratorId}' not found`,
      HttpStatus.NOT_FOUND,
      'TRANSLITERATOR_NOT_FOUND',
      {
        transliterator_id: transliteratorId,
        ...context,
      },
    );
  }
}
