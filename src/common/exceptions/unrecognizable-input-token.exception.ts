import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

/**
 * Exception thrown when the tokenizer cannot match any token at a position
 */
export class UnrecognizableInputTokenException extends BaseException {
  constructor(position: number, character: string, context?: ExceptionContext) {
    super(
      `Unrecognizable input token '${character}'`,
      HttpStatus.UNPROCESSABLE_ENTITY,
      'UNRECOGNIZABLE_INPUT_TOKEN',
      {
        position,
        character,
        ...context,
      },
    );
  }
}
