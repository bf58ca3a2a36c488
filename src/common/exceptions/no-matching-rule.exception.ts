import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

export class NoMatchingRuleException extends BaseException {
  constructor(tokenIndex: number, tokens: string[], context?: ExceptionContext) {
    super(
      `No matching transliteration rule for token '${tokens[tokenIndex]}'`,
      HttpStatus.UNPROCESSABLE_ENTITY,
      'NO_MATCHING_RULE',
      {
        token_index: tokenIndex,
        tokens,
        ...context,
      },
    );
  }
}
