import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

export interface RuleAmbiguity {
  pattern: string[][];
  rules: [string, string];
}

/**
 * Exception thrown when two rules of the same cost can match the same tokens
 * and no cheaper rule resolves the overlap
 */
export class AmbiguousRulesException extends BaseException {
  public readonly ambiguities: RuleAmbiguity[];

  constructor(ambiguities: RuleAmbiguity[], context?: ExceptionContext) {
    super(
      `Ambiguous transliteration rules: ${ambiguities.length} overlapping rule pair(s)`,
      HttpStatus.UNPROCESSABLE_ENTITY,
      'AMBIGUOUS_RULES',
      {
        ambiguities,
        ...context,
      },
    );
    this.ambiguities = ambiguities;
  }
}
