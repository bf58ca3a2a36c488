export { BaseException } from './base.exception';
export type { ExceptionContext } from './base.exception';
export { ValidationException } from './validation.exception';
export type { ValidationIssue } from './validation.exception';
export { AmbiguousRulesException } from './ambiguous-rules.exception';
export type { RuleAmbiguity } from './ambiguous-rules.exception';
export { UnrecognizableInputTokenException } from './unrecognizable-input-token.exception';
export { NoMatchingRuleException } from './no-matching-rule.exception';
export { TransliteratorNotFoundException } from './transliterator-not-found.exception';
