import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ValidationException, ValidationIssue } from '../common/exceptions';
import { EasyReadingSettingsDto } from './dto/easy-reading-settings.dto';
import { TransliteratorSettingsDto } from './dto/transliterator-settings.dto';
import {
  EasyReadingSettings,
  TransliteratorSettings,
} from './interfaces/transliteration.interfaces';

type RuleListKey = 'rules' | 'onmatch_rules';
type TokenListKey = 'tokens' | 'prev_tokens' | 'next_tokens';
type ClassListKey = 'prev_classes' | 'next_classes';
type ReferenceLists = Partial<Record<TokenListKey | ClassListKey, readonly string[] | null>>;

// Satisfied by class-validator's errors and by the ones ValidationPipe hands over
export interface ValidationErrorLike {
  property: string;
  constraints?: Record<string, string>;
  children?: ValidationErrorLike[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten nested class-validator errors into `{path, message}` entries,
 * e.g. `rules.2.tokens: tokens should not be empty`.
 */
export function flattenValidationErrors(
  errors: readonly ValidationErrorLike[],
  parentPath = '',
): ValidationIssue[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => ({ path, message }));
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

function validateShape<T extends object>(
  cls: new () => T,
  raw: unknown,
  kind: string,
): T {
  if (!isPlainObject(raw)) {
    throw new ValidationException(`${kind} must be an object`, [
      { path: '', message: `${kind} must be an object` },
    ]);
  }
  const dto = plainToInstance(cls, raw);
  const issues = flattenValidationErrors(validateSync(dto));
  if (issues.length > 0) {
    throw new ValidationException(`${kind} are malformed`, issues);
  }
  return dto;
}

/**
 * Check that every token and class referenced by rules, on-match rules and
 * the whitespace policy is declared.
 */
export function crossReferenceIssues(settings: TransliteratorSettings): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const declaredTokens = new Set(Object.keys(settings.tokens));
  const declaredClasses = new Set(Object.values(settings.tokens).flat());

  const checkTokens = (path: string, tokens: readonly string[] | null | undefined) => {
    tokens?.forEach((token, index) => {
      if (!declaredTokens.has(token)) {
        issues.push({ path: `${path}.${index}`, message: `Invalid token "${token}"` });
      }
    });
  };
  const checkClasses = (path: string, classes: readonly string[] | null | undefined) => {
    classes?.forEach((tokenClass, index) => {
      if (!declaredClasses.has(tokenClass)) {
        issues.push({ path: `${path}.${index}`, message: `Invalid token class "${tokenClass}"` });
      }
    });
  };

  const tokenKeys: TokenListKey[] = ['tokens', 'prev_tokens', 'next_tokens'];
  const classKeys: ClassListKey[] = ['prev_classes', 'next_classes'];
  const ruleLists: Array<[RuleListKey, readonly ReferenceLists[]]> = [
    ['rules', settings.rules],
    ['onmatch_rules', settings.onmatch_rules ?? []],
  ];

  for (const [listKey, rules] of ruleLists) {
    rules.forEach((rule, ruleIndex) => {
      if (listKey === 'rules') {
        tokenKeys.forEach((key) => checkTokens(`${listKey}.${ruleIndex}.${key}`, rule[key]));
      }
      classKeys.forEach((key) => checkClasses(`${listKey}.${ruleIndex}.${key}`, rule[key]));
    });
  }

  if (!declaredTokens.has(settings.whitespace.default)) {
    issues.push({
      path: 'whitespace.default',
      message: `Invalid default token "${settings.whitespace.default}"`,
    });
  }
  if (!declaredClasses.has(settings.whitespace.token_class)) {
    issues.push({
      path: 'whitespace.token_class',
      message: `Invalid token class "${settings.whitespace.token_class}"`,
    });
  }

  return issues;
}

/**
 * Validate raw settings and return them typed, or throw ValidationException
 * listing every problem found.
 */
export function validateSettings(raw: unknown): TransliteratorSettings {
  const settings = validateShape(TransliteratorSettingsDto, raw, 'Settings');
  const issues = crossReferenceIssues(settings);
  if (issues.length > 0) {
    throw new ValidationException('Settings reference undeclared tokens or classes', issues);
  }
  return settings;
}

/**
 * Structural check of compact-notation settings. Rule strings are checked when parsed.
 */
export function validateEasyReadingSettings(raw: unknown): EasyReadingSettings {
  return validateShape(EasyReadingSettingsDto, raw, 'Settings');
}
