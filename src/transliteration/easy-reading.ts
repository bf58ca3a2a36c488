import { ValidationException, ValidationIssue } from '../common/exceptions';
import {
  EasyReadingSettings,
  OnMatchRuleSettings,
  TransliterationRuleSettings,
  TransliteratorSettings,
} from './interfaces/transliteration.interfaces';
import { validateEasyReadingSettings } from './settings-validator';

const CLASS = /^<([^<>\s()]+)>$/u;

// [ (<classes> tokens) | <classes> ] tokens [ (tokens <classes>) | <classes> ]
const RULE_PATTERN =
  /^(?:\((?<prevGroup>[^()]+)\)\s+|(?<prevClasses>(?:<[^<>\s()]+>\s+)+))?(?<tokens>[^\s()<>]+(?:\s+[^\s()<>]+)*)(?:\s+\((?<nextGroup>[^()]+)\)|(?<nextClasses>(?:\s+<[^<>\s()]+>)+))?$/u;

function wordsOf(text: string): string[] {
  return text.trim().split(/\s+/u).filter((word) => word.length > 0);
}

function classOf(word: string): string | null {
  return CLASS.exec(word)?.[1] ?? null;
}

function orNull(values: string[]): string[] | null {
  return values.length > 0 ? values : null;
}

/**
 * Split a parenthesised context group into classes and tokens. Before the
 * match, classes come first; after it, tokens come first.
 */
function splitGroup(group: string, classesFirst: boolean): { classes: string[]; tokens: string[] } | null {
  const classes: string[] = [];
  const tokens: string[] = [];
  for (const word of wordsOf(group)) {
    const tokenClass = classOf(word);
    if (tokenClass !== null) {
      if (classesFirst && tokens.length > 0) {
        return null;
      }
      classes.push(tokenClass);
    } else {
      if (!classesFirst && classes.length > 0) {
        return null;
      }
      tokens.push(word);
    }
  }
  return { classes, tokens };
}

/**
 * Parse one compact rule such as `(<class_c> b) a (c <class_b>)`. A rule made
 * only of whitespace matches that whitespace as a single token.
 */
export function parseRule(rule: string, production: string): TransliterationRuleSettings | null {
  if (rule.length > 0 && rule.trim().length === 0) {
    return { production, tokens: [rule] };
  }

  const match = RULE_PATTERN.exec(rule.trim());
  if (!match?.groups) {
    return null;
  }
  const { prevGroup, prevClasses, tokens, nextGroup, nextClasses } = match.groups;

  const parsed: TransliterationRuleSettings = { production, tokens: wordsOf(tokens) };

  if (prevGroup !== undefined) {
    const group = splitGroup(prevGroup, true);
    if (!group) {
      return null;
    }
    parsed.prev_classes = orNull(group.classes);
    parsed.prev_tokens = orNull(group.tokens);
  } else if (prevClasses !== undefined) {
    parsed.prev_classes = wordsOf(prevClasses).map((word) => classOf(word) ?? word);
  }

  if (nextGroup !== undefined) {
    const group = splitGroup(nextGroup, false);
    if (!group) {
      return null;
    }
    parsed.next_tokens = orNull(group.tokens);
    parsed.next_classes = orNull(group.classes);
  } else if (nextClasses !== undefined) {
    parsed.next_classes = wordsOf(nextClasses).map((word) => classOf(word) ?? word);
  }

  return parsed;
}

/**
 * Parse `<c1> <c2> + <c3>` into the classes on each side of a match boundary.
 */
export function parseOnMatchRule(rule: string, production: string): OnMatchRuleSettings | null {
  const sides = rule.split('+');
  if (sides.length !== 2) {
    return null;
  }
  const [prev, next] = sides.map((side) => wordsOf(side).map(classOf));
  if (prev.length === 0 || next.length === 0) {
    return null;
  }
  const prevClasses: string[] = [];
  const nextClasses: string[] = [];
  for (const tokenClass of prev) {
    if (tokenClass === null) return null;
    prevClasses.push(tokenClass);
  }
  for (const tokenClass of next) {
    if (tokenClass === null) return null;
    nextClasses.push(tokenClass);
  }
  return { prev_classes: prevClasses, next_classes: nextClasses, production };
}

/**
 * Convert compact-notation settings into the direct form
 */
export function easyReadingToSettings(settings: EasyReadingSettings): TransliteratorSettings {
  const issues: ValidationIssue[] = [];

  const rules: TransliterationRuleSettings[] = [];
  for (const [rule, production] of Object.entries(settings.rules)) {
    const parsed = parseRule(rule, production);
    if (parsed) {
      rules.push(parsed);
    } else {
      issues.push({ path: `rules.${rule}`, message: `Invalid rule "${rule}"` });
    }
  }

  const onmatchRules: OnMatchRuleSettings[] = [];
  (settings.onmatch_rules ?? []).forEach((entry, index) => {
    for (const [rule, production] of Object.entries(entry)) {
      const parsed = parseOnMatchRule(rule, production);
      if (parsed) {
        onmatchRules.push(parsed);
      } else {
        issues.push({ path: `onmatch_rules.${index}`, message: `Invalid on-match rule "${rule}"` });
      }
    }
  });

  if (issues.length > 0) {
    throw new ValidationException('Unparseable rules in compact notation', issues);
  }

  return {
    tokens: settings.tokens,
    rules,
    whitespace: settings.whitespace,
    ...(settings.onmatch_rules && { onmatch_rules: onmatchRules }),
    ...(settings.metadata && { metadata: settings.metadata }),
  };
}

export function parseEasyReadingSettings(raw: unknown): TransliteratorSettings {
  return easyReadingToSettings(validateEasyReadingSettings(raw));
}
