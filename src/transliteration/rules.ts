import {
  OnMatchRule,
  OnMatchRuleSettings,
  Token,
  TokenClass,
  TokenClassMap,
  TransliterationRule,
  TransliterationRuleSettings,
  WhitespacePolicy,
  WhitespaceSettings,
} from './interfaces/transliteration.interfaces';

/**
 * Count of everything a rule has to match: preceding classes and tokens,
 * the tokens themselves, following tokens and classes.
 */
export function constraintCountOf(rule: {
  prevClasses: readonly string[] | null;
  prevTokens: readonly string[] | null;
  tokens: readonly string[];
  nextTokens: readonly string[] | null;
  nextClasses: readonly string[] | null;
}): number {
  return (
    (rule.prevClasses?.length ?? 0) +
    (rule.prevTokens?.length ?? 0) +
    rule.tokens.length +
    (rule.nextTokens?.length ?? 0) +
    (rule.nextClasses?.length ?? 0)
  );
}

/**
 * Cost decreases as the constraint count grows: 1 → 0.585, 2 → 0.415, 3 → 0.322
 */
export function costOf(constraintCount: number): number {
  return Math.log2(1 + 1 / (1 + constraintCount));
}

/** Number of positions a rule inspects before the match start */
export function countOfPrev(rule: TransliterationRule): number {
  return (rule.prevClasses?.length ?? 0) + (rule.prevTokens?.length ?? 0);
}

/** Number of positions a rule inspects from the match start onwards */
export function countOfCurrAndNext(rule: TransliterationRule): number {
  return rule.tokens.length + (rule.nextTokens?.length ?? 0) + (rule.nextClasses?.length ?? 0);
}

function listOrNull<T>(values: readonly T[] | null | undefined): readonly T[] | null {
  return values && values.length > 0 ? Object.freeze([...values]) : null;
}

export function transliterationRuleOf(settings: TransliterationRuleSettings): TransliterationRule {
  const base = {
    production: settings.production,
    prevClasses: listOrNull(settings.prev_classes),
    prevTokens: listOrNull(settings.prev_tokens),
    tokens: Object.freeze([...settings.tokens]),
    nextTokens: listOrNull(settings.next_tokens),
    nextClasses: listOrNull(settings.next_classes),
  };
  return Object.freeze({ ...base, cost: costOf(constraintCountOf(base)) });
}

/**
 * Stable ascending sort by cost: rules of equal cost keep declaration order.
 * The resulting index of each rule is its rule key.
 */
export function sortRulesByCost(rules: readonly TransliterationRule[]): TransliterationRule[] {
  return rules
    .map((rule, index) => ({ rule, index }))
    .sort((a, b) => a.rule.cost - b.rule.cost || a.index - b.index)
    .map(({ rule }) => rule);
}

export function onMatchRuleOf(settings: OnMatchRuleSettings): OnMatchRule {
  return Object.freeze({
    prevClasses: Object.freeze([...settings.prev_classes]),
    nextClasses: Object.freeze([...settings.next_classes]),
    production: settings.production,
  });
}

export function whitespacePolicyOf(settings: WhitespaceSettings): WhitespacePolicy {
  return Object.freeze({
    defaultToken: settings.default,
    tokenClass: settings.token_class,
    consolidate: settings.consolidate,
  });
}

export function tokenClassMapOf(tokens: Record<string, string[]>): Map<Token, ReadonlySet<TokenClass>> {
  return new Map(Object.entries(tokens).map(([token, classes]) => [token, new Set(classes)]));
}

export function tokensByClassOf(tokens: TokenClassMap): Map<TokenClass, ReadonlySet<Token>> {
  const byClass = new Map<TokenClass, Set<Token>>();
  for (const [token, classes] of tokens) {
    for (const tokenClass of classes) {
      let members = byClass.get(tokenClass);
      if (!members) {
        members = new Set();
        byClass.set(tokenClass, members);
      }
      members.add(token);
    }
  }
  return byClass;
}

function tokenString(tokens: readonly string[]): string {
  return tokens.join(' ');
}

function classString(classes: readonly string[]): string {
  return classes.map((tokenClass) => `<${tokenClass}>`).join(' ');
}

/**
 * Render a rule in compact notation, e.g. `(<class_c> b) a (c <class_b>)`
 */
export function formatRule(rule: TransliterationRule): string {
  let out = '';
  if (rule.prevClasses && rule.prevTokens) {
    out = `(${classString(rule.prevClasses)} ${tokenString(rule.prevTokens)}) `;
  } else if (rule.prevClasses) {
    out = `${classString(rule.prevClasses)} `;
  } else if (rule.prevTokens) {
    out = `(${tokenString(rule.prevTokens)}) `;
  }

  out += tokenString(rule.tokens);

  if (rule.nextTokens && rule.nextClasses) {
    out += ` (${tokenString(rule.nextTokens)} ${classString(rule.nextClasses)})`;
  } else if (rule.nextTokens) {
    out += ` (${tokenString(rule.nextTokens)})`;
  } else if (rule.nextClasses) {
    out += ` ${classString(rule.nextClasses)}`;
  }
  return out;
}
