import { Logger } from '@nestjs/common';
import { AmbiguousRulesException, RuleAmbiguity } from '../common/exceptions';
import {
  Token,
  TokenClass,
  TransliterationRule,
} from './interfaces/transliteration.interfaces';
import {
  constraintCountOf,
  countOfCurrAndNext,
  countOfPrev,
  formatRule,
} from './rules';

const logger = new Logger('AmbiguityChecker');

type TokenSet = ReadonlySet<Token>;

function intersect(a: TokenSet, b: TokenSet): Set<Token> {
  const result = new Set<Token>();
  for (const token of a) {
    if (b.has(token)) {
      result.add(token);
    }
  }
  return result;
}

function isSubset(subset: TokenSet, superset: TokenSet): boolean {
  for (const token of subset) {
    if (!superset.has(token)) {
      return false;
    }
  }
  return true;
}

/**
 * Sets of tokens a rule accepts at each position it inspects, from its first
 * preceding class through its last following class.
 */
export function tokensPossible(
  rule: TransliterationRule,
  tokensByClass: ReadonlyMap<TokenClass, TokenSet>,
): TokenSet[] {
  const ofClass = (tokenClass: TokenClass): TokenSet => tokensByClass.get(tokenClass) ?? new Set();
  const literal = (token: Token): TokenSet => new Set([token]);

  return [
    ...(rule.prevClasses ?? []).map(ofClass),
    ...(rule.prevTokens ?? []).map(literal),
    ...rule.tokens.map(literal),
    ...(rule.nextTokens ?? []).map(literal),
    ...(rule.nextClasses ?? []).map(ofClass),
  ];
}

/**
 * Align every rule on its match start in a common matrix: positions a rule
 * does not constrain accept any token.
 */
export function possibilityMatrix(
  rules: readonly TransliterationRule[],
  allTokens: TokenSet,
  tokensByClass: ReadonlyMap<TokenClass, TokenSet>,
): TokenSet[][] {
  const maxPrev = rules.reduce((max, rule) => Math.max(max, countOfPrev(rule)), 0);
  const width = maxPrev + rules.reduce((max, rule) => Math.max(max, countOfCurrAndNext(rule)), 0);

  return rules.map((rule) => {
    const row: TokenSet[] = Array(maxPrev - countOfPrev(rule)).fill(allTokens);
    row.push(...tokensPossible(rule, tokensByClass));
    while (row.length < width) {
      row.push(allTokens);
    }
    return row;
  });
}

/**
 * Find pairs of equal-cost rules that could match the same tokens when no
 * other rule of lower or equal cost covers every token sequence they share.
 * Returns the uncovered overlaps; an empty array means the rules are unambiguous.
 */
export function findAmbiguities(
  rules: readonly TransliterationRule[],
  allTokens: TokenSet,
  tokensByClass: ReadonlyMap<TokenClass, TokenSet>,
): RuleAmbiguity[] {
  if (rules.length === 0) {
    return [];
  }

  const matrix = possibilityMatrix(rules, allTokens, tokensByClass);
  const width = matrix[0].length;

  const fullIntersection = (i: number, j: number): Set<Token>[] | null => {
    const columns: Set<Token>[] = [];
    for (let k = 0; k < width; k++) {
      const column = intersect(matrix[i][k], matrix[j][k]);
      if (column.size === 0) {
        return null;
      }
      columns.push(column);
    }
    return columns;
  };

  const coveredByOther = (overlap: Set<Token>[], i: number, j: number): boolean =>
    rules.some(
      (rule, r) =>
        r !== i &&
        r !== j &&
        rule.cost <= rules[i].cost &&
        overlap.every((column, k) => isSubset(column, matrix[r][k])),
    );

  // rules are sorted by cost, so rules with the same constraint count are adjacent
  const groups: number[][] = [];
  rules.forEach((rule, index) => {
    const group = groups[groups.length - 1];
    if (group && constraintCountOf(rules[group[0]]) === constraintCountOf(rule)) {
      group.push(index);
    } else {
      groups.push([index]);
    }
  });

  const ambiguities: RuleAmbiguity[] = [];
  for (const group of groups) {
    for (let a = 0; a < group.length - 1; a++) {
      for (let b = a + 1; b < group.length; b++) {
        const i = group[a];
        const j = group[b];
        const overlap = fullIntersection(i, j);
        if (!overlap || coveredByOther(overlap, i, j)) {
          continue;
        }
        const ambiguity: RuleAmbiguity = {
          pattern: overlap.map((column) => [...column].sort()),
          rules: [formatRule(rules[i]), formatRule(rules[j])],
        };
        logger.warn(
          `The pattern ${JSON.stringify(ambiguity.pattern)} can be matched by both:\n` +
            `  ${ambiguity.rules[0]}\n  ${ambiguity.rules[1]}`,
        );
        ambiguities.push(ambiguity);
      }
    }
  }
  return ambiguities;
}

/**
 * Throws AmbiguousRulesException listing every uncovered overlap.
 */
export function checkForAmbiguity(
  rules: readonly TransliterationRule[],
  allTokens: TokenSet,
  tokensByClass: ReadonlyMap<TokenClass, TokenSet>,
): void {
  const ambiguities = findAmbiguities(rules, allTokens, tokensByClass);
  if (ambiguities.length > 0) {
    throw new AmbiguousRulesException(ambiguities);
  }
}
