import {
  OnMatchIndex,
  OnMatchRule,
  Token,
  TokenClassMap,
} from './interfaces/transliteration.interfaces';

/**
 * Index on-match rules by the token at the match start and the token right
 * before it. A rule is a candidate when the preceding token carries the rule's
 * last previous class and the current token carries its first next class;
 * the full class windows are checked at match time.
 */
export function buildOnMatchIndex(
  tokens: TokenClassMap,
  onmatchRules: readonly OnMatchRule[],
): OnMatchIndex {
  const index = new Map<Token, Map<Token, number[]>>();

  for (const [currToken, currClasses] of tokens) {
    for (const [prevToken, prevClasses] of tokens) {
      const candidates: number[] = [];
      onmatchRules.forEach((rule, ruleIndex) => {
        const lastPrevClass = rule.prevClasses[rule.prevClasses.length - 1];
        const firstNextClass = rule.nextClasses[0];
        if (prevClasses.has(lastPrevClass) && currClasses.has(firstNextClass)) {
          candidates.push(ruleIndex);
        }
      });
      if (candidates.length === 0) {
        continue;
      }
      let byPrev = index.get(currToken);
      if (!byPrev) {
        byPrev = new Map();
        index.set(currToken, byPrev);
      }
      byPrev.set(prevToken, candidates);
    }
  }

  return index;
}
