import { Logger } from '@nestjs/common';
import { AmbiguousRulesException } from '../common/exceptions';
import { checkForAmbiguity, findAmbiguities, possibilityMatrix } from './ambiguity-checker';
import { TransliterationRuleSettings } from './interfaces/transliteration.interfaces';
import { sortRulesByCost, tokenClassMapOf, tokensByClassOf, transliterationRuleOf } from './rules';

describe('ambiguity checker', () => {
  const tokens = tokenClassMapOf({ a: ['vowel'], b: ['vowel'], ' ': ['wb'] });
  const allTokens = new Set(tokens.keys());
  const tokensByClass = tokensByClassOf(tokens);
  const rulesOf = (settings: TransliterationRuleSettings[]) =>
    sortRulesByCost(settings.map(transliterationRuleOf));

  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('possibilityMatrix', () => {
    it('should align rows on the match start and pad with every token', () => {
      const rules = rulesOf([
        { production: '1', tokens: ['a'], prev_classes: ['wb'] },
        { production: '2', tokens: ['b'], next_tokens: ['a'] },
      ]);
      const matrix = possibilityMatrix(rules, allTokens, tokensByClass);

      expect(matrix.map((row) => row.map((column) => [...column].sort()))).toEqual([
        [[' '], ['a'], [' ', 'a', 'b']],
        [[' ', 'a', 'b'], ['b'], ['a']],
      ]);
    });

    it('should size rows for very large rule sets', () => {
      const [rule] = rulesOf([{ production: '1', tokens: ['a'], prev_classes: ['wb'], next_tokens: ['b'] }]);
      const rules = Array.from({ length: 250000 }, () => rule);
      const matrix = possibilityMatrix(rules, allTokens, tokensByClass);

      expect(matrix).toHaveLength(250000);
      expect(matrix[249999].map((column) => [...column])).toEqual([[' '], ['a'], ['b']]);
    });
  });

  describe('findAmbiguities', () => {
    it('should accept rules that never overlap', () => {
      const rules = rulesOf([
        { production: 'A', tokens: ['a'] },
        { production: 'B', tokens: ['b'] },
        { production: '_', tokens: [' '] },
      ]);

      expect(findAmbiguities(rules, allTokens, tokensByClass)).toEqual([]);
    });

    it('should never find ambiguity without rules', () => {
      expect(findAmbiguities([], allTokens, tokensByClass)).toEqual([]);
    });

    it('should report an overlap of equal-cost rules', () => {
      const rules = rulesOf([
        { production: '1', tokens: ['a'], next_classes: ['vowel'] },
        { production: '2', tokens: ['a'], next_tokens: ['b'] },
      ]);

      expect(findAmbiguities(rules, allTokens, tokensByClass)).toEqual([
        { pattern: [['a'], ['b']], rules: ['a <vowel>', 'a (b)'] },
      ]);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should keep checking a group after a pair that cannot collide', () => {
      const rules = rulesOf([
        { production: '1', tokens: ['a'], next_classes: ['vowel'] },
        { production: '2', tokens: ['b', 'b'] },
        { production: '3', tokens: ['a'], next_tokens: ['b'] },
      ]);

      expect(findAmbiguities(rules, allTokens, tokensByClass)).toEqual([
        { pattern: [['a'], ['b']], rules: ['a <vowel>', 'a (b)'] },
      ]);
    });

    it('should treat an overlap covered by another rule of equal cost as resolved', () => {
      const rules = rulesOf([
        { production: '1', tokens: ['a'], next_classes: ['vowel'] },
        { production: '2', tokens: ['a'], next_tokens: ['b'] },
        { production: '3', tokens: ['a', 'b'] },
      ]);

      expect(findAmbiguities(rules, allTokens, tokensByClass)).toEqual([]);
    });

    it('should not compare rules of different cost', () => {
      const rules = rulesOf([
        { production: '1', tokens: ['a'] },
        { production: '2', tokens: ['a'], next_classes: ['vowel'] },
      ]);

      expect(findAmbiguities(rules, allTokens, tokensByClass)).toEqual([]);
    });
  });

  describe('checkForAmbiguity', () => {
    it('should throw with every overlap listed', () => {
      const rules = rulesOf([
        { production: '1', tokens: ['a'], next_classes: ['vowel'] },
        { production: '2', tokens: ['a'], next_tokens: ['b'] },
      ]);

      expect.assertions(3);
      try {
        checkForAmbiguity(rules, allTokens, tokensByClass);
      } catch (error) {
        expect(error).toBeInstanceOf(AmbiguousRulesException);
        if (error instanceof AmbiguousRulesException) {
          expect(error.errorCode).toBe('AMBIGUOUS_RULES');
          expect(error.ambiguities).toHaveLength(1);
        }
      }
    });

    it('should pass silently on unambiguous rules', () => {
      const rules = rulesOf([{ production: 'A', tokens: ['a'] }]);
      expect(() => checkForAmbiguity(rules, allTokens, tokensByClass)).not.toThrow();
    });
  });
});
