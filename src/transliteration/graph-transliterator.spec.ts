import { Logger } from '@nestjs/common';
import {
  AmbiguousRulesException,
  NoMatchingRuleException,
  UnrecognizableInputTokenException,
  ValidationException,
} from '../common/exceptions';
import { GraphTransliterator } from './graph-transliterator';
import { TransliteratorSettings } from './interfaces/transliteration.interfaces';
import { GRAPH_TRANSLITERATOR_VERSION } from './version';

describe('GraphTransliterator', () => {
  const boundarySettings = (): TransliteratorSettings => ({
    tokens: { a: ['class1'], b: ['class2'], ' ': ['wb'] },
    rules: [
      { production: 'A', tokens: ['a'] },
      { production: 'B', tokens: ['b'] },
      { production: ' ', tokens: [' '] },
    ],
    whitespace: { default: ' ', token_class: 'wb', consolidate: false },
    onmatch_rules: [{ prev_classes: ['class1'], next_classes: ['class2'], production: ',' }],
  });

  const specificitySettings = (): TransliteratorSettings => ({
    tokens: { a: [], ' ': ['wb'] },
    rules: [
      { production: '<A>', tokens: ['a'] },
      { production: '<AA>', tokens: ['a', 'a'] },
      { production: '_', tokens: [' '] },
    ],
    whitespace: { default: ' ', token_class: 'wb', consolidate: true },
    metadata: { name: 'specificity' },
  });

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  describe('on-match rules', () => {
    const gt = GraphTransliterator.fromSettings(boundarySettings());

    it('should insert the production between adjacent matches', () => {
      expect(gt.transliterate('ab')).toBe('A,B');
    });

    it('should not insert across an intervening whitespace token', () => {
      expect(gt.transliterate('a b')).toBe('A B');
    });

    it('should index candidates by the tokens around the boundary', () => {
      expect(gt.onmatchRulesLookup?.get('b')?.get('a')).toEqual([0]);
      expect(gt.onmatchRulesLookup?.has('a')).toBe(false);
    });
  });

  describe('rule specificity', () => {
    const gt = GraphTransliterator.fromSettings(specificitySettings());

    it('should sort rules by cost', () => {
      expect(gt.productions).toEqual(['<AA>', '<A>', '_']);
    });

    it('should prefer the longest match', () => {
      expect(gt.transliterate('aaa')).toBe('<AA><A>');
      expect(gt.transliterate('a  a')).toBe('<A>_<A>');
    });

    it('should expose every match at a position', () => {
      const tokens = gt.tokenize('aa');

      expect(tokens).toEqual([' ', 'a', 'a', ' ']);
      expect(gt.matchAt(1, tokens)).toBe(0);
      expect(gt.matchAt(1, tokens, true)).toEqual([0, 1]);
    });

    it('should take the match mode as a flag', () => {
      const tokens = gt.tokenize('aa');
      const results = [false, true].map((matchAll) => gt.matchAt(1, tokens, matchAll));

      expect(results).toEqual([0, [0, 1]]);
    });

    it('should record the last matched rules', () => {
      gt.transliterate('aaa');

      expect(gt.lastInputTokens).toEqual([' ', 'a', 'a', 'a', ' ']);
      expect(gt.lastMatchedRules.map((rule) => rule.production)).toEqual(['<AA>', '<A>']);
      expect(gt.lastMatchedRuleTokens).toEqual([['a', 'a'], ['a']]);

      gt.transliterate('a');
      expect(gt.lastMatchedRules.map((rule) => rule.production)).toEqual(['<A>']);
    });

    it('should report details without touching the last match record', () => {
      gt.transliterate('a');
      const details = gt.transliterateWithDetails('aa a');

      expect(details).toEqual({ output: '<AA>_<A>', tokens: [' ', 'a', 'a', ' ', 'a', ' '], ruleKeys: [0, 2, 1] });
      expect(gt.lastInputTokens).toEqual([' ', 'a', ' ']);
    });

    it('should expose its build state', () => {
      expect(gt.version).toBe(GRAPH_TRANSLITERATOR_VERSION);
      expect(gt.metadata).toEqual({ name: 'specificity' });
      expect(gt.whitespace).toEqual({ defaultToken: ' ', tokenClass: 'wb', consolidate: true });
      expect(gt.tokenizerPattern).toBe('a| ');
      expect([...(gt.tokensByClass.get('wb') ?? [])]).toEqual([' ']);
      expect(gt.onmatchRules).toBeNull();
      expect(gt.checkAmbiguity).toBe(true);
    });
  });

  describe('errors', () => {
    it('should fail on unrecognizable input unless ignoring errors', () => {
      const gt = GraphTransliterator.fromSettings(specificitySettings());

      expect(() => gt.transliterate('a!a')).toThrow(UnrecognizableInputTokenException);

      gt.ignoreErrors = true;
      expect(gt.transliterate('a!a')).toBe('<AA>');
    });

    it('should fail where no rule matches unless ignoring errors', () => {
      const settings = boundarySettings();
      settings.rules = settings.rules.filter((rule) => rule.production !== 'B');
      const gt = GraphTransliterator.fromSettings(settings);

      expect(() => gt.transliterate('ab')).toThrow(NoMatchingRuleException);
      expect(() => gt.transliterate('ab')).toThrow("No matching transliteration rule for token 'b' [Token: 2]");

      gt.ignoreErrors = true;
      expect(gt.transliterate('aba')).toBe('AA');
    });

    it('should clear the last match record when a call fails', () => {
      const settings = boundarySettings();
      settings.rules = settings.rules.filter((rule) => rule.production !== 'B');
      const gt = GraphTransliterator.fromSettings(settings);

      expect(gt.transliterate('a a')).toBe('A A');
      expect(gt.lastMatchedRules.map((rule) => rule.production)).toEqual(['A', ' ', 'A']);

      expect(() => gt.transliterate('ab')).toThrow(NoMatchingRuleException);
      expect(gt.lastInputTokens).toEqual([]);
      expect(gt.lastMatchedRules).toEqual([]);

      expect(() => gt.transliterate('a!')).toThrow(UnrecognizableInputTokenException);
      expect(gt.lastInputTokens).toEqual([]);
    });

    it('should refuse ambiguous rules unless the check is disabled', () => {
      const settings: TransliteratorSettings = {
        tokens: { a: ['vowel'], b: ['vowel'], ' ': ['wb'] },
        rules: [
          { production: '1', tokens: ['a'], next_classes: ['vowel'] },
          { production: '2', tokens: ['a'], next_tokens: ['b'] },
          { production: 'B', tokens: ['b'] },
        ],
        whitespace: { default: ' ', token_class: 'wb', consolidate: false },
      };

      expect(() => GraphTransliterator.fromSettings(settings)).toThrow(AmbiguousRulesException);
      expect(GraphTransliterator.fromSettings(settings, { checkAmbiguity: false }).transliterate('ab')).toBe('1B');
    });

    it('should validate settings before building', () => {
      expect(() => GraphTransliterator.fromSettings({ tokens: {} })).toThrow(ValidationException);
    });
  });

  describe('prunedOf', () => {
    const gt = GraphTransliterator.fromSettings(specificitySettings());

    it('should drop rules by production', () => {
      const pruned = gt.prunedOf('<AA>');

      expect(pruned.productions).toEqual(['<A>', '_']);
      expect(pruned.transliterate('aa')).toBe('<A><A>');
      expect(pruned.metadata).toEqual({ name: 'specificity' });
    });

    it('should keep everything when the production does not exist', () => {
      const pruned = gt.prunedOf(['<B>']);

      expect(pruned.productions).toEqual(gt.productions);
      expect(pruned.transliterate('aaa')).toBe(gt.transliterate('aaa'));
    });

    it('should leave no rules when every production is pruned', () => {
      const pruned = gt.prunedOf(gt.productions);

      expect(pruned.rules).toHaveLength(0);
      expect(() => pruned.transliterate('a')).toThrow(NoMatchingRuleException);
    });

    it('should carry over error handling and the ambiguity check', () => {
      const lenient = GraphTransliterator.fromSettings(specificitySettings(), {
        ignoreErrors: true,
        checkAmbiguity: false,
      });
      const pruned = lenient.prunedOf('<A>');

      expect(pruned.ignoreErrors).toBe(true);
      expect(pruned.checkAmbiguity).toBe(false);
    });
  });

  describe('fromEasyReading', () => {
    it('should build from compact notation', () => {
      const gt = GraphTransliterator.fromEasyReading({
        tokens: { a: ['vowel'], b: ['consonant'], ' ': ['wb'] },
        rules: { a: 'A', b: 'B', ' ': ' ', '<consonant> a': 'Ä' },
        whitespace: { default: ' ', token_class: 'wb', consolidate: false },
      });

      expect(gt.transliterate('ba')).toBe('BÄ');
      expect(gt.transliterate('a')).toBe('A');
    });

    it('should reject compact rules with undeclared tokens', () => {
      expect(() =>
        GraphTransliterator.fromEasyReading({
          tokens: { a: [], ' ': ['wb'] },
          rules: { z: 'Z' },
          whitespace: { default: ' ', token_class: 'wb', consolidate: false },
        }),
      ).toThrow(ValidationException);
    });
  });

  describe('tokenization and transliteration', () => {
    it('should consume every token exactly once', () => {
      const gt = GraphTransliterator.fromSettings(specificitySettings());
      const details = gt.transliterateWithDetails('aaaaa a');
      const consumed = details.ruleKeys.reduce((sum, key) => sum + gt.rules[key].tokens.length, 0);

      expect(consumed).toBe(details.tokens.length - 2);
    });
  });
});
