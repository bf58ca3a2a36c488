import { Logger } from '@nestjs/common';
import { NoMatchingRuleException, ValidationException } from '../common/exceptions';
import { checkForAmbiguity } from './ambiguity-checker';
import { parseEasyReadingSettings } from './easy-reading';
import { buildGraph } from './graph-builder';
import {
  BuildOptions,
  MatchingGraph,
  Metadata,
  OnMatchIndex,
  OnMatchRule,
  Token,
  TokenClass,
  TokenClassMap,
  TransliterationDetails,
  TransliterationRule,
  TransliteratorDump,
  TransliteratorSettings,
  TransliteratorState,
  WhitespacePolicy,
} from './interfaces/transliteration.interfaces';
import { Matcher, matchTokens } from './matcher';
import { buildOnMatchIndex } from './onmatch-index';
import {
  onMatchRuleOf,
  sortRulesByCost,
  tokenClassMapOf,
  tokensByClassOf,
  transliterationRuleOf,
  whitespacePolicyOf,
} from './rules';
import { DeserializeOptions, deserializeState, serializeState } from './serialization';
import { validateSettings } from './settings-validator';
import { compileTokenizer, tokenize, tokenizerPatternOf } from './tokenizer';
import { GRAPH_TRANSLITERATOR_VERSION } from './version';

const logger = new Logger('GraphTransliterator');

/**
 * Rule-based transliterator.
 *
 * Rules are compiled once into a matching graph; each call tokenizes the
 * input and repeatedly takes the cheapest rule matching at the current
 * token, inserting on-match productions between adjacent matches.
 *
 * @example
 * const gt = GraphTransliterator.fromSettings({
 *   tokens: { a: ['vowel'], ' ': ['wb'] },
 *   rules: [{ tokens: ['a'], production: 'A' }, { tokens: [' '], production: ' ' }],
 *   whitespace: { default: ' ', token_class: 'wb', consolidate: false },
 * });
 * gt.transliterate('a a'); // 'A A'
 */
export class GraphTransliterator {
  private readonly tokenizer: RegExp;
  private readonly matcher: Matcher;
  private ignoreErrorsFlag: boolean;
  private lastRuleKeys: number[] = [];
  private lastTokens: Token[] = [];

  constructor(private readonly state: TransliteratorState) {
    this.tokenizer = compileTokenizer(state.tokenizerPattern);
    this.matcher = new Matcher(state.graph, state.tokens);
    this.ignoreErrorsFlag = state.ignoreErrors;
  }

  /**
   * Build from settings that have already been validated
   */
  static build(settings: TransliteratorSettings, options: BuildOptions = {}): GraphTransliterator {
    const tokens = tokenClassMapOf(settings.tokens);
    const rules = sortRulesByCost(settings.rules.map(transliterationRuleOf));
    const onmatchRules =
      settings.onmatch_rules && settings.onmatch_rules.length > 0
        ? settings.onmatch_rules.map(onMatchRuleOf)
        : null;
    const tokensByClass = tokensByClassOf(tokens);
    const checkAmbiguity = options.checkAmbiguity ?? true;

    if (checkAmbiguity) {
      checkForAmbiguity(rules, new Set(tokens.keys()), tokensByClass);
    }

    return new GraphTransliterator({
      tokens,
      rules,
      whitespace: whitespacePolicyOf(settings.whitespace),
      onmatchRules,
      onmatchRulesLookup: onmatchRules ? buildOnMatchIndex(tokens, onmatchRules) : null,
      metadata: settings.metadata ?? null,
      tokensByClass,
      graph: buildGraph(rules),
      tokenizerPattern: tokenizerPatternOf(tokens.keys()),
      version: options.version ?? GRAPH_TRANSLITERATOR_VERSION,
      ignoreErrors: options.ignoreErrors ?? false,
      checkAmbiguity,
    });
  }

  static fromSettings(raw: unknown, options: BuildOptions = {}): GraphTransliterator {
    return GraphTransliterator.build(validateSettings(raw), options);
  }

  static fromEasyReading(raw: unknown, options: BuildOptions = {}): GraphTransliterator {
    return GraphTransliterator.build(validateSettings(parseEasyReadingSettings(raw)), options);
  }

  /**
   * Restore from a dump. The stored graph is used as is and ambiguity is not
   * checked again.
   */
  static load(dump: unknown, options: DeserializeOptions = {}): GraphTransliterator {
    return new GraphTransliterator(deserializeState(dump, options));
  }

  static loads(json: string, options: DeserializeOptions = {}): GraphTransliterator {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ValidationException('Transliterator dump is not valid JSON', [{ path: 'root', message }]);
    }
    return GraphTransliterator.load(raw, options);
  }

  tokenize(input: string): Token[] {
    return tokenize(input, {
      tokenizer: this.tokenizer,
      tokenClasses: this.state.tokens,
      whitespace: this.state.whitespace,
      ignoreErrors: this.ignoreErrorsFlag,
    });
  }

  /**
   * Transliterate input and record the matched rules and input tokens for
   * inspection through `lastMatchedRules` and `lastInputTokens`.
   */
  transliterate(input: string): string {
    this.lastTokens = [];
    this.lastRuleKeys = [];
    const details = this.transliterateWithDetails(input);
    this.lastTokens = details.tokens;
    this.lastRuleKeys = details.ruleKeys;
    return details.output;
  }

  /**
   * Same as `transliterate`, returning the tokens and rule keys of this call
   * instead of recording them on the instance.
   */
  transliterateWithDetails(input: string): TransliterationDetails {
    const tokens = this.tokenize(input);
    const ruleKeys: number[] = [];
    let output = '';
    let tokenIndex = 1;

    // sentinel whitespace sits at both ends
    while (tokenIndex < tokens.length - 1) {
      const ruleKey = this.matcher.matchAt(tokenIndex, tokens);
      if (ruleKey === null) {
        logger.warn(
          `No matching transliteration rule at token ${tokenIndex} of ${JSON.stringify(tokens)}`,
        );
        if (!this.ignoreErrorsFlag) {
          throw new NoMatchingRuleException(tokenIndex, tokens);
        }
        tokenIndex += 1;
        continue;
      }

      const rule = this.state.rules[ruleKey];
      ruleKeys.push(ruleKey);
      output += this.onMatchProductionAt(tokenIndex, tokens) ?? '';
      output += rule.production;
      tokenIndex += rule.tokens.length;
    }

    return { output, tokens, ruleKeys };
  }

  matchAt(tokenIndex: number, tokens: readonly Token[]): number | null;
  matchAt(tokenIndex: number, tokens: readonly Token[], matchAll: false): number | null;
  matchAt(tokenIndex: number, tokens: readonly Token[], matchAll: true): number[];
  matchAt(tokenIndex: number, tokens: readonly Token[], matchAll: boolean): number | number[] | null;
  matchAt(tokenIndex: number, tokens: readonly Token[], matchAll = false): number | number[] | null {
    return this.matcher.matchAt(tokenIndex, tokens, matchAll);
  }

  /**
   * New transliterator without the rules producing any of `productions`.
   * Everything else, including the ambiguity check setting, carries over.
   */
  prunedOf(productions: string | readonly string[]): GraphTransliterator {
    const removed = new Set(typeof productions === 'string' ? [productions] : productions);
    const settings = this.toSettings();
    return GraphTransliterator.build(
      { ...settings, rules: settings.rules.filter((rule) => !removed.has(rule.production)) },
      {
        ignoreErrors: this.ignoreErrorsFlag,
        checkAmbiguity: this.state.checkAmbiguity,
        version: this.state.version,
      },
    );
  }

  /**
   * Settings that rebuild this transliterator, rules in rule key order
   */
  toSettings(): TransliteratorSettings {
    return {
      tokens: Object.fromEntries(
        [...this.state.tokens].map(([token, classes]) => [token, [...classes]]),
      ),
      rules: this.state.rules.map((rule) => ({
        production: rule.production,
        tokens: [...rule.tokens],
        ...(rule.prevClasses && { prev_classes: [...rule.prevClasses] }),
        ...(rule.prevTokens && { prev_tokens: [...rule.prevTokens] }),
        ...(rule.nextTokens && { next_tokens: [...rule.nextTokens] }),
        ...(rule.nextClasses && { next_classes: [...rule.nextClasses] }),
      })),
      whitespace: {
        default: this.state.whitespace.defaultToken,
        token_class: this.state.whitespace.tokenClass,
        consolidate: this.state.whitespace.consolidate,
      },
      ...(this.state.onmatchRules && {
        onmatch_rules: this.state.onmatchRules.map((rule) => ({
          prev_classes: [...rule.prevClasses],
          next_classes: [...rule.nextClasses],
          production: rule.production,
        })),
      }),
      ...(this.state.metadata && { metadata: this.state.metadata }),
    };
  }

  dump(): TransliteratorDump {
    return serializeState({ ...this.state, ignoreErrors: this.ignoreErrorsFlag });
  }

  dumps(): string {
    return JSON.stringify(this.dump());
  }

  get rules(): readonly TransliterationRule[] {
    return this.state.rules;
  }

  get tokens(): TokenClassMap {
    return this.state.tokens;
  }

  get tokensByClass(): ReadonlyMap<TokenClass, ReadonlySet<Token>> {
    return this.state.tokensByClass;
  }

  get productions(): string[] {
    return this.state.rules.map((rule) => rule.production);
  }

  get whitespace(): WhitespacePolicy {
    return this.state.whitespace;
  }

  get onmatchRules(): readonly OnMatchRule[] | null {
    return this.state.onmatchRules;
  }

  get onmatchRulesLookup(): OnMatchIndex | null {
    return this.state.onmatchRulesLookup;
  }

  get metadata(): Metadata | null {
    return this.state.metadata;
  }

  get graph(): MatchingGraph {
    return this.state.graph;
  }

  get tokenizerPattern(): string {
    return this.state.tokenizerPattern;
  }

  get version(): string {
    return this.state.version;
  }

  get checkAmbiguity(): boolean {
    return this.state.checkAmbiguity;
  }

  get ignoreErrors(): boolean {
    return this.ignoreErrorsFlag;
  }

  set ignoreErrors(value: boolean) {
    this.ignoreErrorsFlag = value;
  }

  get lastMatchedRules(): TransliterationRule[] {
    return this.lastRuleKeys.map((ruleKey) => this.state.rules[ruleKey]);
  }

  get lastMatchedRuleTokens(): Array<readonly Token[]> {
    return this.lastMatchedRules.map((rule) => rule.tokens);
  }

  get lastInputTokens(): Token[] {
    return this.lastTokens;
  }

  /**
   * Production of the first on-match rule whose classes surround the
   * boundary just before `tokenIndex`
   */
  private onMatchProductionAt(tokenIndex: number, tokens: readonly Token[]): string | null {
    const { onmatchRules, onmatchRulesLookup } = this.state;
    if (!onmatchRules || !onmatchRulesLookup) {
      return null;
    }
    const candidates = onmatchRulesLookup.get(tokens[tokenIndex])?.get(tokens[tokenIndex - 1]);
    if (!candidates) {
      return null;
    }
    for (const index of candidates) {
      const rule = onmatchRules[index];
      if (
        matchTokens(tokenIndex - rule.prevClasses.length, rule.prevClasses, tokens, this.state.tokens, 'prev', true) &&
        matchTokens(tokenIndex, rule.nextClasses, tokens, this.state.tokens, 'next', true)
      ) {
        return rule.production;
      }
    }
    return null;
  }
}
