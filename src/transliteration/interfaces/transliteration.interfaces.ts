/**
 * Graph Transliteration Interfaces
 *
 * Tokens are grouped into classes; rules match token sequences with optional
 * context before and after; on-match rules insert text between productions.
 */

export type Token = string;
export type TokenClass = string;

/** Mapping of every declared token to the classes it belongs to */
export type TokenClassMap = ReadonlyMap<Token, ReadonlySet<TokenClass>>;

export interface TransliterationRule {
  readonly production: string;
  readonly prevClasses: readonly TokenClass[] | null;
  readonly prevTokens: readonly Token[] | null;
  readonly tokens: readonly Token[];
  readonly nextTokens: readonly Token[] | null;
  readonly nextClasses: readonly TokenClass[] | null;
  readonly cost: number; // Lower = more specific = tried first
}

export interface OnMatchRule {
  readonly prevClasses: readonly TokenClass[];
  readonly nextClasses: readonly TokenClass[];
  readonly production: string;
}

export interface WhitespacePolicy {
  readonly defaultToken: Token;
  readonly tokenClass: TokenClass;
  readonly consolidate: boolean;
}

/** Context constraints checked once a rule's tokens have been consumed (AND semantics) */
export interface RuleConstraints {
  readonly prevTokens?: readonly Token[];
  readonly prevClasses?: readonly TokenClass[];
  readonly nextTokens?: readonly Token[];
  readonly nextClasses?: readonly TokenClass[];
}

interface GraphNodeBase {
  /** Children reachable by consuming a token, merged with rule children, by ascending cost */
  readonly orderedChildren: ReadonlyMap<Token, readonly number[]>;
  /** Accepting children with no further token to consume */
  readonly ruleChildren: readonly number[];
}

export interface StartNode extends GraphNodeBase {
  readonly kind: 'start';
}

export interface TokenNode extends GraphNodeBase {
  readonly kind: 'token';
  readonly token: Token;
  readonly cost: number;
  readonly firstRuleKey: number;
}

export interface RuleNode extends GraphNodeBase {
  readonly kind: 'rule';
  readonly ruleKey: number;
  readonly cost: number;
  readonly tokenCount: number;
  readonly constraints: RuleConstraints;
}

export type GraphNode = StartNode | TokenNode | RuleNode;

export interface MatchingGraph {
  readonly nodes: readonly GraphNode[];
}

/** boundary-first token → boundary-preceding token → on-match rule indexes */
export type OnMatchIndex = ReadonlyMap<Token, ReadonlyMap<Token, readonly number[]>>;

/** Everything a built transliterator holds; rebuilt wholesale, never edited */
export interface TransliteratorState {
  readonly tokens: TokenClassMap;
  readonly rules: readonly TransliterationRule[];
  readonly whitespace: WhitespacePolicy;
  readonly onmatchRules: readonly OnMatchRule[] | null;
  readonly onmatchRulesLookup: OnMatchIndex | null;
  readonly metadata: Metadata | null;
  readonly tokensByClass: ReadonlyMap<TokenClass, ReadonlySet<Token>>;
  readonly graph: MatchingGraph;
  readonly tokenizerPattern: string;
  readonly version: string;
  readonly ignoreErrors: boolean;
  readonly checkAmbiguity: boolean;
}

export interface TransliterationDetails {
  output: string;
  tokens: Token[];
  ruleKeys: number[];
}

export interface BuildOptions {
  ignoreErrors?: boolean;
  checkAmbiguity?: boolean;
  version?: string;
}

// Plain settings, as accepted from JSON

export interface TransliterationRuleSettings {
  production: string;
  tokens: string[];
  prev_tokens?: string[] | null;
  prev_classes?: string[] | null;
  next_tokens?: string[] | null;
  next_classes?: string[] | null;
}

export interface OnMatchRuleSettings {
  prev_classes: string[];
  next_classes: string[];
  production: string;
}

export interface WhitespaceSettings {
  default: string;
  token_class: string;
  consolidate: boolean;
}

export type Metadata = Record<string, unknown>;

export interface TransliteratorSettings {
  tokens: Record<string, string[]>;
  rules: TransliterationRuleSettings[];
  whitespace: WhitespaceSettings;
  onmatch_rules?: OnMatchRuleSettings[];
  metadata?: Metadata;
}

/** Compact notation: rule strings such as `(<class_c> b) a (c <class_b>)` */
export interface EasyReadingSettings {
  tokens: Record<string, string[]>;
  rules: Record<string, string>;
  whitespace: WhitespaceSettings;
  onmatch_rules?: Array<Record<string, string>>;
  metadata?: Metadata;
}

// Serialized form

export interface SerializedRule {
  production: string;
  prev_classes: string[] | null;
  prev_tokens: string[] | null;
  tokens: string[];
  next_tokens: string[] | null;
  next_classes: string[] | null;
  cost: number;
}

export interface SerializedConstraints {
  prev_tokens?: string[];
  prev_classes?: string[];
  next_tokens?: string[];
  next_classes?: string[];
}

export type SerializedNode =
  | { type: 'start'; ordered_children: Record<string, number[]>; rule_children: number[] }
  | {
      type: 'token';
      token: string;
      cost: number;
      first_rule_key: number;
      ordered_children: Record<string, number[]>;
      rule_children: number[];
    }
  | {
      type: 'rule';
      rule_key: number;
      cost: number;
      token_count: number;
      constraints: SerializedConstraints;
      ordered_children: Record<string, number[]>;
      rule_children: number[];
    };

export interface TransliteratorDump {
  tokens: Record<string, string[]>;
  rules: SerializedRule[];
  whitespace: WhitespaceSettings;
  onmatch_rules: OnMatchRuleSettings[] | null;
  metadata: Metadata | null;
  ignore_errors: boolean;
  check_ambiguity: boolean;
  onmatch_rules_lookup: Record<string, Record<string, number[]>> | null;
  tokens_by_class: Record<string, string[]>;
  graph: { node: SerializedNode[] };
  tokenizer_pattern: string;
  version: string;
}
