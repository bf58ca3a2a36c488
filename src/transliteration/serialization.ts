import { SchemaObject } from 'ajv';
import { ValidationException, ValidationIssue } from '../common/exceptions';
import { SchemaValidator } from '../common/validators/schema-validator';
import {
  GraphNode,
  OnMatchIndex,
  RuleConstraints,
  SerializedConstraints,
  SerializedNode,
  Token,
  TransliterationRule,
  TransliteratorDump,
  TransliteratorState,
} from './interfaces/transliteration.interfaces';
import { onMatchRuleOf, tokenClassMapOf, whitespacePolicyOf } from './rules';

const stringArray = { type: 'array', items: { type: 'string' } };
const nullableStringArray = { type: ['array', 'null'], items: { type: 'string' } };
const indexArray = { type: 'array', items: { type: 'integer', minimum: 0 } };
const stringArrayRecord = { type: 'object', additionalProperties: stringArray };

const nodeSchema = {
  type: 'object',
  required: ['type', 'ordered_children', 'rule_children'],
  properties: {
    type: { enum: ['start', 'token', 'rule'] },
    ordered_children: { type: 'object', additionalProperties: indexArray },
    rule_children: indexArray,
    token: { type: 'string' },
    cost: { type: 'number' },
    first_rule_key: { type: 'integer' },
    rule_key: { type: 'integer', minimum: 0 },
    token_count: { type: 'integer', minimum: 1 },
    constraints: {
      type: 'object',
      additionalProperties: false,
      properties: {
        prev_tokens: stringArray,
        prev_classes: stringArray,
        next_tokens: stringArray,
        next_classes: stringArray,
      },
    },
  },
  allOf: [
    {
      if: { properties: { type: { const: 'token' } } },
      then: { required: ['token', 'cost', 'first_rule_key'] },
    },
    {
      if: { properties: { type: { const: 'rule' } } },
      then: { required: ['rule_key', 'cost', 'token_count', 'constraints'] },
    },
  ],
};

export const TRANSLITERATOR_DUMP_SCHEMA: SchemaObject = {
  type: 'object',
  required: [
    'tokens',
    'rules',
    'whitespace',
    'onmatch_rules',
    'metadata',
    'ignore_errors',
    'check_ambiguity',
    'onmatch_rules_lookup',
    'tokens_by_class',
    'graph',
    'tokenizer_pattern',
    'version',
  ],
  properties: {
    tokens: stringArrayRecord,
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['production', 'prev_classes', 'prev_tokens', 'tokens', 'next_tokens', 'next_classes', 'cost'],
        properties: {
          production: { type: 'string' },
          prev_classes: nullableStringArray,
          prev_tokens: nullableStringArray,
          tokens: { ...stringArray, minItems: 1 },
          next_tokens: nullableStringArray,
          next_classes: nullableStringArray,
          cost: { type: 'number' },
        },
      },
    },
    whitespace: {
      type: 'object',
      required: ['default', 'token_class', 'consolidate'],
      properties: {
        default: { type: 'string' },
        token_class: { type: 'string' },
        consolidate: { type: 'boolean' },
      },
    },
    onmatch_rules: {
      type: ['array', 'null'],
      items: {
        type: 'object',
        required: ['prev_classes', 'next_classes', 'production'],
        properties: {
          prev_classes: { ...stringArray, minItems: 1 },
          next_classes: { ...stringArray, minItems: 1 },
          production: { type: 'string' },
        },
      },
    },
    metadata: { type: ['object', 'null'] },
    ignore_errors: { type: 'boolean' },
    check_ambiguity: { type: 'boolean' },
    onmatch_rules_lookup: {
      type: ['object', 'null'],
      additionalProperties: { type: 'object', additionalProperties: indexArray },
    },
    tokens_by_class: stringArrayRecord,
    graph: {
      type: 'object',
      required: ['node'],
      properties: {
        node: { type: 'array', minItems: 1, items: nodeSchema },
      },
    },
    tokenizer_pattern: { type: 'string' },
    version: { type: 'string' },
  },
};

const schemaValidator = new SchemaValidator();

function copyOrNull(values: readonly string[] | null): string[] | null {
  return values ? [...values] : null;
}

function frozenOrNull(values: string[] | null): readonly string[] | null {
  return values ? Object.freeze([...values]) : null;
}

function serializeConstraints(constraints: RuleConstraints): SerializedConstraints {
  return {
    ...(constraints.prevTokens && { prev_tokens: [...constraints.prevTokens] }),
    ...(constraints.prevClasses && { prev_classes: [...constraints.prevClasses] }),
    ...(constraints.nextTokens && { next_tokens: [...constraints.nextTokens] }),
    ...(constraints.nextClasses && { next_classes: [...constraints.nextClasses] }),
  };
}

function serializeNode(node: GraphNode): SerializedNode {
  const edges = {
    ordered_children: Object.fromEntries(
      [...node.orderedChildren].map(([token, children]) => [token, [...children]]),
    ),
    rule_children: [...node.ruleChildren],
  };
  switch (node.kind) {
    case 'start':
      return { type: 'start', ...edges };
    case 'token':
      return {
        type: 'token',
        token: node.token,
        cost: node.cost,
        first_rule_key: node.firstRuleKey,
        ...edges,
      };
    case 'rule':
      return {
        type: 'rule',
        rule_key: node.ruleKey,
        cost: node.cost,
        token_count: node.tokenCount,
        constraints: serializeConstraints(node.constraints),
        ...edges,
      };
  }
}

/**
 * Plain, JSON-safe dump of a transliterator's full derived state
 */
export function serializeState(state: TransliteratorState): TransliteratorDump {
  return {
    tokens: Object.fromEntries([...state.tokens].map(([token, classes]) => [token, [...classes]])),
    rules: state.rules.map((rule) => ({
      production: rule.production,
      prev_classes: copyOrNull(rule.prevClasses),
      prev_tokens: copyOrNull(rule.prevTokens),
      tokens: [...rule.tokens],
      next_tokens: copyOrNull(rule.nextTokens),
      next_classes: copyOrNull(rule.nextClasses),
      cost: rule.cost,
    })),
    whitespace: {
      default: state.whitespace.defaultToken,
      token_class: state.whitespace.tokenClass,
      consolidate: state.whitespace.consolidate,
    },
    onmatch_rules: state.onmatchRules
      ? state.onmatchRules.map((rule) => ({
          prev_classes: [...rule.prevClasses],
          next_classes: [...rule.nextClasses],
          production: rule.production,
        }))
      : null,
    metadata: state.metadata,
    ignore_errors: state.ignoreErrors,
    check_ambiguity: state.checkAmbiguity,
    onmatch_rules_lookup: state.onmatchRulesLookup
      ? Object.fromEntries(
          [...state.onmatchRulesLookup].map(([currToken, byPrev]) => [
            currToken,
            Object.fromEntries([...byPrev].map(([prevToken, indexes]) => [prevToken, [...indexes]])),
          ]),
        )
      : null,
    tokens_by_class: Object.fromEntries(
      [...state.tokensByClass].map(([tokenClass, tokens]) => [tokenClass, [...tokens]]),
    ),
    graph: { node: state.graph.nodes.map(serializeNode) },
    tokenizer_pattern: state.tokenizerPattern,
    version: state.version,
  };
}

function deserializeConstraints(constraints: SerializedConstraints): RuleConstraints {
  return {
    ...(constraints.prev_tokens && { prevTokens: constraints.prev_tokens }),
    ...(constraints.prev_classes && { prevClasses: constraints.prev_classes }),
    ...(constraints.next_tokens && { nextTokens: constraints.next_tokens }),
    ...(constraints.next_classes && { nextClasses: constraints.next_classes }),
  };
}

function deserializeNode(node: SerializedNode): GraphNode {
  const edges = {
    orderedChildren: new Map<Token, readonly number[]>(Object.entries(node.ordered_children)),
    ruleChildren: node.rule_children,
  };
  switch (node.type) {
    case 'start':
      return { kind: 'start', ...edges };
    case 'token':
      return {
        kind: 'token',
        token: node.token,
        cost: node.cost,
        firstRuleKey: node.first_rule_key,
        ...edges,
      };
    case 'rule':
      return {
        kind: 'rule',
        ruleKey: node.rule_key,
        cost: node.cost,
        tokenCount: node.token_count,
        constraints: deserializeConstraints(node.constraints),
        ...edges,
      };
  }
}

/**
 * Index references a schema cannot express: child node ids, rule keys and
 * on-match rule indexes must point inside their arrays.
 */
function referenceIssues(dump: TransliteratorDump): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const nodeCount = dump.graph.node.length;
  const onmatchCount = dump.onmatch_rules?.length ?? 0;

  if (dump.graph.node[0].type !== 'start') {
    issues.push({ path: '/graph/node/0', message: 'First node must be the start node' });
  }
  dump.graph.node.forEach((node, index) => {
    const children = [...Object.values(node.ordered_children).flat(), ...node.rule_children];
    if (children.some((child) => child >= nodeCount)) {
      issues.push({ path: `/graph/node/${index}`, message: 'Child index out of range' });
    }
    if (node.type === 'rule' && node.rule_key >= dump.rules.length) {
      issues.push({ path: `/graph/node/${index}/rule_key`, message: 'Rule key out of range' });
    }
  });
  for (const [currToken, byPrev] of Object.entries(dump.onmatch_rules_lookup ?? {})) {
    for (const [prevToken, indexes] of Object.entries(byPrev)) {
      if (indexes.some((index) => index >= onmatchCount)) {
        issues.push({
          path: `/onmatch_rules_lookup/${currToken}/${prevToken}`,
          message: 'On-match rule index out of range',
        });
      }
    }
  }
  return issues;
}

export interface DeserializeOptions {
  ignoreErrors?: boolean;
  checkAmbiguity?: boolean;
}

/**
 * Rebuild state from a dump without recompiling the graph. The stored
 * `check_ambiguity` flag only applies to transliterators later derived from
 * this one; options override both stored flags.
 */
export function deserializeState(raw: unknown, options: DeserializeOptions = {}): TransliteratorState {
  const dump = schemaValidator.validate<TransliteratorDump>(TRANSLITERATOR_DUMP_SCHEMA, raw);
  const issues = referenceIssues(dump);
  if (issues.length > 0) {
    throw new ValidationException('Transliterator dump has dangling references', issues);
  }

  const rules: TransliterationRule[] = dump.rules.map((rule) =>
    Object.freeze({
      production: rule.production,
      prevClasses: frozenOrNull(rule.prev_classes),
      prevTokens: frozenOrNull(rule.prev_tokens),
      tokens: Object.freeze([...rule.tokens]),
      nextTokens: frozenOrNull(rule.next_tokens),
      nextClasses: frozenOrNull(rule.next_classes),
      cost: rule.cost,
    }),
  );

  const onmatchRulesLookup: OnMatchIndex | null = dump.onmatch_rules_lookup
    ? new Map(
        Object.entries(dump.onmatch_rules_lookup).map(([currToken, byPrev]) => [
          currToken,
          new Map(Object.entries(byPrev)),
        ]),
      )
    : null;

  return {
    tokens: tokenClassMapOf(dump.tokens),
    rules,
    whitespace: whitespacePolicyOf(dump.whitespace),
    onmatchRules: dump.onmatch_rules ? dump.onmatch_rules.map(onMatchRuleOf) : null,
    onmatchRulesLookup,
    metadata: dump.metadata,
    tokensByClass: new Map(
      Object.entries(dump.tokens_by_class).map(([tokenClass, tokens]) => [tokenClass, new Set(tokens)]),
    ),
    graph: { nodes: Object.freeze(dump.graph.node.map(deserializeNode)) },
    tokenizerPattern: dump.tokenizer_pattern,
    version: dump.version,
    ignoreErrors: options.ignoreErrors ?? dump.ignore_errors,
    checkAmbiguity: options.checkAmbiguity ?? dump.check_ambiguity,
  };
}
