import {
  GraphNode,
  MatchingGraph,
  RuleConstraints,
  Token,
  TransliterationRule,
} from './interfaces/transliteration.interfaces';

interface DraftEdges {
  tokenChildren: Map<Token, number>;
  ruleChildren: number[];
  cost: number;
  firstRuleKey: number;
}

type DraftNode =
  | (DraftEdges & { kind: 'start' })
  | (DraftEdges & { kind: 'token'; token: Token })
  | (DraftEdges & { kind: 'rule'; ruleKey: number; tokenCount: number; constraints: RuleConstraints });

function constraintsOf(rule: TransliterationRule): RuleConstraints {
  return {
    ...(rule.prevTokens && { prevTokens: rule.prevTokens }),
    ...(rule.prevClasses && { prevClasses: rule.prevClasses }),
    ...(rule.nextTokens && { nextTokens: rule.nextTokens }),
    ...(rule.nextClasses && { nextClasses: rule.nextClasses }),
  };
}

/**
 * Build the matching graph from cost-sorted rules.
 *
 * Each rule's tokens become a path from Start that reuses nodes for shared
 * prefixes and ends in an accepting rule node carrying the rule's context
 * constraints. Children of every node are ordered by ascending cost, ties by
 * the key of the first rule that created them.
 */
export function buildGraph(rules: readonly TransliterationRule[]): MatchingGraph {
  const draft: DraftNode[] = [
    { kind: 'start', cost: 0, firstRuleKey: -1, tokenChildren: new Map(), ruleChildren: [] },
  ];

  rules.forEach((rule, ruleKey) => {
    let parentId = 0;
    for (const token of rule.tokens) {
      const parent = draft[parentId];
      let childId = parent.tokenChildren.get(token);
      if (childId === undefined) {
        childId = draft.length;
        // rules arrive cheapest first, so the creating rule fixes the node's cost
        draft.push({
          kind: 'token',
          token,
          cost: rule.cost,
          firstRuleKey: ruleKey,
          tokenChildren: new Map(),
          ruleChildren: [],
        });
        parent.tokenChildren.set(token, childId);
      }
      parentId = childId;
    }

    draft[parentId].ruleChildren.push(draft.length);
    draft.push({
      kind: 'rule',
      ruleKey,
      tokenCount: rule.tokens.length,
      constraints: constraintsOf(rule),
      cost: rule.cost,
      firstRuleKey: ruleKey,
      tokenChildren: new Map(),
      ruleChildren: [],
    });
  });

  const byCost = (a: number, b: number) =>
    draft[a].cost - draft[b].cost || draft[a].firstRuleKey - draft[b].firstRuleKey;

  const nodes = draft.map((node): GraphNode => {
    const ruleChildren = Object.freeze([...node.ruleChildren].sort(byCost));
    const orderedChildren = new Map<Token, readonly number[]>();
    for (const [token, childId] of node.tokenChildren) {
      orderedChildren.set(token, Object.freeze([childId, ...ruleChildren].sort(byCost)));
    }
    const edges = { orderedChildren, ruleChildren };

    switch (node.kind) {
      case 'start':
        return { kind: 'start', ...edges };
      case 'token':
        return {
          kind: 'token',
          token: node.token,
          cost: node.cost,
          firstRuleKey: node.firstRuleKey,
          ...edges,
        };
      case 'rule':
        return {
          kind: 'rule',
          ruleKey: node.ruleKey,
          cost: node.cost,
          tokenCount: node.tokenCount,
          constraints: node.constraints,
          ...edges,
        };
    }
  });

  return { nodes: Object.freeze(nodes) };
}
