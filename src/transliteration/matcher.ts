import {
  MatchingGraph,
  RuleNode,
  Token,
  TokenClassMap,
} from './interfaces/transliteration.interfaces';

export type WindowDirection = 'prev' | 'next';

interface StackFrame {
  nodeId: number;
  tokenIndex: number;
}

/**
 * Compare a window of the token stream against literal tokens or classes.
 *
 * Backward windows fail when they start before the first token, forward
 * windows when they run past the last one.
 */
export function matchTokens(
  startAt: number,
  expected: readonly string[],
  tokens: readonly Token[],
  tokenClasses: TokenClassMap,
  direction: WindowDirection,
  byClass: boolean,
): boolean {
  if (direction === 'prev' && startAt < 0) {
    return false;
  }
  if (direction === 'next' && startAt + expected.length > tokens.length) {
    return false;
  }
  for (let i = 0; i < expected.length; i++) {
    const actual = tokens[startAt + i];
    if (byClass) {
      if (!tokenClasses.get(actual)?.has(expected[i])) {
        return false;
      }
    } else if (actual !== expected[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Check a rule node's constraints. `tokenIndex` is the position right after
 * the tokens the rule consumed.
 *
 *   rule (<class_a> b) a (c <class_b>), input "xbacy":
 *   ' ' x b a c y ' '
 *       ^             prevClasses  = end - tokenCount - |prevTokens| - |prevClasses|
 *         ^           prevTokens   = end - tokenCount - |prevTokens|
 *             ^       nextTokens   = end
 *               ^     nextClasses  = end + |nextTokens|
 */
export function matchConstraints(
  node: RuleNode,
  tokenIndex: number,
  tokens: readonly Token[],
  tokenClasses: TokenClassMap,
): boolean {
  const { prevTokens, prevClasses, nextTokens, nextClasses } = node.constraints;
  const matchStart = tokenIndex - node.tokenCount;

  if (prevTokens) {
    const startAt = matchStart - prevTokens.length;
    if (!matchTokens(startAt, prevTokens, tokens, tokenClasses, 'prev', false)) {
      return false;
    }
  }
  if (prevClasses) {
    const startAt = matchStart - (prevTokens?.length ?? 0) - prevClasses.length;
    if (!matchTokens(startAt, prevClasses, tokens, tokenClasses, 'prev', true)) {
      return false;
    }
  }
  if (nextTokens) {
    if (!matchTokens(tokenIndex, nextTokens, tokens, tokenClasses, 'next', false)) {
      return false;
    }
  }
  if (nextClasses) {
    const startAt = tokenIndex + (nextTokens?.length ?? 0);
    if (!matchTokens(startAt, nextClasses, tokens, tokenClasses, 'next', true)) {
      return false;
    }
  }
  return true;
}

/**
 * Walks the matching graph depth first with an explicit stack. Children are
 * pushed in reverse so the cheapest is popped first, which makes the first
 * accepted rule node the most specific match.
 */
export class Matcher {
  constructor(
    private readonly graph: MatchingGraph,
    private readonly tokenClasses: TokenClassMap,
  ) {}

  matchAt(tokenIndex: number, tokens: readonly Token[]): number | null;
  matchAt(tokenIndex: number, tokens: readonly Token[], matchAll: false): number | null;
  matchAt(tokenIndex: number, tokens: readonly Token[], matchAll: true): number[];
  matchAt(tokenIndex: number, tokens: readonly Token[], matchAll: boolean): number | number[] | null;
  matchAt(tokenIndex: number, tokens: readonly Token[], matchAll = false): number | number[] | null {
    const matches: number[] = [];
    const stack: StackFrame[] = [];
    const lastIndex = tokens.length - 1;

    const pushChildren = (nodeId: number, at: number) => {
      const node = this.graph.nodes[nodeId];
      const children = node.orderedChildren.get(tokens[at]) ?? node.ruleChildren;
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ nodeId: children[i], tokenIndex: at });
      }
    };

    pushChildren(0, tokenIndex);

    let frame = stack.pop();
    while (frame) {
      const node = this.graph.nodes[frame.nodeId];
      if (
        node.kind === 'rule' &&
        matchConstraints(node, frame.tokenIndex, tokens, this.tokenClasses)
      ) {
        if (!matchAll) {
          return node.ruleKey;
        }
        matches.push(node.ruleKey);
      } else {
        // never advance past the final whitespace sentinel
        const next = frame.tokenIndex < lastIndex ? frame.tokenIndex + 1 : frame.tokenIndex;
        pushChildren(frame.nodeId, next);
      }
      frame = stack.pop();
    }

    return matchAll ? matches : null;
  }
}
