import { Logger } from '@nestjs/common';
import { UnrecognizableInputTokenException } from '../common/exceptions';
import { Token, TokenClassMap, WhitespacePolicy } from './interfaces/transliteration.interfaces';

const logger = new Logger('Tokenizer');

// Characters that may be escaped under the `u` flag
const SYNTAX_CHARACTERS = /[\^$\\.*+?()[\]{}|\/]/g;

export function escapeToken(token: Token): string {
  return token.replace(SYNTAX_CHARACTERS, '\\$&');
}

/**
 * Alternation of every token, longest first so a token is never shadowed by
 * one of its prefixes. Tokens of equal length keep declaration order.
 */
export function tokenizerPatternOf(tokens: Iterable<Token>): string {
  return [...tokens]
    .map((token, index) => ({ token, index }))
    .sort((a, b) => b.token.length - a.token.length || a.index - b.index)
    .map(({ token }) => escapeToken(token))
    .join('|');
}

export function compileTokenizer(pattern: string): RegExp {
  return new RegExp(pattern, 'uy');
}

export interface TokenizeOptions {
  tokenizer: RegExp;
  tokenClasses: TokenClassMap;
  whitespace: WhitespacePolicy;
  ignoreErrors: boolean;
}

/**
 * Split input into tokens, framed by the default whitespace token on both
 * sides. With `consolidate`, runs of whitespace collapse into their first
 * token and whitespace at either edge is dropped.
 */
export function tokenize(input: string, options: TokenizeOptions): Token[] {
  const { tokenizer, tokenClasses, whitespace, ignoreErrors } = options;
  const isWhitespace = (token: Token) =>
    tokenClasses.get(token)?.has(whitespace.tokenClass) ?? false;

  const tokens: Token[] = [whitespace.defaultToken];
  let prevWhitespace = true;
  let position = 0;

  while (position < input.length) {
    tokenizer.lastIndex = position;
    const match = tokenizer.exec(input);

    if (!match || match[0].length === 0) {
      const codePoint = input.codePointAt(position) ?? 0;
      const character = String.fromCodePoint(codePoint);
      logger.warn(`Unrecognizable token '${character}' at position ${position} of '${input}'`);
      if (!ignoreErrors) {
        throw new UnrecognizableInputTokenException(position, character);
      }
      position += character.length;
      continue;
    }

    const token = match[0];
    position += token.length;
    if (isWhitespace(token)) {
      if (prevWhitespace && whitespace.consolidate) {
        continue;
      }
      prevWhitespace = true;
    } else {
      prevWhitespace = false;
    }
    tokens.push(token);
  }

  if (whitespace.consolidate) {
    while (tokens.length > 1 && isWhitespace(tokens[tokens.length - 1])) {
      tokens.pop();
    }
  }

  tokens.push(whitespace.defaultToken);
  return tokens;
}
