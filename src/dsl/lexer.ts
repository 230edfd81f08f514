import { LexError } from '../errors';
import { Token, TokenKind } from './tokens';

const KEYWORDS: Record<string, TokenKind> = {
  ENTRY: 'ENTRY',
  EXIT: 'EXIT',
  AND: 'AND',
  OR: 'OR',
  SMA: 'FUNCTION',
  RSI: 'FUNCTION',
};

const SINGLE_CHAR: Record<string, TokenKind> = {
  '(': 'LPAREN',
  ')': 'RPAREN',
  ',': 'COMMA',
  ':': 'COLON',
  '+': 'PLUS',
  '-': 'MINUS',
  '*': 'STAR',
  '/': 'SLASH',
};

const WORD_START = /[A-Za-z_]/;
const WORD_CHAR = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

/**
 * Split rule text into tokens. The returned array always ends with an EOF
 * token. Throws LexError on the first lexeme it cannot classify.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let lineStart = 0;

  const peek = (ahead = 0): string => source.charAt(pos + ahead);

  function fail(message: string, start: number, end: number): never {
    const lexeme = source.slice(start, Math.max(end, start + 1));
    throw new LexError(`${message} '${lexeme}'`, lexeme, start, line, start - lineStart + 1);
  }

  const push = (kind: TokenKind, text: string, start: number) => {
    tokens.push({ kind, text, offset: start, line, column: start - lineStart + 1 });
  };

  const readWord = (): string => {
    const start = pos;
    while (pos < source.length && WORD_CHAR.test(peek())) pos++;
    return source.slice(start, pos);
  };

  // Whitespace between the two words of a cross phrase may span lines
  const skipWhitespace = () => {
    while (pos < source.length && WHITESPACE.test(peek())) {
      if (peek() === '\n') {
        line++;
        lineStart = pos + 1;
      }
      pos++;
    }
  };

  while (pos < source.length) {
    const ch = peek();

    if (WHITESPACE.test(ch)) {
      skipWhitespace();
      continue;
    }

    const start = pos;

    if (DIGIT.test(ch)) {
      while (DIGIT.test(peek())) pos++;
      if (peek() === '.' && DIGIT.test(peek(1))) {
        pos++;
        while (DIGIT.test(peek())) pos++;
      }
      if (/[KkMm]/.test(peek())) pos++;
      if (pos < source.length && (WORD_CHAR.test(peek()) || peek() === '.')) {
        while (pos < source.length && (WORD_CHAR.test(peek()) || peek() === '.')) pos++;
        fail('Malformed number', start, pos);
      }
      push('NUMBER', source.slice(start, pos), start);
      continue;
    }

    if (WORD_START.test(ch)) {
      const word = readWord();
      const upper = word.toUpperCase();

      if (upper === 'CROSSES') {
        const startLine = line;
        const startLineStart = lineStart;
        skipWhitespace();
        const direction = WORD_START.test(peek()) ? readWord().toUpperCase() : '';
        if (direction !== 'ABOVE' && direction !== 'BELOW') {
          line = startLine;
          lineStart = startLineStart;
          fail("Expected 'above' or 'below' after", start, start + word.length);
        }
        tokens.push({
          kind: 'CROSS',
          text: `CROSS_${direction}`,
          offset: start,
          line: startLine,
          column: start - startLineStart + 1,
        });
        continue;
      }

      const keyword = KEYWORDS[upper];
      if (keyword) {
        push(keyword, upper, start);
      } else {
        push('IDENTIFIER', word.toLowerCase(), start);
      }
      continue;
    }

    if (ch === '>' || ch === '<' || ch === '=') {
      if (peek(1) === '=') {
        pos += 2;
        push('COMPARATOR', source.slice(start, pos), start);
        continue;
      }
      if (ch === '=') fail('Unrecognised operator', start, start + 1);
      pos++;
      push('COMPARATOR', ch, start);
      continue;
    }

    const single = SINGLE_CHAR[ch];
    if (single) {
      pos++;
      push(single, ch, start);
      continue;
    }

    fail('Unrecognised character', start, start + 1);
  }

  push('EOF', '', pos);
  return tokens;
}
