import { ParseError } from '../errors';
import { createLogger } from '../utils';
import {
  ArithmeticOperator, ComparisonOperator, CrossOperator, Expression,
  FunctionName, NumberLiteral, Strategy, isCondition, resolveField,
} from './ast';
import { tokenize } from './lexer';
import { Token, TokenKind, describeToken } from './tokens';

const log = createLogger('parser');

const NUMBER_PATTERN = /^(\d+(?:\.\d+)?)([KkMm])?$/;

const SCALE: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
};

const COMPARATORS: readonly string[] = ['>', '<', '>=', '<=', '=='];

function isComparator(text: string): text is ComparisonOperator {
  return COMPARATORS.includes(text);
}

function isCrossOperator(text: string): text is CrossOperator {
  return text === 'CROSS_ABOVE' || text === 'CROSS_BELOW';
}

function isFunctionName(text: string): text is FunctionName {
  return text === 'SMA' || text === 'RSI';
}

/** Numeric literal text → value, with the K/M scale applied. */
export function numberValue(text: string): number {
  const match = NUMBER_PATTERN.exec(text);
  if (!match) throw new ParseError('a numeric literal', `'${text}'`, 0);
  const scale = match[2] ? SCALE[match[2].toUpperCase()] : 1;
  return parseFloat(match[1]) * scale;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parseStrategy(): Strategy {
    let entry: Expression | null = null;
    let exit: Expression | null = null;

    if (this.check('ENTRY')) {
      this.advance();
      this.expect('COLON', "':' after ENTRY");
      entry = this.parseSection();
    }

    if (this.check('EXIT')) {
      this.advance();
      this.expect('COLON', "':' after EXIT");
      exit = this.parseSection();
    }

    if (!this.check('EOF')) {
      const tok = this.current();
      if (entry === null && exit === null) {
        throw this.error("'ENTRY:' or 'EXIT:'", tok);
      }
      if (tok.kind === 'ENTRY' || tok.kind === 'EXIT') {
        throw this.error('end of input', tok,
          `Section ${tok.text} at offset ${tok.offset} is out of place: ENTRY and EXIT appear at most once each, ENTRY first`);
      }
      if (tok.kind === 'COMPARATOR' || tok.kind === 'CROSS') {
        throw this.error('AND, OR or a section keyword', tok,
          `Comparisons do not chain: unexpected ${describeToken(tok)} at offset ${tok.offset}`);
      }
      throw this.error(exit === null ? "AND, OR, 'EXIT:' or end of input" : 'AND, OR or end of input', tok);
    }

    return { type: 'strategy', entry, exit };
  }

  private parseSection(): Expression {
    const body = this.parseOr();
    this.requireCondition(body);
    return body;
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.check('OR')) {
      this.requireCondition(left);
      this.advance();
      const right = this.parseAnd();
      this.requireCondition(right);
      left = { type: 'logical', operator: 'OR', left, right };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseComparison();
    while (this.check('AND')) {
      this.requireCondition(left);
      this.advance();
      const right = this.parseComparison();
      this.requireCondition(right);
      left = { type: 'logical', operator: 'AND', left, right };
    }
    return left;
  }

  private parseComparison(): Expression {
    const left = this.parseArith();
    const tok = this.current();
    if (tok.kind !== 'COMPARATOR' && tok.kind !== 'CROSS') return left;

    this.requireValue(left, tok);
    this.advance();
    const rightStart = this.current();
    const right = this.parseArith();
    this.requireValue(right, rightStart);

    const next = this.current();
    if (next.kind === 'COMPARATOR' || next.kind === 'CROSS') {
      throw this.error('AND, OR or end of expression', next,
        `Comparisons do not chain: unexpected ${describeToken(next)} at offset ${next.offset}`);
    }

    if (tok.kind === 'COMPARATOR' && isComparator(tok.text)) {
      return { type: 'comparison', operator: tok.text, left, right };
    }
    if (tok.kind === 'CROSS' && isCrossOperator(tok.text)) {
      return { type: 'cross', operator: tok.text, left, right };
    }
    throw this.error('a comparator or cross phrase', tok);
  }

  private parseArith(): Expression {
    let left = this.parseTerm();
    while (this.check('PLUS') || this.check('MINUS')) {
      const op = this.advance();
      this.requireValue(left, op);
      const rightStart = this.current();
      const right = this.parseTerm();
      this.requireValue(right, rightStart);
      const operator: ArithmeticOperator = op.kind === 'PLUS' ? '+' : '-';
      left = { type: 'binary', operator, left, right };
    }
    return left;
  }

  private parseTerm(): Expression {
    let left = this.parsePrimary();
    while (this.check('STAR') || this.check('SLASH')) {
      const op = this.advance();
      this.requireValue(left, op);
      const rightStart = this.current();
      const right = this.parsePrimary();
      this.requireValue(right, rightStart);
      const operator: ArithmeticOperator = op.kind === 'STAR' ? '*' : '/';
      left = { type: 'binary', operator, left, right };
    }
    return left;
  }

  private parsePrimary(): Expression {
    const tok = this.current();

    switch (tok.kind) {
      case 'NUMBER': {
        this.advance();
        const literal: NumberLiteral = { type: 'number', value: numberValue(tok.text) };
        return literal;
      }
      case 'IDENTIFIER': {
        if (this.peek(1).kind === 'LPAREN') {
          throw this.error('SMA or RSI', tok,
            `Unknown function '${tok.text.toUpperCase()}' at offset ${tok.offset}; expected SMA or RSI`);
        }
        if (!resolveField(tok.text)) {
          throw this.error('a field (open, high, low, close, volume)', tok,
            `Unknown field '${tok.text}' at offset ${tok.offset}`);
        }
        this.advance();
        return { type: 'identifier', name: tok.text };
      }
      case 'FUNCTION':
        return this.parseFunctionCall();
      case 'LPAREN': {
        this.advance();
        const inner = this.parseOr();
        this.expect('RPAREN', "')'");
        return inner;
      }
      default:
        throw this.error("a number, field, function call or '('", tok);
    }
  }

  private parseFunctionCall(): Expression {
    const nameTok = this.advance();
    if (!isFunctionName(nameTok.text)) {
      throw this.error('SMA or RSI', nameTok);
    }
    const name = nameTok.text;
    this.expect('LPAREN', `'(' after ${name}`);

    const args: Expression[] = [];
    const argStarts: Token[] = [];
    if (!this.check('RPAREN')) {
      do {
        argStarts.push(this.current());
        args.push(this.parseOr());
      } while (this.match('COMMA'));
    }
    this.expect('RPAREN', "')'");

    if (args.length !== 2) {
      throw new ParseError('2 arguments', `${args.length}`, nameTok.offset,
        `${name} takes exactly 2 arguments (field, window), got ${args.length} at offset ${nameTok.offset}`);
    }

    const [field, period] = args;
    if (field.type !== 'identifier') {
      throw new ParseError('a field name', field.type, argStarts[0].offset,
        `First argument of ${name} must be a field name at offset ${argStarts[0].offset}`);
    }
    if (period.type !== 'number' || !Number.isInteger(period.value) || period.value < 1) {
      const found = period.type === 'number' ? String(period.value) : period.type;
      throw new ParseError('a positive integer window', found, argStarts[1].offset,
        `Second argument of ${name} must be a positive integer window, got ${found} at offset ${argStarts[1].offset}`);
    }

    return { type: 'function', name, arguments: [field, period] };
  }

  // ── Type checks ──────────────────────────────────────────────────

  private requireCondition(node: Expression) {
    if (!isCondition(node)) {
      throw this.error('a comparator or cross phrase', this.current());
    }
  }

  private requireValue(node: Expression, at: Token) {
    if (isCondition(node)) {
      throw new ParseError('a numeric value', 'a condition', at.offset,
        `Expected a numeric value but found a condition near offset ${at.offset}`);
    }
  }

  // ── Token cursor ─────────────────────────────────────────────────

  private current(): Token {
    return this.peek(0);
  }

  private peek(ahead: number): Token {
    const idx = Math.min(this.pos + ahead, this.tokens.length - 1);
    return this.tokens[idx];
  }

  private check(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private advance(): Token {
    const tok = this.current();
    if (tok.kind !== 'EOF') this.pos++;
    return tok;
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.advance();
    return true;
  }

  private expect(kind: TokenKind, expected: string): Token {
    if (!this.check(kind)) throw this.error(expected, this.current());
    return this.advance();
  }

  private error(expected: string, found: Token, detail?: string): ParseError {
    return new ParseError(expected, describeToken(found), found.offset, detail);
  }
}

/** Parse an already-tokenised rule. The token list must end with EOF. */
export function parseTokens(tokens: Token[]): Strategy {
  if (tokens.length === 0 || tokens[tokens.length - 1].kind !== 'EOF') {
    throw new ParseError('end of input', 'truncated token stream', 0);
  }
  return new Parser(tokens).parseStrategy();
}

/** Lex and parse rule text into a Strategy AST. */
export function parseRule(source: string): Strategy {
  const tokens = tokenize(source);
  const strategy = parseTokens(tokens);
  log.debug('Rule parsed', {
    tokens: tokens.length - 1,
    entry: strategy.entry !== null,
    exit: strategy.exit !== null,
  });
  return strategy;
}
