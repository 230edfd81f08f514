export type TokenKind =
  | 'ENTRY'
  | 'EXIT'
  | 'COLON'
  | 'AND'
  | 'OR'
  | 'COMPARATOR'
  | 'CROSS'
  | 'IDENTIFIER'
  | 'FUNCTION'
  | 'NUMBER'
  | 'LPAREN'
  | 'RPAREN'
  | 'COMMA'
  | 'PLUS'
  | 'MINUS'
  | 'STAR'
  | 'SLASH'
  | 'EOF';

export interface Token {
  kind: TokenKind;
  /**
   * Normalised lexeme: upper case for keywords, function names and cross
   * operators (`CROSS_ABOVE`), lower case for identifiers, raw text for
   * numbers and symbols.
   */
  text: string;
  offset: number;
  line: number;
  column: number;
}

/** Human-readable form used in parse error messages. */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'EOF':
      return 'end of input';
    case 'IDENTIFIER':
      return `identifier '${token.text}'`;
    case 'NUMBER':
      return `number ${token.text}`;
    case 'CROSS':
      return token.text === 'CROSS_ABOVE' ? "'crosses above'" : "'crosses below'";
    default:
      return `'${token.text}'`;
  }
}
