/**
 * Error taxonomy for the rule pipeline. Every stage fails loudly with one of
 * these; nothing in the core catches and retries them.
 */

export class RuleEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuleEngineError';
  }
}

/** Unrecognised lexeme in rule text. */
export class LexError extends RuleEngineError {
  constructor(
    message: string,
    readonly lexeme: string,
    readonly offset: number,
    readonly line: number,
    readonly column: number,
  ) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'LexError';
  }
}

/** Grammar violation: unexpected token, bad function arguments, unknown field or function. */
export class ParseError extends RuleEngineError {
  constructor(
    readonly expected: string,
    readonly found: string,
    readonly offset: number,
    detail?: string,
  ) {
    super(detail ?? `Expected ${expected} but found ${found} at offset ${offset}`);
    this.name = 'ParseError';
  }
}

export class EvaluationError extends RuleEngineError {
  constructor(message: string, readonly node: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/** Price series or signal series that cannot be used as given. */
export class DataError extends RuleEngineError {
  constructor(message: string, readonly field?: string, readonly row?: number) {
    super(message);
    this.name = 'DataError';
  }
}
