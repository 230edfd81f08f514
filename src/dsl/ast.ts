export const FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;

export type Field = (typeof FIELDS)[number];

/** Identifier suffix → number of bars the field is shifted back. */
export const LOOKBACK_SUFFIXES: Record<string, number> = {
  _yesterday: 1,
  _last_week: 5,
};

export type ComparisonOperator = '>' | '<' | '>=' | '<=' | '==';
export type CrossOperator = 'CROSS_ABOVE' | 'CROSS_BELOW';
export type LogicalOperator = 'AND' | 'OR';
export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type FunctionName = 'SMA' | 'RSI';

export interface Strategy {
  readonly type: 'strategy';
  readonly entry: Expression | null;
  readonly exit: Expression | null;
}

export interface LogicalExpression {
  readonly type: 'logical';
  readonly operator: LogicalOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface ComparisonExpression {
  readonly type: 'comparison';
  readonly operator: ComparisonOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface CrossExpression {
  readonly type: 'cross';
  readonly operator: CrossOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface BinaryExpression {
  readonly type: 'binary';
  readonly operator: ArithmeticOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface FunctionCall {
  readonly type: 'function';
  readonly name: FunctionName;
  readonly arguments: readonly Expression[];
}

export interface Identifier {
  readonly type: 'identifier';
  /** Field name as written, lower-cased, including any lookback suffix. */
  readonly name: string;
}

export interface NumberLiteral {
  readonly type: 'number';
  readonly value: number;
}

export type Expression =
  | LogicalExpression
  | ComparisonExpression
  | CrossExpression
  | BinaryExpression
  | FunctionCall
  | Identifier
  | NumberLiteral;

export type AstNode = Strategy | Expression;

export interface FieldReference {
  field: Field;
  lag: number;
}

function isField(name: string): name is Field {
  return FIELDS.some(field => field === name);
}

/**
 * Resolve an identifier name (`close`, `volume_yesterday`, `high_last_week`)
 * to its base field and lag. Returns null for anything outside the field set.
 */
export function resolveField(name: string): FieldReference | null {
  if (isField(name)) return { field: name, lag: 0 };

  for (const [suffix, lag] of Object.entries(LOOKBACK_SUFFIXES)) {
    if (!name.endsWith(suffix)) continue;
    const base = name.slice(0, -suffix.length);
    if (isField(base)) return { field: base, lag };
  }
  return null;
}

/** Whether an expression yields a per-bar boolean (vs. a numeric value). */
export function isCondition(node: Expression): boolean {
  return node.type === 'logical' || node.type === 'comparison' || node.type === 'cross';
}
