export { tokenize } from './lexer';
export { parseRule, parseTokens, numberValue } from './parser';
export { formatExpression, formatNumber, formatStrategy } from './format';
export { FIELDS, LOOKBACK_SUFFIXES, resolveField, isCondition } from './ast';
export type {
  Strategy, Expression, AstNode, Field, FieldReference,
  LogicalExpression, ComparisonExpression, CrossExpression, BinaryExpression,
  FunctionCall, Identifier, NumberLiteral,
  ComparisonOperator, CrossOperator, LogicalOperator, ArithmeticOperator, FunctionName,
} from './ast';
export type { Token, TokenKind } from './tokens';
