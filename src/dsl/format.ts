import { Expression, Strategy } from './ast';

function precedence(node: Expression): number {
  switch (node.type) {
    case 'logical':
      return node.operator === 'OR' ? 1 : 2;
    case 'comparison':
    case 'cross':
      return 3;
    case 'binary':
      return node.operator === '+' || node.operator === '-' ? 4 : 5;
    default:
      return 6;
  }
}

const EXPONENT_FORM = /^(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/** Plain decimal digits; the rule language has no exponent notation. */
export function formatNumber(value: number): string {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) return text;

  const digits = match[1] + (match[2] ?? '');
  const point = match[1].length + Number(match[3]);
  if (point <= 0) return `0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return digits + '0'.repeat(point - digits.length);
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

function wrap(node: Expression, minPrec: number): string {
  const text = formatExpression(node);
  return precedence(node) < minPrec ? `(${text})` : text;
}

/**
 * Render an expression as rule text. Parentheses are emitted only where the
 * tree shape differs from what default precedence would produce, so the
 * output parses back to the same tree.
 */
export function formatExpression(node: Expression): string {
  switch (node.type) {
    case 'number':
      return formatNumber(node.value);
    case 'identifier':
      return node.name;
    case 'function':
      return `${node.name}(${node.arguments.map(formatExpression).join(',')})`;
    case 'cross': {
      const phrase = node.operator === 'CROSS_ABOVE' ? 'crosses above' : 'crosses below';
      return `${wrap(node.left, 4)} ${phrase} ${wrap(node.right, 4)}`;
    }
    case 'comparison':
      return `${wrap(node.left, 4)} ${node.operator} ${wrap(node.right, 4)}`;
    case 'binary':
    case 'logical': {
      const prec = precedence(node);
      return `${wrap(node.left, prec)} ${node.operator} ${wrap(node.right, prec + 1)}`;
    }
  }
}

export function formatStrategy(strategy: Strategy): string {
  const lines: string[] = [];
  if (strategy.entry) lines.push(`ENTRY: ${formatExpression(strategy.entry)}`);
  if (strategy.exit) lines.push(`EXIT: ${formatExpression(strategy.exit)}`);
  return lines.join('\n');
}
