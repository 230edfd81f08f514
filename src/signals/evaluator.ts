import { DataError, EvaluationError } from '../errors';
import { Bar, dateSeries, fieldSeries, parseBars } from '../data';
import {
  ComparisonOperator, Expression, FunctionCall, Strategy, resolveField,
} from '../dsl';
import { createLogger } from '../utils';
import { computeRsiSeries, computeSma, shiftSeries } from './indicators';

const log = createLogger('evaluator');

export interface SignalSeries {
  /** Bar dates the signals are aligned to. */
  dates: string[];
  entry: boolean[];
  exit: boolean[];
}

function compare(op: ComparisonOperator, a: number, b: number): boolean {
  switch (op) {
    case '>': return a > b;
    case '<': return a < b;
    case '>=': return a >= b;
    case '<=': return a <= b;
    case '==': return a === b;
  }
}

/**
 * Walks one Strategy over one validated bar series. Indicator series are
 * cached per instance, so an instance must not outlive a single evaluation.
 */
class SeriesEvaluator {
  private readonly length: number;
  private readonly indicatorCache = new Map<string, number[]>();

  constructor(private readonly bars: readonly Bar[]) {
    this.length = bars.length;
  }

  condition(node: Expression): boolean[] {
    switch (node.type) {
      case 'logical': {
        const left = this.condition(node.left);
        const right = this.condition(node.right);
        return node.operator === 'AND'
          ? left.map((l, i) => l && right[i])
          : left.map((l, i) => l || right[i]);
      }
      case 'comparison': {
        const left = this.value(node.left);
        const right = this.value(node.right);
        return left.map((l, i) => compare(node.operator, l, right[i]));
      }
      case 'cross': {
        const left = this.value(node.left);
        const right = this.value(node.right);
        const holds = node.operator === 'CROSS_ABOVE'
          ? left.map((l, i) => l > right[i])
          : left.map((l, i) => l < right[i]);
        // A cross fires only on the bar where the relation starts to hold
        return holds.map((h, i) => h && i > 0 && !holds[i - 1]);
      }
      case 'binary':
      case 'function':
      case 'identifier':
      case 'number':
        throw new EvaluationError(
          `Expected a condition but found a '${node.type}' node`, node.type);
      default: {
        const unreachable: never = node;
        return this.unknownNode(unreachable);
      }
    }
  }

  value(node: Expression): number[] {
    switch (node.type) {
      case 'number':
        return new Array<number>(this.length).fill(node.value);
      case 'identifier':
        return this.field(node.name);
      case 'function':
        return this.call(node);
      case 'binary': {
        const left = this.value(node.left);
        const right = this.value(node.right);
        const op = node.operator;
        switch (op) {
          case '+': return left.map((l, i) => l + right[i]);
          case '-': return left.map((l, i) => l - right[i]);
          case '*': return left.map((l, i) => l * right[i]);
          case '/': return left.map((l, i) => {
            if (right[i] === 0) {
              throw new EvaluationError(
                `Division by zero on ${this.bars[i].date} (bar ${i})`, 'binary');
            }
            return l / right[i];
          });
          default: {
            const unknownOp: never = op;
            throw new EvaluationError(
              `Unknown arithmetic operator '${String(unknownOp)}'`, 'binary');
          }
        }
      }
      case 'logical':
      case 'comparison':
      case 'cross':
        throw new EvaluationError(
          `Expected a numeric value but found a '${node.type}' node`, node.type);
      default: {
        const unreachable: never = node;
        return this.unknownNode(unreachable);
      }
    }
  }

  private field(name: string): number[] {
    const ref = resolveField(name);
    if (!ref) {
      throw new EvaluationError(`Unknown field '${name}'`, 'identifier');
    }
    return shiftSeries(fieldSeries(this.bars, ref.field), ref.lag);
  }

  private call(node: FunctionCall): number[] {
    if (node.arguments.length !== 2) {
      throw new EvaluationError(
        `${node.name} expects 2 arguments, got ${node.arguments.length}`, 'function');
    }
    const [source, period] = node.arguments;
    if (source.type !== 'identifier') {
      throw new EvaluationError(
        `${node.name} first argument must be a field, got a '${source.type}' node`, 'function');
    }
    if (period.type !== 'number' || !Number.isInteger(period.value) || period.value < 1) {
      throw new EvaluationError(
        `${node.name} second argument must be a positive integer window`, 'function');
    }

    const key = `${node.name}:${source.name}:${period.value}`;
    const cached = this.indicatorCache.get(key);
    if (cached) return cached;

    const input = this.field(source.name);
    const name = node.name;
    let series: number[];
    switch (name) {
      case 'SMA':
        series = computeSma(input, period.value);
        break;
      case 'RSI':
        series = computeRsiSeries(input, period.value);
        break;
      default: {
        const unknownName: never = name;
        throw new EvaluationError(`Unknown function '${String(unknownName)}'`, 'function');
      }
    }
    this.indicatorCache.set(key, series);
    return series;
  }

  private unknownNode(node: unknown): never {
    const type = typeof node === 'object' && node !== null && 'type' in node
      ? String(node.type)
      : typeof node;
    throw new EvaluationError(`Malformed AST node of type '${type}'`, type);
  }
}

/**
 * Evaluate a Strategy against a bar series. Both output series have one
 * entry per bar; a missing section yields all-false. Neither the bars nor the
 * AST are modified.
 */
export function evaluateStrategy(bars: readonly Bar[], strategy: Strategy): SignalSeries {
  const series = parseBars(bars);

  const evaluator = new SeriesEvaluator(series);
  const allFalse = () => new Array<boolean>(series.length).fill(false);

  const entry = strategy.entry ? evaluator.condition(strategy.entry) : allFalse();
  const exit = strategy.exit ? evaluator.condition(strategy.exit) : allFalse();

  if (log.isEnabled('DEBUG')) {
    log.debug('Signals evaluated', {
      bars: series.length,
      entrySignals: entry.filter(Boolean).length,
      exitSignals: exit.filter(Boolean).length,
    });
  }

  return { dates: dateSeries(series), entry, exit };
}

/** Throws DataError unless the signals line up one-to-one with the bars. */
export function assertAligned(bars: readonly Bar[], signals: SignalSeries): void {
  const n = bars.length;
  for (const key of ['dates', 'entry', 'exit'] as const) {
    if (signals[key].length !== n) {
      throw new DataError(
        `Signal series '${key}' has ${signals[key].length} values for ${n} bars`, key);
    }
  }
  for (let i = 0; i < n; i++) {
    if (signals.dates[i] !== bars[i].date) {
      throw new DataError(
        `Signal date ${signals.dates[i]} does not match bar ${i} date ${bars[i].date}`, 'dates', i);
    }
  }
}
