import { describe, it, expect } from 'vitest';
import { Bar } from '../src/data';
import { Expression, Strategy, parseRule } from '../src/dsl';
import { DataError, EvaluationError } from '../src/errors';
import { computeSma, evaluateStrategy } from '../src/signals';
import { dayDate, makeBars, thrown } from './helpers';

function entrySignals(closes: number[], rule: string, opens?: number[]): boolean[] {
  return evaluateStrategy(makeBars(closes, opens), parseRule(rule)).entry;
}

function indicesOf(flags: boolean[]): number[] {
  return flags.flatMap((f, i) => (f ? [i] : []));
}

describe('evaluateStrategy', () => {
  it('evaluates a comparison bar by bar', () => {
    const bars = makeBars([99, 101, 100, 102]);
    const signals = evaluateStrategy(bars, parseRule('ENTRY: close > 100'));
    expect(signals).toEqual({
      dates: [dayDate(0), dayDate(1), dayDate(2), dayDate(3)],
      entry: [false, true, false, true],
      exit: [false, false, false, false],
    });
  });

  it('fills a missing section with false', () => {
    const signals = evaluateStrategy(makeBars([1, 2, 3]), parseRule('EXIT: close > 1'));
    expect(signals.entry).toEqual([false, false, false]);
    expect(signals.exit).toEqual([false, true, true]);
  });

  it('combines conditions with AND and OR', () => {
    const closes = [1, 5, 10, 15];
    expect(entrySignals(closes, 'ENTRY: close > 2 AND close < 12')).toEqual([false, true, true, false]);
    expect(entrySignals(closes, 'ENTRY: close < 2 OR close > 12')).toEqual([true, false, false, true]);
  });

  it('applies arithmetic across fields', () => {
    expect(entrySignals([10.5, 11, 9], 'ENTRY: close - open > 0.5', [10, 10, 10]))
      .toEqual([false, true, false]);
  });

  it('reads lookback fields from earlier bars', () => {
    expect(entrySignals([1, 2, 2, 3], 'ENTRY: close > close_yesterday'))
      .toEqual([false, true, false, true]);
    expect(entrySignals([5, 1, 1, 1, 1, 6, 0.5], 'ENTRY: close > close_last_week'))
      .toEqual([false, false, false, false, false, true, false]);
  });

  it('treats comparisons against a missing value as false', () => {
    expect(entrySignals([1, 1, 1], 'ENTRY: close_yesterday == close_yesterday'))
      .toEqual([false, true, true]);
    expect(entrySignals([1, 1, 1], 'ENTRY: close_yesterday <= close')).toEqual([false, true, true]);
  });

  it('fires a cross above once on a rising series', () => {
    const closes = Array.from({ length: 30 }, (_, i) => 100 + i);
    const entry = entrySignals(closes, 'ENTRY: close crosses above SMA(close,20)');
    expect(indicesOf(entry)).toEqual([1]);
  });

  it('fires a cross above on the first bar that closes over the SMA', () => {
    const closes = [
      ...Array.from({ length: 10 }, (_, i) => 110 - 2 * i),
      ...Array.from({ length: 20 }, (_, i) => 93 + i),
    ];
    const sma = computeSma(closes, 20);
    const firstAbove = closes.findIndex((c, i) => c > sma[i]);
    const entry = entrySignals(closes, 'ENTRY: close crosses above SMA(close,20)');

    expect(firstAbove).toBe(16);
    expect(indicesOf(entry)).toEqual([16]);
  });

  it('does not signal around an SMA on a flat stretch of prices', () => {
    const closes = [100.1, 100.7, 100.3, ...new Array<number>(200).fill(100.3)];
    const entry = entrySignals(closes, 'ENTRY: close > SMA(close,3) OR close < SMA(close,3)');
    expect(indicesOf(entry)).toEqual([1, 2, 3]);
  });

  it('never fires a cross on the first bar', () => {
    expect(entrySignals([100, 101], 'ENTRY: close crosses above 50')).toEqual([false, false]);
  });

  it('fires a cross below each time the relation starts to hold', () => {
    expect(entrySignals([10, 8, 9, 7], 'ENTRY: close crosses below 9'))
      .toEqual([false, true, false, true]);
  });

  it('keeps RSI neutral until its window is filled', () => {
    const closes = Array.from({ length: 20 }, (_, i) => 100 + i);
    const entry = entrySignals(closes, 'ENTRY: RSI(close,14) == 50');
    expect(indicesOf(entry)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
  });

  it('computes the same signals on repeated runs without touching its input', () => {
    const bars = makeBars([100, 98, 103, 101, 99, 104, 106, 102]);
    const before = structuredClone(bars);
    const strategy = parseRule('ENTRY: close crosses above SMA(close,3)\nEXIT: RSI(close,3) > 60');

    const first = evaluateStrategy(bars, strategy);
    const second = evaluateStrategy(bars, strategy);

    expect(second).toEqual(first);
    expect(bars).toEqual(before);
  });

  it('returns empty series for no bars', () => {
    expect(evaluateStrategy([], parseRule('ENTRY: close > 1'))).toEqual({ dates: [], entry: [], exit: [] });
  });

  it('rejects division by zero', () => {
    const err = thrown(() => entrySignals([10, 11], 'ENTRY: close / (open - open) > 1'));
    expect(err).toBeInstanceOf(EvaluationError);
    expect(err).toMatchObject({ message: `Division by zero on ${dayDate(0)} (bar 0)` });
  });

  it('rejects a numeric node where a condition is expected', () => {
    const strategy: Strategy = { type: 'strategy', entry: { type: 'identifier', name: 'close' }, exit: null };
    const err = thrown(() => evaluateStrategy(makeBars([1, 2]), strategy));
    expect(err).toBeInstanceOf(EvaluationError);
    expect(err).toMatchObject({ message: "Expected a condition but found a 'identifier' node" });
  });

  it('rejects a condition where a number is expected', () => {
    const inner: Expression = {
      type: 'comparison',
      operator: '>',
      left: { type: 'identifier', name: 'close' },
      right: { type: 'number', value: 1 },
    };
    const strategy: Strategy = {
      type: 'strategy',
      entry: { type: 'comparison', operator: '==', left: inner, right: { type: 'number', value: 1 } },
      exit: null,
    };
    expect(() => evaluateStrategy(makeBars([1, 2]), strategy)).toThrow(EvaluationError);
  });

  it('rejects an unknown field in a hand-built tree', () => {
    const strategy: Strategy = {
      type: 'strategy',
      entry: {
        type: 'comparison',
        operator: '>',
        left: { type: 'identifier', name: 'price' },
        right: { type: 'number', value: 1 },
      },
      exit: null,
    };
    expect(() => evaluateStrategy(makeBars([1, 2]), strategy)).toThrow("Unknown field 'price'");
  });

  it('rejects a bad indicator window in a hand-built tree', () => {
    const strategy: Strategy = {
      type: 'strategy',
      entry: {
        type: 'comparison',
        operator: '>',
        left: {
          type: 'function',
          name: 'SMA',
          arguments: [{ type: 'identifier', name: 'close' }, { type: 'number', value: 0 }],
        },
        right: { type: 'number', value: 1 },
      },
      exit: null,
    };
    expect(() => evaluateStrategy(makeBars([1, 2]), strategy)).toThrow(EvaluationError);
  });

  it('rejects bars missing a required field', () => {
    const bars: Bar[] = JSON.parse(
      '[{"date":"2024-01-01","open":1,"high":2,"low":0.5,"close":1.5}]',
    );
    const err = thrown(() => evaluateStrategy(bars, parseRule('ENTRY: close > 1')));
    expect(err).toBeInstanceOf(DataError);
    expect(err).toMatchObject({
      field: 'volume',
      row: 0,
      message: "Bar 0 is missing required field 'volume'",
    });
  });
});
