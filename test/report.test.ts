import { describe, it, expect } from 'vitest';
import {
  BacktestResult, ClosedTrade, Trade, computeMetrics, formatReport, maxDrawdownPct, runBacktest,
} from '../src/backtest';
import { dayDate, makeBars, signalsFor } from './helpers';

function closed(returnPct: number, holdBars: number): ClosedTrade {
  return {
    entryDate: '2024-01-02',
    entryPrice: 100,
    entryIndex: 1,
    exitDate: '2024-01-05',
    exitPrice: 100 + returnPct,
    pnl: returnPct,
    returnPct,
    holdBars,
    exitReason: 'signal',
  };
}

const open: Trade = {
  entryDate: '2024-01-08',
  entryPrice: 100,
  entryIndex: 5,
  exitDate: null,
  exitPrice: null,
  pnl: null,
  returnPct: null,
  holdBars: null,
  exitReason: null,
};

describe('maxDrawdownPct', () => {
  it('returns the deepest fall from a running peak', () => {
    expect(maxDrawdownPct([100, 120, 90, 130, 117])).toBe(-25);
  });

  it('is zero for a curve that never falls', () => {
    expect(maxDrawdownPct([100, 100, 101, 150])).toBe(0);
    expect(maxDrawdownPct([100])).toBe(0);
  });
});

describe('computeMetrics', () => {
  it('summarises wins and losses', () => {
    const m = computeMetrics([closed(10, 2), closed(-5, 4), closed(20, 3)], [100, 110, 104.5, 125.4], 100, 125.4);
    expect(m).toMatchObject({
      numTrades: 3,
      wins: 2,
      losses: 1,
      avgWinPct: 15,
      avgLossPct: -5,
      profitFactor: 6,
      avgHoldBars: 3,
      finalCapital: 125.4,
      equityCurve: [100, 110, 104.5, 125.4],
    });
    expect(m.winRate).toBeCloseTo(2 / 3, 12);
    expect(m.totalReturnPct).toBeCloseTo(25.4, 9);
    expect(m.maxDrawdownPct).toBeCloseTo(-5, 9);
  });

  it('counts a flat trade as a loss', () => {
    const m = computeMetrics([closed(0, 1), closed(4, 1)], [100, 100, 104], 100, 104);
    expect(m).toMatchObject({ wins: 1, losses: 1, winRate: 0.5 });
  });

  it('leaves open trades out of the win rate', () => {
    const m = computeMetrics([closed(10, 2), open], [100, 110], 100, 110);
    expect(m).toMatchObject({ numTrades: 2, wins: 1, losses: 0, winRate: 1, profitFactor: Infinity });
  });

  it('reports zeros when nothing traded', () => {
    const m = computeMetrics([], [100, 100], 100, 100);
    expect(m).toMatchObject({
      numTrades: 0,
      winRate: 0,
      avgWinPct: 0,
      avgLossPct: 0,
      profitFactor: 0,
      avgHoldBars: 0,
      totalReturnPct: 0,
      maxDrawdownPct: 0,
    });
  });
});

describe('formatReport', () => {
  function sampleResult(): BacktestResult {
    const bars = makeBars([100, 120, 90, 95], [100, 100, 110, 95]);
    return runBacktest(bars, signalsFor(bars, [true, false, false, false], [false, true, false, false]));
  }

  it('prints the headline metrics', () => {
    const lines = formatReport(sampleResult(), 'ENTRY: close > 1').split('\n');
    expect(lines).toContain('Rule:          ENTRY: close > 1');
    expect(lines).toContain(`Period:        ${dayDate(0)} to ${dayDate(3)} (4 bars)`);
    expect(lines).toContain('Trades:        1 (1W / 0L)');
    expect(lines).toContain('Win rate:      100.0%');
    expect(lines).toContain('Profit factor: Inf');
    expect(lines).toContain('Total return:  +10.00%');
    expect(lines).toContain('Final capital: 110,000.00 (from 100,000.00)');
    expect(lines).toContain('Max drawdown:  -8.33%');
  });

  it('lists each trade', () => {
    const lines = formatReport(sampleResult()).split('\n');
    expect(lines[lines.length - 1]).toBe(
      `  #1   ${dayDate(1)} @ 100.00 -> ${dayDate(2)} @ 110.00 | +10.00% | 1 bars | signal`,
    );
  });

  it('says so when no trades ran', () => {
    const bars = makeBars([1, 2]);
    const result = runBacktest(bars, signalsFor(bars, [false, false], [false, false]));
    const lines = formatReport(result).split('\n');
    expect(lines[lines.length - 1]).toBe('No trades executed.');
    expect(lines).not.toContain('Trade log:');
  });
});
