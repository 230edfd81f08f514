import { Bar, parseBars } from '../data';
import { SignalSeries, assertAligned } from '../signals';
import { createLogger } from '../utils';
import { computeMetrics } from './report';
import { BacktestConfig, BacktestResult, ClosedTrade, ExitReason, Trade } from './types';

const log = createLogger('engine');

export const DEFAULT_INITIAL_CAPITAL = 100_000;

function returnPct(entryPrice: number, price: number): number {
  return ((price - entryPrice) / entryPrice) * 100;
}

function closeTrade(trade: Trade, bar: Bar, index: number, price: number, reason: ExitReason): ClosedTrade {
  const pnl = price - trade.entryPrice;
  return {
    ...trade,
    exitDate: bar.date,
    exitPrice: price,
    pnl,
    returnPct: (pnl / trade.entryPrice) * 100,
    holdBars: index - trade.entryIndex,
    exitReason: reason,
  };
}

/**
 * Long-only replay with next-bar execution: a signal seen on bar i-1 fills at
 * bar i's open. Within a bar an exit is handled before an entry, so one bar
 * can close a position and open the next. A position still open after the
 * last bar is closed at that bar's close.
 */
export function runBacktest(
  bars: readonly Bar[],
  signals: SignalSeries,
  config: BacktestConfig = {},
): BacktestResult {
  const { initialCapital = DEFAULT_INITIAL_CAPITAL } = config;
  if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
    throw new RangeError(`Initial capital must be a positive number, got ${initialCapital}`);
  }

  const series = parseBars(bars);
  assertAligned(series, signals);

  const trades: ClosedTrade[] = [];
  const equityCurve: number[] = [initialCapital];
  let capital = initialCapital;
  let position: Trade | null = null;

  for (let i = 0; i < series.length; i++) {
    const bar = series[i];

    // Signals from the previous bar execute at this bar's open
    if (i > 0) {
      if (position && signals.exit[i - 1]) {
        const closed = closeTrade(position, bar, i, bar.open, 'signal');
        capital *= 1 + closed.returnPct / 100;
        trades.push(closed);
        position = null;
      }

      if (!position && signals.entry[i - 1]) {
        position = {
          entryDate: bar.date,
          entryPrice: bar.open,
          entryIndex: i,
          exitDate: null,
          exitPrice: null,
          pnl: null,
          returnPct: null,
          holdBars: null,
          exitReason: null,
        };
      }
    }

    equityCurve.push(
      position
        ? capital * (1 + returnPct(position.entryPrice, bar.close) / 100)
        : capital,
    );
  }

  if (position) {
    const lastIndex = series.length - 1;
    const last = series[lastIndex];
    const closed = closeTrade(position, last, lastIndex, last.close, 'end-of-data');
    capital *= 1 + closed.returnPct / 100;
    trades.push(closed);
    position = null;
  }

  const metrics = computeMetrics(trades, equityCurve, initialCapital, capital);

  log.debug('Backtest complete', {
    bars: series.length,
    trades: trades.length,
    finalCapital: capital,
    totalReturnPct: metrics.totalReturnPct,
  });

  return {
    initialCapital,
    trades,
    metrics,
    totalBars: series.length,
    dateRange: series.length > 0
      ? { start: series[0].date, end: series[series.length - 1].date }
      : null,
  };
}
