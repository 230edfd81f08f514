export { runBacktest, DEFAULT_INITIAL_CAPITAL } from './engine';
export { computeMetrics, maxDrawdownPct, formatReport, printReport } from './report';
export type {
  Trade, ClosedTrade, ExitReason, BacktestConfig, BacktestMetrics, BacktestResult,
} from './types';
