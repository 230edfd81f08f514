export type ExitReason = 'signal' | 'end-of-data';

/**
 * One round trip. Exit fields stay null while the trade is open and are
 * filled exactly once when it closes.
 */
export interface Trade {
  entryDate: string;
  entryPrice: number;
  entryIndex: number;
  exitDate: string | null;
  exitPrice: number | null;
  pnl: number | null;          // exit - entry, per unit
  returnPct: number | null;    // pnl / entry * 100
  holdBars: number | null;
  exitReason: ExitReason | null;
}

/** Trade as it appears in the ledger, after it has been closed. */
export interface ClosedTrade extends Trade {
  exitDate: string;
  exitPrice: number;
  pnl: number;
  returnPct: number;
  holdBars: number;
  exitReason: ExitReason;
}

export interface BacktestConfig {
  initialCapital?: number;
}

export interface BacktestMetrics {
  totalReturnPct: number;
  /** Fraction of closed trades with pnl > 0, in [0, 1]. */
  winRate: number;
  numTrades: number;
  /** Worst peak-to-trough decline of the equity curve; <= 0. */
  maxDrawdownPct: number;
  finalCapital: number;
  equityCurve: number[];
  wins: number;
  losses: number;
  avgWinPct: number;
  avgLossPct: number;
  profitFactor: number;
  avgHoldBars: number;
}

export interface BacktestResult {
  initialCapital: number;
  trades: ClosedTrade[];
  metrics: BacktestMetrics;
  totalBars: number;
  dateRange: { start: string; end: string } | null;
}
