import { BacktestMetrics, BacktestResult, ClosedTrade, Trade } from './types';

function isClosed(trade: Trade): trade is ClosedTrade {
  return trade.pnl !== null && trade.returnPct !== null && trade.exitPrice !== null
    && trade.exitDate !== null && trade.holdBars !== null && trade.exitReason !== null;
}

/** Most negative (equity - running peak) / running peak, in percent. */
export function maxDrawdownPct(equityCurve: readonly number[]): number {
  let peak = -Infinity;
  let maxDD = 0;
  for (const equity of equityCurve) {
    if (equity > peak) peak = equity;
    const dd = ((equity - peak) / peak) * 100;
    if (dd < maxDD) maxDD = dd;
  }
  return maxDD;
}

export function computeMetrics(
  trades: readonly Trade[],
  equityCurve: readonly number[],
  initialCapital: number,
  finalCapital: number,
): BacktestMetrics {
  // Open trades carry no realized pnl and do not count towards win rate
  const closed = trades.filter(isClosed);
  const wins = closed.filter(t => t.pnl > 0);
  const losses = closed.filter(t => t.pnl <= 0);

  const winRate = closed.length > 0 ? wins.length / closed.length : 0;
  const avgWinPct = wins.length > 0
    ? wins.reduce((s, t) => s + t.returnPct, 0) / wins.length : 0;
  const avgLossPct = losses.length > 0
    ? losses.reduce((s, t) => s + t.returnPct, 0) / losses.length : 0;

  const totalWin = wins.reduce((s, t) => s + t.returnPct, 0);
  const totalLoss = Math.abs(losses.reduce((s, t) => s + t.returnPct, 0));
  const profitFactor = totalLoss > 0 ? totalWin / totalLoss : totalWin > 0 ? Infinity : 0;

  return {
    totalReturnPct: ((finalCapital - initialCapital) / initialCapital) * 100,
    winRate,
    numTrades: trades.length,
    maxDrawdownPct: maxDrawdownPct(equityCurve),
    finalCapital,
    equityCurve: [...equityCurve],
    wins: wins.length,
    losses: losses.length,
    avgWinPct,
    avgLossPct,
    profitFactor,
    avgHoldBars: closed.length > 0
      ? closed.reduce((s, t) => s + t.holdBars, 0) / closed.length : 0,
  };
}

function money(n: number): string {
  return n.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

function signed(n: number, digits = 2): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(digits)}`;
}

export function formatReport(result: BacktestResult, ruleText?: string): string {
  const m = result.metrics;
  const lines: string[] = [];
  const period = result.dateRange
    ? `${result.dateRange.start} to ${result.dateRange.end}`
    : 'no data';

  lines.push('='.repeat(60));
  if (ruleText) {
    for (const ruleLine of ruleText.split('\n')) lines.push(`Rule:          ${ruleLine}`);
  }
  lines.push(`Period:        ${period} (${result.totalBars} bars)`);
  lines.push('='.repeat(60));
  lines.push(`Trades:        ${m.numTrades} (${m.wins}W / ${m.losses}L)`);
  lines.push(`Win rate:      ${(m.winRate * 100).toFixed(1)}%`);
  lines.push(`Avg win:       ${signed(m.avgWinPct)}%`);
  lines.push(`Avg loss:      ${signed(m.avgLossPct)}%`);
  lines.push(`Profit factor: ${m.profitFactor === Infinity ? 'Inf' : m.profitFactor.toFixed(2)}`);
  lines.push(`Total return:  ${signed(m.totalReturnPct)}%`);
  lines.push(`Final capital: ${money(m.finalCapital)} (from ${money(result.initialCapital)})`);
  lines.push(`Max drawdown:  ${m.maxDrawdownPct.toFixed(2)}%`);
  lines.push(`Avg hold:      ${m.avgHoldBars.toFixed(1)} bars`);
  lines.push('='.repeat(60));

  if (result.trades.length > 0) {
    lines.push('');
    lines.push('Trade log:');
    result.trades.forEach((t, i) => {
      lines.push(
        `  #${String(i + 1).padEnd(3)} ${t.entryDate} @ ${t.entryPrice.toFixed(2)} -> ` +
        `${t.exitDate} @ ${t.exitPrice.toFixed(2)} | ${signed(t.returnPct)}% | ` +
        `${t.holdBars} bars | ${t.exitReason}`,
      );
    });
  } else {
    lines.push('No trades executed.');
  }

  return lines.join('\n');
}

export function printReport(result: BacktestResult, ruleText?: string): void {
  console.log(formatReport(result, ruleText));
}
