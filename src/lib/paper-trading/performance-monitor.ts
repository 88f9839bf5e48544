/**
 * Performance Monitor
 * Aggregate statistics over the closed-trade log
 */

import type { ClosedTrade, PerformanceSnapshot, StrategyMetrics, TradeStrategy } from '@/types';
import { mean, round, sampleStdev, sum } from '@/lib/utils/math';

const TRADING_DAYS_PER_YEAR = 252;

export function emptyPerformance(startingBalance: number): PerformanceSnapshot {
  return {
    virtualBalance: startingBalance,
    startingBalance,
    totalTrades: 0,
    openPositions: 0,
    wins: 0,
    losses: 0,
    expired: 0,
    winRate: 0,
    profitFactor: 0,
    expectancy: 0,
    sharpeRatio: 0,
    avgRMultiple: 0,
    maxDrawdownPct: 0,
    strategyMetrics: {},
    lastUpdated: null,
  };
}

/** Gross wins over gross losses, Infinity when nothing was lost */
export function profitFactor(pnls: number[]): number {
  const grossWin = sum(pnls.filter((p) => p > 0));
  const grossLoss = Math.abs(sum(pnls.filter((p) => p < 0)));
  return grossLoss > 0 ? round(grossWin / grossLoss, 2) : Infinity;
}

/** Per-trade Sharpe, annualized with √252 */
export function sharpeRatio(pnls: number[]): number {
  if (pnls.length < 2) return 0;
  const sd = sampleStdev(pnls);
  return sd > 0 ? round((mean(pnls) / sd) * Math.sqrt(TRADING_DAYS_PER_YEAR), 2) : 0;
}

/**
 * Deepest decline of the running balance from its peak, as a negative
 * percentage with 2 dp
 */
export function maxDrawdownPct(startingBalance: number, pnls: number[]): number {
  let balance = startingBalance;
  let peak = balance;
  let maxDd = 0;
  for (const pnl of pnls) {
    balance += pnl;
    peak = Math.max(peak, balance);
    const dd = peak > 0 ? (balance - peak) / peak : 0;
    maxDd = Math.min(maxDd, dd);
  }
  return round(maxDd * 100, 2);
}

export function strategyBreakdown(
  trades: Pick<ClosedTrade, 'strategy' | 'pnl'>[],
): Partial<Record<TradeStrategy, StrategyMetrics>> {
  const totals = new Map<TradeStrategy, { totalTrades: number; wins: number; pnl: number }>();
  for (const t of trades) {
    const m = totals.get(t.strategy) ?? { totalTrades: 0, wins: 0, pnl: 0 };
    m.totalTrades++;
    m.pnl += t.pnl;
    if (t.pnl > 0) m.wins++;
    totals.set(t.strategy, m);
  }

  const metrics: Partial<Record<TradeStrategy, StrategyMetrics>> = {};
  for (const [name, m] of totals) {
    metrics[name] = {
      totalTrades: m.totalTrades,
      wins: m.wins,
      pnl: round(m.pnl, 2),
      winRate: round(m.wins / m.totalTrades, 3),
    };
  }
  return metrics;
}

/**
 * Snapshot of the trade log. `virtualBalance` is the realized balance the
 * trader carries, passed through unchanged.
 */
export function computePerformance(
  trades: ClosedTrade[],
  options: {
    startingBalance: number;
    virtualBalance: number;
    openPositions: number;
    lastUpdated?: string | null;
  },
): PerformanceSnapshot {
  const base = emptyPerformance(options.startingBalance);
  base.virtualBalance = options.virtualBalance;
  base.openPositions = options.openPositions;
  base.lastUpdated = options.lastUpdated ?? null;
  if (trades.length === 0) return base;

  const pnls = trades.map((t) => t.pnl);
  const wins = pnls.filter((p) => p > 0).length;

  return {
    ...base,
    totalTrades: trades.length,
    wins,
    losses: pnls.filter((p) => p < 0).length,
    expired: trades.filter((t) => t.exitReason === 'expired').length,
    winRate: round(wins / trades.length, 3),
    profitFactor: profitFactor(pnls),
    expectancy: round(mean(pnls), 2),
    sharpeRatio: sharpeRatio(pnls),
    avgRMultiple: round(mean(trades.map((t) => t.rMultiple)), 2),
    maxDrawdownPct: maxDrawdownPct(options.startingBalance, pnls),
    strategyMetrics: strategyBreakdown(trades),
  };
}

export function formatProfitFactor(value: number): string {
  return Number.isFinite(value) ? value.toFixed(2) : '∞';
}

/**
 * One-paragraph console summary
 */
export function formatPerformance(p: PerformanceSnapshot): string {
  const ret = ((p.virtualBalance - p.startingBalance) / p.startingBalance) * 100;
  const lines = [
    `Balance:        $${p.virtualBalance.toFixed(2)} (${ret >= 0 ? '+' : ''}${ret.toFixed(2)}%)`,
    `Trades:         ${p.totalTrades} (${p.wins}W / ${p.losses}L / ${p.expired} expired), ${p.openPositions} open`,
    `Win rate:       ${(p.winRate * 100).toFixed(1)}%`,
    `Profit factor:  ${formatProfitFactor(p.profitFactor)}`,
    `Expectancy:     $${p.expectancy.toFixed(2)}/trade`,
    `Sharpe:         ${p.sharpeRatio.toFixed(2)}`,
    `Avg R:          ${p.avgRMultiple.toFixed(2)}`,
    `Max drawdown:   ${p.maxDrawdownPct.toFixed(2)}%`,
  ];
  return lines.join('\n');
}
