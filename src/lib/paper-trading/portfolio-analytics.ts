/**
 * Portfolio Analytics
 *
 * Deeper statistics over the closed-trade log: equity curve with drawdown
 * duration, Sortino and Calmar ratios, streaks, calendar breakdowns and
 * per-strategy / per-direction / per-exit-reason tables.
 */

import type { ClosedTrade, Direction, ExitReason } from '@/types';
import { daysBetween } from '@/lib/utils/dates';
import { mean, round, sampleStdev, sum } from '@/lib/utils/math';
import { formatProfitFactor, sharpeRatio } from './performance-monitor';

// ============================================
// Types
// ============================================

export interface EquityPoint {
  date: string;
  balance: number;
  drawdownPct: number;
  peak: number;
}

export interface StrategyStats {
  name: string;
  totalTrades: number;
  wins: number;
  /** Trades with pnl <= 0 */
  losses: number;
  winRate: number;
  totalPnl: number;
  avgPnl: number;
  avgWin: number;
  avgLoss: number;
  profitFactor: number;
  avgHoldDays: number;
  bestTrade: number;
  worstTrade: number;
  avgRMultiple: number;
}

export interface DirectionStats {
  totalTrades: number;
  wins: number;
  winRate: number;
  totalPnl: number;
  avgPnl: number;
}

export interface ExitReasonStats {
  count: number;
  totalPnl: number;
  avgPnl: number;
}

export interface PortfolioReport {
  startingBalance: number;
  currentBalance: number;
  totalReturnPct: number;
  totalTrades: number;
  winRate: number;
  profitFactor: number;
  expectancy: number;

  sharpeRatio: number;
  sortinoRatio: number;
  maxDrawdownPct: number;
  /** Longest drawdown, counted in trades */
  maxDrawdownDuration: number;
  currentDrawdownPct: number;
  calmarRatio: number;
  avgRMultiple: number;

  avgHoldDays: number;
  avgTradesPerWeek: number;
  bestDayPnl: number;
  worstDayPnl: number;
  consecutiveWins: number;
  consecutiveLosses: number;
  maxConsecutiveWins: number;
  maxConsecutiveLosses: number;

  strategyStats: StrategyStats[];
  equityCurve: EquityPoint[];
  /** YYYY-MM → realized P&L */
  monthlyReturns: Record<string, number>;
  directionStats: Partial<Record<Direction, DirectionStats>>;
  exitReasonStats: Partial<Record<ExitReason, ExitReasonStats>>;
}

// ============================================
// Computation
// ============================================

export function computePortfolioReport(
  trades: ClosedTrade[],
  startingBalance: number,
  currentBalance: number,
): PortfolioReport {
  const report = emptyReport(startingBalance, currentBalance);
  if (trades.length === 0) return report;

  const pnls = trades.map((t) => t.pnl);
  const wins = pnls.filter((p) => p > 0);

  report.totalTrades = trades.length;
  report.winRate = wins.length / pnls.length;
  report.totalReturnPct =
    startingBalance > 0 ? round(((currentBalance - startingBalance) / startingBalance) * 100, 2) : 0;
  report.profitFactor = profitFactorInclusive(pnls);
  report.expectancy = round(mean(pnls), 2);
  report.sharpeRatio = sharpeRatio(pnls);
  report.sortinoRatio = sortinoRatio(pnls);
  report.avgRMultiple = round(mean(trades.map((t) => t.rMultiple)), 2);

  applyEquityCurve(report, trades);
  applyStreaks(report, pnls);

  report.avgHoldDays = round(mean(trades.map((t) => t.daysHeld)), 1);
  if (trades.length >= 2) {
    const weeks = Math.max(daysBetween(trades[0].entryDate, trades[trades.length - 1].exitDate) / 7, 1);
    report.avgTradesPerWeek = round(trades.length / weeks, 1);
  }

  const daily = new Map<string, number>();
  for (const t of trades) daily.set(t.exitDate, (daily.get(t.exitDate) ?? 0) + t.pnl);
  const dayValues = [...daily.values()];
  report.bestDayPnl = round(Math.max(...dayValues), 2);
  report.worstDayPnl = round(Math.min(...dayValues), 2);

  report.strategyStats = computeStrategyStats(trades);
  report.monthlyReturns = computeMonthlyReturns(trades);
  report.directionStats = computeDirectionStats(trades);
  report.exitReasonStats = computeExitReasonStats(trades);

  return report;
}

function emptyReport(startingBalance: number, currentBalance: number): PortfolioReport {
  return {
    startingBalance,
    currentBalance,
    totalReturnPct: 0,
    totalTrades: 0,
    winRate: 0,
    profitFactor: 0,
    expectancy: 0,
    sharpeRatio: 0,
    sortinoRatio: 0,
    maxDrawdownPct: 0,
    maxDrawdownDuration: 0,
    currentDrawdownPct: 0,
    calmarRatio: 0,
    avgRMultiple: 0,
    avgHoldDays: 0,
    avgTradesPerWeek: 0,
    bestDayPnl: 0,
    worstDayPnl: 0,
    consecutiveWins: 0,
    consecutiveLosses: 0,
    maxConsecutiveWins: 0,
    maxConsecutiveLosses: 0,
    strategyStats: [],
    equityCurve: [],
    monthlyReturns: {},
    directionStats: {},
    exitReasonStats: {},
  };
}

/** Profit factor counting break-even trades on the loss side */
function profitFactorInclusive(pnls: number[]): number {
  const grossLoss = Math.abs(sum(pnls.filter((p) => p <= 0)));
  if (grossLoss === 0) return Infinity;
  return round(sum(pnls.filter((p) => p > 0)) / grossLoss, 2);
}

/**
 * Sortino over losing trades. A single loss uses its magnitude as the
 * downside deviation.
 */
export function sortinoRatio(pnls: number[]): number {
  if (pnls.length < 2) return 0;
  const downside = pnls.filter((p) => p < 0);
  if (downside.length === 0) return 0;
  const downsideSd = downside.length >= 2 ? sampleStdev(downside) : Math.abs(downside[0]);
  return downsideSd > 0 ? round((mean(pnls) / downsideSd) * Math.sqrt(252), 2) : 0;
}

function applyEquityCurve(report: PortfolioReport, trades: ClosedTrade[]): void {
  let balance = report.startingBalance;
  let peak = balance;
  let maxDd = 0;
  let maxDuration = 0;
  let ddStart: number | null = null;

  for (let i = 0; i < trades.length; i++) {
    const t = trades[i];
    balance += t.pnl;
    peak = Math.max(peak, balance);
    const ddPct = peak > 0 ? ((balance - peak) / peak) * 100 : 0;
    maxDd = Math.min(maxDd, ddPct);

    if (ddPct < -0.01) {
      if (ddStart === null) ddStart = i;
      maxDuration = Math.max(maxDuration, i - ddStart);
    } else {
      ddStart = null;
    }

    report.equityCurve.push({
      date: t.exitDate,
      balance: round(balance, 2),
      drawdownPct: round(ddPct, 2),
      peak: round(peak, 2),
    });
  }

  report.maxDrawdownPct = round(maxDd, 2);
  report.maxDrawdownDuration = maxDuration;
  const lastPoint = report.equityCurve[report.equityCurve.length - 1];
  report.currentDrawdownPct = lastPoint ? lastPoint.drawdownPct : 0;
  if (Math.abs(maxDd) > 0) {
    report.calmarRatio = round(report.totalReturnPct / Math.abs(maxDd), 2);
  }
}

function applyStreaks(report: PortfolioReport, pnls: number[]): void {
  let wins = 0;
  let losses = 0;
  for (const pnl of pnls) {
    if (pnl > 0) {
      wins++;
      losses = 0;
      report.maxConsecutiveWins = Math.max(report.maxConsecutiveWins, wins);
    } else {
      losses++;
      wins = 0;
      report.maxConsecutiveLosses = Math.max(report.maxConsecutiveLosses, losses);
    }
  }
  report.consecutiveWins = wins;
  report.consecutiveLosses = losses;
}

function groupBy<K extends string>(trades: ClosedTrade[], key: (t: ClosedTrade) => K): Map<K, ClosedTrade[]> {
  const groups = new Map<K, ClosedTrade[]>();
  for (const t of trades) {
    const k = key(t);
    groups.set(k, [...(groups.get(k) ?? []), t]);
  }
  return groups;
}

export function computeStrategyStats(trades: ClosedTrade[]): StrategyStats[] {
  const stats: StrategyStats[] = [];
  const groups = groupBy(trades, (t) => t.strategy);

  for (const [name, group] of [...groups].sort(([a], [b]) => a.localeCompare(b))) {
    const pnls = group.map((t) => t.pnl);
    const wins = pnls.filter((p) => p > 0);
    const losses = pnls.filter((p) => p <= 0);

    stats.push({
      name,
      totalTrades: group.length,
      wins: wins.length,
      losses: losses.length,
      winRate: round(wins.length / group.length, 3),
      totalPnl: round(sum(pnls), 2),
      avgPnl: round(mean(pnls), 2),
      avgWin: round(mean(wins), 2),
      avgLoss: round(mean(losses), 2),
      profitFactor: profitFactorInclusive(pnls),
      avgHoldDays: round(mean(group.map((t) => t.daysHeld)), 1),
      bestTrade: round(Math.max(...pnls), 2),
      worstTrade: round(Math.min(...pnls), 2),
      avgRMultiple: round(mean(group.map((t) => t.rMultiple)), 2),
    });
  }

  return stats.sort((a, b) => b.totalPnl - a.totalPnl);
}

export function computeMonthlyReturns(trades: ClosedTrade[]): Record<string, number> {
  const monthly = new Map<string, number>();
  for (const t of trades) {
    if (t.exitDate.length < 7) continue;
    const month = t.exitDate.slice(0, 7);
    monthly.set(month, (monthly.get(month) ?? 0) + t.pnl);
  }
  const result: Record<string, number> = {};
  for (const [month, pnl] of [...monthly].sort(([a], [b]) => a.localeCompare(b))) {
    result[month] = round(pnl, 2);
  }
  return result;
}

export function computeDirectionStats(trades: ClosedTrade[]): Partial<Record<Direction, DirectionStats>> {
  const result: Partial<Record<Direction, DirectionStats>> = {};
  for (const direction of ['LONG', 'SHORT'] as const) {
    const group = trades.filter((t) => t.direction === direction);
    if (group.length === 0) continue;
    const pnls = group.map((t) => t.pnl);
    const wins = pnls.filter((p) => p > 0).length;
    result[direction] = {
      totalTrades: group.length,
      wins,
      winRate: round(wins / group.length, 3),
      totalPnl: round(sum(pnls), 2),
      avgPnl: round(mean(pnls), 2),
    };
  }
  return result;
}

export function computeExitReasonStats(trades: ClosedTrade[]): Partial<Record<ExitReason, ExitReasonStats>> {
  const result: Partial<Record<ExitReason, ExitReasonStats>> = {};
  const groups = groupBy(trades, (t) => t.exitReason);
  for (const [reason, group] of [...groups].sort(([a], [b]) => a.localeCompare(b))) {
    const pnls = group.map((t) => t.pnl);
    result[reason] = {
      count: group.length,
      totalPnl: round(sum(pnls), 2),
      avgPnl: round(mean(pnls), 2),
    };
  }
  return result;
}

// ============================================
// Formatting
// ============================================

const signed = (v: number, digits = 2): string => `${v >= 0 ? '+' : ''}${v.toFixed(digits)}`;

const titleCase = (name: string): string =>
  name
    .split('_')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');

export function formatPortfolioSummary(report: PortfolioReport): string {
  const pnl = report.currentBalance - report.startingBalance;
  const lines = [
    '## Portfolio Analytics',
    '',
    '### Performance Overview',
    `- **Balance:** $${report.currentBalance.toFixed(2)} (${signed(report.totalReturnPct, 1)}%)`,
    `- **Total P&L:** $${signed(pnl)} over ${report.totalTrades} trades`,
    `- **Win Rate:** ${(report.winRate * 100).toFixed(0)}% | **Profit Factor:** ${formatProfitFactor(report.profitFactor)}`,
    `- **Expectancy:** $${report.expectancy.toFixed(2)}/trade | **Avg R:** ${report.avgRMultiple.toFixed(2)}`,
    '',
    '### Risk Metrics',
    `- **Sharpe Ratio:** ${report.sharpeRatio.toFixed(2)} | **Sortino:** ${report.sortinoRatio.toFixed(2)}`,
    `- **Max Drawdown:** ${report.maxDrawdownPct.toFixed(1)}% (duration: ${report.maxDrawdownDuration} trades)`,
    `- **Current Drawdown:** ${report.currentDrawdownPct.toFixed(1)}%`,
    `- **Calmar Ratio:** ${report.calmarRatio.toFixed(2)}`,
    '',
    '### Streaks & Activity',
    `- **Best Day:** $${signed(report.bestDayPnl)} | **Worst Day:** $${signed(report.worstDayPnl)}`,
    `- **Max Win Streak:** ${report.maxConsecutiveWins} | **Max Loss Streak:** ${report.maxConsecutiveLosses}`,
    `- **Avg Hold:** ${report.avgHoldDays.toFixed(1)} days | **Trades/Week:** ${report.avgTradesPerWeek.toFixed(1)}`,
  ];

  if (report.strategyStats.length > 0) {
    lines.push('', '### Strategy Breakdown');
    lines.push('| Strategy | Trades | Win% | P&L | Avg R | PF |');
    lines.push('|----------|--------|------|-----|-------|-----|');
    for (const s of report.strategyStats) {
      lines.push(
        `| ${titleCase(s.name)} | ${s.totalTrades} | ${(s.winRate * 100).toFixed(0)}% | ` +
          `$${signed(s.totalPnl)} | ${s.avgRMultiple.toFixed(2)} | ${formatProfitFactor(s.profitFactor)} |`,
      );
    }
  }

  return lines.join('\n');
}
