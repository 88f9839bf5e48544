import { describe, expect, it } from '@jest/globals';

import { computePortfolioReport, formatPortfolioSummary, sortinoRatio } from '@/lib/paper-trading';
import { makeTrade } from './helpers/fixtures';

describe('Portfolio analytics', () => {
  const trades = [
    makeTrade(10, { entryDate: '2024-02-26', exitDate: '2024-02-29', rMultiple: 1, daysHeld: 4 }),
    makeTrade(-5, {
      strategy: 'mean_reversion',
      direction: 'SHORT',
      entryDate: '2024-03-08',
      exitDate: '2024-03-12',
      rMultiple: -1,
      daysHeld: 2,
    }),
    makeTrade(0, { exitReason: 'expired', entryDate: '2024-03-18', exitDate: '2024-03-25', daysHeld: 5 }),
    makeTrade(20, { entryDate: '2024-03-20', exitDate: '2024-03-25', rMultiple: 2, daysHeld: 3 }),
  ];
  const report = computePortfolioReport(trades, 100, 125);

  it('should summarize returns with break-even trades counted as losses', () => {
    expect(report.totalTrades).toBe(4);
    expect(report.winRate).toBe(0.5);
    expect(report.totalReturnPct).toBe(25);
    expect(report.profitFactor).toBe(6);
    expect(report.expectancy).toBe(6.25);
    expect(report.avgRMultiple).toBe(0.5);
    expect(report.sortinoRatio).toBe(19.84);
  });

  it('should build the equity curve and drawdown figures', () => {
    expect(report.equityCurve.map((p) => [p.balance, p.drawdownPct])).toEqual([
      [110, 0],
      [105, -4.55],
      [105, -4.55],
      [125, 0],
    ]);
    expect(report.maxDrawdownPct).toBe(-4.55);
    expect(report.maxDrawdownDuration).toBe(1);
    expect(report.currentDrawdownPct).toBe(0);
    expect(report.calmarRatio).toBe(5.5);
  });

  it('should track streaks and activity', () => {
    expect(report.maxConsecutiveWins).toBe(1);
    expect(report.maxConsecutiveLosses).toBe(2);
    expect(report.consecutiveWins).toBe(1);
    expect(report.consecutiveLosses).toBe(0);
    expect(report.avgHoldDays).toBe(3.5);
    expect(report.avgTradesPerWeek).toBe(1);
    expect(report.bestDayPnl).toBe(20);
    expect(report.worstDayPnl).toBe(-5);
  });

  it('should break results down by strategy, month, direction and exit reason', () => {
    expect(report.strategyStats.map((s) => s.name)).toEqual(['breakout', 'mean_reversion']);
    expect(report.strategyStats[0]).toEqual({
      name: 'breakout',
      totalTrades: 3,
      wins: 2,
      losses: 1,
      winRate: 0.667,
      totalPnl: 30,
      avgPnl: 10,
      avgWin: 15,
      avgLoss: 0,
      profitFactor: Infinity,
      avgHoldDays: 4,
      bestTrade: 20,
      worstTrade: 0,
      avgRMultiple: 1,
    });
    expect(report.monthlyReturns).toEqual({ '2024-02': 10, '2024-03': 15 });
    expect(report.directionStats).toEqual({
      LONG: { totalTrades: 3, wins: 2, winRate: 0.667, totalPnl: 30, avgPnl: 10 },
      SHORT: { totalTrades: 1, wins: 0, winRate: 0, totalPnl: -5, avgPnl: -5 },
    });
    expect(report.exitReasonStats).toEqual({
      expired: { count: 1, totalPnl: 0, avgPnl: 0 },
      stopped_out: { count: 1, totalPnl: -5, avgPnl: -5 },
      target_hit: { count: 2, totalPnl: 30, avgPnl: 15 },
    });
  });

  it('should render a markdown summary', () => {
    const lines = formatPortfolioSummary(report).split('\n');

    expect(lines).toContain('- **Balance:** $125.00 (+25.0%)');
    expect(lines).toContain('- **Win Rate:** 50% | **Profit Factor:** 6.00');
    expect(lines).toContain('| Breakout | 3 | 67% | $+30.00 | 1.00 | ∞ |');
  });

  it('should return an empty report without trades', () => {
    const empty = computePortfolioReport([], 500, 500);

    expect(empty.totalTrades).toBe(0);
    expect(empty.profitFactor).toBe(0);
    expect(empty.equityCurve).toEqual([]);
    expect(formatPortfolioSummary(empty)).not.toContain('### Strategy Breakdown');
  });

  it('should return zero Sortino without losses or history', () => {
    expect(sortinoRatio([5, 10])).toBe(0);
    expect(sortinoRatio([-3])).toBe(0);
  });
});
