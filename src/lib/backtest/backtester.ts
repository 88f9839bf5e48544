/**
 * Backtest Replay Engine
 *
 * Replays historical daily bars through the decision cycle, one market
 * trading day at a time. Every run starts from a fresh classifier, trader
 * and behavior log; nothing leaks between runs.
 */

import type {
  Candle,
  ClosedTrade,
  RegimeHistoryEntry,
  StrategyMetrics,
  TradeStrategy,
} from '@/types';
import { TRADE_STRATEGIES, sliceToDate } from '@/types';
import type { EngineConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { calculatePnl } from '@/lib/paper-trading/paper-trader';
import {
  formatProfitFactor,
  maxDrawdownPct,
  profitFactor,
  sharpeRatio,
  strategyBreakdown,
} from '@/lib/paper-trading/performance-monitor';
import { DecisionCycle, buildCycleInputs, createCycleComponents } from '@/lib/pipeline/decision-cycle';
import { mean, round, sum } from '@/lib/utils/math';
import { createLogger, type Logger } from '@/lib/utils/logger';

// ============================================
// Types
// ============================================

export interface BacktestInputs {
  /** Daily series per ticker, ascending by date */
  instruments: Record<string, Candle[]>;
  /** Market proxy series; its dates define the trading calendar */
  market: Candle[];
  vix?: Candle[] | null;
  startDate: string;
  endDate: string;
}

export interface DailyBalance {
  date: string;
  /** Realized balance plus unrealized P&L of positions with a bar that day */
  balance: number;
  openPositions: number;
}

export interface BacktestResult {
  startDate: string;
  endDate: string;
  tradingDays: number;
  startingBalance: number;
  endingBalance: number;
  totalReturnPct: number;
  totalTrades: number;
  wins: number;
  losses: number;
  expired: number;
  winRate: number;
  profitFactor: number;
  expectancy: number;
  sharpeRatio: number;
  maxDrawdownPct: number;
  /** Mean R over trades with a non-zero R-multiple */
  avgRMultiple: number;
  bestTrade: ClosedTrade | null;
  worstTrade: ClosedTrade | null;
  strategyBreakdown: Partial<Record<TradeStrategy, StrategyMetrics>>;
  dailyBalances: DailyBalance[];
  trades: ClosedTrade[];
  regimeHistory: RegimeHistoryEntry[];
}

// ============================================
// Backtester
// ============================================

export class Backtester {
  private config: EngineConfig;
  private log: Logger;
  private componentLogger: ((scope: string) => Logger) | undefined;

  constructor(
    config: EngineConfig = DEFAULT_ENGINE_CONFIG,
    options: { logger?: Logger; componentLogger?: (scope: string) => Logger } = {},
  ) {
    this.config = config;
    this.log = options.logger ?? createLogger('Backtest', config.logging);
    this.componentLogger = options.componentLogger;
  }

  run(inputs: BacktestInputs): BacktestResult {
    const { startDate, endDate } = inputs;
    const settings = this.config.backtest;
    const candidates = Object.keys(inputs.instruments);

    const components = createCycleComponents(this.config, { logger: this.componentLogger });
    const cycle = new DecisionCycle(components, this.config, {
      logger: this.componentLogger?.('Cycle'),
    });
    const { trader } = components;

    const tradingDays = inputs.market
      .map((c) => c.date)
      .filter((d) => d >= startDate && d <= endDate);
    this.log.info(`Backtesting ${tradingDays.length} trading days: ${startDate} to ${endDate}`);

    const dailyBalances: DailyBalance[] = [];
    const regimeHistory: RegimeHistoryEntry[] = [];

    for (const date of tradingDays) {
      const cycleInputs = buildCycleInputs(
        { date, market: inputs.market, vix: inputs.vix ?? null, series: inputs.instruments, candidates },
        settings,
      );
      if (!cycleInputs) continue;

      const result = cycle.run(cycleInputs);
      const { bars } = cycleInputs;
      const { regime } = result;
      regimeHistory.push({
        date,
        regime: regime.regime,
        confidence: regime.confidence,
        adx: regime.adx,
        vix: regime.vix,
        breadth: regime.breadth,
        ageDays: regime.regimeAgeDays,
      });

      const open = trader.getOpenPositions();
      const unrealized = sum(
        open.map((p) => {
          const bar = bars[p.ticker];
          return bar ? calculatePnl(p, bar.close) : 0;
        }),
      );
      dailyBalances.push({
        date,
        balance: round(trader.getBalance() + unrealized, 2),
        openPositions: open.length,
      });
    }

    // Force-close whatever is still open at the last close on or before the end
    for (const pos of trader.getOpenPositions()) {
      const series = inputs.instruments[pos.ticker] ?? [];
      const available = sliceToDate(series, endDate);
      const last = available[available.length - 1];
      if (!last) {
        this.log.warn(`No price for ${pos.ticker} on or before ${endDate}, leaving open`);
        continue;
      }
      trader.closePosition(pos.id, last.close, endDate, 'backtest_end');
    }

    return this.compileResults(
      inputs,
      tradingDays.length,
      trader.getBalance(),
      trader.getClosedTrades(),
      dailyBalances,
      regimeHistory,
    );
  }

  private compileResults(
    inputs: BacktestInputs,
    tradingDays: number,
    finalBalance: number,
    trades: ClosedTrade[],
    dailyBalances: DailyBalance[],
    regimeHistory: RegimeHistoryEntry[],
  ): BacktestResult {
    const starting = this.config.trader.startingBalance;
    const pnls = trades.map((t) => t.pnl);
    const wins = trades.filter((t) => t.pnl > 0).length;
    const rMultiples = trades.map((t) => t.rMultiple).filter((r) => r !== 0);

    let best: ClosedTrade | null = null;
    let worst: ClosedTrade | null = null;
    for (const t of trades) {
      if (!best || t.pnl > best.pnl) best = t;
      if (!worst || t.pnl < worst.pnl) worst = t;
    }

    return {
      startDate: inputs.startDate,
      endDate: inputs.endDate,
      tradingDays,
      startingBalance: starting,
      endingBalance: round(finalBalance, 2),
      totalReturnPct: round(((finalBalance - starting) / starting) * 100, 2),
      totalTrades: trades.length,
      wins,
      losses: trades.filter((t) => t.pnl < 0).length,
      expired: trades.filter((t) => t.exitReason === 'expired').length,
      winRate: trades.length > 0 ? round(wins / trades.length, 3) : 0,
      profitFactor: profitFactor(pnls),
      expectancy: pnls.length > 0 ? round(mean(pnls), 2) : 0,
      sharpeRatio: sharpeRatio(pnls),
      maxDrawdownPct: maxDrawdownPct(starting, pnls),
      avgRMultiple: rMultiples.length > 0 ? round(mean(rMultiples), 2) : 0,
      bestTrade: best,
      worstTrade: worst,
      strategyBreakdown: strategyBreakdown(trades),
      dailyBalances,
      trades,
      regimeHistory,
    };
  }
}

// ============================================
// Report
// ============================================

export function formatBacktestReport(result: BacktestResult): string {
  const rule = '='.repeat(60);
  const pnl = result.endingBalance - result.startingBalance;
  const sign = pnl >= 0 ? '+' : '';
  const lines = [
    '',
    rule,
    `  BACKTEST RESULTS: ${result.startDate} → ${result.endDate}`,
    rule,
    '',
    `  Period: ${result.tradingDays} trading days`,
    `  Starting Balance: $${result.startingBalance.toFixed(2)}`,
    `  Ending Balance:   $${result.endingBalance.toFixed(2)}`,
    `  Total Return:     ${sign}$${pnl.toFixed(2)} (${sign}${result.totalReturnPct.toFixed(1)}%)`,
    '',
    `  Trades: ${result.totalTrades} | Wins: ${result.wins} | Losses: ${result.losses} | Expired: ${result.expired}`,
    `  Win Rate:       ${(result.winRate * 100).toFixed(1)}%`,
    `  Profit Factor:  ${formatProfitFactor(result.profitFactor)}`,
    `  Expectancy:     $${result.expectancy.toFixed(2)}/trade`,
    `  Avg R-Multiple: ${result.avgRMultiple.toFixed(2)}`,
    `  Sharpe Ratio:   ${result.sharpeRatio.toFixed(2)}`,
    `  Max Drawdown:   ${result.maxDrawdownPct.toFixed(1)}%`,
  ];

  if (result.bestTrade) {
    lines.push('', `  Best Trade:  ${result.bestTrade.ticker} (${result.bestTrade.strategy}) +$${result.bestTrade.pnl.toFixed(2)}`);
  }
  if (result.worstTrade) {
    lines.push(`  Worst Trade: ${result.worstTrade.ticker} (${result.worstTrade.strategy}) $${result.worstTrade.pnl.toFixed(2)}`);
  }

  const strategies = TRADE_STRATEGIES.flatMap((name) => {
    const m = result.strategyBreakdown[name];
    return m ? [{ name, m }] : [];
  }).sort((a, b) => a.name.localeCompare(b.name));
  if (strategies.length > 0) {
    lines.push('', '  Strategy Breakdown:');
    lines.push(`  ${'Strategy'.padEnd(20)} ${'Trades'.padStart(6)} ${'Win%'.padStart(6)} ${'P&L'.padStart(10)}`);
    lines.push(`  ${'-'.repeat(20)} ${'-'.repeat(6)} ${'-'.repeat(6)} ${'-'.repeat(10)}`);
    for (const { name, m } of strategies) {
      lines.push(
        `  ${name.padEnd(20)} ${String(m.totalTrades).padStart(6)} ` +
          `${`${(m.winRate * 100).toFixed(0)}%`.padStart(6)} ${`$${m.pnl.toFixed(2)}`.padStart(10)}`,
      );
    }
  }

  if (result.regimeHistory.length > 0) {
    const counts = new Map<string, number>();
    for (const r of result.regimeHistory) counts.set(r.regime, (counts.get(r.regime) ?? 0) + 1);
    lines.push('', '  Regime Distribution:');
    for (const [regime, count] of [...counts.entries()].sort((a, b) => b[1] - a[1])) {
      const pct = (count / result.regimeHistory.length) * 100;
      lines.push(`    ${regime}: ${count} days (${pct.toFixed(0)}%)`);
    }
  }

  lines.push('', rule);
  return lines.join('\n');
}
