/**
 * Paper Trader
 * Virtual portfolio: admits strategy signals as simulated positions and
 * advances them one daily bar at a time through the exit state machine.
 *
 * Per position and step:
 *   1. days held += 1
 *   2. track the running high / low
 *   3. tighten the trailing stop (only once in profit, never loosen)
 *   4. exit check: trailing stop → stop loss → take profit → max hold days
 *
 * A position without a bar on a step only ages.
 */

import { EventEmitter } from 'events';

import type {
  BarsByTicker,
  ClosedTrade,
  ExitCheck,
  ExitReason,
  PerformanceSnapshot,
  Position,
  PositionUpdateResult,
  PriceBar,
  StrategySignal,
} from '@/types';
import type { TraderConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { subtractBusinessDays } from '@/lib/utils/dates';
import { round } from '@/lib/utils/math';
import { createLogger, type Logger } from '@/lib/utils/logger';

import type { ExitRules, PaperTraderEvents, PaperTraderState } from './types';
import { computePerformance } from './performance-monitor';

// ============================================
// Pure lifecycle steps
// ============================================

/**
 * Tighten the trailing stop from the favorable extreme. The bar's range
 * stands in for ATR. Returns the new level (unchanged when it would loosen).
 */
export function nextTrailingStop(pos: Position, bar: PriceBar): number {
  if (pos.trailingStopAtr <= 0) return pos.trailingStop;

  const atrProxy = Math.abs(bar.high - bar.low);
  if (atrProxy <= 0) return pos.trailingStop;

  const distance = atrProxy * pos.trailingStopAtr;
  if (pos.direction === 'LONG') {
    const candidate = pos.highestPrice - distance;
    if (candidate > pos.entryPrice && (pos.trailingStop === 0 || candidate > pos.trailingStop)) {
      return round(candidate, 4);
    }
  } else {
    const candidate = pos.lowestPrice + distance;
    if (candidate < pos.entryPrice && (pos.trailingStop === 0 || candidate < pos.trailingStop)) {
      return round(candidate, 4);
    }
  }
  return pos.trailingStop;
}

export function checkExit(pos: Position, bar: PriceBar): ExitCheck {
  if (pos.direction === 'LONG') {
    if (pos.trailingStop > 0 && bar.low <= pos.trailingStop) return 'trailing_stopped';
    if (bar.low <= pos.stopLoss) return 'stopped_out';
    if (bar.high >= pos.takeProfit) return 'target_hit';
  } else {
    if (pos.trailingStop > 0 && bar.high >= pos.trailingStop) return 'trailing_stopped';
    if (bar.high >= pos.stopLoss) return 'stopped_out';
    if (bar.low <= pos.takeProfit) return 'target_hit';
  }
  if (pos.daysHeld >= pos.maxHoldDays) return 'expired';
  return 'open';
}

export function exitPrice(pos: Position, reason: ExitReason, bar: PriceBar): number {
  switch (reason) {
    case 'stopped_out':
      return pos.trailingStop > 0 ? pos.trailingStop : pos.stopLoss;
    case 'trailing_stopped':
      return pos.trailingStop;
    case 'target_hit':
      return pos.takeProfit;
    case 'expired':
    case 'manual':
    case 'backtest_end':
      return bar.close;
  }
}

export function calculatePnl(pos: Pick<Position, 'direction' | 'entryPrice' | 'positionSize'>, price: number): number {
  const move = pos.direction === 'LONG' ? price - pos.entryPrice : pos.entryPrice - price;
  return round(move * pos.positionSize, 2);
}

export function toClosedTrade(
  pos: Position,
  price: number,
  date: string,
  reason: ExitReason,
): ClosedTrade {
  const pnl = calculatePnl(pos, price);
  const costBasis = pos.entryPrice * pos.positionSize;
  const initialRisk = Math.abs(pos.entryPrice - pos.stopLoss) * pos.positionSize;

  return {
    id: pos.id,
    ticker: pos.ticker,
    sector: pos.sector,
    direction: pos.direction,
    strategy: pos.strategy,
    entryPrice: pos.entryPrice,
    entryDate: pos.entryDate,
    exitPrice: price,
    exitDate: date,
    exitReason: reason,
    positionSize: pos.positionSize,
    stopLoss: pos.stopLoss,
    takeProfit: pos.takeProfit,
    pnl,
    pnlPct: costBasis !== 0 ? round((pnl / costBasis) * 100, 2) : 0,
    rMultiple: initialRisk > 0 ? round(pnl / initialRisk, 2) : 0,
    daysHeld: pos.daysHeld,
    signalScore: pos.signalScore,
  };
}

// ============================================
// Trader
// ============================================

export class PaperTrader extends EventEmitter {
  private config: TraderConfig;
  private exitRules: ExitRules;
  private log: Logger;

  private positions: Position[] = [];
  private closedTrades: ClosedTrade[] = [];
  private virtualBalance: number;
  private lastUpdated: string | null = null;

  constructor(
    exitRules: ExitRules,
    config: TraderConfig = DEFAULT_ENGINE_CONFIG.trader,
    options: { logger?: Logger; state?: PaperTraderState } = {},
  ) {
    super();
    this.config = config;
    this.exitRules = exitRules;
    this.log = options.logger ?? createLogger('Trader');
    this.virtualBalance = config.startingBalance;
    if (options.state) this.importState(options.state);
  }

  // ============================================
  // Position Monitoring
  // ============================================

  /**
   * Advance every open position by one step using `bars` dated `date`.
   * Runs before any entry of the same step so freed slots are visible.
   */
  updatePositions(bars: BarsByTicker, date: string): PositionUpdateResult {
    const closed: ClosedTrade[] = [];
    const stillOpen: Position[] = [];

    for (const original of this.positions) {
      const pos: Position = { ...original, daysHeld: original.daysHeld + 1 };
      const bar = bars[pos.ticker];

      if (!bar) {
        stillOpen.push(pos);
        continue;
      }

      pos.highestPrice = Math.max(pos.highestPrice, bar.high);
      pos.lowestPrice = Math.min(pos.lowestPrice, bar.low);

      const trailing = nextTrailingStop(pos, bar);
      if (trailing !== pos.trailingStop) {
        this.log.debug(`Trailing stop for ${pos.ticker} updated to ${trailing.toFixed(4)}`);
        pos.trailingStop = trailing;
      }

      const result = checkExit(pos, bar);
      if (result === 'open') {
        pos.unrealizedPnl = calculatePnl(pos, bar.close);
        stillOpen.push(pos);
        continue;
      }

      closed.push(this.settle(pos, exitPrice(pos, result, bar), date, result));
    }

    this.positions = stillOpen;
    this.lastUpdated = date;
    return { closed, open: this.getOpenPositions() };
  }

  // ============================================
  // Position Entry
  // ============================================

  /**
   * Open positions for `enter_now` signals, in order, until the
   * concurrency cap is reached
   */
  admitSignals(signals: StrategySignal[], date: string): Position[] {
    const opened: Position[] = [];

    for (const sig of signals) {
      if (sig.action !== 'enter_now') continue;
      const ticker = sig.instrument.ticker;

      if (this.wouldViolatePdt(date)) {
        const count = this.countRecentDayTrades(date);
        this.log.warn(`PDT rule blocks entry for ${ticker} (${count} day trades)`);
        this.emit('pdtBlocked', ticker, count);
        continue;
      }

      if (this.positions.length >= this.config.maxConcurrentPositions) {
        this.log.info(`Max positions (${this.config.maxConcurrentPositions}) reached, skipping ${ticker}`);
        break;
      }

      if (this.positions.some((p) => p.ticker === ticker)) continue;

      const position = this.openPosition(sig, date);
      this.positions.push(position);
      opened.push(position);
      this.emit('entry', position, sig);

      this.log.info(
        `Paper trade opened: ${position.direction} ${ticker} @ ${position.entryPrice.toFixed(2)} ` +
          `(SL: ${position.stopLoss.toFixed(2)}, TP: ${position.takeProfit.toFixed(2)}) [${position.strategy}]` +
          (position.trailingStopAtr > 0 ? ` (trailing ${position.trailingStopAtr}x ATR)` : ''),
      );
    }

    if (opened.length > 0) this.lastUpdated = date;
    return opened;
  }

  private openPosition(sig: StrategySignal, date: string): Position {
    const strategy = sig.strategyName;
    const takeProfit = this.exitRules.computeTakeProfit(
      strategy,
      sig.direction,
      sig.entryPrice,
      sig.instrument.technical,
      sig.takeProfit,
    );

    return {
      id: this.nextPositionId(date),
      ticker: sig.instrument.ticker,
      sector: sig.instrument.sector,
      direction: sig.direction,
      entryPrice: sig.entryPrice,
      entryDate: date,
      positionSize: round(sig.positionSize, 4),
      stopLoss: round(sig.stopLoss, 4),
      takeProfit: round(takeProfit, 4),
      strategy,
      maxHoldDays: this.exitRules.maxHoldDays(strategy),
      daysHeld: 0,
      signalScore: sig.instrument.compositeScore,
      trailingStopAtr: this.exitRules.trailingStopAtr(strategy),
      trailingStop: 0,
      highestPrice: sig.entryPrice,
      lowestPrice: sig.entryPrice,
      unrealizedPnl: 0,
    };
  }

  /** PT-<date>-<NNN>, NNN counting every position opened on `date` */
  private nextPositionId(date: string): string {
    const openedToday =
      this.positions.filter((p) => p.entryDate === date).length +
      this.closedTrades.filter((t) => t.entryDate === date).length;
    return `PT-${date}-${String(openedToday + 1).padStart(3, '0')}`;
  }

  // ============================================
  // Manual Close
  // ============================================

  /**
   * Close a position at a supplied price. Returns null when no open
   * position has that id.
   */
  closePosition(
    id: string,
    price: number,
    date: string,
    reason: Extract<ExitReason, 'manual' | 'backtest_end'> = 'manual',
  ): ClosedTrade | null {
    const pos = this.positions.find((p) => p.id === id);
    if (!pos) {
      this.log.warn(`No open position ${id}`);
      return null;
    }
    this.positions = this.positions.filter((p) => p.id !== id);
    this.lastUpdated = date;
    return this.settle(pos, price, date, reason);
  }

  private settle(pos: Position, price: number, date: string, reason: ExitReason): ClosedTrade {
    const trade = toClosedTrade(pos, price, date, reason);
    this.closedTrades.push(trade);
    this.virtualBalance = round(this.virtualBalance + trade.pnl, 2);
    this.emit('exit', trade);
    this.log.info(
      `Paper trade closed: ${trade.direction} ${trade.ticker} — ${reason}, P&L: $${trade.pnl.toFixed(2)}`,
    );
    return trade;
  }

  // ============================================
  // PDT Simulation
  // ============================================

  wouldViolatePdt(date: string): boolean {
    if (!this.config.pdtSimulation) return false;
    return this.countRecentDayTrades(date) >= this.config.pdtMaxDayTrades;
  }

  /** Trades opened and closed on the same day within the last `pdtWindowDays` business days, `date` included */
  countRecentDayTrades(date: string): number {
    const cutoff = subtractBusinessDays(date, this.config.pdtWindowDays - 1);
    return this.closedTrades.filter((t) => t.entryDate >= cutoff && t.entryDate === t.exitDate).length;
  }

  // ============================================
  // Accessors
  // ============================================

  getOpenPositions(): Position[] {
    return this.positions.map((p) => ({ ...p }));
  }

  getClosedTrades(): ClosedTrade[] {
    return [...this.closedTrades];
  }

  getBalance(): number {
    return this.virtualBalance;
  }

  getPerformance(): PerformanceSnapshot {
    return computePerformance(this.closedTrades, {
      startingBalance: this.config.startingBalance,
      virtualBalance: this.virtualBalance,
      openPositions: this.positions.length,
      lastUpdated: this.lastUpdated,
    });
  }

  exportState(): PaperTraderState {
    return {
      positions: this.getOpenPositions(),
      closedTrades: this.getClosedTrades(),
      virtualBalance: this.virtualBalance,
      lastUpdated: this.lastUpdated,
    };
  }

  importState(state: PaperTraderState): void {
    this.positions = state.positions.map((p) => ({ ...p }));
    this.closedTrades = [...state.closedTrades];
    this.virtualBalance = state.virtualBalance;
    this.lastUpdated = state.lastUpdated;
  }

  /**
   * Type-safe event emitter methods
   */
  override on<K extends keyof PaperTraderEvents>(event: K, listener: PaperTraderEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof PaperTraderEvents>(
    event: K,
    ...args: Parameters<PaperTraderEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
