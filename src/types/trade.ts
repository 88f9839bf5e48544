/**
 * Trade Types
 * Simulated positions, closed trades and the performance snapshot
 */

import type { Direction, TradeStrategy } from './market';

// ============================================
// Positions
// ============================================

export interface Position {
  /** PT-<entryDate>-<NNN> */
  id: string;
  ticker: string;
  sector: string;
  direction: Direction;
  entryPrice: number;
  entryDate: string;
  positionSize: number;
  stopLoss: number;
  takeProfit: number;
  strategy: TradeStrategy;
  maxHoldDays: number;
  daysHeld: number;
  signalScore: number;
  /** Trailing distance in bar-range units, 0 = strategy does not trail */
  trailingStopAtr: number;
  /** Current trailing level, 0 = inactive */
  trailingStop: number;
  highestPrice: number;
  lowestPrice: number;
  unrealizedPnl: number;
}

/** Terminal states of the lifecycle plus the two administrative closes */
export const EXIT_REASONS = [
  'stopped_out',
  'trailing_stopped',
  'target_hit',
  'expired',
  'manual',
  'backtest_end',
] as const;

export type ExitReason = (typeof EXIT_REASONS)[number];

/** Result of evaluating one position against one bar */
export type ExitCheck = ExitReason | 'open';

export interface ClosedTrade {
  id: string;
  ticker: string;
  sector: string;
  direction: Direction;
  strategy: TradeStrategy;
  entryPrice: number;
  entryDate: string;
  exitPrice: number;
  exitDate: string;
  exitReason: ExitReason;
  positionSize: number;
  stopLoss: number;
  takeProfit: number;
  pnl: number;
  pnlPct: number;
  rMultiple: number;
  daysHeld: number;
  signalScore: number;
}

// ============================================
// Performance
// ============================================

export interface StrategyMetrics {
  totalTrades: number;
  wins: number;
  pnl: number;
  winRate: number;
}

export interface PerformanceSnapshot {
  virtualBalance: number;
  startingBalance: number;
  totalTrades: number;
  openPositions: number;
  wins: number;
  losses: number;
  expired: number;
  winRate: number;
  /** Infinity when there are no losing trades */
  profitFactor: number;
  expectancy: number;
  sharpeRatio: number;
  avgRMultiple: number;
  /** Negative percentage from the running balance peak */
  maxDrawdownPct: number;
  strategyMetrics: Partial<Record<TradeStrategy, StrategyMetrics>>;
  lastUpdated: string | null;
}

export interface PositionUpdateResult {
  closed: ClosedTrade[];
  open: Position[];
}
