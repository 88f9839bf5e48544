/**
 * Paper Trading Types
 * Types shared by the position lifecycle, its persistence and its callers
 */

import type {
  ClosedTrade,
  Direction,
  Position,
  StrategySignal,
  TechnicalSummary,
  TradeStrategy,
} from '@/types';

// ============================================
// Strategy Exit Rules
// ============================================

/** Per-strategy exit settings the lifecycle needs at entry */
export interface ExitRules {
  maxHoldDays(strategy: TradeStrategy): number;
  /** 0 = the strategy does not trail */
  trailingStopAtr(strategy: TradeStrategy): number;
  computeTakeProfit(
    strategy: TradeStrategy,
    direction: Direction,
    entryPrice: number,
    tech: TechnicalSummary,
    fallback: number,
  ): number;
}

// ============================================
// State
// ============================================

/** Everything needed to resume a trader */
export interface PaperTraderState {
  positions: Position[];
  closedTrades: ClosedTrade[];
  virtualBalance: number;
  /** Last date the lifecycle advanced to, null before the first step */
  lastUpdated: string | null;
}

// ============================================
// Events
// ============================================

/** Paper trader events */
export interface PaperTraderEvents {
  entry: (position: Position, signal: StrategySignal) => void;
  exit: (trade: ClosedTrade) => void;
  /** Entry refused by the pattern-day-trading rule */
  pdtBlocked: (ticker: string, dayTrades: number) => void;
}
