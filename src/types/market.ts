/**
 * Market Types
 * Regimes, technical summaries, scored instruments and strategy signals
 */

import type { RiskAssessment } from './risk';

// ============================================
// Regime
// ============================================

export const MARKET_REGIMES = [
  'TRENDING_UP',
  'TRENDING_DOWN',
  'RANGE_BOUND',
  'HIGH_VOLATILITY',
] as const;

export type MarketRegime = (typeof MARKET_REGIMES)[number];

/** Where the market proxy closes relative to its EMA20/SMA50/SMA200 */
export type TrendDescriptor = 'above_all_sma' | 'below_all_sma' | 'mixed';

export interface RegimeAssessment {
  regime: MarketRegime;
  /** 0-1, min(ADX / 40, 1) */
  confidence: number;
  trend: TrendDescriptor;
  /** Trend-strength oscillator reading (ADX-14) */
  adx: number;
  /** Latest volatility-index close, 0 when unavailable */
  vix: number;
  /** % of recent bars closing above SMA50 (breadth proxy) */
  breadth: number;
  /** Consecutive prior evaluations in this regime */
  regimeAgeDays: number;
  /** Date the current regime began, null for the default assessment */
  regimeStartDate: string | null;
  activeStrategies: StrategyName[];
  /** Multiplier applied to risk-per-trade, in (0, 1] */
  positionSizeModifier: number;
  /** Last 30 ADX readings (1 dp) */
  adxHistory: number[];
  /** Last 30 volatility-index closes (1 dp) */
  vixHistory: number[];
}

export interface RegimeHistoryEntry {
  date: string;
  regime: MarketRegime;
  confidence: number;
  adx: number;
  vix: number;
  breadth: number;
  ageDays: number;
}

// ============================================
// Strategies
// ============================================

export const STRATEGY_NAMES = [
  'trend_following',
  'mean_reversion',
  'breakout',
  'momentum',
  'defensive',
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/** Strategies that open trades (defensive is a mode, not a trade) */
export type TradeStrategy = Exclude<StrategyName, 'defensive'>;

export const TRADE_STRATEGIES = [
  'trend_following',
  'mean_reversion',
  'breakout',
  'momentum',
] as const satisfies readonly TradeStrategy[];

// ============================================
// Technical Analysis
// ============================================

export interface TechnicalSummary {
  ticker: string;
  rsi: number;
  /** Sign of the MACD histogram signal: -1, 0 or 1 */
  macdSignal: number;
  macdHistogram: number;
  /** 1 when SMA50 > SMA200, -1 below, 0 when unavailable */
  smaCross: number;
  /** 1 when close > EMA20, -1 below, 0 when unavailable */
  emaTrend: number;
  bbSqueeze: boolean;
  /** -1 at the lower band, 0 at the middle, 1 at the upper band */
  bbPosition: number;
  volumeRatio: number;
  atr: number;
  close: number;
  sma50: number;
  sma200: number;
  ema20: number;
  adx: number;
  /** Weighted technical score in [-1, 1] */
  composite: number;
}

export interface SentimentReading {
  ticker: string;
  /** Mean sentiment in [-1, 1] */
  score: number;
  articleCount: number;
  headline?: string;
}

export const TRADE_SIGNALS = ['STRONG_BUY', 'BUY', 'NEUTRAL', 'SELL', 'STRONG_SELL'] as const;

export type TradeSignal = (typeof TRADE_SIGNALS)[number];

export interface ScoredInstrument {
  rank: number;
  ticker: string;
  sector: string;
  /** Technical + sentiment + volume score in [-1, 1] */
  compositeScore: number;
  signal: TradeSignal;
  technical: TechnicalSummary;
  sentiment: SentimentReading | null;
  reasoning: string;
}

// ============================================
// Strategy Signals
// ============================================

export const DIRECTIONS = ['LONG', 'SHORT'] as const;

export type Direction = (typeof DIRECTIONS)[number];

export type SignalAction = 'enter_now' | 'watchlist' | 'skip';

export interface StrategySignal {
  instrument: ScoredInstrument;
  strategyName: TradeStrategy;
  strategyLabel: string;
  action: SignalAction;
  direction: Direction;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  riskPerShare: number;
  rewardPerShare: number;
  riskRewardRatio: number;
  positionSize: number;
  dollarRisk: number;
  regime: MarketRegime;
  skipReason: string | null;
  riskAssessment?: RiskAssessment;
}
