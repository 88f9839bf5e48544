/**
 * Builders for test data. Every builder returns a fully populated value
 * and takes overrides for the fields a test cares about.
 */

import type {
  Candle,
  ClosedTrade,
  Position,
  RegimeAssessment,
  ScoredInstrument,
  StrategySignal,
  TechnicalSummary,
} from '@/types';
import type { ExitRules } from '@/lib/paper-trading/types';
import { addDays } from '@/lib/utils/dates';

export const START_DATE = '2024-01-01';

/** ISO date `index` days after START_DATE */
export function day(index: number): string {
  return addDays(START_DATE, index);
}

/**
 * `count` consecutive daily bars at close 100 with a 2-point range and
 * constant volume. `volumeAt` replaces the volume of selected bars.
 */
export function flatCandles(count: number, volumeAt: Record<number, number> = {}): Candle[] {
  return Array.from({ length: count }, (_, i) => ({
    date: day(i),
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: volumeAt[i] ?? 1000,
  }));
}

export function makeTechnical(overrides: Partial<TechnicalSummary> = {}): TechnicalSummary {
  return {
    ticker: 'AAPL',
    rsi: 50,
    macdSignal: 0,
    macdHistogram: 0,
    smaCross: 0,
    emaTrend: 0,
    bbSqueeze: false,
    bbPosition: 0,
    volumeRatio: 1,
    atr: 2,
    close: 100,
    sma50: 0,
    sma200: 0,
    ema20: 0,
    adx: 20,
    composite: 0,
    ...overrides,
  };
}

export function makeInstrument(
  overrides: Partial<ScoredInstrument> = {},
  technical: Partial<TechnicalSummary> = {},
): ScoredInstrument {
  const ticker = overrides.ticker ?? 'AAPL';
  return {
    rank: 1,
    ticker,
    sector: 'technology',
    compositeScore: 0.5,
    signal: 'BUY',
    technical: makeTechnical({ ticker, ...technical }),
    sentiment: null,
    reasoning: 'Tech: RSI 50',
    ...overrides,
  };
}

export function makeSignal(overrides: Partial<StrategySignal> = {}): StrategySignal {
  return {
    instrument: makeInstrument(),
    strategyName: 'breakout',
    strategyLabel: 'Breakout — Range Break',
    action: 'enter_now',
    direction: 'LONG',
    entryPrice: 100,
    stopLoss: 97,
    takeProfit: 106,
    riskPerShare: 3,
    rewardPerShare: 6,
    riskRewardRatio: 2,
    positionSize: 2.5,
    dollarRisk: 7.5,
    regime: 'RANGE_BOUND',
    skipReason: null,
    ...overrides,
  };
}

export function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    id: 'PT-2024-03-01-001',
    ticker: 'AAPL',
    sector: 'technology',
    direction: 'LONG',
    entryPrice: 150,
    entryDate: '2024-03-01',
    positionSize: 2,
    stopLoss: 145,
    takeProfit: 160,
    strategy: 'mean_reversion',
    maxHoldDays: 5,
    daysHeld: 0,
    signalScore: 0.5,
    trailingStopAtr: 0,
    trailingStop: 0,
    highestPrice: 150,
    lowestPrice: 150,
    unrealizedPnl: 0,
    ...overrides,
  };
}

export function makeTrade(pnl: number, overrides: Partial<ClosedTrade> = {}): ClosedTrade {
  return {
    id: 'PT-2024-03-01-001',
    ticker: 'AAPL',
    sector: 'technology',
    direction: 'LONG',
    strategy: 'breakout',
    entryPrice: 100,
    entryDate: '2024-03-01',
    exitPrice: 100,
    exitDate: '2024-03-05',
    exitReason: pnl >= 0 ? 'target_hit' : 'stopped_out',
    positionSize: 1,
    stopLoss: 95,
    takeProfit: 110,
    pnl,
    pnlPct: 0,
    rMultiple: 0,
    daysHeld: 4,
    signalScore: 0.5,
    ...overrides,
  };
}

export function makeRegime(overrides: Partial<RegimeAssessment> = {}): RegimeAssessment {
  return {
    regime: 'RANGE_BOUND',
    confidence: 0.6,
    trend: 'mixed',
    adx: 24,
    vix: 15,
    breadth: 50,
    regimeAgeDays: 3,
    regimeStartDate: '2024-02-26',
    activeStrategies: ['mean_reversion', 'breakout'],
    positionSizeModifier: 0.75,
    adxHistory: [],
    vixHistory: [],
    ...overrides,
  };
}

/** Exit rules with fixed values, independent of the strategy config */
export function fixedExitRules(
  overrides: { maxHoldDays?: number; trailingStopAtr?: number } = {},
): ExitRules {
  return {
    maxHoldDays: () => overrides.maxHoldDays ?? 5,
    trailingStopAtr: () => overrides.trailingStopAtr ?? 0,
    computeTakeProfit: (_strategy, _direction, _entry, _tech, fallback) => fallback,
  };
}
