/**
 * Strategy Profiles
 *
 * One profile per tradable strategy: how well a technical summary fits the
 * strategy's entry conditions, the label shown for a match, and whether the
 * strategy takes setups whose composite signal is NEUTRAL.
 */

import { TRADE_STRATEGIES, type TechnicalSummary, type TradeStrategy } from '@/types';
import type { StrategiesConfig } from '@/lib/config';

export interface StrategyProfile {
  name: TradeStrategy;
  /** Match strength, 0 = no match */
  score(tech: TechnicalSummary, config: StrategiesConfig): number;
  label(tech: TechnicalSummary): string;
  /** Admit an instrument whose composite signal is NEUTRAL */
  admitsNeutral?(tech: TechnicalSummary, config: StrategiesConfig): boolean;
}

/** Tiebreak order when two strategies score the same */
export const STRATEGY_PRIORITY: readonly TradeStrategy[] = TRADE_STRATEGIES;

const inRange = (value: number, [low, high]: [number, number]): boolean =>
  value >= low && value <= high;

const trendFollowing: StrategyProfile = {
  name: 'trend_following',
  score(tech, config) {
    const { entry } = config.trend_following;
    let score = 0;
    if (inRange(tech.rsi, entry.rsiRange)) score += 2;
    if (tech.emaTrend > 0 && entry.requireEmaBounce) score += 2;
    if (tech.macdSignal > 0 && entry.requireMacdPositive) score += 1;
    // quiet volume on the pullback
    if (tech.volumeRatio < 1.0) score += 1;
    return score;
  },
  label: () => 'Trend Following — Pullback to 20 EMA',
};

const meanReversion: StrategyProfile = {
  name: 'mean_reversion',
  score(tech, config) {
    const { entry } = config.mean_reversion;
    let score = 0;
    if (tech.rsi <= entry.rsiThreshold) score += 3;
    if (tech.bbPosition < -0.5 && entry.requireBbTouch) score += 2;
    else if (tech.rsi <= entry.rsiThreshold - 5) score += 1;
    if (tech.sma200 > 0 && tech.close > tech.sma200 && entry.requireAbove200Sma) score += 1;
    return score;
  },
  label: () => 'Mean Reversion — Oversold Bounce',
  admitsNeutral: (tech, config) => tech.rsi <= config.mean_reversion.entry.rsiThreshold,
};

const breakout: StrategyProfile = {
  name: 'breakout',
  score(tech, config) {
    let score = 0;
    if (tech.bbSqueeze) score += 3;
    if (tech.volumeRatio >= config.breakout.entry.requireVolumeSurge) score += 2;
    return score;
  },
  label: (tech) => (tech.bbSqueeze ? 'Breakout — BB Squeeze' : 'Breakout — Range Break'),
};

const momentum: StrategyProfile = {
  name: 'momentum',
  score(tech, config) {
    const { entry } = config.momentum;
    let score = 0;
    if (inRange(tech.rsi, entry.rsiRange)) score += 2;
    if (tech.volumeRatio >= entry.volumeSurge) score += 2;
    if (tech.macdHistogram > 0) score += 1;
    return score;
  },
  label: () => 'Momentum Continuation — New Highs',
};

export const STRATEGY_PROFILES: Record<TradeStrategy, StrategyProfile> = {
  trend_following: trendFollowing,
  mean_reversion: meanReversion,
  breakout,
  momentum,
};

export function isTradeStrategy(name: string): name is TradeStrategy {
  return STRATEGY_PRIORITY.some((s) => s === name);
}
