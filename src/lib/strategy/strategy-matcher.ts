/**
 * Strategy-Regime Matcher
 *
 * Picks the best-fitting strategy for each scored instrument among those the
 * current regime allows, prices the entry, stop and target from the
 * instrument's ATR and sizes the trade with the fixed-fractional risk rule
 * scaled by the regime's size modifier.
 */

import type {
  Direction,
  RegimeAssessment,
  ScoredInstrument,
  SignalAction,
  StrategySignal,
  TechnicalSummary,
  TradeStrategy,
} from '@/types';
import type { ExitConfig, SizingConfig, StrategiesConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { round } from '@/lib/utils/math';
import { createLogger, type Logger } from '@/lib/utils/logger';
import { STRATEGY_PRIORITY, STRATEGY_PROFILES } from './strategy-profiles';

export interface MatchContext {
  /** Realized balance used for sizing */
  balance: number;
  openPositionCount: number;
  maxPositions: number;
}

export interface StrategyMatch {
  name: TradeStrategy;
  label: string;
  direction: Direction;
  score: number;
}

export const SKIP_NO_SLOTS = 'No position slots available';
export const SKIP_WEAK_SIGNAL = 'Signal not strong enough';

export class StrategyMatcher {
  private strategies: StrategiesConfig;
  private sizing: SizingConfig;
  private log: Logger;

  constructor(
    strategies: StrategiesConfig = DEFAULT_ENGINE_CONFIG.strategies,
    sizing: SizingConfig = DEFAULT_ENGINE_CONFIG.sizing,
    logger?: Logger,
  ) {
    this.strategies = strategies;
    this.sizing = sizing;
    this.log = logger ?? createLogger('Strategy');
  }

  /**
   * Build one signal per matched instrument. Slots are consumed locally as
   * `enter_now` signals are emitted.
   */
  match(
    instruments: ScoredInstrument[],
    regime: RegimeAssessment,
    ctx: MatchContext,
  ): StrategySignal[] {
    const signals: StrategySignal[] = [];
    let availableSlots = ctx.maxPositions - ctx.openPositionCount;

    for (const inst of instruments) {
      const best = this.findBestStrategy(inst, regime);
      if (!best) continue;

      const tech = inst.technical;
      const entryPrice = tech.close;
      const atr = tech.atr;
      if (!(atr > 0)) {
        this.log.debug(`${inst.ticker}: no ATR reading, cannot price a stop`);
        continue;
      }

      const exit = this.exitConfig(best.name);
      const slDistance = atr * exit.stopLossAtr;
      const tpDistance = atr * exit.takeProfitAtr;
      const long = best.direction === 'LONG';
      const stopLoss = long ? entryPrice - slDistance : entryPrice + slDistance;
      const takeProfit = long ? entryPrice + tpDistance : entryPrice - tpDistance;

      const riskPerShare = Math.abs(entryPrice - stopLoss);
      const rewardPerShare = Math.abs(takeProfit - entryPrice);
      if (riskPerShare <= 0) continue;

      const riskAmount = ctx.balance * this.sizing.riskPerTrade * regime.positionSizeModifier;
      const positionSize = riskAmount / riskPerShare;

      const { action, skipReason } = this.classifyAction(inst, best.name, availableSlots);

      signals.push({
        instrument: inst,
        strategyName: best.name,
        strategyLabel: best.label,
        action,
        direction: best.direction,
        entryPrice: round(entryPrice, 4),
        stopLoss: round(stopLoss, 4),
        takeProfit: round(takeProfit, 4),
        riskPerShare: round(riskPerShare, 4),
        rewardPerShare: round(rewardPerShare, 4),
        riskRewardRatio: round(rewardPerShare / riskPerShare, 2),
        positionSize: round(positionSize, 4),
        dollarRisk: round(riskAmount, 2),
        regime: regime.regime,
        skipReason,
      });

      if (action === 'enter_now') availableSlots--;
    }

    return signals;
  }

  /**
   * Strategies that may trade in this regime, in priority order
   */
  candidateStrategies(regime: RegimeAssessment): TradeStrategy[] {
    return STRATEGY_PRIORITY.filter((name) => {
      const cfg = this.strategies[name];
      if (!regime.activeStrategies.includes(name)) return false;
      if (!cfg.enabled) return false;
      if (cfg.skipRegimes.includes(regime.regime)) return false;
      if (cfg.activeRegimes.length > 0 && !cfg.activeRegimes.includes(regime.regime)) return false;
      return true;
    });
  }

  findBestStrategy(inst: ScoredInstrument, regime: RegimeAssessment): StrategyMatch | null {
    const tech = inst.technical;
    const neutral = inst.signal === 'NEUTRAL';

    let best: StrategyMatch | null = null;
    for (const name of this.candidateStrategies(regime)) {
      const profile = STRATEGY_PROFILES[name];
      if (neutral && !(profile.admitsNeutral?.(tech, this.strategies) ?? false)) continue;

      const score = profile.score(tech, this.strategies);
      // strict > keeps the earlier (higher-priority) strategy on ties
      if (score > 0 && (best === null || score > best.score)) {
        best = {
          name,
          label: profile.label(tech),
          direction: inst.signal === 'SELL' || inst.signal === 'STRONG_SELL' ? 'SHORT' : 'LONG',
          score,
        };
      }
    }
    return best;
  }

  /**
   * Defensive mode suspends new entries for the cycle
   */
  checkDefensive(regime: RegimeAssessment, maxDrawdownPct: number): boolean {
    const trigger = this.strategies.defensive.trigger;

    if (regime.vix > trigger.vixAbove) {
      this.log.warn(`Defensive mode: VIX at ${regime.vix.toFixed(1)}`);
      return true;
    }
    if (maxDrawdownPct < trigger.maxDrawdownPct) {
      this.log.warn(`Defensive mode: Drawdown at ${maxDrawdownPct.toFixed(1)}%`);
      return true;
    }
    if (trigger.regimes.includes(regime.regime)) {
      this.log.warn(`Defensive mode: Regime is ${regime.regime}`);
      return true;
    }
    return false;
  }

  maxHoldDays(name: TradeStrategy): number {
    return this.strategies[name].maxHoldDays;
  }

  trailingStopAtr(name: TradeStrategy): number {
    return this.exitConfig(name).trailingStopAtr;
  }

  /**
   * Strategy-aware target at entry. Falls back to the ATR target when the
   * method does not apply.
   */
  computeTakeProfit(
    name: TradeStrategy,
    direction: Direction,
    entryPrice: number,
    tech: TechnicalSummary,
    fallback: number,
  ): number {
    const method = this.exitConfig(name).takeProfit;

    if (method === 'middle_bb') {
      // EMA20 stands in for the band midline
      const middle = tech.ema20;
      if (middle > 0) {
        if (direction === 'LONG' && middle > entryPrice) return middle;
        if (direction === 'SHORT' && middle < entryPrice) return middle;
      }
      return fallback;
    }

    if (method === 'measured_move' && tech.atr > 0) {
      const move = tech.atr * 4.0;
      return direction === 'LONG' ? entryPrice + move : entryPrice - move;
    }

    return fallback;
  }

  private exitConfig(name: TradeStrategy): ExitConfig {
    return this.strategies[name].exit;
  }

  private classifyAction(
    inst: ScoredInstrument,
    strategy: TradeStrategy,
    availableSlots: number,
  ): { action: SignalAction; skipReason: string | null } {
    if (availableSlots <= 0) return { action: 'skip', skipReason: SKIP_NO_SLOTS };

    switch (inst.signal) {
      case 'STRONG_BUY':
      case 'BUY':
      case 'SELL':
      case 'STRONG_SELL':
        return { action: 'enter_now', skipReason: null };
      case 'NEUTRAL':
        return STRATEGY_PROFILES[strategy].admitsNeutral
          ? { action: 'watchlist', skipReason: null }
          : { action: 'skip', skipReason: SKIP_WEAK_SIGNAL };
    }
  }
}
