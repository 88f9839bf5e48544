import { describe, expect, it } from '@jest/globals';

import {
  SKIP_NO_SLOTS,
  STRATEGY_PROFILES,
  StrategyMatcher,
  isTradeStrategy,
} from '@/lib/strategy';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { silentLogger } from '@/lib/utils/logger';
import { makeInstrument, makeRegime, makeTechnical } from './helpers/fixtures';

const ctx = { balance: 500, openPositionCount: 0, maxPositions: 3 };

function matcher(): StrategyMatcher {
  return new StrategyMatcher(undefined, undefined, silentLogger);
}

describe('Strategy selection', () => {
  it('should only consider strategies the regime and config both allow', () => {
    const regime = makeRegime({ regime: 'HIGH_VOLATILITY', activeStrategies: ['mean_reversion', 'breakout'] });

    expect(matcher().candidateStrategies(regime)).toEqual(['breakout']);
  });

  it('should break score ties by strategy priority', () => {
    const regime = makeRegime({ regime: 'TRENDING_UP', activeStrategies: ['trend_following', 'momentum'] });
    const inst = makeInstrument({}, { rsi: 60, emaTrend: 1, volumeRatio: 1.2 });

    const best = matcher().findBestStrategy(inst, regime);

    expect(best?.name).toBe('trend_following');
    expect(best?.score).toBe(2);
    expect(STRATEGY_PROFILES.momentum.score(inst.technical, DEFAULT_ENGINE_CONFIG.strategies)).toBe(2);
  });

  it('should admit NEUTRAL instruments only for strategies that take them', () => {
    const m = matcher();
    const regime = makeRegime();
    const oversold = makeInstrument({ signal: 'NEUTRAL' }, { rsi: 30, bbPosition: -0.8 });
    const surging = makeInstrument({ signal: 'NEUTRAL' }, { volumeRatio: 2 });

    const [signal] = m.match([oversold], regime, ctx);

    expect(signal.strategyName).toBe('mean_reversion');
    expect(signal.action).toBe('watchlist');
    expect(m.match([surging], regime, ctx)).toEqual([]);
  });

  it('should recognize trade strategy names', () => {
    expect(isTradeStrategy('momentum')).toBe(true);
    expect(isTradeStrategy('defensive')).toBe(false);
  });
});

describe('Signal pricing and sizing', () => {
  it('should price a long breakout from ATR and size it by regime-scaled risk', () => {
    const [signal] = matcher().match([makeInstrument({}, { volumeRatio: 2 })], makeRegime(), ctx);

    expect(signal).toMatchObject({
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
    });
  });

  it('should mirror stop and target for SELL signals', () => {
    const inst = makeInstrument({ signal: 'SELL' }, { volumeRatio: 2 });

    const [signal] = matcher().match([inst], makeRegime(), ctx);

    expect(signal.direction).toBe('SHORT');
    expect(signal.stopLoss).toBe(103);
    expect(signal.takeProfit).toBe(94);
  });

  it('should halve risk in a HIGH_VOLATILITY regime', () => {
    const regime = makeRegime({ regime: 'HIGH_VOLATILITY', activeStrategies: ['breakout'], positionSizeModifier: 0.5 });

    const [signal] = matcher().match([makeInstrument({}, { volumeRatio: 2 })], regime, ctx);

    expect(signal.positionSize).toBe(1.6667);
    expect(signal.dollarRisk).toBe(5);
  });

  it('should mark signals beyond the free slots as skipped', () => {
    const instruments = ['AAPL', 'MSFT'].map((ticker) => makeInstrument({ ticker }, { volumeRatio: 2 }));

    const signals = matcher().match(instruments, makeRegime(), { ...ctx, openPositionCount: 2 });

    expect(signals.map((s) => s.action)).toEqual(['enter_now', 'skip']);
    expect(signals[1].skipReason).toBe(SKIP_NO_SLOTS);
  });

  it('should drop instruments without an ATR reading', () => {
    expect(matcher().match([makeInstrument({}, { volumeRatio: 2, atr: 0 })], makeRegime(), ctx)).toEqual([]);
  });
});

describe('Exit targets', () => {
  const tech = makeTechnical({ ema20: 105, atr: 2 });

  it('should target the band midline for mean reversion when it lies ahead', () => {
    const m = matcher();

    expect(m.computeTakeProfit('mean_reversion', 'LONG', 100, tech, 106)).toBe(105);
    expect(m.computeTakeProfit('mean_reversion', 'SHORT', 100, tech, 94)).toBe(94);
  });

  it('should project a measured move for breakouts', () => {
    expect(matcher().computeTakeProfit('breakout', 'SHORT', 100, tech, 94)).toBe(92);
  });

  it('should keep the ATR target for strategies without a special method', () => {
    expect(matcher().computeTakeProfit('momentum', 'LONG', 100, tech, 106)).toBe(106);
  });
});

describe('Defensive mode', () => {
  it('should trigger on volatility, drawdown or a defensive regime', () => {
    const m = matcher();

    expect(m.checkDefensive(makeRegime({ vix: 30 }), 0)).toBe(true);
    expect(m.checkDefensive(makeRegime(), -9)).toBe(true);
    expect(m.checkDefensive(makeRegime({ regime: 'TRENDING_DOWN' }), 0)).toBe(true);
    expect(m.checkDefensive(makeRegime(), -2)).toBe(false);
  });
});
