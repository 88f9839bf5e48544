import { describe, expect, it } from '@jest/globals';

import type { Candle, RiskAssessment, RiskRecommendation } from '@/types';
import { buildEngineConfig, type EngineConfig } from '@/lib/config';
import { DecisionCycle, buildCycleInputs, createCycleComponents, type CycleInputs } from '@/lib/pipeline';
import { RiskProfiler } from '@/lib/risk';
import { silentLogger } from '@/lib/utils/logger';
import { day, flatCandles } from './helpers/fixtures';

const config = buildEngineConfig({ scoring: { weights: { technical: 0, sentiment: 0, volume: 1 } } });

const MARKET = flatCandles(60);
const SERIES = { AAPL: flatCandles(60, { 40: 3000 }) };

/** Overrides the recommendation of every trade assessment */
class FixedRecommendationProfiler extends RiskProfiler {
  constructor(private readonly recommendation: RiskRecommendation) {
    super(config.riskProfiler);
  }

  override assessTrade(...args: Parameters<RiskProfiler['assessTrade']>): RiskAssessment {
    return {
      ...super.assessTrade(...args),
      recommendation: this.recommendation,
      recommendationReason: 'test override',
    };
  }
}

function newCycle(engineConfig: EngineConfig = config, riskProfiler?: RiskProfiler): DecisionCycle {
  const components = createCycleComponents(engineConfig, { logger: () => silentLogger });
  if (riskProfiler) components.riskProfiler = riskProfiler;
  return new DecisionCycle(components, engineConfig, { logger: silentLogger });
}

function inputsOn(date: string, series: Record<string, Candle[]> = SERIES, market: Candle[] = MARKET): CycleInputs {
  const inputs = buildCycleInputs(
    { date, market, vix: null, series, candidates: Object.keys(series) },
    config.backtest,
  );
  if (!inputs) throw new Error(`no cycle inputs for ${date}`);
  return inputs;
}

describe('buildCycleInputs', () => {
  it('should return null without a market bar on the date', () => {
    const market = MARKET.filter((c) => c.date !== day(40));

    expect(
      buildCycleInputs({ date: day(40), market, vix: null, series: SERIES, candidates: ['AAPL'] }, config.backtest),
    ).toBeNull();
  });

  it('should return null with too little market history', () => {
    expect(
      buildCycleInputs({ date: day(10), market: MARKET, vix: null, series: SERIES, candidates: ['AAPL'] }, config.backtest),
    ).toBeNull();
  });

  it('should score only candidates with a bar on the date and enough history', () => {
    const inputs = inputsOn(day(41), {
      AAPL: flatCandles(60).filter((c) => c.date !== day(41)),
      MSFT: flatCandles(60),
      SPY: flatCandles(60),
      NEW: flatCandles(60).slice(30),
    });

    expect(inputs.instruments.map((i) => i.ticker)).toEqual(['MSFT']);
    expect(inputs.instruments[0].candles).toHaveLength(42);
    expect(Object.keys(inputs.bars).sort()).toEqual(['MSFT', 'NEW', 'SPY']);
    expect(inputs.market).toHaveLength(42);
    expect(inputs.vix).toBeNull();
  });

  it('should price held tickers that are not candidates', () => {
    const inputs = buildCycleInputs(
      { date: day(41), market: MARKET, vix: null, series: { ...SERIES, HELD: flatCandles(60) }, candidates: ['AAPL'] },
      config.backtest,
    );

    expect(inputs?.instruments.map((i) => i.ticker)).toEqual(['AAPL']);
    expect(inputs?.bars.HELD).toEqual({ date: day(41), open: 100, high: 101, low: 99, close: 100, volume: 1000 });
  });
});

describe('DecisionCycle', () => {
  it('should decide the same with or without later bars', () => {
    const full = newCycle().run(inputsOn(day(40)));
    const truncated = newCycle().run(
      inputsOn(day(40), { AAPL: flatCandles(41, { 40: 3000 }) }, flatCandles(41)),
    );

    expect(full.opened).toHaveLength(1);
    expect(truncated.opened).toEqual(full.opened);
    expect(truncated.scored).toEqual(full.scored);
    expect(truncated.signals).toEqual(full.signals);
    expect(truncated.regime).toEqual(full.regime);
  });

  it('should enter a breakout and log the entry', () => {
    const result = newCycle().run(inputsOn(day(40)));

    expect(result.defensive).toBe(false);
    expect(result.opened.map((p) => [p.ticker, p.strategy, p.positionSize])).toEqual([['AAPL', 'breakout', 2.5]]);
    expect(result.tradeAssessments.map((a) => [a.scope, a.ticker, a.assessment.recommendation])).toEqual([
      ['trade', 'AAPL', 'enter'],
    ]);
    expect(result.behavior.map((b) => [b.action, b.ticker])).toEqual([['entry', 'AAPL']]);
  });

  it('should open nothing in defensive mode', () => {
    const defensiveConfig = buildEngineConfig({
      scoring: { weights: { technical: 0, sentiment: 0, volume: 1 } },
      strategies: { defensive: { trigger: { regimes: ['RANGE_BOUND'] } } },
    });
    const result = newCycle(defensiveConfig).run(inputsOn(day(40)));

    expect(result.defensive).toBe(true);
    expect(result.signals).toEqual([]);
    expect(result.opened).toEqual([]);
    expect(result.tradeAssessments).toEqual([]);
    expect(result.behavior).toEqual([]);
  });

  it.each(['skip', 'blocked'] as const)('should turn a %s recommendation into a skipped signal', (recommendation) => {
    const result = newCycle(config, new FixedRecommendationProfiler(recommendation)).run(inputsOn(day(40)));

    expect(result.opened).toEqual([]);
    expect(result.signals.map((s) => [s.instrument.ticker, s.action, s.skipReason])).toEqual([
      ['AAPL', 'skip', 'test override'],
    ]);
    expect(result.behavior).toEqual([
      {
        date: day(40),
        action: 'skip',
        ticker: 'AAPL',
        strategy: 'breakout',
        planAligned: true,
        disciplineRating: null,
        reason: 'test override',
      },
    ]);
    expect(result.performance.openPositions).toBe(0);
  });

  it('should halve the size on a reduce_size recommendation', () => {
    const result = newCycle(config, new FixedRecommendationProfiler('reduce_size')).run(inputsOn(day(40)));

    expect(result.signals.map((s) => s.positionSize)).toEqual([1.25]);
    expect(result.opened.map((p) => p.positionSize)).toEqual([1.25]);
  });

  it('should log an exit when a position expires', () => {
    const cycle = newCycle();
    for (let i = 40; i < 47; i++) cycle.run(inputsOn(day(i)));
    const result = cycle.run(inputsOn(day(47)));

    expect(result.closed.map((t) => [t.ticker, t.exitReason, t.daysHeld])).toEqual([['AAPL', 'expired', 7]]);
    expect(result.behavior.filter((b) => b.action === 'exit')).toEqual([
      {
        date: day(47),
        action: 'exit',
        ticker: 'AAPL',
        strategy: 'breakout',
        planAligned: true,
        disciplineRating: null,
        reason: 'expired',
      },
    ]);
  });
});
