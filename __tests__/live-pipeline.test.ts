import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';

import type { Candle } from '@/types';
import { buildEngineConfig } from '@/lib/config';
import { Backtester } from '@/lib/backtest';
import { SqliteRepository } from '@/lib/paper-trading/repository-sqlite';
import { CircuitBreaker, LivePipeline, type MarketDataProvider } from '@/lib/pipeline';
import { silentLogger } from '@/lib/utils/logger';
import { day, flatCandles } from './helpers/fixtures';

const config = buildEngineConfig({
  scoring: { weights: { technical: 0, sentiment: 0, volume: 1 } },
  pipeline: { universe: ['AAPL'] },
});

class InMemoryProvider implements MarketDataProvider {
  readonly name = 'fake';

  constructor(private readonly series: Record<string, Candle[]>) {}

  async getDailyBars(ticker: string, from: string, to: string): Promise<Candle[]> {
    return (this.series[ticker] ?? []).filter((c) => c.date >= from && c.date <= to);
  }
}

class FailingProvider implements MarketDataProvider {
  readonly name = 'fake';

  async getDailyBars(): Promise<Candle[]> {
    throw new Error('connection refused');
  }
}

function breaker(): CircuitBreaker {
  return new CircuitBreaker(config.pipeline.circuitBreaker, { logger: silentLogger, sleep: async () => undefined });
}

describe('LivePipeline', () => {
  let repo: SqliteRepository;
  const provider = new InMemoryProvider({ SPY: flatCandles(60), AAPL: flatCandles(60, { 40: 3000 }) });

  function pipeline(source: MarketDataProvider = provider): LivePipeline {
    return new LivePipeline(repo, source, config, {
      logger: silentLogger,
      componentLogger: () => silentLogger,
      breaker: breaker(),
    });
  }

  beforeEach(() => {
    repo = new SqliteRepository(':memory:');
  });

  afterEach(async () => {
    await repo.close();
  });

  it('should run one cycle and commit its state', async () => {
    const result = await pipeline().run(day(40));

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;
    expect(result.cycle.opened.map((p) => p.id)).toEqual([`PT-${day(40)}-001`]);

    const positions = await repo.loadPositions();
    expect(positions).toHaveLength(1);
    expect(positions[0]).toMatchObject({ ticker: 'AAPL', strategy: 'breakout', stopLoss: 97, takeProfit: 108 });
    expect(await repo.listRegimeHistory()).toHaveLength(1);
    expect((await repo.listBehavior()).map((b) => [b.action, b.ticker])).toEqual([['entry', 'AAPL']]);

    const assessments = await repo.listRiskAssessments(day(40));
    expect(assessments.map((a) => a.scope).sort()).toEqual(['portfolio', 'trade']);
    expect(assessments.find((a) => a.scope === 'trade')?.assessment.recommendation).toBe('enter');
    expect((await repo.loadPerformance())?.lastUpdated).toBe(day(40));
  });

  it('should resume from stored state on the next run', async () => {
    await pipeline().run(day(40));
    const result = await pipeline().run(day(41));

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;
    expect(result.cycle.regime.regimeAgeDays).toBe(1);
    expect(result.cycle.opened).toEqual([]);

    const [position] = await repo.loadPositions();
    expect(position.daysHeld).toBe(1);
    expect((await repo.listRegimeHistory()).map((r) => [r.date, r.ageDays])).toEqual([
      [day(40), 0],
      [day(41), 1],
    ]);
    expect(await repo.listRiskAssessments(day(41))).toHaveLength(1);
  });

  it('should not advance positions twice for the same date', async () => {
    await pipeline().run(day(40));
    await pipeline().run(day(41));
    const rerun = await pipeline().run(day(41));

    expect(rerun).toEqual({ status: 'skipped', reason: 'already processed', health: [] });
    const [position] = await repo.loadPositions();
    expect(position.daysHeld).toBe(1);
    expect(await repo.listRegimeHistory()).toHaveLength(2);
  });

  it.each([40, 41])('should open the same positions as a backtest on day %i', async (index) => {
    const date = day(index);
    const market = flatCandles(60);
    const aapl = flatCandles(60, { 40: 3000 }).filter((c) => c.date !== day(41));

    const live = await pipeline(new InMemoryProvider({ SPY: market, AAPL: aapl })).run(date);
    const replay = new Backtester(config, { logger: silentLogger, componentLogger: () => silentLogger }).run({
      instruments: { AAPL: aapl },
      market,
      startDate: date,
      endDate: date,
    });

    expect(live.status).toBe('completed');
    if (live.status !== 'completed') return;
    const opened = live.cycle.opened.map((p) => [p.id, p.entryDate, p.entryPrice, p.positionSize, p.stopLoss, p.takeProfit]);
    expect(opened).toEqual(
      replay.trades.map((t) => [t.id, t.entryDate, t.entryPrice, t.positionSize, t.stopLoss, t.takeProfit]),
    );
    expect(opened).toHaveLength(index === 40 ? 1 : 0);
  });

  it('should skip the run without market data', async () => {
    const result = await pipeline(new InMemoryProvider({ AAPL: flatCandles(60) })).run(day(40));

    expect(result).toEqual({
      status: 'skipped',
      reason: 'no market data',
      health: [expect.objectContaining({ name: 'fake', state: 'CLOSED', totalCalls: 2, failures: 0 })],
    });
    expect(await repo.loadPerformance()).toBeNull();
  });

  it('should report provider failures through health', async () => {
    const result = await pipeline(new FailingProvider()).run(day(40));

    expect(result.status).toBe('skipped');
    expect(result.health).toEqual([
      expect.objectContaining({ name: 'fake', totalCalls: 2, failures: 2, lastError: 'connection refused' }),
    ]);
  });
});
