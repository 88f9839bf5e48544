import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';

import type { BehaviorEntry, RegimeHistoryEntry } from '@/types';
import {
  REGIME_HISTORY_LIMIT,
  createRepository,
  emptyPerformance,
  type StoredRiskAssessment,
} from '@/lib/paper-trading';
import { SqliteRepository } from '@/lib/paper-trading/repository-sqlite';
import { EMPTY_BEHAVIOR_PROFILE, RiskProfiler } from '@/lib/risk';
import { silentLogger } from '@/lib/utils/logger';
import { day, makePosition, makeRegime, makeSignal, makeTrade } from './helpers/fixtures';

function regimeEntry(date: string, overrides: Partial<RegimeHistoryEntry> = {}): RegimeHistoryEntry {
  return { date, regime: 'RANGE_BOUND', confidence: 0.6, adx: 20, vix: 15, breadth: 50, ageDays: 0, ...overrides };
}

function behavior(ticker: string, action: BehaviorEntry['action'] = 'entry'): BehaviorEntry {
  return {
    date: '2024-03-01',
    action,
    ticker,
    strategy: 'breakout',
    planAligned: true,
    disciplineRating: null,
    reason: 'test entry',
  };
}

function storedAssessment(id: string, date: string): StoredRiskAssessment {
  const assessment = new RiskProfiler().assessTrade(makeSignal(), [], {
    virtualBalance: 500,
    maxDrawdownPct: 0,
    strategyMetrics: {},
  }, makeRegime(), EMPTY_BEHAVIOR_PROFILE);
  return { id, date, scope: 'trade', ticker: 'AAPL', strategy: 'breakout', assessment };
}

describe('SqliteRepository', () => {
  let repo: SqliteRepository;

  beforeEach(() => {
    repo = new SqliteRepository(':memory:');
  });

  afterEach(async () => {
    await repo.close();
  });

  it('should replace the stored open positions', async () => {
    const first = makePosition();
    const second = makePosition({ id: 'PT-2024-03-01-002', ticker: 'MSFT', trailingStop: 140.5 });

    await repo.savePositions([first, second]);
    expect(await repo.loadPositions()).toEqual([first, second]);

    await repo.savePositions([second]);
    expect(await repo.loadPositions()).toEqual([second]);
  });

  it('should append closed trades once per id in exit order', async () => {
    const later = makeTrade(5, { id: 'PT-2024-03-01-002', exitDate: '2024-03-08' });
    const earlier = makeTrade(-3, { id: 'PT-2024-03-01-001', exitDate: '2024-03-05' });

    await repo.appendClosedTrades([later, earlier]);
    await repo.appendClosedTrades([earlier]);

    expect(await repo.listClosedTrades()).toEqual([earlier, later]);
  });

  it('should keep an infinite profit factor through storage', async () => {
    expect(await repo.loadPerformance()).toBeNull();

    const snapshot = { ...emptyPerformance(500), profitFactor: Infinity, lastUpdated: '2024-03-05' };
    await repo.savePerformance(snapshot);
    await repo.savePerformance({ ...snapshot, virtualBalance: 510 });

    const loaded = await repo.loadPerformance();
    expect(loaded?.profitFactor).toBe(Infinity);
    expect(loaded?.virtualBalance).toBe(510);
  });

  it('should upsert regime entries by date', async () => {
    await repo.appendRegime(regimeEntry('2024-03-01'));
    await repo.appendRegime(regimeEntry('2024-03-01', { regime: 'TRENDING_UP', ageDays: 0 }));

    expect(await repo.listRegimeHistory()).toEqual([regimeEntry('2024-03-01', { regime: 'TRENDING_UP' })]);
  });

  it('should keep only the most recent regime entries', async () => {
    for (let i = 0; i < REGIME_HISTORY_LIMIT + 5; i++) {
      await repo.appendRegime(regimeEntry(day(i), { ageDays: i }));
    }

    const history = await repo.listRegimeHistory();
    expect(history).toHaveLength(REGIME_HISTORY_LIMIT);
    expect(history[0].date).toBe(day(5));
    expect(history[history.length - 1].date).toBe(day(REGIME_HISTORY_LIMIT + 4));
  });

  it('should list behavior entries in insertion order', async () => {
    await repo.appendBehavior([behavior('NVDA'), behavior('AAPL', 'skip')]);
    await repo.appendBehavior([behavior('MSFT', 'exit')]);

    expect((await repo.listBehavior()).map((b) => [b.ticker, b.action])).toEqual([
      ['NVDA', 'entry'],
      ['AAPL', 'skip'],
      ['MSFT', 'exit'],
    ]);
    expect((await repo.listBehavior())[0]).toEqual(behavior('NVDA'));
  });

  it('should filter stored risk assessments by date', async () => {
    const first = storedAssessment('00000000-0000-4000-8000-000000000001', '2024-03-01');
    const second = storedAssessment('00000000-0000-4000-8000-000000000002', '2024-03-02');
    await repo.saveRiskAssessments([first, second]);

    expect(await repo.listRiskAssessments('2024-03-02')).toEqual([second]);
    expect(await repo.listRiskAssessments()).toHaveLength(2);
  });

  it('should write a whole cycle together', async () => {
    const position = makePosition();
    const trade = makeTrade(4);
    const snapshot = { ...emptyPerformance(500), virtualBalance: 504, totalTrades: 1, lastUpdated: '2024-03-05' };

    await repo.commitCycle({
      positions: [position],
      closedTrades: [trade],
      performance: snapshot,
      regime: regimeEntry('2024-03-05'),
      behavior: [behavior('AAPL', 'exit')],
      assessments: [storedAssessment('00000000-0000-4000-8000-000000000003', '2024-03-05')],
    });

    expect(await repo.loadPositions()).toEqual([position]);
    expect(await repo.listClosedTrades()).toEqual([trade]);
    expect(await repo.loadPerformance()).toEqual(snapshot);
    expect(await repo.listRegimeHistory()).toEqual([regimeEntry('2024-03-05')]);
    expect(await repo.listBehavior()).toHaveLength(1);
    expect(await repo.listRiskAssessments('2024-03-05')).toHaveLength(1);
  });

  it('should leave the regime table alone when a cycle carries no entry', async () => {
    await repo.commitCycle({
      positions: [],
      closedTrades: [],
      performance: emptyPerformance(500),
      regime: null,
      behavior: [],
      assessments: [],
    });

    expect(await repo.listRegimeHistory()).toEqual([]);
    expect(await repo.loadPerformance()).toEqual(emptyPerformance(500));
  });
});

describe('createRepository', () => {
  it('should fall back to SQLite without a postgres URL', async () => {
    const repo = await createRepository(
      { sqlitePath: ':memory:' },
      { databaseUrl: 'mysql://localhost/engine', logger: silentLogger },
    );

    expect(repo).toBeInstanceOf(SqliteRepository);
    expect(await repo.loadPositions()).toEqual([]);
    await repo.close();
  });
});
