import { describe, expect, it } from '@jest/globals';

import type { BehaviorEntry } from '@/types';
import { EMPTY_BEHAVIOR_PROFILE, buildBehaviorProfile, countConsecutive } from '@/lib/risk';

function entry(overrides: Partial<BehaviorEntry>): BehaviorEntry {
  return {
    date: '2024-03-04',
    action: 'entry',
    ticker: 'AAPL',
    strategy: 'breakout',
    planAligned: true,
    disciplineRating: null,
    reason: 'Breakout — Range Break',
    ...overrides,
  };
}

describe('Behavior profile', () => {
  const log: BehaviorEntry[] = [
    entry({ date: '2024-02-20', ticker: 'XOM' }),
    entry({ action: 'exit', ticker: 'MSFT', reason: 'stopped_out', disciplineRating: 4 }),
    entry({ ticker: 'NVDA', disciplineRating: 5 }),
    entry({ ticker: 'AMD', planAligned: false, reason: 'fomo chase' }),
    entry({ date: '2024-03-05', action: 'skip', ticker: 'TSLA', reason: 'Risk grade HIGH' }),
  ];

  it('should aggregate the lookback window', () => {
    const profile = buildBehaviorProfile(log, [{ pnl: 5 }, { pnl: -2 }, { pnl: -3 }], '2024-03-06', 7);

    expect(profile).toEqual({
      entriesLast7d: 2,
      exitsLast7d: 1,
      skipsLast7d: 1,
      planAdherencePct: 0.75,
      avgDisciplineRating: 4.5,
      consecutiveWins: 0,
      consecutiveLosses: 2,
      tradesPerDayAvg: 2 / 7,
      revengeTradeCount: 2,
      fomoEntryCount: 1,
      earlyExitCount: 0,
    });
  });

  it('should ignore entries dated after the evaluation date', () => {
    const profile = buildBehaviorProfile(log, [], '2024-03-04', 7);

    expect(profile.skipsLast7d).toBe(0);
    expect(profile.entriesLast7d).toBe(2);
  });

  it('should start from a neutral profile with an empty log', () => {
    expect(buildBehaviorProfile([], [], '2024-03-06')).toEqual(EMPTY_BEHAVIOR_PROFILE);
  });

  it('should count the trailing streak only', () => {
    const trades = [{ pnl: -1 }, { pnl: 2 }, { pnl: 3 }, { pnl: 0 }, { pnl: 4 }];

    expect(countConsecutive(trades, 'win')).toBe(1);
    expect(countConsecutive(trades, 'loss')).toBe(0);
    expect(countConsecutive(trades.slice(0, 3), 'win')).toBe(2);
  });
});
