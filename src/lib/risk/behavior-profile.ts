/**
 * Trader behavior profile built from the append-only behavior log
 */

import type { BehaviorEntry, BehaviorProfile, ClosedTrade } from '@/types';
import { addDays } from '@/lib/utils/dates';

export const EMPTY_BEHAVIOR_PROFILE: BehaviorProfile = {
  entriesLast7d: 0,
  exitsLast7d: 0,
  skipsLast7d: 0,
  planAdherencePct: 1.0,
  avgDisciplineRating: 3.0,
  consecutiveWins: 0,
  consecutiveLosses: 0,
  tradesPerDayAvg: 0,
  revengeTradeCount: 0,
  fomoEntryCount: 0,
  earlyExitCount: 0,
};

/**
 * Aggregate the log entries dated on or after `asOf - lookbackDays`.
 * Win and loss streaks come from the tail of the closed-trade log.
 */
export function buildBehaviorProfile(
  log: BehaviorEntry[],
  closedTrades: Pick<ClosedTrade, 'pnl'>[],
  asOf: string,
  lookbackDays = 7,
): BehaviorProfile {
  const cutoff = addDays(asOf, -lookbackDays);
  const recent = log.filter((e) => e.date >= cutoff && e.date <= asOf);

  const entries = recent.filter((e) => e.action === 'entry');
  const exits = recent.filter((e) => e.action === 'exit');
  const skips = recent.filter((e) => e.action === 'skip');
  const aligned = recent.filter((e) => e.planAligned);
  const ratings = recent
    .map((e) => e.disciplineRating)
    .filter((r): r is number => r !== null && r > 0);

  const stopOutDates = new Set(
    exits.filter((e) => e.reason === 'stopped_out').map((e) => e.date),
  );

  return {
    entriesLast7d: entries.length,
    exitsLast7d: exits.length,
    skipsLast7d: skips.length,
    planAdherencePct: recent.length > 0 ? aligned.length / recent.length : 1.0,
    avgDisciplineRating:
      ratings.length > 0 ? ratings.reduce((a, b) => a + b, 0) / ratings.length : 3.0,
    consecutiveWins: countConsecutive(closedTrades, 'win'),
    consecutiveLosses: countConsecutive(closedTrades, 'loss'),
    tradesPerDayAvg: entries.length / Math.max(lookbackDays, 1),
    revengeTradeCount: entries.filter((e) => stopOutDates.has(e.date)).length,
    fomoEntryCount: entries.filter((e) => e.reason.includes('fomo')).length,
    earlyExitCount: exits.filter((e) => e.reason === 'manual_early').length,
  };
}

/** Length of the trailing run of wins (pnl > 0) or losses (pnl < 0) */
export function countConsecutive(
  trades: Pick<ClosedTrade, 'pnl'>[],
  outcome: 'win' | 'loss',
): number {
  let count = 0;
  for (let i = trades.length - 1; i >= 0; i--) {
    const pnl = trades[i].pnl;
    if ((outcome === 'win' && pnl > 0) || (outcome === 'loss' && pnl < 0)) count++;
    else break;
  }
  return count;
}
