/**
 * Engine State Repository Interface
 *
 * Abstracts database operations so the engine can run against
 * SQLite (local dev) or PostgreSQL (deployment).
 */

import superjson from 'superjson';
import type {
  BehaviorEntry,
  ClosedTrade,
  PerformanceSnapshot,
  Position,
  RegimeHistoryEntry,
  RiskAssessment,
  TradeStrategy,
} from '@/types';

/** Regime history rows kept per database */
export const REGIME_HISTORY_LIMIT = 90;

// ============================================
// Stored Shapes
// ============================================

export type AssessmentScope = 'trade' | 'portfolio';

export interface StoredRiskAssessment {
  /** uuid v4 */
  id: string;
  date: string;
  scope: AssessmentScope;
  /** Null for portfolio-level assessments */
  ticker: string | null;
  strategy: TradeStrategy | null;
  assessment: RiskAssessment;
}

/** Everything one decision cycle writes, committed in one transaction */
export interface CycleCommit {
  /** Replaces the stored open positions */
  positions: Position[];
  /** Trades closed during the cycle, appended */
  closedTrades: ClosedTrade[];
  performance: PerformanceSnapshot;
  regime: RegimeHistoryEntry | null;
  behavior: BehaviorEntry[];
  assessments: StoredRiskAssessment[];
}

// ============================================
// Repository Interface
// ============================================

export interface EngineStateRepository {
  loadPositions(): Promise<Position[]>;
  savePositions(positions: Position[]): Promise<void>;

  appendClosedTrades(trades: ClosedTrade[]): Promise<void>;
  listClosedTrades(): Promise<ClosedTrade[]>;

  /** Null when nothing has been saved yet */
  loadPerformance(): Promise<PerformanceSnapshot | null>;
  savePerformance(snapshot: PerformanceSnapshot): Promise<void>;

  /** Upserts by date and keeps the most recent REGIME_HISTORY_LIMIT rows */
  appendRegime(entry: RegimeHistoryEntry): Promise<void>;
  /** Ascending by date */
  listRegimeHistory(): Promise<RegimeHistoryEntry[]>;

  appendBehavior(entries: BehaviorEntry[]): Promise<void>;
  listBehavior(): Promise<BehaviorEntry[]>;

  saveRiskAssessments(assessments: StoredRiskAssessment[]): Promise<void>;
  listRiskAssessments(date?: string): Promise<StoredRiskAssessment[]>;

  commitCycle(cycle: CycleCommit): Promise<void>;

  close(): Promise<void>;
}

// ============================================
// Payload Codecs (shared by both dialects)
// ============================================

export function encodePayload<T>(value: T): string {
  return superjson.stringify(value);
}

export function decodePayload<T>(payload: string): T {
  return superjson.parse<T>(payload);
}

export interface RiskAssessmentRow {
  id: string;
  date: string;
  scope: AssessmentScope;
  ticker: string | null;
  strategy: string | null;
  compositeScore: number;
  riskLevel: string;
  recommendation: string;
  payload: string;
}

export function toRiskAssessmentRow(stored: StoredRiskAssessment): RiskAssessmentRow {
  return {
    id: stored.id,
    date: stored.date,
    scope: stored.scope,
    ticker: stored.ticker,
    strategy: stored.strategy,
    compositeScore: stored.assessment.compositeScore,
    riskLevel: stored.assessment.riskLevel,
    recommendation: stored.assessment.recommendation,
    payload: encodePayload(stored),
  };
}

export function fromRiskAssessmentRow(row: Pick<RiskAssessmentRow, 'payload'>): StoredRiskAssessment {
  return decodePayload<StoredRiskAssessment>(row.payload);
}

/** Every regime column except the date key, for upserts */
export function regimeColumns(entry: RegimeHistoryEntry): Omit<RegimeHistoryEntry, 'date'> {
  return {
    regime: entry.regime,
    confidence: entry.confidence,
    adx: entry.adx,
    vix: entry.vix,
    breadth: entry.breadth,
    ageDays: entry.ageDays,
  };
}

export function toBehaviorEntry(row: BehaviorEntry & { id: number }): BehaviorEntry {
  return {
    date: row.date,
    action: row.action,
    ticker: row.ticker,
    strategy: row.strategy,
    planAligned: row.planAligned,
    disciplineRating: row.disciplineRating,
    reason: row.reason,
  };
}
