/**
 * SQLite Repository Implementation
 *
 * drizzle-orm over better-sqlite3 for local runs and tests (':memory:').
 * better-sqlite3 is synchronous, so every write runs inside one sync
 * transaction.
 */

import type { RunResult } from 'better-sqlite3';
import { asc, desc, eq, inArray } from 'drizzle-orm';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { createSqliteDb, schema, type SqliteHandle } from '@/lib/data/db';
import type {
  BehaviorEntry,
  ClosedTrade,
  PerformanceSnapshot,
  Position,
  RegimeHistoryEntry,
} from '@/types';
import {
  REGIME_HISTORY_LIMIT,
  decodePayload,
  encodePayload,
  fromRiskAssessmentRow,
  regimeColumns,
  toBehaviorEntry,
  toRiskAssessmentRow,
  type CycleCommit,
  type EngineStateRepository,
  type StoredRiskAssessment,
} from './repository';

type SqliteExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

const PERFORMANCE_ROW_ID = 1;

export class SqliteRepository implements EngineStateRepository {
  private handle: SqliteHandle;

  constructor(dbPath: string) {
    this.handle = createSqliteDb(dbPath);
  }

  private get db(): SqliteExecutor {
    return this.handle.db;
  }

  // ============================================
  // Positions
  // ============================================

  async loadPositions(): Promise<Position[]> {
    return this.db.select().from(schema.openPositions).orderBy(asc(schema.openPositions.id)).all();
  }

  async savePositions(positions: Position[]): Promise<void> {
    this.handle.db.transaction((tx) => writePositions(tx, positions));
  }

  // ============================================
  // Closed Trades
  // ============================================

  async appendClosedTrades(trades: ClosedTrade[]): Promise<void> {
    writeClosedTrades(this.db, trades);
  }

  async listClosedTrades(): Promise<ClosedTrade[]> {
    return this.db
      .select()
      .from(schema.closedTrades)
      .orderBy(asc(schema.closedTrades.exitDate), asc(schema.closedTrades.id))
      .all();
  }

  // ============================================
  // Performance
  // ============================================

  async loadPerformance(): Promise<PerformanceSnapshot | null> {
    const row = this.db
      .select()
      .from(schema.performance)
      .where(eq(schema.performance.id, PERFORMANCE_ROW_ID))
      .get();
    return row ? decodePayload<PerformanceSnapshot>(row.payload) : null;
  }

  async savePerformance(snapshot: PerformanceSnapshot): Promise<void> {
    writePerformance(this.db, snapshot);
  }

  // ============================================
  // Regime History
  // ============================================

  async appendRegime(entry: RegimeHistoryEntry): Promise<void> {
    this.handle.db.transaction((tx) => writeRegime(tx, entry));
  }

  async listRegimeHistory(): Promise<RegimeHistoryEntry[]> {
    return this.db.select().from(schema.regimeHistory).orderBy(asc(schema.regimeHistory.date)).all();
  }

  // ============================================
  // Behavior Log
  // ============================================

  async appendBehavior(entries: BehaviorEntry[]): Promise<void> {
    writeBehavior(this.db, entries);
  }

  async listBehavior(): Promise<BehaviorEntry[]> {
    const rows = this.db.select().from(schema.behaviorLog).orderBy(asc(schema.behaviorLog.id)).all();
    return rows.map(toBehaviorEntry);
  }

  // ============================================
  // Risk Assessments
  // ============================================

  async saveRiskAssessments(assessments: StoredRiskAssessment[]): Promise<void> {
    writeAssessments(this.db, assessments);
  }

  async listRiskAssessments(date?: string): Promise<StoredRiskAssessment[]> {
    const query = this.db.select().from(schema.riskAssessments);
    const rows = date
      ? query.where(eq(schema.riskAssessments.date, date)).all()
      : query.all();
    return rows.map(fromRiskAssessmentRow);
  }

  // ============================================
  // Cycle Commit
  // ============================================

  async commitCycle(cycle: CycleCommit): Promise<void> {
    this.handle.db.transaction((tx) => {
      writePositions(tx, cycle.positions);
      writeClosedTrades(tx, cycle.closedTrades);
      writePerformance(tx, cycle.performance);
      if (cycle.regime) writeRegime(tx, cycle.regime);
      writeBehavior(tx, cycle.behavior);
      writeAssessments(tx, cycle.assessments);
    });
  }

  async close(): Promise<void> {
    this.handle.sqlite.close();
  }
}

// ============================================
// Writers
// ============================================

function writePositions(db: SqliteExecutor, positions: Position[]): void {
  db.delete(schema.openPositions).run();
  if (positions.length > 0) db.insert(schema.openPositions).values(positions).run();
}

function writeClosedTrades(db: SqliteExecutor, trades: ClosedTrade[]): void {
  if (trades.length === 0) return;
  db.insert(schema.closedTrades).values(trades).onConflictDoNothing().run();
}

function writePerformance(db: SqliteExecutor, snapshot: PerformanceSnapshot): void {
  const payload = encodePayload(snapshot);
  const updatedAt = snapshot.lastUpdated ?? '';
  db.insert(schema.performance)
    .values({ id: PERFORMANCE_ROW_ID, payload, updatedAt })
    .onConflictDoUpdate({ target: schema.performance.id, set: { payload, updatedAt } })
    .run();
}

function writeRegime(db: SqliteExecutor, entry: RegimeHistoryEntry): void {
  db.insert(schema.regimeHistory)
    .values(entry)
    .onConflictDoUpdate({ target: schema.regimeHistory.date, set: regimeColumns(entry) })
    .run();

  const stale = db
    .select({ date: schema.regimeHistory.date })
    .from(schema.regimeHistory)
    .orderBy(desc(schema.regimeHistory.date))
    .all()
    .slice(REGIME_HISTORY_LIMIT)
    .map((r) => r.date);
  if (stale.length > 0) {
    db.delete(schema.regimeHistory).where(inArray(schema.regimeHistory.date, stale)).run();
  }
}

function writeBehavior(db: SqliteExecutor, entries: BehaviorEntry[]): void {
  if (entries.length === 0) return;
  db.insert(schema.behaviorLog).values(entries).run();
}

function writeAssessments(db: SqliteExecutor, assessments: StoredRiskAssessment[]): void {
  if (assessments.length === 0) return;
  db.insert(schema.riskAssessments).values(assessments.map(toRiskAssessmentRow)).run();
}
