/**
 * PostgreSQL Repository Implementation
 *
 * Uses node-postgres (pg) Pool + drizzle-orm for deployment.
 * Runs CREATE TABLE IF NOT EXISTS on startup in place of migrations.
 */

import pg from 'pg';
import { asc, desc, eq, inArray } from 'drizzle-orm';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type {
  BehaviorEntry,
  ClosedTrade,
  PerformanceSnapshot,
  Position,
  RegimeHistoryEntry,
} from '@/types';
import * as pgSchema from './pg-schema';
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

type PgExecutor = PgDatabase<NodePgQueryResultHKT, typeof pgSchema>;

const PERFORMANCE_ROW_ID = 1;

export class PgRepository implements EngineStateRepository {
  private pool: pg.Pool;
  private db: PgExecutor;

  constructor(databaseUrl: string) {
    this.pool = new pg.Pool({
      connectionString: databaseUrl,
      max: 5,
      ssl: databaseUrl.includes('localhost') || databaseUrl.includes('127.0.0.1')
        ? false
        : { rejectUnauthorized: false },
    });

    this.db = drizzle(this.pool, { schema: pgSchema });
  }

  /** Create tables if they don't exist. Call once at startup. */
  async ensureTables(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(pgSchema.CREATE_TABLES_SQL);
    } finally {
      client.release();
    }
  }

  async loadPositions(): Promise<Position[]> {
    return this.db.select().from(pgSchema.pgOpenPositions).orderBy(asc(pgSchema.pgOpenPositions.id));
  }

  async savePositions(positions: Position[]): Promise<void> {
    await this.db.transaction((tx) => writePositions(tx, positions));
  }

  async appendClosedTrades(trades: ClosedTrade[]): Promise<void> {
    await writeClosedTrades(this.db, trades);
  }

  async listClosedTrades(): Promise<ClosedTrade[]> {
    return this.db
      .select()
      .from(pgSchema.pgClosedTrades)
      .orderBy(asc(pgSchema.pgClosedTrades.exitDate), asc(pgSchema.pgClosedTrades.id));
  }

  async loadPerformance(): Promise<PerformanceSnapshot | null> {
    const rows = await this.db
      .select()
      .from(pgSchema.pgPerformance)
      .where(eq(pgSchema.pgPerformance.id, PERFORMANCE_ROW_ID));
    return rows.length > 0 ? decodePayload<PerformanceSnapshot>(rows[0].payload) : null;
  }

  async savePerformance(snapshot: PerformanceSnapshot): Promise<void> {
    await writePerformance(this.db, snapshot);
  }

  async appendRegime(entry: RegimeHistoryEntry): Promise<void> {
    await this.db.transaction((tx) => writeRegime(tx, entry));
  }

  async listRegimeHistory(): Promise<RegimeHistoryEntry[]> {
    return this.db.select().from(pgSchema.pgRegimeHistory).orderBy(asc(pgSchema.pgRegimeHistory.date));
  }

  async appendBehavior(entries: BehaviorEntry[]): Promise<void> {
    await writeBehavior(this.db, entries);
  }

  async listBehavior(): Promise<BehaviorEntry[]> {
    const rows = await this.db.select().from(pgSchema.pgBehaviorLog).orderBy(asc(pgSchema.pgBehaviorLog.id));
    return rows.map(toBehaviorEntry);
  }

  async saveRiskAssessments(assessments: StoredRiskAssessment[]): Promise<void> {
    await writeAssessments(this.db, assessments);
  }

  async listRiskAssessments(date?: string): Promise<StoredRiskAssessment[]> {
    const query = this.db.select().from(pgSchema.pgRiskAssessments);
    const rows = date ? await query.where(eq(pgSchema.pgRiskAssessments.date, date)) : await query;
    return rows.map(fromRiskAssessmentRow);
  }

  async commitCycle(cycle: CycleCommit): Promise<void> {
    await this.db.transaction(async (tx) => {
      await writePositions(tx, cycle.positions);
      await writeClosedTrades(tx, cycle.closedTrades);
      await writePerformance(tx, cycle.performance);
      if (cycle.regime) await writeRegime(tx, cycle.regime);
      await writeBehavior(tx, cycle.behavior);
      await writeAssessments(tx, cycle.assessments);
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

// ============================================
// Writers
// ============================================

async function writePositions(db: PgExecutor, positions: Position[]): Promise<void> {
  await db.delete(pgSchema.pgOpenPositions);
  if (positions.length > 0) await db.insert(pgSchema.pgOpenPositions).values(positions);
}

async function writeClosedTrades(db: PgExecutor, trades: ClosedTrade[]): Promise<void> {
  if (trades.length === 0) return;
  await db.insert(pgSchema.pgClosedTrades).values(trades).onConflictDoNothing();
}

async function writePerformance(db: PgExecutor, snapshot: PerformanceSnapshot): Promise<void> {
  const payload = encodePayload(snapshot);
  const updatedAt = snapshot.lastUpdated ?? '';
  await db
    .insert(pgSchema.pgPerformance)
    .values({ id: PERFORMANCE_ROW_ID, payload, updatedAt })
    .onConflictDoUpdate({ target: pgSchema.pgPerformance.id, set: { payload, updatedAt } });
}

async function writeRegime(db: PgExecutor, entry: RegimeHistoryEntry): Promise<void> {
  await db
    .insert(pgSchema.pgRegimeHistory)
    .values(entry)
    .onConflictDoUpdate({ target: pgSchema.pgRegimeHistory.date, set: regimeColumns(entry) });

  const dates = await db
    .select({ date: pgSchema.pgRegimeHistory.date })
    .from(pgSchema.pgRegimeHistory)
    .orderBy(desc(pgSchema.pgRegimeHistory.date));
  const stale = dates.slice(REGIME_HISTORY_LIMIT).map((r) => r.date);
  if (stale.length > 0) {
    await db.delete(pgSchema.pgRegimeHistory).where(inArray(pgSchema.pgRegimeHistory.date, stale));
  }
}

async function writeBehavior(db: PgExecutor, entries: BehaviorEntry[]): Promise<void> {
  if (entries.length === 0) return;
  await db.insert(pgSchema.pgBehaviorLog).values(entries);
}

async function writeAssessments(db: PgExecutor, assessments: StoredRiskAssessment[]): Promise<void> {
  if (assessments.length === 0) return;
  await db.insert(pgSchema.pgRiskAssessments).values(assessments.map(toRiskAssessmentRow));
}
