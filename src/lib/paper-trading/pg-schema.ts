/**
 * PostgreSQL Table Definitions
 *
 * Mirrors the SQLite tables from @/lib/data/schema but uses PG-native
 * column types.
 */

import { pgTable, text, serial, doublePrecision, integer, boolean } from 'drizzle-orm/pg-core';
import {
  BEHAVIOR_ACTIONS,
  DIRECTIONS,
  EXIT_REASONS,
  MARKET_REGIMES,
  TRADE_STRATEGIES,
} from '@/types';

export const pgOpenPositions = pgTable('open_positions', {
  id: text('id').primaryKey(),
  ticker: text('ticker').notNull(),
  sector: text('sector').notNull(),
  direction: text('direction', { enum: DIRECTIONS }).notNull(),
  entryPrice: doublePrecision('entry_price').notNull(),
  entryDate: text('entry_date').notNull(),
  positionSize: doublePrecision('position_size').notNull(),
  stopLoss: doublePrecision('stop_loss').notNull(),
  takeProfit: doublePrecision('take_profit').notNull(),
  strategy: text('strategy', { enum: TRADE_STRATEGIES }).notNull(),
  maxHoldDays: integer('max_hold_days').notNull(),
  daysHeld: integer('days_held').notNull(),
  signalScore: doublePrecision('signal_score').notNull(),
  trailingStopAtr: doublePrecision('trailing_stop_atr').notNull(),
  trailingStop: doublePrecision('trailing_stop').notNull(),
  highestPrice: doublePrecision('highest_price').notNull(),
  lowestPrice: doublePrecision('lowest_price').notNull(),
  unrealizedPnl: doublePrecision('unrealized_pnl').notNull(),
});

export const pgClosedTrades = pgTable('closed_trades', {
  id: text('id').primaryKey(),
  ticker: text('ticker').notNull(),
  sector: text('sector').notNull(),
  direction: text('direction', { enum: DIRECTIONS }).notNull(),
  strategy: text('strategy', { enum: TRADE_STRATEGIES }).notNull(),
  entryPrice: doublePrecision('entry_price').notNull(),
  entryDate: text('entry_date').notNull(),
  exitPrice: doublePrecision('exit_price').notNull(),
  exitDate: text('exit_date').notNull(),
  exitReason: text('exit_reason', { enum: EXIT_REASONS }).notNull(),
  positionSize: doublePrecision('position_size').notNull(),
  stopLoss: doublePrecision('stop_loss').notNull(),
  takeProfit: doublePrecision('take_profit').notNull(),
  pnl: doublePrecision('pnl').notNull(),
  pnlPct: doublePrecision('pnl_pct').notNull(),
  rMultiple: doublePrecision('r_multiple').notNull(),
  daysHeld: integer('days_held').notNull(),
  signalScore: doublePrecision('signal_score').notNull(),
});

// Single row (id = 1), superjson so an infinite profit factor survives
export const pgPerformance = pgTable('performance', {
  id: integer('id').primaryKey(),
  payload: text('payload').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export const pgRegimeHistory = pgTable('regime_history', {
  date: text('date').primaryKey(),
  regime: text('regime', { enum: MARKET_REGIMES }).notNull(),
  confidence: doublePrecision('confidence').notNull(),
  adx: doublePrecision('adx').notNull(),
  vix: doublePrecision('vix').notNull(),
  breadth: doublePrecision('breadth').notNull(),
  ageDays: integer('age_days').notNull(),
});

export const pgBehaviorLog = pgTable('behavior_log', {
  id: serial('id').primaryKey(),
  date: text('date').notNull(),
  action: text('action', { enum: BEHAVIOR_ACTIONS }).notNull(),
  ticker: text('ticker').notNull(),
  strategy: text('strategy').notNull(),
  planAligned: boolean('plan_aligned').notNull(),
  disciplineRating: integer('discipline_rating'),
  reason: text('reason').notNull(),
});

export const pgRiskAssessments = pgTable('risk_assessments', {
  id: text('id').primaryKey(),
  date: text('date').notNull(),
  scope: text('scope', { enum: ['trade', 'portfolio'] }).notNull(),
  ticker: text('ticker'),
  strategy: text('strategy'),
  compositeScore: doublePrecision('composite_score').notNull(),
  riskLevel: text('risk_level').notNull(),
  recommendation: text('recommendation').notNull(),
  payload: text('payload').notNull(),
});

// Raw SQL for CREATE TABLE IF NOT EXISTS (used by ensureTables)
export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS open_positions (
  id TEXT PRIMARY KEY,
  ticker TEXT NOT NULL,
  sector TEXT NOT NULL,
  direction TEXT NOT NULL,
  entry_price DOUBLE PRECISION NOT NULL,
  entry_date TEXT NOT NULL,
  position_size DOUBLE PRECISION NOT NULL,
  stop_loss DOUBLE PRECISION NOT NULL,
  take_profit DOUBLE PRECISION NOT NULL,
  strategy TEXT NOT NULL,
  max_hold_days INTEGER NOT NULL,
  days_held INTEGER NOT NULL,
  signal_score DOUBLE PRECISION NOT NULL,
  trailing_stop_atr DOUBLE PRECISION NOT NULL,
  trailing_stop DOUBLE PRECISION NOT NULL,
  highest_price DOUBLE PRECISION NOT NULL,
  lowest_price DOUBLE PRECISION NOT NULL,
  unrealized_pnl DOUBLE PRECISION NOT NULL
);

CREATE TABLE IF NOT EXISTS closed_trades (
  id TEXT PRIMARY KEY,
  ticker TEXT NOT NULL,
  sector TEXT NOT NULL,
  direction TEXT NOT NULL,
  strategy TEXT NOT NULL,
  entry_price DOUBLE PRECISION NOT NULL,
  entry_date TEXT NOT NULL,
  exit_price DOUBLE PRECISION NOT NULL,
  exit_date TEXT NOT NULL,
  exit_reason TEXT NOT NULL,
  position_size DOUBLE PRECISION NOT NULL,
  stop_loss DOUBLE PRECISION NOT NULL,
  take_profit DOUBLE PRECISION NOT NULL,
  pnl DOUBLE PRECISION NOT NULL,
  pnl_pct DOUBLE PRECISION NOT NULL,
  r_multiple DOUBLE PRECISION NOT NULL,
  days_held INTEGER NOT NULL,
  signal_score DOUBLE PRECISION NOT NULL
);

CREATE TABLE IF NOT EXISTS performance (
  id INTEGER PRIMARY KEY,
  payload TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS regime_history (
  date TEXT PRIMARY KEY,
  regime TEXT NOT NULL,
  confidence DOUBLE PRECISION NOT NULL,
  adx DOUBLE PRECISION NOT NULL,
  vix DOUBLE PRECISION NOT NULL,
  breadth DOUBLE PRECISION NOT NULL,
  age_days INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS behavior_log (
  id SERIAL PRIMARY KEY,
  date TEXT NOT NULL,
  action TEXT NOT NULL,
  ticker TEXT NOT NULL,
  strategy TEXT NOT NULL,
  plan_aligned BOOLEAN NOT NULL,
  discipline_rating INTEGER,
  reason TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS risk_assessments (
  id TEXT PRIMARY KEY,
  date TEXT NOT NULL,
  scope TEXT NOT NULL,
  ticker TEXT,
  strategy TEXT,
  composite_score DOUBLE PRECISION NOT NULL,
  risk_level TEXT NOT NULL,
  recommendation TEXT NOT NULL,
  payload TEXT NOT NULL
);
`;
