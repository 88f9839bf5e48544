/**
 * SQLite Table Definitions
 *
 * Column keys match the domain types in @/types, so selected rows are
 * usable as positions, trades and history entries without remapping.
 */

import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';
import {
  BEHAVIOR_ACTIONS,
  DIRECTIONS,
  EXIT_REASONS,
  MARKET_REGIMES,
  TRADE_STRATEGIES,
} from '@/types';

export const openPositions = sqliteTable('open_positions', {
  id: text('id').primaryKey(),
  ticker: text('ticker').notNull(),
  sector: text('sector').notNull(),
  direction: text('direction', { enum: DIRECTIONS }).notNull(),
  entryPrice: real('entry_price').notNull(),
  entryDate: text('entry_date').notNull(),
  positionSize: real('position_size').notNull(),
  stopLoss: real('stop_loss').notNull(),
  takeProfit: real('take_profit').notNull(),
  strategy: text('strategy', { enum: TRADE_STRATEGIES }).notNull(),
  maxHoldDays: integer('max_hold_days').notNull(),
  daysHeld: integer('days_held').notNull(),
  signalScore: real('signal_score').notNull(),
  trailingStopAtr: real('trailing_stop_atr').notNull(),
  trailingStop: real('trailing_stop').notNull(),
  highestPrice: real('highest_price').notNull(),
  lowestPrice: real('lowest_price').notNull(),
  unrealizedPnl: real('unrealized_pnl').notNull(),
});

export const closedTrades = sqliteTable('closed_trades', {
  id: text('id').primaryKey(),
  ticker: text('ticker').notNull(),
  sector: text('sector').notNull(),
  direction: text('direction', { enum: DIRECTIONS }).notNull(),
  strategy: text('strategy', { enum: TRADE_STRATEGIES }).notNull(),
  entryPrice: real('entry_price').notNull(),
  entryDate: text('entry_date').notNull(),
  exitPrice: real('exit_price').notNull(),
  exitDate: text('exit_date').notNull(),
  exitReason: text('exit_reason', { enum: EXIT_REASONS }).notNull(),
  positionSize: real('position_size').notNull(),
  stopLoss: real('stop_loss').notNull(),
  takeProfit: real('take_profit').notNull(),
  pnl: real('pnl').notNull(),
  pnlPct: real('pnl_pct').notNull(),
  rMultiple: real('r_multiple').notNull(),
  daysHeld: integer('days_held').notNull(),
  signalScore: real('signal_score').notNull(),
});

// Single row (id = 1), superjson so an infinite profit factor survives
export const performance = sqliteTable('performance', {
  id: integer('id').primaryKey(),
  payload: text('payload').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export const regimeHistory = sqliteTable('regime_history', {
  date: text('date').primaryKey(),
  regime: text('regime', { enum: MARKET_REGIMES }).notNull(),
  confidence: real('confidence').notNull(),
  adx: real('adx').notNull(),
  vix: real('vix').notNull(),
  breadth: real('breadth').notNull(),
  ageDays: integer('age_days').notNull(),
});

export const behaviorLog = sqliteTable('behavior_log', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  date: text('date').notNull(),
  action: text('action', { enum: BEHAVIOR_ACTIONS }).notNull(),
  ticker: text('ticker').notNull(),
  strategy: text('strategy').notNull(),
  planAligned: integer('plan_aligned', { mode: 'boolean' }).notNull(),
  disciplineRating: integer('discipline_rating'),
  reason: text('reason').notNull(),
});

export const riskAssessments = sqliteTable('risk_assessments', {
  id: text('id').primaryKey(),
  date: text('date').notNull(),
  scope: text('scope', { enum: ['trade', 'portfolio'] }).notNull(),
  ticker: text('ticker'),
  strategy: text('strategy'),
  compositeScore: real('composite_score').notNull(),
  riskLevel: text('risk_level').notNull(),
  recommendation: text('recommendation').notNull(),
  payload: text('payload').notNull(),
});

// Raw SQL for CREATE TABLE IF NOT EXISTS (run when a database is opened)
export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS open_positions (
  id TEXT PRIMARY KEY,
  ticker TEXT NOT NULL,
  sector TEXT NOT NULL,
  direction TEXT NOT NULL,
  entry_price REAL NOT NULL,
  entry_date TEXT NOT NULL,
  position_size REAL NOT NULL,
  stop_loss REAL NOT NULL,
  take_profit REAL NOT NULL,
  strategy TEXT NOT NULL,
  max_hold_days INTEGER NOT NULL,
  days_held INTEGER NOT NULL,
  signal_score REAL NOT NULL,
  trailing_stop_atr REAL NOT NULL,
  trailing_stop REAL NOT NULL,
  highest_price REAL NOT NULL,
  lowest_price REAL NOT NULL,
  unrealized_pnl REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS closed_trades (
  id TEXT PRIMARY KEY,
  ticker TEXT NOT NULL,
  sector TEXT NOT NULL,
  direction TEXT NOT NULL,
  strategy TEXT NOT NULL,
  entry_price REAL NOT NULL,
  entry_date TEXT NOT NULL,
  exit_price REAL NOT NULL,
  exit_date TEXT NOT NULL,
  exit_reason TEXT NOT NULL,
  position_size REAL NOT NULL,
  stop_loss REAL NOT NULL,
  take_profit REAL NOT NULL,
  pnl REAL NOT NULL,
  pnl_pct REAL NOT NULL,
  r_multiple REAL NOT NULL,
  days_held INTEGER NOT NULL,
  signal_score REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS performance (
  id INTEGER PRIMARY KEY,
  payload TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS regime_history (
  date TEXT PRIMARY KEY,
  regime TEXT NOT NULL,
  confidence REAL NOT NULL,
  adx REAL NOT NULL,
  vix REAL NOT NULL,
  breadth REAL NOT NULL,
  age_days INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS behavior_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date TEXT NOT NULL,
  action TEXT NOT NULL,
  ticker TEXT NOT NULL,
  strategy TEXT NOT NULL,
  plan_aligned INTEGER NOT NULL,
  discipline_rating INTEGER,
  reason TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS risk_assessments (
  id TEXT PRIMARY KEY,
  date TEXT NOT NULL,
  scope TEXT NOT NULL,
  ticker TEXT,
  strategy TEXT,
  composite_score REAL NOT NULL,
  risk_level TEXT NOT NULL,
  recommendation TEXT NOT NULL,
  payload TEXT NOT NULL
);
`;
