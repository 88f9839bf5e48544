/**
 * Engine Configuration
 *
 * Centralized configuration for the regime classifier, strategy matcher,
 * risk profiler, paper trader and backtester. Every leaf has a default, so
 * parsing an empty object yields the full default configuration.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { MARKET_REGIMES } from '@/types';
import { createLogger } from '@/lib/utils/logger';
import { sum } from '@/lib/utils/math';

const RegimeSchema = z.enum(MARKET_REGIMES);
const RangeSchema = z.tuple([z.number(), z.number()]);

// ============================================
// Regime
// ============================================

const RegimeThresholdsSchema = z.object({
  /** ADX above this is a trending market */
  adxTrending: z.number().positive().default(25),
  /** Volatility index above this forces HIGH_VOLATILITY */
  vixHigh: z.number().positive().default(28),
  /** ATR above its 20-bar mean times this forces HIGH_VOLATILITY */
  atrExpansion: z.number().positive().default(1.3),
});

const RegimeConfigSchema = z.object({
  thresholds: RegimeThresholdsSchema.default({}),
  /** Fewer market bars than this yields the default assessment */
  minBars: z.number().int().positive().default(30),
  /** Rolling regime history length */
  historyLimit: z.number().int().positive().default(90),
  breadthLookback: z.number().int().positive().default(20),
});

// ============================================
// Strategies
// ============================================

const TakeProfitMethodSchema = z.enum(['atr', 'middle_bb', 'measured_move']);

const ExitConfigSchema = z.object({
  stopLossAtr: z.number().positive().default(1.5),
  takeProfitAtr: z.number().positive().default(3.0),
  /** 0 disables the trailing stop */
  trailingStopAtr: z.number().min(0).default(0),
  takeProfit: TakeProfitMethodSchema.default('atr'),
});

const TrendFollowingSchema = z.object({
  enabled: z.boolean().default(true),
  activeRegimes: z.array(RegimeSchema).default(['TRENDING_UP', 'TRENDING_DOWN']),
  skipRegimes: z.array(RegimeSchema).default([]),
  entry: z.object({
    rsiRange: RangeSchema.default([40, 55]),
    requireEmaBounce: z.boolean().default(true),
    requireMacdPositive: z.boolean().default(true),
  }).default({}),
  exit: ExitConfigSchema.default({ trailingStopAtr: 2.0 }),
  maxHoldDays: z.number().int().positive().default(10),
});

const MeanReversionSchema = z.object({
  enabled: z.boolean().default(true),
  activeRegimes: z.array(RegimeSchema).default(['RANGE_BOUND', 'TRENDING_UP']),
  skipRegimes: z.array(RegimeSchema).default(['TRENDING_DOWN', 'HIGH_VOLATILITY']),
  entry: z.object({
    rsiThreshold: z.number().default(38),
    requireBbTouch: z.boolean().default(true),
    requireAbove200Sma: z.boolean().default(false),
  }).default({}),
  exit: ExitConfigSchema.default({ takeProfit: 'middle_bb' }),
  maxHoldDays: z.number().int().positive().default(5),
});

const BreakoutSchema = z.object({
  enabled: z.boolean().default(true),
  activeRegimes: z.array(RegimeSchema).default([
    'RANGE_BOUND',
    'TRENDING_UP',
    'TRENDING_DOWN',
    'HIGH_VOLATILITY',
  ]),
  skipRegimes: z.array(RegimeSchema).default([]),
  entry: z.object({
    requireVolumeSurge: z.number().positive().default(1.5),
  }).default({}),
  exit: ExitConfigSchema.default({ takeProfit: 'measured_move' }),
  maxHoldDays: z.number().int().positive().default(7),
});

const MomentumSchema = z.object({
  enabled: z.boolean().default(true),
  activeRegimes: z.array(RegimeSchema).default(['TRENDING_UP']),
  skipRegimes: z.array(RegimeSchema).default(['TRENDING_DOWN', 'RANGE_BOUND', 'HIGH_VOLATILITY']),
  entry: z.object({
    rsiRange: RangeSchema.default([60, 75]),
    volumeSurge: z.number().positive().default(2.0),
  }).default({}),
  exit: ExitConfigSchema.default({ trailingStopAtr: 2.0 }),
  maxHoldDays: z.number().int().positive().default(10),
});

const DefensiveSchema = z.object({
  trigger: z.object({
    vixAbove: z.number().default(28),
    maxDrawdownPct: z.number().default(-8.0),
    regimes: z.array(RegimeSchema).default(['HIGH_VOLATILITY', 'TRENDING_DOWN']),
  }).default({}),
});

const StrategiesSchema = z.object({
  trend_following: TrendFollowingSchema.default({}),
  mean_reversion: MeanReversionSchema.default({}),
  breakout: BreakoutSchema.default({}),
  momentum: MomentumSchema.default({}),
  defensive: DefensiveSchema.default({}),
});

const SizingSchema = z.object({
  /** Fraction of balance risked per trade before the regime modifier */
  riskPerTrade: z.number().positive().max(1).default(0.02),
});

// ============================================
// Scoring
// ============================================

const ScoringSchema = z.object({
  weights: z.object({
    technical: z.number().min(0).default(0.6),
    sentiment: z.number().min(0).default(0.25),
    volume: z.number().min(0).default(0.15),
  }).default({}),
  thresholds: z.object({
    strongBuy: z.number().default(0.7),
    buy: z.number().default(0.4),
    sell: z.number().default(-0.4),
    strongSell: z.number().default(-0.7),
  }).default({}),
  maxResults: z.number().int().positive().default(10),
  /** Bars required before an instrument is analyzed */
  minBars: z.number().int().positive().default(30),
});

// ============================================
// Risk Profiler
// ============================================

const DimensionWeightsSchema = z.object({
  position: z.number().min(0),
  portfolio: z.number().min(0),
  market: z.number().min(0),
  behavioral: z.number().min(0),
  strategy: z.number().min(0),
}).refine(
  (w) => Math.abs(sum(Object.values(w)) - 1) < 1e-6,
  { message: 'weights must sum to 1' },
);

const RiskProfilerSchema = z.object({
  tradeWeights: DimensionWeightsSchema.default({
    position: 0.25,
    portfolio: 0.25,
    market: 0.2,
    behavioral: 0.15,
    strategy: 0.15,
  }),
  portfolioWeights: DimensionWeightsSchema.default({
    position: 0,
    portfolio: 0.3,
    market: 0.25,
    behavioral: 0.2,
    strategy: 0.25,
  }),
  position: z.object({
    minRiskReward: z.number().default(1.5),
    targetRiskReward: z.number().default(2.0),
  }).default({}),
  portfolio: z.object({
    maxConcurrentPositions: z.number().int().positive().default(3),
    maxTotalRiskPct: z.number().positive().default(6.0),
    maxDrawdownLimit: z.number().default(-8.0),
    drawdownWarningBuffer: z.number().min(0).default(2.0),
    maxSectorConcentration: z.number().int().positive().default(2),
  }).default({}),
  market: z.object({
    vixElevated: z.number().default(20),
    vixHigh: z.number().default(25),
    vixExtreme: z.number().default(30),
    regimeAgeWarning: z.number().int().default(30),
    minRegimeConfidence: z.number().min(0).max(1).default(0.5),
  }).default({}),
  behavioral: z.object({
    lookbackDays: z.number().int().positive().default(7),
    maxTradesPerDay: z.number().positive().default(2),
    winStreakWarning: z.number().int().positive().default(3),
    lossStreakWarning: z.number().int().positive().default(3),
    minPlanAdherence: z.number().min(0).max(1).default(0.7),
  }).default({}),
  strategy: z.object({
    minSampleSize: z.number().int().positive().default(5),
    minWinRate: z.number().min(0).max(1).default(0.4),
  }).default({}),
});

// ============================================
// Trader, Backtest, Pipeline
// ============================================

const TraderSchema = z.object({
  startingBalance: z.number().positive().default(500),
  maxConcurrentPositions: z.number().int().positive().default(3),
  pdtSimulation: z.boolean().default(false),
  pdtMaxDayTrades: z.number().int().positive().default(3),
  /** Business days, the current day included */
  pdtWindowDays: z.number().int().positive().default(5),
  /** Open positions from approved signals; off = signals only */
  autoEnter: z.boolean().default(true),
});

const BacktestSchema = z.object({
  /** Market bars required before a day is simulated */
  minMarketBars: z.number().int().positive().default(20),
  /** Instrument bars required before an instrument is scored */
  minInstrumentBars: z.number().int().positive().default(20),
  /** Tickers treated as benchmarks, never traded */
  excludedTickers: z.array(z.string()).default(['SPY', 'VIX', 'US500']),
});

const PipelineSchema = z.object({
  universe: z.array(z.string()).default([]),
  marketTickers: z.array(z.string()).default(['SPY', 'US500']),
  volatilityTicker: z.string().default('VIX'),
  /** Calendar days of history requested per series */
  historyDays: z.number().int().positive().default(400),
  circuitBreaker: z.object({
    failureThreshold: z.number().int().positive().default(3),
    recoveryTimeoutMs: z.number().int().positive().default(300_000),
    maxRetries: z.number().int().positive().default(3),
    baseDelayMs: z.number().int().min(0).default(1_000),
    maxDelayMs: z.number().int().min(0).default(30_000),
  }).default({}),
});

const PersistenceSchema = z.object({
  sqlitePath: z.string().default('data/paper-engine.db'),
});

const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  consoleOutput: z.boolean().default(true),
});

export const EngineConfigSchema = z.object({
  regime: RegimeConfigSchema.default({}),
  strategies: StrategiesSchema.default({}),
  sizing: SizingSchema.default({}),
  scoring: ScoringSchema.default({}),
  riskProfiler: RiskProfilerSchema.default({}),
  trader: TraderSchema.default({}),
  backtest: BacktestSchema.default({}),
  pipeline: PipelineSchema.default({}),
  persistence: PersistenceSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type RegimeConfig = EngineConfig['regime'];
export type StrategiesConfig = EngineConfig['strategies'];
export type ExitConfig = z.infer<typeof ExitConfigSchema>;
export type TakeProfitMethod = z.infer<typeof TakeProfitMethodSchema>;
export type SizingConfig = EngineConfig['sizing'];
export type ScoringConfig = EngineConfig['scoring'];
export type RiskProfilerConfig = EngineConfig['riskProfiler'];
export type DimensionWeights = z.infer<typeof DimensionWeightsSchema>;
export type TraderConfig = EngineConfig['trader'];
export type BacktestSettings = EngineConfig['backtest'];
export type PipelineConfig = EngineConfig['pipeline'];

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

export const DEFAULT_CONFIG_PATH = path.join('config', 'engine.json');

/**
 * Build a config from partial input, filling every omitted leaf with its
 * default. Throws a ZodError on invalid values.
 */
export function buildEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(input);
}

/**
 * Load config from a JSON file or use defaults
 */
export function loadEngineConfig(configPath: string = DEFAULT_CONFIG_PATH): EngineConfig {
  const log = createLogger('Config');

  if (!fs.existsSync(configPath)) {
    log.warn(`No config at ${configPath}, using defaults`);
    return DEFAULT_ENGINE_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    log.warn(`Failed to read config from ${configPath} (${String(error)}), using defaults`);
    return DEFAULT_ENGINE_CONFIG;
  }

  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Invalid config at ${configPath}: ${formatIssues(parsed.error).join('; ')}, using defaults`);
    return DEFAULT_ENGINE_CONFIG;
  }
  return parsed.data;
}

/**
 * Validate a config value
 */
export function validateEngineConfig(value: unknown): { valid: boolean; errors: string[] } {
  const parsed = EngineConfigSchema.safeParse(value);
  const errors = parsed.success ? [] : formatIssues(parsed.error);

  if (parsed.success) {
    const { scoring, riskProfiler } = parsed.data;
    if (scoring.thresholds.buy > scoring.thresholds.strongBuy) {
      errors.push('scoring.thresholds.buy must be <= strongBuy');
    }
    if (scoring.thresholds.sell < scoring.thresholds.strongSell) {
      errors.push('scoring.thresholds.sell must be >= strongSell');
    }
    const { vixElevated, vixHigh, vixExtreme } = riskProfiler.market;
    if (!(vixElevated <= vixHigh && vixHigh <= vixExtreme)) {
      errors.push('riskProfiler.market volatility bands must be ascending');
    }
  }

  return { valid: errors.length === 0, errors };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
