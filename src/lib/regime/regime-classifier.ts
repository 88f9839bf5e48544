/**
 * Market Regime Classifier
 *
 * Classifies the broad market into one of four regimes from a market proxy
 * series (SPY or an index CFD) and an optional volatility-index series.
 *
 * Precedence:
 * 1. Volatility index above `vixHigh`, or ATR above its 20-bar mean × `atrExpansion`
 *    → HIGH_VOLATILITY
 * 2. ADX above `adxTrending`, close above EMA20 and SMA50 above SMA200
 *    → TRENDING_UP
 * 3. ADX above `adxTrending`, close not above EMA20 and no golden alignment
 *    → TRENDING_DOWN
 * 4. Otherwise → RANGE_BOUND
 *
 * The classifier keeps a bounded history of past evaluations, which drives the
 * regime age counter. Re-evaluating the same date replaces that date's entry.
 */

import type {
  Candle,
  MarketRegime,
  RegimeAssessment,
  RegimeHistoryEntry,
  StrategyName,
  TrendDescriptor,
} from '@/types';
import type { RegimeConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { adx, atr, closes, ema, rollingMean, sma, valueAt } from '@/lib/indicators';
import { round } from '@/lib/utils/math';
import { createLogger, type Logger } from '@/lib/utils/logger';

// ============================================
// Regime Profiles
// ============================================

interface RegimeProfile {
  activeStrategies: StrategyName[];
  positionSizeModifier: number;
}

export const REGIME_PROFILES: Record<MarketRegime, RegimeProfile> = {
  HIGH_VOLATILITY: { activeStrategies: ['breakout'], positionSizeModifier: 0.5 },
  TRENDING_UP: { activeStrategies: ['trend_following', 'momentum'], positionSizeModifier: 1.0 },
  TRENDING_DOWN: { activeStrategies: ['trend_following', 'defensive'], positionSizeModifier: 0.5 },
  RANGE_BOUND: { activeStrategies: ['mean_reversion', 'breakout'], positionSizeModifier: 0.75 },
};

const SPARKLINE_LENGTH = 30;
const DEFAULT_CONFIDENCE = 0.3;

/** Assessment returned when the market series is too short to classify */
export function defaultAssessment(): RegimeAssessment {
  return {
    regime: 'RANGE_BOUND',
    confidence: DEFAULT_CONFIDENCE,
    trend: 'mixed',
    adx: 0,
    vix: 0,
    breadth: 50,
    regimeAgeDays: 0,
    regimeStartDate: null,
    activeStrategies: [...REGIME_PROFILES.RANGE_BOUND.activeStrategies],
    positionSizeModifier: REGIME_PROFILES.RANGE_BOUND.positionSizeModifier,
    adxHistory: [],
    vixHistory: [],
  };
}

// ============================================
// Readings
// ============================================

/** Indicator readings at the last market bar */
export interface MarketReadings {
  close: number;
  ema20: number | null;
  sma50: number | null;
  sma200: number | null;
  adx: number;
  atr: number;
  atrMean: number;
  vix: number;
  breadth: number;
  adxHistory: number[];
  vixHistory: number[];
}

export function computeReadings(
  market: Candle[],
  vix: Candle[] | null | undefined,
  breadthLookback: number,
): MarketReadings {
  const close = closes(market);
  const last = market.length - 1;

  const ema20 = ema(close, 20);
  const sma50 = sma(close, 50);
  const sma200 = sma(close, 200);
  const adxSeries = adx(market, 14);
  const atrSeries = atr(market, 14);
  const atrMeanSeries = rollingMean(atrSeries, 20);

  const atrNow = valueAt(atrSeries, last) ?? 0;

  return {
    close: close[last],
    ema20: valueAt(ema20, last),
    sma50: valueAt(sma50, last),
    sma200: valueAt(sma200, last),
    adx: valueAt(adxSeries, last) ?? 0,
    atr: atrNow,
    atrMean: valueAt(atrMeanSeries, last) ?? atrNow,
    vix: vix && vix.length > 0 ? vix[vix.length - 1].close : 0,
    breadth: estimateBreadth(close, sma50, breadthLookback),
    adxHistory: tail(adxSeries, SPARKLINE_LENGTH),
    vixHistory: vix ? tail(closes(vix), SPARKLINE_LENGTH) : [],
  };
}

/**
 * Share of the last `lookback` bars that closed above SMA50, in percent.
 * Bars without an SMA50 count as not above.
 */
export function estimateBreadth(close: number[], sma50: number[], lookback: number): number {
  const start = Math.max(0, close.length - lookback);
  const count = close.length - start;
  if (count === 0) return 50;

  let above = 0;
  for (let i = start; i < close.length; i++) {
    if (!Number.isNaN(sma50[i]) && close[i] > sma50[i]) above++;
  }
  return (above / count) * 100;
}

function tail(series: number[], n: number): number[] {
  return series
    .slice(-n)
    .filter((v) => !Number.isNaN(v))
    .map((v) => round(v, 1));
}

// ============================================
// Classification
// ============================================

export function classifyReadings(
  r: MarketReadings,
  thresholds: RegimeConfig['thresholds'],
): MarketRegime {
  const aboveEma20 = r.ema20 !== null && r.close > r.ema20;
  const goldenCross = r.sma50 !== null && r.sma200 !== null && r.sma50 > r.sma200;
  const atrExpanding = r.atrMean > 0 && r.atr > r.atrMean * thresholds.atrExpansion;

  if (r.vix > thresholds.vixHigh || atrExpanding) return 'HIGH_VOLATILITY';
  if (r.adx > thresholds.adxTrending && aboveEma20 && goldenCross) return 'TRENDING_UP';
  if (r.adx > thresholds.adxTrending && !aboveEma20 && !goldenCross) return 'TRENDING_DOWN';
  return 'RANGE_BOUND';
}

export function describeTrend(r: MarketReadings): TrendDescriptor {
  const checks = [
    r.ema20 !== null && r.close > r.ema20,
    r.sma50 !== null && r.close > r.sma50,
    r.sma200 !== null && r.close > r.sma200,
  ];
  if (checks.every(Boolean)) return 'above_all_sma';
  if (!checks.some(Boolean)) return 'below_all_sma';
  return 'mixed';
}

// ============================================
// Classifier
// ============================================

export class RegimeClassifier {
  private config: RegimeConfig;
  private log: Logger;
  private history: RegimeHistoryEntry[] = [];
  private regimeStartDate: string | null = null;

  constructor(
    config: RegimeConfig = DEFAULT_ENGINE_CONFIG.regime,
    options: { logger?: Logger; history?: RegimeHistoryEntry[] } = {},
  ) {
    this.config = config;
    this.log = options.logger ?? createLogger('Regime');
    if (options.history) this.loadHistory(options.history);
  }

  /**
   * Classify the market as of `date`. `market` and `vix` must already be
   * sliced to bars dated on or before `date`.
   */
  classify(market: Candle[], vix: Candle[] | null | undefined, date: string): RegimeAssessment {
    if (market.length < this.config.minBars) {
      this.log.warn(`Insufficient market data for regime detection (${market.length} bars)`);
      return defaultAssessment();
    }

    const readings = computeReadings(market, vix, this.config.breadthLookback);
    const regime = classifyReadings(readings, this.config.thresholds);
    const profile = REGIME_PROFILES[regime];
    const confidence = readings.adx > 0 ? Math.min(readings.adx / 40, 1.0) : DEFAULT_CONFIDENCE;

    const { ageDays, startDate } = this.advanceAge(regime, date);

    const assessment: RegimeAssessment = {
      regime,
      confidence: round(confidence, 2),
      trend: describeTrend(readings),
      adx: round(readings.adx, 1),
      vix: round(readings.vix, 1),
      breadth: round(readings.breadth, 1),
      regimeAgeDays: ageDays,
      regimeStartDate: startDate,
      activeStrategies: [...profile.activeStrategies],
      positionSizeModifier: profile.positionSizeModifier,
      adxHistory: readings.adxHistory,
      vixHistory: readings.vixHistory,
    };

    this.record(assessment, date);

    this.log.info(
      `Regime: ${regime} (confidence: ${(confidence * 100).toFixed(0)}%, ` +
        `ADX: ${readings.adx.toFixed(1)}, VIX: ${readings.vix.toFixed(1)}, ` +
        `Breadth: ${readings.breadth.toFixed(0)}%)`,
    );

    return assessment;
  }

  /** Rolling history, oldest first */
  getHistory(): RegimeHistoryEntry[] {
    return this.history.map((e) => ({ ...e }));
  }

  /** Most recent entry, or null before the first classification */
  getLatest(): RegimeHistoryEntry | null {
    const latest = this.history[this.history.length - 1];
    return latest ? { ...latest } : null;
  }

  /**
   * Replace the history (e.g. from the repository). The regime start date is
   * recovered from the trailing run of same-regime entries.
   */
  loadHistory(entries: RegimeHistoryEntry[]): void {
    const sorted = [...entries].sort((a, b) => a.date.localeCompare(b.date));
    this.history = sorted.slice(-this.config.historyLimit).map((e) => ({ ...e }));
    this.regimeStartDate = recoverStartDate(this.history);
  }

  private advanceAge(regime: MarketRegime, date: string): { ageDays: number; startDate: string } {
    const previous = this.previousEntry(date);
    if (previous && previous.regime === regime) {
      return {
        ageDays: previous.ageDays + 1,
        startDate: recoverStartDate(this.history.filter((e) => e.date < date)) ?? previous.date,
      };
    }
    return { ageDays: 0, startDate: date };
  }

  private previousEntry(date: string): RegimeHistoryEntry | null {
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].date < date) return this.history[i];
    }
    return null;
  }

  private record(assessment: RegimeAssessment, date: string): void {
    this.history = this.history.filter((e) => e.date !== date);
    this.history.push({
      date,
      regime: assessment.regime,
      confidence: assessment.confidence,
      adx: assessment.adx,
      vix: assessment.vix,
      breadth: assessment.breadth,
      ageDays: assessment.regimeAgeDays,
    });
    this.history.sort((a, b) => a.date.localeCompare(b.date));
    if (this.history.length > this.config.historyLimit) {
      this.history = this.history.slice(-this.config.historyLimit);
    }
    this.regimeStartDate = assessment.regimeStartDate;
  }

  /** Start date of the regime currently in force */
  getRegimeStartDate(): string | null {
    return this.regimeStartDate;
  }
}

/** Date of the first entry in the trailing same-regime run */
function recoverStartDate(history: RegimeHistoryEntry[]): string | null {
  if (history.length === 0) return null;
  const current = history[history.length - 1].regime;
  let start = history[history.length - 1].date;
  for (let i = history.length - 2; i >= 0; i--) {
    if (history[i].regime !== current) break;
    start = history[i].date;
  }
  return start;
}
