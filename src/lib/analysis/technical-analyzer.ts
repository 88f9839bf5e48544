/**
 * Technical Analyzer
 *
 * Turns an OHLCV series into a TechnicalSummary: indicator readings at the
 * last bar, discrete signal flags and a weighted composite in [-1, 1].
 */

import type { Candle, TechnicalSummary } from '@/types';
import {
  adx,
  atr,
  bollinger,
  closes,
  ema,
  latest,
  macd,
  rollingMin,
  rsi,
  sma,
  valueAt,
  volumes,
} from '@/lib/indicators';
import { clamp } from '@/lib/utils/math';
import { createLogger, type Logger } from '@/lib/utils/logger';

export interface AnalyzerConfig {
  /** Minimum bars before analysis (default: 30) */
  minBars: number;
  rsiOversold: number;
  rsiOverbought: number;
  /** Volume ratio above which the volume flag is set (default: 1.5) */
  volumeSurge: number;
  /** Band width below rolling-min × this is a squeeze (default: 1.1) */
  squeezeFactor: number;
  squeezeLookback: number;
}

const DEFAULT_CONFIG: AnalyzerConfig = {
  minBars: 30,
  rsiOversold: 30,
  rsiOverbought: 70,
  volumeSurge: 1.5,
  squeezeFactor: 1.1,
  squeezeLookback: 50,
};

/** Discrete flags feeding the composite */
export interface SignalFlags {
  rsi: number;
  macd: number;
  smaCross: number;
  emaTrend: number;
  volume: number;
  volumeRatio: number;
  bbSqueeze: boolean;
  bbPosition: number;
}

const COMPOSITE_WEIGHTS = {
  rsi: 0.25,
  macd: 0.25,
  smaCross: 0.2,
  emaTrend: 0.15,
  volume: 0.15,
} as const;

export function compositeFromFlags(flags: SignalFlags): number {
  const raw =
    flags.rsi * COMPOSITE_WEIGHTS.rsi +
    flags.macd * COMPOSITE_WEIGHTS.macd +
    flags.smaCross * COMPOSITE_WEIGHTS.smaCross +
    flags.emaTrend * COMPOSITE_WEIGHTS.emaTrend +
    flags.volume * COMPOSITE_WEIGHTS.volume;
  return clamp(raw, -1, 1);
}

export class TechnicalAnalyzer {
  private config: AnalyzerConfig;
  private log: Logger;

  constructor(config: Partial<AnalyzerConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.log = logger ?? createLogger('Analyzer');
  }

  /**
   * Analyze a series. Returns null when there is too little history.
   */
  analyze(ticker: string, candles: Candle[]): TechnicalSummary | null {
    if (candles.length < this.config.minBars) {
      this.log.warn(`Insufficient data for ${ticker} (${candles.length} bars)`);
      return null;
    }

    const close = closes(candles);
    const last = candles.length - 1;

    const rsiSeries = rsi(close, 14);
    const macdSeries = macd(close, 12, 26, 9);
    const sma50 = sma(close, 50);
    const sma200 = sma(close, 200);
    const ema20 = ema(close, 20);
    const bands = bollinger(close, 20, 2);
    const adxSeries = adx(candles, 14);
    const atrSeries = atr(candles, 14);
    const volAvg = sma(volumes(candles), 20);

    const flags = this.computeFlags(candles, {
      rsi: valueAt(rsiSeries, last),
      hist: valueAt(macdSeries.histogram, last),
      prevHist: valueAt(macdSeries.histogram, last - 1),
      sma50: valueAt(sma50, last),
      sma200: valueAt(sma200, last),
      ema20: valueAt(ema20, last),
      volAvg: valueAt(volAvg, last),
      bbUpper: valueAt(bands.upper, last),
      bbLower: valueAt(bands.lower, last),
      bbWidth: valueAt(bands.width, last),
      bbMinWidth: valueAt(rollingMin(bands.width, this.config.squeezeLookback), last),
    });

    return {
      ticker,
      rsi: latest(rsiSeries, 50),
      macdSignal: Math.sign(flags.macd),
      macdHistogram: latest(macdSeries.histogram, 0),
      smaCross: flags.smaCross,
      emaTrend: flags.emaTrend,
      bbSqueeze: flags.bbSqueeze,
      bbPosition: flags.bbPosition,
      volumeRatio: flags.volumeRatio,
      atr: latest(atrSeries, 0),
      close: candles[last].close,
      sma50: latest(sma50, 0),
      sma200: latest(sma200, 0),
      ema20: latest(ema20, 0),
      adx: latest(adxSeries, 0),
      composite: compositeFromFlags(flags),
    };
  }

  private computeFlags(
    candles: Candle[],
    v: {
      rsi: number | null;
      hist: number | null;
      prevHist: number | null;
      sma50: number | null;
      sma200: number | null;
      ema20: number | null;
      volAvg: number | null;
      bbUpper: number | null;
      bbLower: number | null;
      bbWidth: number | null;
      bbMinWidth: number | null;
    },
  ): SignalFlags {
    const bar = candles[candles.length - 1];
    const { rsiOversold, rsiOverbought, volumeSurge, squeezeFactor } = this.config;

    let rsiFlag = 0;
    if (v.rsi !== null) {
      if (v.rsi < rsiOversold) rsiFlag = 1;
      else if (v.rsi > rsiOverbought) rsiFlag = -1;
    }

    let macdFlag = 0;
    if (v.hist !== null && v.prevHist !== null) {
      if (v.hist > 0 && v.prevHist <= 0) macdFlag = 1;
      else if (v.hist < 0 && v.prevHist >= 0) macdFlag = -1;
      else if (v.hist > 0) macdFlag = 0.5;
      else if (v.hist < 0) macdFlag = -0.5;
    }

    const smaCross = v.sma50 !== null && v.sma200 !== null ? (v.sma50 > v.sma200 ? 1 : -1) : 0;
    const emaTrend = v.ema20 !== null ? (bar.close > v.ema20 ? 1 : -1) : 0;

    let volumeRatio = 1.0;
    let volume = 0;
    if (v.volAvg !== null && v.volAvg > 0) {
      volumeRatio = bar.volume / v.volAvg;
      volume = volumeRatio > volumeSurge ? 1 : 0;
    }

    const bbSqueeze =
      v.bbWidth !== null && v.bbMinWidth !== null && v.bbWidth < v.bbMinWidth * squeezeFactor;

    let bbPosition = 0;
    if (v.bbUpper !== null && v.bbLower !== null) {
      const bandRange = v.bbUpper - v.bbLower;
      if (bandRange > 0) bbPosition = ((bar.close - v.bbLower) / bandRange) * 2 - 1;
    }

    return {
      rsi: rsiFlag,
      macd: macdFlag,
      smaCross,
      emaTrend,
      volume,
      volumeRatio,
      bbSqueeze,
      bbPosition,
    };
  }
}

export { DEFAULT_CONFIG as DEFAULT_ANALYZER_CONFIG };
