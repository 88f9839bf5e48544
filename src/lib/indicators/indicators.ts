/**
 * Technical Indicators
 *
 * Stateless indicator library used by the technical analyzer and the regime
 * classifier. Every function maps an input series to an output series of the
 * same length; positions without enough history hold NaN.
 */

import type { Candle } from '@/types/candle';

type Series = number[];

function nanSeries(n: number): Series {
  return new Array<number>(n).fill(NaN);
}

/** Index of the first run of `period` consecutive finite values, -1 if none */
function firstFullWindow(values: Series, period: number): number {
  let run = 0;
  for (let i = 0; i < values.length; i++) {
    run = Number.isFinite(values[i]) ? run + 1 : 0;
    if (run === period) return i;
  }
  return -1;
}

// ============================================
// Moving Averages
// ============================================

/**
 * Simple moving average. NaN inside the window propagates.
 */
export function sma(values: Series, period: number): Series {
  const out = nanSeries(values.length);
  for (let i = period - 1; i < values.length; i++) {
    let total = 0;
    for (let j = i - period + 1; j <= i; j++) total += values[j];
    out[i] = total / period;
  }
  return out;
}

/**
 * Exponential moving average, seeded with the SMA of the first full window.
 * Leading NaNs (e.g. from a MACD line) are skipped.
 */
export function ema(values: Series, period: number): Series {
  const out = nanSeries(values.length);
  const seedEnd = firstFullWindow(values, period);
  if (seedEnd < 0) return out;

  let seed = 0;
  for (let i = seedEnd - period + 1; i <= seedEnd; i++) seed += values[i];
  let prev = seed / period;
  out[seedEnd] = prev;

  const k = 2 / (period + 1);
  for (let i = seedEnd + 1; i < values.length; i++) {
    prev = values[i] * k + prev * (1 - k);
    out[i] = prev;
  }
  return out;
}

/**
 * Wilder's smoothing (RMA), seeded with the SMA of the first full window.
 */
export function wilder(values: Series, period: number): Series {
  const out = nanSeries(values.length);
  const seedEnd = firstFullWindow(values, period);
  if (seedEnd < 0) return out;

  let seed = 0;
  for (let i = seedEnd - period + 1; i <= seedEnd; i++) seed += values[i];
  let prev = seed / period;
  out[seedEnd] = prev;

  for (let i = seedEnd + 1; i < values.length; i++) {
    prev = (prev * (period - 1) + values[i]) / period;
    out[i] = prev;
  }
  return out;
}

// ============================================
// Rolling Window Statistics
// ============================================

export function rollingMean(values: Series, window: number): Series {
  return sma(values, window);
}

export function rollingMin(values: Series, window: number): Series {
  const out = nanSeries(values.length);
  for (let i = window - 1; i < values.length; i++) {
    let min = Infinity;
    let valid = true;
    for (let j = i - window + 1; j <= i; j++) {
      if (!Number.isFinite(values[j])) {
        valid = false;
        break;
      }
      min = Math.min(min, values[j]);
    }
    if (valid) out[i] = min;
  }
  return out;
}

// ============================================
// RSI
// ============================================

/**
 * Relative Strength Index with Wilder's smoothing. First value at `period`.
 */
export function rsi(values: Series, period = 14): Series {
  const out = nanSeries(values.length);
  if (values.length <= period) return out;

  const gains = nanSeries(values.length);
  const losses = nanSeries(values.length);
  for (let i = 1; i < values.length; i++) {
    const change = values[i] - values[i - 1];
    gains[i] = change > 0 ? change : 0;
    losses[i] = change < 0 ? -change : 0;
  }

  const avgGain = wilder(gains, period);
  const avgLoss = wilder(losses, period);
  for (let i = period; i < values.length; i++) {
    if (!Number.isFinite(avgGain[i]) || !Number.isFinite(avgLoss[i])) continue;
    if (avgLoss[i] === 0) {
      out[i] = avgGain[i] === 0 ? 50 : 100;
    } else {
      out[i] = 100 - 100 / (1 + avgGain[i] / avgLoss[i]);
    }
  }
  return out;
}

// ============================================
// MACD
// ============================================

export interface MACDSeries {
  macd: Series;
  signal: Series;
  histogram: Series;
}

export function macd(values: Series, fast = 12, slow = 26, signalPeriod = 9): MACDSeries {
  const fastEma = ema(values, fast);
  const slowEma = ema(values, slow);
  const line = values.map((_, i) => fastEma[i] - slowEma[i]);
  const signal = ema(line, signalPeriod);
  const histogram = line.map((v, i) => v - signal[i]);
  return { macd: line, signal, histogram };
}

// ============================================
// Bollinger Bands
// ============================================

export interface BollingerSeries {
  upper: Series;
  middle: Series;
  lower: Series;
  /** Absolute band width (upper - lower) */
  width: Series;
}

/**
 * Bollinger Bands around an SMA with population standard deviation.
 */
export function bollinger(values: Series, period = 20, stdDevMultiple = 2): BollingerSeries {
  const middle = sma(values, period);
  const upper = nanSeries(values.length);
  const lower = nanSeries(values.length);
  const width = nanSeries(values.length);

  for (let i = period - 1; i < values.length; i++) {
    let variance = 0;
    for (let j = i - period + 1; j <= i; j++) variance += (values[j] - middle[i]) ** 2;
    const stdDev = Math.sqrt(variance / period);
    upper[i] = middle[i] + stdDev * stdDevMultiple;
    lower[i] = middle[i] - stdDev * stdDevMultiple;
    width[i] = upper[i] - lower[i];
  }

  return { upper, middle, lower, width };
}

// ============================================
// ATR / ADX
// ============================================

export function trueRange(candles: Candle[]): Series {
  return candles.map((c, i) => {
    if (i === 0) return c.high - c.low;
    const prevClose = candles[i - 1].close;
    return Math.max(c.high - c.low, Math.abs(c.high - prevClose), Math.abs(c.low - prevClose));
  });
}

/**
 * Average True Range with Wilder's smoothing. First value at `period - 1`.
 */
export function atr(candles: Candle[], period = 14): Series {
  return wilder(trueRange(candles), period);
}

/**
 * Average Directional Index (Wilder). First value at `2 * period - 1`.
 */
export function adx(candles: Candle[], period = 14): Series {
  const n = candles.length;
  const out = nanSeries(n);
  if (n < 2 * period) return out;

  const plusDM = nanSeries(n);
  const minusDM = nanSeries(n);
  const tr = nanSeries(n);
  for (let i = 1; i < n; i++) {
    const up = candles[i].high - candles[i - 1].high;
    const down = candles[i - 1].low - candles[i].low;
    plusDM[i] = up > down && up > 0 ? up : 0;
    minusDM[i] = down > up && down > 0 ? down : 0;
    const prevClose = candles[i - 1].close;
    tr[i] = Math.max(
      candles[i].high - candles[i].low,
      Math.abs(candles[i].high - prevClose),
      Math.abs(candles[i].low - prevClose),
    );
  }

  const smoothTr = wilder(tr, period);
  const smoothPlus = wilder(plusDM, period);
  const smoothMinus = wilder(minusDM, period);

  const dx = nanSeries(n);
  for (let i = period; i < n; i++) {
    if (!(smoothTr[i] > 0)) {
      dx[i] = 0;
      continue;
    }
    const plusDI = (100 * smoothPlus[i]) / smoothTr[i];
    const minusDI = (100 * smoothMinus[i]) / smoothTr[i];
    const diSum = plusDI + minusDI;
    dx[i] = diSum === 0 ? 0 : (100 * Math.abs(plusDI - minusDI)) / diSum;
  }

  const smoothed = wilder(dx, period);
  for (let i = 0; i < n; i++) out[i] = smoothed[i];
  return out;
}

// ============================================
// Helpers
// ============================================

export function closes(candles: Candle[]): Series {
  return candles.map((c) => c.close);
}

export function volumes(candles: Candle[]): Series {
  return candles.map((c) => c.volume);
}

/** Last value if finite, else `fallback` */
export function latest(series: Series, fallback = 0): number {
  const v = series[series.length - 1];
  return v !== undefined && Number.isFinite(v) ? v : fallback;
}

/** Finite value at `index`, or null */
export function valueAt(series: Series, index: number): number | null {
  const v = series[index];
  return v !== undefined && Number.isFinite(v) ? v : null;
}
