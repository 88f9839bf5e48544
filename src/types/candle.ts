/**
 * Core OHLCV bar types
 */

/** One daily bar. `date` is an ISO calendar date (YYYY-MM-DD). */
export interface Candle {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** The subset of a bar the position lifecycle needs */
export type PriceBar = Pick<Candle, 'open' | 'high' | 'low' | 'close'>;

/** Bars keyed by ticker, all dated the same day */
export type BarsByTicker = Record<string, PriceBar>;

/**
 * All bars dated on or before `date`. Series are sorted ascending, so this
 * is a prefix of the input.
 */
export function sliceToDate<T extends Pick<Candle, 'date'>>(series: T[], date: string): T[] {
  let end = series.length;
  while (end > 0 && series[end - 1].date > date) end--;
  return end === series.length ? series : series.slice(0, end);
}

/** The bar dated exactly `date`, if any */
export function barOn<T extends Pick<Candle, 'date'>>(series: T[], date: string): T | undefined {
  for (let i = series.length - 1; i >= 0; i--) {
    const d = series[i].date;
    if (d === date) return series[i];
    if (d < date) return undefined;
  }
  return undefined;
}
