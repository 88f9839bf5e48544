/**
 * Market Data Provider
 *
 * The pipeline's only view of the outside world. Vendor clients live
 * outside this project; a JSON directory provider ships for local runs.
 */

import fs from 'fs';
import path from 'path';
import type { Candle, SentimentReading } from '@/types';
import { sliceToDate } from '@/types';
import { loadCandleFile } from '@/lib/data/candle-loader';

export interface MarketDataProvider {
  /** Dependency name used for circuit breaking */
  readonly name: string;
  /** Daily bars with from ≤ date ≤ to, ascending. Empty when unknown. */
  getDailyBars(ticker: string, from: string, to: string): Promise<Candle[]>;
  getSentiment?(tickers: string[]): Promise<SentimentReading[]>;
}

/**
 * Serves <dir>/<TICKER>.json files, each an array of daily bars
 */
export class JsonDirectoryProvider implements MarketDataProvider {
  readonly name = 'json-directory';
  private cache = new Map<string, Candle[]>();

  constructor(private readonly dir: string) {}

  async getDailyBars(ticker: string, from: string, to: string): Promise<Candle[]> {
    const series = this.load(ticker.toUpperCase());
    return sliceToDate(series, to).filter((c) => c.date >= from);
  }

  private load(ticker: string): Candle[] {
    const cached = this.cache.get(ticker);
    if (cached) return cached;

    const file = path.join(this.dir, `${ticker}.json`);
    const series = fs.existsSync(file) ? loadCandleFile(file) : [];
    this.cache.set(ticker, series);
    return series;
  }
}
