/**
 * Candle File Loader
 * Reads daily OHLCV series from JSON files: one array of bars per ticker,
 * named <TICKER>.json
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Candle } from '@/types';
import { isIsoDate } from '@/lib/utils/dates';

const CandleSchema = z.object({
  date: z.string().refine(isIsoDate, { message: 'expected YYYY-MM-DD' }),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative().default(0),
});

const CandleSeriesSchema = z.array(CandleSchema);

/**
 * Validate and sort a raw series. Duplicate dates keep the last bar.
 * Throws a ZodError on malformed input.
 */
export function parseCandles(raw: unknown): Candle[] {
  const candles = CandleSeriesSchema.parse(raw);
  const byDate = new Map<string, Candle>();
  for (const c of candles) byDate.set(c.date, c);
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}

export function loadCandleFile(filePath: string): Candle[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parseCandles(raw);
}

/**
 * Load every <TICKER>.json in a directory, keyed by upper-cased ticker
 */
export function loadCandleDir(dir: string): Record<string, Candle[]> {
  const series: Record<string, Candle[]> = {};
  for (const file of fs.readdirSync(dir)) {
    if (!file.endsWith('.json')) continue;
    const ticker = path.basename(file, '.json').toUpperCase();
    series[ticker] = loadCandleFile(path.join(dir, file));
  }
  return series;
}
