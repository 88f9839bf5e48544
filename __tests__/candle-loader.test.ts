import { afterAll, describe, expect, it } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ZodError } from 'zod';

import { loadCandleDir, parseCandles } from '@/lib/data/candle-loader';
import { JsonDirectoryProvider } from '@/lib/pipeline';
import { flatCandles } from './helpers/fixtures';

describe('parseCandles', () => {
  it('should sort bars, keep the last duplicate and default volume', () => {
    const candles = parseCandles([
      { date: '2024-01-03', open: 3, high: 3, low: 3, close: 3 },
      { date: '2024-01-02', open: 1, high: 1, low: 1, close: 1, volume: 10 },
      { date: '2024-01-02', open: 2, high: 2, low: 2, close: 2, volume: 20 },
    ]);

    expect(candles).toEqual([
      { date: '2024-01-02', open: 2, high: 2, low: 2, close: 2, volume: 20 },
      { date: '2024-01-03', open: 3, high: 3, low: 3, close: 3, volume: 0 },
    ]);
  });

  it('should reject malformed bars', () => {
    expect(() => parseCandles([{ date: '01/02/2024', open: 1, high: 1, low: 1, close: 1 }])).toThrow(ZodError);
    expect(() => parseCandles({ date: '2024-01-02' })).toThrow(ZodError);
  });
});

describe('Candle files', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'candles-'));
  fs.writeFileSync(path.join(dir, 'AAPL.json'), JSON.stringify(flatCandles(5)));
  fs.writeFileSync(path.join(dir, 'spy.json'), JSON.stringify(flatCandles(3)));
  fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should load every JSON series in a directory keyed by ticker', () => {
    const series = loadCandleDir(dir);

    expect(Object.keys(series).sort()).toEqual(['AAPL', 'SPY']);
    expect(series.AAPL).toHaveLength(5);
  });

  it('should serve a date window and nothing for unknown tickers', async () => {
    const provider = new JsonDirectoryProvider(dir);

    const bars = await provider.getDailyBars('aapl', '2024-01-02', '2024-01-04');

    expect(bars.map((c) => c.date)).toEqual(['2024-01-02', '2024-01-03', '2024-01-04']);
    await expect(provider.getDailyBars('MSFT', '2024-01-01', '2024-01-31')).resolves.toEqual([]);
  });
});
