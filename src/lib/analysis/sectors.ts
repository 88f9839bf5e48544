/**
 * Ticker → sector lookup used for portfolio concentration checks
 */

import { z } from 'zod';
import sectorTable from './sectors.json';

const SECTOR_MAP: Record<string, string> = z.record(z.string()).parse(sectorTable);

/** Sector for a ticker, '' when unknown */
export function sectorFor(ticker: string, overrides: Record<string, string> = {}): string {
  const key = ticker.toUpperCase();
  return overrides[key] ?? SECTOR_MAP[key] ?? '';
}
