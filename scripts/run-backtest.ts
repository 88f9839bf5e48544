#!/usr/bin/env npx tsx
/**
 * Backtest CLI
 * Replay daily bars from a directory of <TICKER>.json files through the engine
 *
 * Usage:
 *   npx tsx scripts/run-backtest.ts --data ./data/bars --start 2024-01-02 --end 2024-12-31
 *   npx tsx scripts/run-backtest.ts --data ./data/bars --start 2024-01-02 --end 2024-06-28 --out ./data/backtest
 *   npx tsx scripts/run-backtest.ts --help
 */

import fs from 'fs';
import path from 'path';

import { loadEngineConfig, DEFAULT_CONFIG_PATH } from '../src/lib/config';
import { loadCandleDir } from '../src/lib/data/candle-loader';
import { Backtester, formatBacktestReport } from '../src/lib/backtest';
import { computePortfolioReport, formatPortfolioSummary } from '../src/lib/paper-trading';
import { isIsoDate } from '../src/lib/utils/dates';

interface Args {
  data: string;
  start: string;
  end: string;
  market: string;
  vix: string;
  config: string;
  out: string | null;
  help: boolean;
}

function parseArgs(): Args {
  const args = process.argv.slice(2);
  const options: Record<string, string> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      options['help'] = 'true';
    } else if (arg?.startsWith('--')) {
      const key = arg.replace(/^--/, '');
      const value = args[i + 1];
      if (value && !value.startsWith('--')) {
        options[key] = value;
        i++;
      } else {
        options[key] = 'true';
      }
    }
  }

  return {
    data: options['data'] || path.join('data', 'bars'),
    start: options['start'] || '',
    end: options['end'] || '',
    market: (options['market'] || 'SPY').toUpperCase(),
    vix: (options['vix'] || 'VIX').toUpperCase(),
    config: options['config'] || DEFAULT_CONFIG_PATH,
    out: options['out'] || null,
    help: options['help'] === 'true',
  };
}

function printHelp(): void {
  console.log(`
Regime Paper Engine - Backtest

Usage:
  npx tsx scripts/run-backtest.ts [options]

Options:
  --data <dir>       Directory of <TICKER>.json daily bars (default: data/bars)
  --start <date>     First trading day, YYYY-MM-DD (required)
  --end <date>       Last trading day, YYYY-MM-DD (required)
  --market <ticker>  Market proxy series (default: SPY, falls back to US500)
  --vix <ticker>     Volatility index series (default: VIX)
  --config <file>    Engine config JSON (default: ${DEFAULT_CONFIG_PATH})
  --out <dir>        Write the result as JSON to this directory
  --help, -h         Show this help
`);
}

function main(): void {
  const args = parseArgs();
  if (args.help) {
    printHelp();
    return;
  }

  if (!isIsoDate(args.start) || !isIsoDate(args.end) || args.start > args.end) {
    console.error('[Backtest] --start and --end must be YYYY-MM-DD with start <= end');
    process.exit(1);
  }

  const config = loadEngineConfig(args.config);
  const series = loadCandleDir(args.data);
  const market = series[args.market] ?? series['US500'];
  if (!market) {
    console.error(`[Backtest] No market proxy series (${args.market} or US500) in ${args.data}`);
    process.exit(1);
  }

  console.log(`[Backtest] Loaded ${Object.keys(series).length} series from ${args.data}`);

  const backtester = new Backtester(config);
  const result = backtester.run({
    instruments: series,
    market,
    vix: series[args.vix] ?? null,
    startDate: args.start,
    endDate: args.end,
  });

  console.log(formatBacktestReport(result));
  console.log('');
  console.log(
    formatPortfolioSummary(
      computePortfolioReport(result.trades, result.startingBalance, result.endingBalance),
    ),
  );

  if (args.out) {
    fs.mkdirSync(args.out, { recursive: true });
    const file = path.join(args.out, `backtest_${result.startDate}_to_${result.endDate}.json`);
    fs.writeFileSync(file, JSON.stringify(result, null, 2));
    console.log(`[Backtest] Report saved to ${file}`);
  }
}

try {
  main();
} catch (error: unknown) {
  console.error('[Backtest] Fatal error:', error);
  process.exit(1);
}
