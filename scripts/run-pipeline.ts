#!/usr/bin/env npx tsx
/**
 * Daily Pipeline CLI
 * Run one decision cycle against persisted state (SQLite, or PostgreSQL when
 * DATABASE_URL is set)
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts --data ./data/bars --universe AAPL,MSFT,NVDA
 *   npx tsx scripts/run-pipeline.ts --data ./data/bars --date 2024-06-28
 *   npx tsx scripts/run-pipeline.ts --help
 */

import { loadEngineConfig, DEFAULT_CONFIG_PATH } from '../src/lib/config';
import { createRepository, formatPerformance } from '../src/lib/paper-trading';
import { JsonDirectoryProvider, LivePipeline } from '../src/lib/pipeline';
import { isIsoDate, today } from '../src/lib/utils/dates';
import { createLogger } from '../src/lib/utils/logger';

interface Args {
  data: string;
  date: string;
  universe: string[];
  config: string;
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
    data: options['data'] || 'data/bars',
    date: options['date'] || today(),
    universe: (options['universe'] || '')
      .split(',')
      .map((t) => t.trim().toUpperCase())
      .filter((t) => t.length > 0),
    config: options['config'] || DEFAULT_CONFIG_PATH,
    help: options['help'] === 'true',
  };
}

function printHelp(): void {
  console.log(`
Regime Paper Engine - Daily Pipeline

Usage:
  npx tsx scripts/run-pipeline.ts [options]

Options:
  --data <dir>         Directory of <TICKER>.json daily bars (default: data/bars)
  --date <date>        Run date, YYYY-MM-DD (default: today)
  --universe <list>    Comma-separated tickers, overrides pipeline.universe
  --config <file>      Engine config JSON (default: ${DEFAULT_CONFIG_PATH})
  --help, -h           Show this help

Environment:
  DATABASE_URL         postgres:// URL; local SQLite is used when unset
`);
}

async function main(): Promise<void> {
  const args = parseArgs();
  if (args.help) {
    printHelp();
    return;
  }
  if (!isIsoDate(args.date)) {
    console.error(`[Pipeline] Invalid --date ${args.date}`);
    process.exit(1);
  }

  const loaded = loadEngineConfig(args.config);
  const config = args.universe.length > 0
    ? { ...loaded, pipeline: { ...loaded.pipeline, universe: args.universe } }
    : loaded;

  const repo = await createRepository(config.persistence, { logger: createLogger('DB', config.logging) });
  try {
    const pipeline = new LivePipeline(repo, new JsonDirectoryProvider(args.data), config);
    const result = await pipeline.run(args.date);

    if (result.status === 'skipped') {
      console.warn(`[Pipeline] Skipped: ${result.reason}`);
    } else {
      const { cycle } = result;
      console.log('');
      console.log(`Regime:         ${cycle.regime.regime} (${(cycle.regime.confidence * 100).toFixed(0)}%)`);
      console.log(`Signals:        ${cycle.signals.length} (${cycle.opened.length} opened)`);
      console.log(`Portfolio risk: ${cycle.portfolioRisk.compositeScore.toFixed(1)} ${cycle.portfolioRisk.riskLevel}`);
      console.log(formatPerformance(cycle.performance));
    }
  } finally {
    await repo.close();
  }
}

main().catch((error: unknown) => {
  console.error('[Pipeline] Fatal error:', error);
  process.exit(1);
});
