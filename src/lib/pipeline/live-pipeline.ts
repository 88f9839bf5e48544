/**
 * Live Pipeline
 *
 * One daily run against persisted state:
 *   1. load positions, trades, balance, regime history and behavior log;
 *      a date the stored state has already reached is skipped
 *   2. fetch market proxy, volatility index and universe bars (breaker-guarded)
 *   3. run one decision cycle
 *   4. commit everything the cycle changed in one transaction
 */

import { v4 as uuidv4 } from 'uuid';

import type { Candle, SentimentReading } from '@/types';
import type { EngineConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import type { EngineStateRepository, StoredRiskAssessment } from '@/lib/paper-trading/repository';
import { addDays } from '@/lib/utils/dates';
import { createLogger, type Logger } from '@/lib/utils/logger';

import { CircuitBreaker, type DependencyHealth } from './circuit-breaker';
import { DecisionCycle, buildCycleInputs, createCycleComponents, type CycleResult } from './decision-cycle';
import type { MarketDataProvider } from './market-data';

export type PipelineRunResult =
  | { status: 'completed'; cycle: CycleResult; health: DependencyHealth[] }
  | { status: 'skipped'; reason: string; health: DependencyHealth[] };

export class LivePipeline {
  private repo: EngineStateRepository;
  private provider: MarketDataProvider;
  private config: EngineConfig;
  private breaker: CircuitBreaker;
  private log: Logger;
  private componentLogger: ((scope: string) => Logger) | undefined;

  constructor(
    repo: EngineStateRepository,
    provider: MarketDataProvider,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG,
    options: {
      logger?: Logger;
      componentLogger?: (scope: string) => Logger;
      breaker?: CircuitBreaker;
    } = {},
  ) {
    this.repo = repo;
    this.provider = provider;
    this.config = config;
    this.log = options.logger ?? createLogger('Pipeline', config.logging);
    this.componentLogger = options.componentLogger;
    this.breaker =
      options.breaker ??
      new CircuitBreaker(config.pipeline.circuitBreaker, { logger: createLogger('Circuit', config.logging) });
  }

  async run(asOf: string): Promise<PipelineRunResult> {
    const { pipeline } = this.config;

    // Step 1: State
    const [positions, closedTrades, performance, regimeHistory, behaviorLog] = await Promise.all([
      this.repo.loadPositions(),
      this.repo.listClosedTrades(),
      this.repo.loadPerformance(),
      this.repo.listRegimeHistory(),
      this.repo.listBehavior(),
    ]);
    this.log.info(`Loaded ${positions.length} open position(s), ${closedTrades.length} closed trade(s)`);

    const lastRun = performance?.lastUpdated;
    if (lastRun && lastRun >= asOf) {
      this.log.warn(`State already advanced to ${lastRun}, skipping run for ${asOf}`);
      return { status: 'skipped', reason: 'already processed', health: this.breaker.getHealth() };
    }

    // Step 2: Market data
    const from = addDays(asOf, -pipeline.historyDays);
    const market = await this.fetchMarketProxy(from, asOf);
    if (!market) {
      this.log.error('No market proxy data available, skipping run');
      return { status: 'skipped', reason: 'no market data', health: this.breaker.getHealth() };
    }
    const vix = await this.fetchBars(pipeline.volatilityTicker, from, asOf);

    const tickers = [...new Set([...pipeline.universe, ...positions.map((p) => p.ticker)])];
    const series: Record<string, Candle[]> = {};
    for (const ticker of tickers) {
      const bars = await this.fetchBars(ticker, from, asOf);
      if (bars && bars.length > 0) series[ticker] = bars;
    }
    const sentiment = await this.fetchSentiment(pipeline.universe);

    const inputs = buildCycleInputs(
      { date: asOf, market, vix, series, candidates: pipeline.universe, sentiment },
      this.config.backtest,
    );
    if (!inputs) {
      this.log.error(`No market bar for ${asOf} or too little history, skipping run`);
      return { status: 'skipped', reason: 'no market bar', health: this.breaker.getHealth() };
    }

    // Step 3: Decide
    const components = createCycleComponents(this.config, {
      logger: this.componentLogger,
      regimeHistory,
      trader: {
        positions,
        closedTrades,
        virtualBalance: performance?.virtualBalance ?? this.config.trader.startingBalance,
        lastUpdated: performance?.lastUpdated ?? null,
      },
    });
    const cycle = new DecisionCycle(components, this.config, {
      logger: this.componentLogger?.('Cycle'),
      behaviorLog,
    });
    const result = cycle.run(inputs);

    // Step 4: Commit
    const latest = components.classifier.getLatest();
    const portfolio: StoredRiskAssessment = {
      id: uuidv4(),
      date: asOf,
      scope: 'portfolio',
      ticker: null,
      strategy: null,
      assessment: result.portfolioRisk,
    };
    await this.repo.commitCycle({
      positions: components.trader.getOpenPositions(),
      closedTrades: result.closed,
      performance: result.performance,
      regime: latest && latest.date === asOf ? latest : null,
      behavior: result.behavior,
      assessments: [...result.tradeAssessments, portfolio],
    });

    this.log.info(
      `Run ${asOf} committed: ${result.regime.regime}, ${result.opened.length} opened, ` +
        `${result.closed.length} closed, balance $${result.performance.virtualBalance.toFixed(2)}`,
    );

    return { status: 'completed', cycle: result, health: this.breaker.getHealth() };
  }

  getHealth(): DependencyHealth[] {
    return this.breaker.getHealth();
  }

  /** First configured market ticker with data */
  private async fetchMarketProxy(from: string, to: string): Promise<Candle[] | null> {
    for (const ticker of this.config.pipeline.marketTickers) {
      const bars = await this.fetchBars(ticker, from, to);
      if (bars && bars.length > 0) {
        this.log.info(`Market proxy: ${ticker} (${bars.length} bars)`);
        return bars;
      }
      this.log.warn(`No data for market proxy ${ticker}`);
    }
    return null;
  }

  private fetchBars(ticker: string, from: string, to: string): Promise<Candle[] | null> {
    return this.breaker.call(this.provider.name, () => this.provider.getDailyBars(ticker, from, to));
  }

  private async fetchSentiment(tickers: string[]): Promise<Map<string, SentimentReading>> {
    const readings = new Map<string, SentimentReading>();
    const { provider } = this;
    if (!provider.getSentiment || tickers.length === 0) return readings;

    const getSentiment = provider.getSentiment.bind(provider);
    const result = await this.breaker.call(`${provider.name}:sentiment`, () => getSentiment(tickers));
    for (const r of result ?? []) readings.set(r.ticker, r);
    return readings;
  }
}
