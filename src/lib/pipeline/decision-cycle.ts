/**
 * Decision Cycle
 *
 * One time-step of the engine, shared by the backtester and the live
 * pipeline so both make identical decisions from identical inputs:
 *
 *   regime → position updates → scoring → performance → defensive check
 *   → strategy matching → per-signal risk gating → entries
 *   → portfolio risk
 */

import { v4 as uuidv4 } from 'uuid';

import type {
  BarsByTicker,
  BehaviorEntry,
  BehaviorProfile,
  Candle,
  ClosedTrade,
  PerformanceSnapshot,
  Position,
  RegimeAssessment,
  RegimeHistoryEntry,
  RiskAssessment,
  ScoredInstrument,
  SentimentReading,
  StrategySignal,
} from '@/types';
import { barOn, sliceToDate } from '@/types';
import type { BacktestSettings, EngineConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { RegimeClassifier } from '@/lib/regime';
import { Scorer, type InstrumentInput } from '@/lib/analysis';
import { StrategyMatcher } from '@/lib/strategy';
import { RiskProfiler, applyRiskRecommendation, buildBehaviorProfile } from '@/lib/risk';
import { PaperTrader } from '@/lib/paper-trading/paper-trader';
import type { PaperTraderState } from '@/lib/paper-trading/types';
import type { StoredRiskAssessment } from '@/lib/paper-trading/repository';
import { createLogger, type Logger } from '@/lib/utils/logger';

// ============================================
// Types
// ============================================

export interface CycleInputs {
  date: string;
  /** Market proxy bars dated on or before `date` */
  market: Candle[];
  vix: Candle[] | null;
  /** Candidate instruments, candles sliced to `date` */
  instruments: InstrumentInput[];
  /** Bars dated `date`, for every ticker that has one */
  bars: BarsByTicker;
}

export interface CycleResult {
  date: string;
  regime: RegimeAssessment;
  closed: ClosedTrade[];
  opened: Position[];
  scored: ScoredInstrument[];
  /** Every matched signal after risk gating */
  signals: StrategySignal[];
  defensive: boolean;
  tradeAssessments: StoredRiskAssessment[];
  portfolioRisk: RiskAssessment;
  performance: PerformanceSnapshot;
  /** Behavior entries appended during this cycle */
  behavior: BehaviorEntry[];
}

export interface CycleSource {
  date: string;
  /** Full market proxy series; bars after `date` are ignored */
  market: Candle[];
  vix: Candle[] | null;
  /** Full series per ticker, including tickers held but not scored */
  series: Record<string, Candle[]>;
  /** Tickers eligible for scoring */
  candidates: string[];
  sentiment?: Map<string, SentimentReading>;
}

export interface CycleComponents {
  classifier: RegimeClassifier;
  scorer: Scorer;
  matcher: StrategyMatcher;
  riskProfiler: RiskProfiler;
  trader: PaperTrader;
}

export interface ComponentOptions {
  /** Logger factory, one logger per component scope */
  logger?: (scope: string) => Logger;
  trader?: PaperTraderState;
  regimeHistory?: RegimeHistoryEntry[];
  sectorOverrides?: Record<string, string>;
}

/**
 * Slice every series to `date` and assemble the inputs of one cycle.
 * Returns null when the market proxy has no bar dated `date` or too little
 * history. An instrument is scored only with a bar dated `date` and at
 * least `minInstrumentBars` bars.
 */
export function buildCycleInputs(source: CycleSource, settings: BacktestSettings): CycleInputs | null {
  const { date } = source;
  const market = sliceToDate(source.market, date);
  if (!barOn(source.market, date) || market.length < settings.minMarketBars) return null;

  const bars: BarsByTicker = {};
  for (const [ticker, series] of Object.entries(source.series)) {
    const bar = barOn(series, date);
    if (bar) bars[ticker] = bar;
  }

  const excluded = new Set(settings.excludedTickers.map((t) => t.toUpperCase()));
  const instruments: InstrumentInput[] = [];
  for (const ticker of new Set(source.candidates)) {
    const series = source.series[ticker];
    if (!series || !bars[ticker] || excluded.has(ticker.toUpperCase())) continue;

    const candles = sliceToDate(series, date);
    if (candles.length >= settings.minInstrumentBars) {
      instruments.push({ ticker, candles, sentiment: source.sentiment?.get(ticker) });
    }
  }

  return {
    date,
    market,
    vix: source.vix ? sliceToDate(source.vix, date) : null,
    instruments,
    bars,
  };
}

/**
 * Wire a full set of components from one config
 */
export function createCycleComponents(
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  options: ComponentOptions = {},
): CycleComponents {
  const logger = options.logger ?? ((scope: string) => createLogger(scope, config.logging));
  const matcher = new StrategyMatcher(config.strategies, config.sizing, logger('Strategy'));

  return {
    classifier: new RegimeClassifier(config.regime, {
      logger: logger('Regime'),
      history: options.regimeHistory,
    }),
    scorer: new Scorer(config.scoring, {
      logger: logger('Scorer'),
      sectorOverrides: options.sectorOverrides,
    }),
    matcher,
    riskProfiler: new RiskProfiler(config.riskProfiler),
    trader: new PaperTrader(matcher, config.trader, {
      logger: logger('Trader'),
      state: options.trader,
    }),
  };
}

// ============================================
// Cycle
// ============================================

export class DecisionCycle {
  private components: CycleComponents;
  private config: EngineConfig;
  private log: Logger;
  private behaviorLog: BehaviorEntry[];

  constructor(
    components: CycleComponents,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG,
    options: { logger?: Logger; behaviorLog?: BehaviorEntry[] } = {},
  ) {
    this.components = components;
    this.config = config;
    this.log = options.logger ?? createLogger('Cycle', config.logging);
    this.behaviorLog = [...(options.behaviorLog ?? [])];
  }

  run(inputs: CycleInputs): CycleResult {
    const { classifier, scorer, matcher, riskProfiler, trader } = this.components;
    const { date } = inputs;
    const appended: BehaviorEntry[] = [];
    const log = (entry: BehaviorEntry): void => {
      this.behaviorLog.push(entry);
      appended.push(entry);
    };

    // 1. Regime
    const regime = classifier.classify(inputs.market, inputs.vix, date);

    // 2. Advance open positions before any entry so freed slots count
    const { closed } = trader.updatePositions(inputs.bars, date);
    for (const trade of closed) {
      log(behavior(date, 'exit', trade.ticker, trade.strategy, trade.exitReason));
    }

    // 3. Score
    const scored = scorer.scoreInstruments(inputs.instruments);

    // 4-5. Performance and defensive mode
    const performance = trader.getPerformance();
    const defensive = matcher.checkDefensive(regime, performance.maxDrawdownPct);

    // 6. Match
    const matched = defensive
      ? []
      : matcher.match(scored, regime, {
          balance: trader.getBalance(),
          openPositionCount: trader.getOpenPositions().length,
          maxPositions: this.config.trader.maxConcurrentPositions,
        });
    if (defensive) this.log.warn('Defensive mode, no new entries');

    // 7. Risk gating
    const tradeAssessments: StoredRiskAssessment[] = [];
    const approved: StrategySignal[] = [];
    let signals = matched;

    if (!defensive && this.config.trader.autoEnter) {
      const openPositions = trader.getOpenPositions();
      const profile = this.profile(date);

      signals = matched.map((sig) => {
        if (sig.action !== 'enter_now') return sig;

        const assessment = riskProfiler.assessTrade(sig, openPositions, performance, regime, profile);
        tradeAssessments.push({
          id: uuidv4(),
          date,
          scope: 'trade',
          ticker: sig.instrument.ticker,
          strategy: sig.strategyName,
          assessment,
        });

        const ticker = sig.instrument.ticker;
        const reason = assessment.recommendationReason;
        switch (assessment.recommendation) {
          case 'blocked':
          case 'skip': {
            this.log.warn(`${assessment.recommendation === 'blocked' ? 'BLOCKED' : 'SKIP'} ${ticker}: ${reason}`);
            log(behavior(date, 'skip', ticker, sig.strategyName, reason));
            return { ...sig, action: 'skip' as const, skipReason: reason, riskAssessment: assessment };
          }
          default: {
            if (assessment.recommendation === 'reduce_size') {
              this.log.info(`REDUCE SIZE ${ticker}: ${reason}`);
            }
            const gated = applyRiskRecommendation(sig, assessment);
            approved.push(gated);
            return gated;
          }
        }
      });
    }

    // 8. Entries
    const opened = approved.length > 0 ? trader.admitSignals(approved, date) : [];
    for (const pos of opened) {
      const sig = approved.find((s) => s.instrument.ticker === pos.ticker);
      log(behavior(date, 'entry', pos.ticker, pos.strategy, sig?.strategyLabel ?? pos.strategy));
    }
    if (opened.length > 0) this.log.info(`Opened ${opened.length} new paper position(s)`);

    // 9. Portfolio risk
    const finalPerformance = trader.getPerformance();
    const portfolioRisk = riskProfiler.assessPortfolio(
      trader.getOpenPositions(),
      finalPerformance,
      regime,
      this.profile(date),
    );

    return {
      date,
      regime,
      closed,
      opened,
      scored,
      signals,
      defensive,
      tradeAssessments,
      portfolioRisk,
      performance: finalPerformance,
      behavior: appended,
    };
  }

  getBehaviorLog(): BehaviorEntry[] {
    return [...this.behaviorLog];
  }

  private profile(date: string): BehaviorProfile {
    return buildBehaviorProfile(
      this.behaviorLog,
      this.components.trader.getClosedTrades(),
      date,
      this.config.riskProfiler.behavioral.lookbackDays,
    );
  }
}

function behavior(
  date: string,
  action: BehaviorEntry['action'],
  ticker: string,
  strategy: string,
  reason: string,
): BehaviorEntry {
  return { date, action, ticker, strategy, planAligned: true, disciplineRating: null, reason };
}
