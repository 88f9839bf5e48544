/**
 * Instrument Scorer
 *
 * Blends the technical composite, news sentiment and a volume bonus into one
 * score in [-1, 1], discretizes it into a TradeSignal and ranks instruments
 * by signal strength.
 */

import type {
  Candle,
  ScoredInstrument,
  SentimentReading,
  TechnicalSummary,
  TradeSignal,
} from '@/types';
import type { ScoringConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { clamp, round } from '@/lib/utils/math';
import { createLogger, type Logger } from '@/lib/utils/logger';
import { TechnicalAnalyzer } from './technical-analyzer';
import { sectorFor } from './sectors';

export interface InstrumentInput {
  ticker: string;
  candles: Candle[];
  sentiment?: SentimentReading | null;
}

export type SentimentClass = 'bullish' | 'neutral' | 'bearish';

export function classifySentiment(score: number): SentimentClass {
  if (score > 0.35) return 'bullish';
  if (score < -0.15) return 'bearish';
  return 'neutral';
}

/** Volume bonus: 1 on a 2x surge, 0.5 on 1.5x, else 0 */
export function volumeScore(volumeRatio: number): number {
  if (volumeRatio >= 2.0) return 1.0;
  if (volumeRatio >= 1.5) return 0.5;
  return 0;
}

export class Scorer {
  private config: ScoringConfig;
  private analyzer: TechnicalAnalyzer;
  private sectorOverrides: Record<string, string>;
  private log: Logger;

  constructor(
    config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring,
    options: { logger?: Logger; sectorOverrides?: Record<string, string> } = {},
  ) {
    this.config = config;
    this.log = options.logger ?? createLogger('Scorer');
    this.sectorOverrides = options.sectorOverrides ?? {};
    this.analyzer = new TechnicalAnalyzer({ minBars: config.minBars }, this.log);
  }

  computeComposite(technical: TechnicalSummary, sentiment: SentimentReading | null): number {
    const { weights } = this.config;
    const sentimentScore = sentiment ? clamp(sentiment.score, -1, 1) : 0;

    const composite =
      technical.composite * weights.technical +
      sentimentScore * weights.sentiment +
      volumeScore(technical.volumeRatio) * weights.volume;

    return round(clamp(composite, -1, 1), 4);
  }

  classifySignal(score: number): TradeSignal {
    const t = this.config.thresholds;
    if (score >= t.strongBuy) return 'STRONG_BUY';
    if (score >= t.buy) return 'BUY';
    if (score <= t.strongSell) return 'STRONG_SELL';
    if (score <= t.sell) return 'SELL';
    return 'NEUTRAL';
  }

  buildReasoning(technical: TechnicalSummary, sentiment: SentimentReading | null): string {
    const parts: string[] = [];
    const rsi = technical.rsi.toFixed(0);

    if (technical.rsi < 30) parts.push(`RSI ${rsi} (oversold)`);
    else if (technical.rsi > 70) parts.push(`RSI ${rsi} (overbought)`);
    else parts.push(`RSI ${rsi}`);

    if (technical.macdSignal > 0) parts.push('MACD bullish');
    else if (technical.macdSignal < 0) parts.push('MACD bearish');

    if (technical.smaCross > 0) parts.push('golden cross');
    else if (technical.smaCross < 0) parts.push('death cross');

    const vol = technical.volumeRatio.toFixed(1);
    if (technical.volumeRatio >= 2.0) parts.push(`Vol ${vol}x avg (surging)`);
    else if (technical.volumeRatio >= 1.5) parts.push(`Vol ${vol}x avg (elevated)`);

    if (technical.bbSqueeze) parts.push('BB squeeze active');

    if (sentiment) {
      parts.push(
        `Sentiment: ${classifySentiment(sentiment.score)} ` +
          `(${sentiment.score.toFixed(2)}, ${sentiment.articleCount} articles)`,
      );
    }

    return `Tech: ${parts.join(', ')}`;
  }

  /**
   * Score and rank instruments. Instruments without enough history are
   * dropped. Result is sorted by |score| descending and truncated.
   */
  scoreInstruments(instruments: InstrumentInput[]): ScoredInstrument[] {
    const scored: ScoredInstrument[] = [];

    for (const inst of instruments) {
      const technical = this.analyzer.analyze(inst.ticker, inst.candles);
      if (!technical) continue;

      const sentiment = inst.sentiment ?? null;
      const compositeScore = this.computeComposite(technical, sentiment);

      scored.push({
        rank: 0,
        ticker: inst.ticker,
        sector: sectorFor(inst.ticker, this.sectorOverrides),
        compositeScore,
        signal: this.classifySignal(compositeScore),
        technical,
        sentiment,
        reasoning: this.buildReasoning(technical, sentiment),
      });
    }

    // Array.prototype.sort is stable, so equal scores keep input order
    scored.sort((a, b) => Math.abs(b.compositeScore) - Math.abs(a.compositeScore));

    const ranked = scored.slice(0, this.config.maxResults);
    ranked.forEach((s, i) => {
      s.rank = i + 1;
    });

    this.log.debug(`Scored ${scored.length}/${instruments.length} instruments`);
    return ranked;
  }
}
