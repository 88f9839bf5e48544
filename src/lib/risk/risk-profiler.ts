/**
 * Risk Profiler: five-dimension risk assessment
 *
 * Scores a candidate trade (or the portfolio alone) on five independent
 * dimensions, each clamped to 0-10:
 * - position: reward-to-risk geometry and stop presence
 * - portfolio: slot usage, aggregate risk, drawdown proximity, sector crowding
 * - market: regime alignment, volatility-index band, regime age and confidence
 * - behavioral: overtrading, revenge entries, streaks, plan adherence
 * - strategy: track record of the candidate's strategy
 *
 * BLOCK and CRITICAL alerts are hard blocks and force a `blocked`
 * recommendation whatever the composite.
 *
 * The profiler holds no state; the behavior profile is passed in.
 */

import type {
  BehaviorProfile,
  DimensionScore,
  PerformanceSnapshot,
  Position,
  RegimeAssessment,
  RiskAlert,
  RiskAssessment,
  RiskDimension,
  RiskLevel,
  RiskRecommendation,
  StrategySignal,
} from '@/types';
import type { DimensionWeights, RiskProfilerConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { clamp, round } from '@/lib/utils/math';

/** Performance figures the profiler reads */
export type PerformanceView = Pick<
  PerformanceSnapshot,
  'virtualBalance' | 'maxDrawdownPct' | 'strategyMetrics'
>;

/** Open-position fields the profiler reads */
export type PositionView = Pick<
  Position,
  'ticker' | 'sector' | 'entryPrice' | 'stopLoss' | 'positionSize'
>;

export const RECOMMENDATION_REASONS = {
  skip: 'Risk grade HIGH — multiple factors elevated',
  reduce_size: 'Risk grade ELEVATED — consider half position',
  enter: 'Risk within acceptable parameters',
  monitor: 'Portfolio-level assessment',
} as const;

const HARD_BLOCK_SEVERITIES = new Set(['BLOCK', 'CRITICAL']);

export function isHardBlock(alert: RiskAlert): boolean {
  return HARD_BLOCK_SEVERITIES.has(alert.severity);
}

export function classifyRiskLevel(score: number): RiskLevel {
  if (score <= 2) return 'LOW';
  if (score <= 4) return 'MODERATE';
  if (score <= 6) return 'ELEVATED';
  if (score <= 8) return 'HIGH';
  return 'CRITICAL';
}

function dimension(
  name: RiskDimension,
  score: number,
  alerts: RiskAlert[] = [],
  details: DimensionScore['details'] = {},
): DimensionScore {
  return { name, score: clamp(score, 0, 10), alerts, details };
}

function alert(
  severity: RiskAlert['severity'],
  dim: RiskDimension,
  message: string,
  checkName: string,
  value: number | null = null,
  threshold: number | null = null,
): RiskAlert {
  return { severity, dimension: dim, message, checkName, value, threshold };
}

const pct = (v: number): string => `${(v * 100).toFixed(0)}%`;

export class RiskProfiler {
  private config: RiskProfilerConfig;

  constructor(config: RiskProfilerConfig = DEFAULT_ENGINE_CONFIG.riskProfiler) {
    this.config = config;
  }

  // ============================================
  // Entry Points
  // ============================================

  /**
   * Full assessment of a candidate trade
   */
  assessTrade(
    signal: StrategySignal,
    openPositions: PositionView[],
    performance: PerformanceView,
    regime: RegimeAssessment,
    behavior: BehaviorProfile,
  ): RiskAssessment {
    const dims = {
      position: this.assessPositionRisk(signal),
      portfolio: this.assessPortfolioRisk(signal, openPositions, performance),
      market: this.assessMarketRisk(signal, regime),
      behavioral: this.assessBehavioralRisk(behavior),
      strategy: this.assessStrategyRisk(signal, performance),
    };

    const composite = weightedComposite(dims, this.config.tradeWeights);
    const allAlerts = [
      ...dims.position.alerts,
      ...dims.portfolio.alerts,
      ...dims.market.alerts,
      ...dims.behavioral.alerts,
      ...dims.strategy.alerts,
    ];
    const blockingAlerts = allAlerts.filter(isHardBlock);

    let recommendation: RiskRecommendation;
    let reason: string;
    if (blockingAlerts.length > 0) {
      recommendation = 'blocked';
      reason = `Hard block: ${blockingAlerts[0].message}`;
    } else if (composite >= 7) {
      recommendation = 'skip';
      reason = RECOMMENDATION_REASONS.skip;
    } else if (composite >= 5) {
      recommendation = 'reduce_size';
      reason = RECOMMENDATION_REASONS.reduce_size;
    } else {
      recommendation = 'enter';
      reason = RECOMMENDATION_REASONS.enter;
    }

    return {
      positionRisk: dims.position,
      portfolioRisk: dims.portfolio,
      marketRisk: dims.market,
      behavioralRisk: dims.behavioral,
      strategyRisk: dims.strategy,
      compositeScore: round(composite, 1),
      riskLevel: classifyRiskLevel(composite),
      hasHardBlocks: blockingAlerts.length > 0,
      allAlerts,
      blockingAlerts,
      recommendation,
      recommendationReason: reason,
    };
  }

  /**
   * Portfolio-level assessment with no candidate. The position dimension
   * is always 0 and the recommendation is always `monitor`.
   */
  assessPortfolio(
    openPositions: PositionView[],
    performance: PerformanceView,
    regime: RegimeAssessment,
    behavior: BehaviorProfile,
  ): RiskAssessment {
    const dims = {
      position: dimension('position', 0),
      portfolio: this.assessPortfolioRisk(null, openPositions, performance),
      market: this.assessMarketRisk(null, regime),
      behavioral: this.assessBehavioralRisk(behavior),
      strategy: this.assessStrategyRisk(null, performance),
    };

    const composite = weightedComposite(dims, this.config.portfolioWeights);
    const allAlerts = [
      ...dims.portfolio.alerts,
      ...dims.market.alerts,
      ...dims.behavioral.alerts,
      ...dims.strategy.alerts,
    ];

    return {
      positionRisk: dims.position,
      portfolioRisk: dims.portfolio,
      marketRisk: dims.market,
      behavioralRisk: dims.behavioral,
      strategyRisk: dims.strategy,
      compositeScore: round(composite, 1),
      riskLevel: classifyRiskLevel(composite),
      hasHardBlocks: false,
      allAlerts,
      blockingAlerts: [],
      recommendation: 'monitor',
      recommendationReason: RECOMMENDATION_REASONS.monitor,
    };
  }

  // ============================================
  // Dimensions
  // ============================================

  assessPositionRisk(signal: StrategySignal | null): DimensionScore {
    if (!signal) return dimension('position', 0);

    const { minRiskReward, targetRiskReward } = this.config.position;
    const alerts: RiskAlert[] = [];
    const rr = signal.riskRewardRatio;
    let score = 0;

    if (rr < minRiskReward) {
      score += 4;
      alerts.push(
        alert('WARNING', 'position', `R:R ${rr.toFixed(1)} below ${minRiskReward}`, 'rr_ratio', rr, minRiskReward),
      );
    } else if (rr < targetRiskReward) {
      score += 2;
    }

    if (signal.stopLoss <= 0) {
      score = 10;
      alerts.push(alert('CRITICAL', 'position', 'No stop-loss defined', 'stop_loss_defined', 0, 1));
    }

    return dimension('position', score, alerts, { riskReward: rr });
  }

  assessPortfolioRisk(
    signal: StrategySignal | null,
    positions: PositionView[],
    performance: PerformanceView,
  ): DimensionScore {
    const cfg = this.config.portfolio;
    const alerts: RiskAlert[] = [];
    const details: DimensionScore['details'] = { slotsUsed: positions.length };
    let score = 0;

    if (signal && positions.length >= cfg.maxConcurrentPositions) {
      alerts.push(
        alert(
          'BLOCK',
          'portfolio',
          `All ${cfg.maxConcurrentPositions} slots full`,
          'max_positions',
          positions.length,
          cfg.maxConcurrentPositions,
        ),
      );
      return dimension('portfolio', 10, alerts, details);
    }

    const balance = performance.virtualBalance;
    if (balance > 0 && positions.length > 0) {
      let totalRiskPct = 0;
      for (const p of positions) {
        totalRiskPct += ((Math.abs(p.entryPrice - p.stopLoss) * p.positionSize) / balance) * 100;
      }
      details.totalRiskPct = round(totalRiskPct, 1);

      if (totalRiskPct > cfg.maxTotalRiskPct) {
        score += 5;
        alerts.push(
          alert(
            'WARNING',
            'portfolio',
            `Total risk ${totalRiskPct.toFixed(1)}% > ${cfg.maxTotalRiskPct}%`,
            'total_exposure',
            totalRiskPct,
            cfg.maxTotalRiskPct,
          ),
        );
      } else if (totalRiskPct > cfg.maxTotalRiskPct * 0.66) {
        score += 2;
      }
    }

    const dd = performance.maxDrawdownPct;
    if (dd < cfg.maxDrawdownLimit + cfg.drawdownWarningBuffer) {
      score += 4;
      alerts.push(
        alert(
          'ALERT',
          'portfolio',
          `Drawdown ${dd.toFixed(1)}% near limit ${cfg.maxDrawdownLimit}%`,
          'drawdown_proximity',
          dd,
          cfg.maxDrawdownLimit,
        ),
      );
    }

    // Sector crowding, counting the candidate as if it were open
    const sectors = new Map<string, string[]>();
    for (const p of positions) {
      if (!p.sector) continue;
      sectors.set(p.sector, [...(sectors.get(p.sector) ?? []), p.ticker]);
    }
    const candidateSector = signal?.instrument.sector ?? '';
    if (signal && candidateSector) {
      sectors.set(candidateSector, [...(sectors.get(candidateSector) ?? []), signal.instrument.ticker]);
    }

    for (const [sector, tickers] of sectors) {
      if (tickers.length > cfg.maxSectorConcentration) {
        score += 3;
        alerts.push(
          alert(
            'WARNING',
            'portfolio',
            `Sector concentration: ${tickers.length} positions in ${sector} (${tickers.join(', ')})`,
            'sector_concentration',
            tickers.length,
            cfg.maxSectorConcentration,
          ),
        );
        break;
      }
    }

    const sectorCounts: Record<string, number> = {};
    for (const [sector, tickers] of sectors) sectorCounts[sector] = tickers.length;
    details.sectorCounts = sectorCounts;

    return dimension('portfolio', score, alerts, details);
  }

  assessMarketRisk(signal: StrategySignal | null, regime: RegimeAssessment): DimensionScore {
    const cfg = this.config.market;
    const alerts: RiskAlert[] = [];
    const details: DimensionScore['details'] = { regime: regime.regime, vix: regime.vix };
    let score = 0;

    if (signal && !regime.activeStrategies.includes(signal.strategyName)) {
      alerts.push(
        alert(
          'BLOCK',
          'market',
          `Strategy '${signal.strategyName}' not active in ${regime.regime}`,
          'regime_alignment',
        ),
      );
      return dimension('market', 10, alerts, details);
    }

    if (regime.vix > cfg.vixExtreme) score += 5;
    else if (regime.vix > cfg.vixHigh) score += 3;
    else if (regime.vix > cfg.vixElevated) score += 1;

    if (regime.regimeAgeDays > cfg.regimeAgeWarning) {
      score += 1;
      alerts.push(
        alert(
          'INFO',
          'market',
          `Regime persisted ${regime.regimeAgeDays}d — watch for transition`,
          'regime_age',
          regime.regimeAgeDays,
          cfg.regimeAgeWarning,
        ),
      );
    }

    if (regime.confidence < cfg.minRegimeConfidence) {
      score += 2;
      alerts.push(
        alert(
          'WARNING',
          'market',
          `Regime confidence low (${pct(regime.confidence)})`,
          'regime_confidence',
          regime.confidence,
          cfg.minRegimeConfidence,
        ),
      );
    }

    return dimension('market', score, alerts, details);
  }

  assessBehavioralRisk(profile: BehaviorProfile): DimensionScore {
    const cfg = this.config.behavioral;
    const alerts: RiskAlert[] = [];
    let score = 0;

    if (profile.tradesPerDayAvg > cfg.maxTradesPerDay) {
      score += 3;
      alerts.push(
        alert(
          'WARNING',
          'behavioral',
          `Avg ${profile.tradesPerDayAvg.toFixed(1)} trades/day — overtrading?`,
          'overtrading',
          profile.tradesPerDayAvg,
          cfg.maxTradesPerDay,
        ),
      );
    }

    if (profile.revengeTradeCount > 0) {
      score += 4;
      alerts.push(
        alert(
          'ALERT',
          'behavioral',
          `${profile.revengeTradeCount} possible revenge trade(s)`,
          'revenge_trading',
          profile.revengeTradeCount,
          0,
        ),
      );
    }

    if (profile.consecutiveWins >= cfg.winStreakWarning) {
      score += 2;
      alerts.push(
        alert(
          'WARNING',
          'behavioral',
          `${profile.consecutiveWins} consecutive wins — watch overconfidence`,
          'win_streak',
          profile.consecutiveWins,
          cfg.winStreakWarning,
        ),
      );
    }

    if (profile.consecutiveLosses >= cfg.lossStreakWarning) {
      score += 4;
      alerts.push(
        alert(
          'ALERT',
          'behavioral',
          `${profile.consecutiveLosses} consecutive losses — consider pausing`,
          'loss_spiral',
          profile.consecutiveLosses,
          cfg.lossStreakWarning,
        ),
      );
    }

    if (profile.planAdherencePct < cfg.minPlanAdherence) {
      score += 3;
      alerts.push(
        alert(
          'WARNING',
          'behavioral',
          `Plan adherence ${pct(profile.planAdherencePct)} — discipline slipping`,
          'plan_adherence',
          profile.planAdherencePct,
          cfg.minPlanAdherence,
        ),
      );
    }

    return dimension('behavioral', score, alerts, {
      planAdherence: profile.planAdherencePct,
      disciplineAvg: profile.avgDisciplineRating,
    });
  }

  /**
   * Scores 0 until the strategy has a closed trade; a short track record is
   * penalized only once metrics exist.
   */
  assessStrategyRisk(signal: StrategySignal | null, performance: PerformanceView): DimensionScore {
    if (!signal) return dimension('strategy', 0);

    const cfg = this.config.strategy;
    const name = signal.strategyName;
    const metrics = performance.strategyMetrics[name];
    if (!metrics) return dimension('strategy', 0);

    const alerts: RiskAlert[] = [];
    let score = 0;

    if (metrics.totalTrades < cfg.minSampleSize) {
      score += 2;
      alerts.push(
        alert(
          'INFO',
          'strategy',
          `Only ${metrics.totalTrades} trades for ${name}`,
          'sample_size',
          metrics.totalTrades,
          cfg.minSampleSize,
        ),
      );
    } else if (metrics.winRate < cfg.minWinRate) {
      score += 4;
      alerts.push(
        alert(
          'ALERT',
          'strategy',
          `${name} win rate ${pct(metrics.winRate)} < ${pct(cfg.minWinRate)}`,
          'strategy_win_rate',
          metrics.winRate,
          cfg.minWinRate,
        ),
      );
    }

    return dimension('strategy', score, alerts, { strategy: name });
  }
}

function weightedComposite(
  dims: Record<RiskDimension, DimensionScore>,
  weights: DimensionWeights,
): number {
  return (
    dims.position.score * weights.position +
    dims.portfolio.score * weights.portfolio +
    dims.market.score * weights.market +
    dims.behavioral.score * weights.behavioral +
    dims.strategy.score * weights.strategy
  );
}

/**
 * Halve a signal's size and dollar risk for a `reduce_size` recommendation
 */
export function applyRiskRecommendation(signal: StrategySignal, assessment: RiskAssessment): StrategySignal {
  const withAssessment = { ...signal, riskAssessment: assessment };
  if (assessment.recommendation !== 'reduce_size') return withAssessment;
  return {
    ...withAssessment,
    positionSize: round(signal.positionSize / 2, 4),
    dollarRisk: round(signal.dollarRisk / 2, 2),
  };
}
