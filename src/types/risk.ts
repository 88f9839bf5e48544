/**
 * Risk Types
 * Five-dimension risk assessment and trader behavior records
 */

export const ALERT_SEVERITIES = ['INFO', 'WARNING', 'ALERT', 'BLOCK', 'CRITICAL'] as const;

export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export type RiskDimension = 'position' | 'portfolio' | 'market' | 'behavioral' | 'strategy';

export interface RiskAlert {
  severity: AlertSeverity;
  dimension: RiskDimension;
  message: string;
  /** Stable identifier of the check that fired, e.g. "rr_ratio" */
  checkName: string;
  value: number | null;
  threshold: number | null;
}

export interface DimensionScore {
  name: RiskDimension;
  /** 0-10 */
  score: number;
  alerts: RiskAlert[];
  details: Record<string, number | string | Record<string, number>>;
}

export type RiskLevel = 'LOW' | 'MODERATE' | 'ELEVATED' | 'HIGH' | 'CRITICAL';

export type RiskRecommendation = 'enter' | 'reduce_size' | 'skip' | 'blocked' | 'monitor';

export interface RiskAssessment {
  positionRisk: DimensionScore;
  portfolioRisk: DimensionScore;
  marketRisk: DimensionScore;
  behavioralRisk: DimensionScore;
  strategyRisk: DimensionScore;
  /** Weighted composite, 0-10, 1 dp */
  compositeScore: number;
  riskLevel: RiskLevel;
  hasHardBlocks: boolean;
  allAlerts: RiskAlert[];
  blockingAlerts: RiskAlert[];
  recommendation: RiskRecommendation;
  recommendationReason: string;
}

// ============================================
// Behavior
// ============================================

export const BEHAVIOR_ACTIONS = ['entry', 'exit', 'skip'] as const;

export type BehaviorAction = (typeof BEHAVIOR_ACTIONS)[number];

export interface BehaviorEntry {
  date: string;
  action: BehaviorAction;
  ticker: string;
  strategy: string;
  planAligned: boolean;
  /** 1-5, null when unrated */
  disciplineRating: number | null;
  /** Free-form reason; exits carry their exit reason */
  reason: string;
}

export interface BehaviorProfile {
  entriesLast7d: number;
  exitsLast7d: number;
  skipsLast7d: number;
  /** 0-1 */
  planAdherencePct: number;
  avgDisciplineRating: number;
  consecutiveWins: number;
  consecutiveLosses: number;
  tradesPerDayAvg: number;
  revengeTradeCount: number;
  fomoEntryCount: number;
  earlyExitCount: number;
}
