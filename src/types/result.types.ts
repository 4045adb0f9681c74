import { FactorName } from '@/types/profile.types';

export type RiskLevel = 'ok' | 'warning' | 'critical';

export type EngineMode = 'adaptive' | 'simple';

export interface AnomalyFlags {
  readonly zscore: boolean;
  readonly ewma: boolean;
}

export interface AdaptiveThresholds {
  readonly z: number;
  readonly ewma_L: number;
  readonly warn: number;
  readonly crit: number;
}

export type FactorContributions = Readonly<Record<FactorName, number>>;

/**
 * Scoring output for a single reading.
 */
export interface SpoilageResult {
  readonly ts: number | null;
  readonly product: string;
  readonly instant_spoilage_pct: number;
  readonly cumulative_spoilage_pct: number;
  readonly risk_level: RiskLevel;
  readonly anomalies: AnomalyFlags;
  readonly adaptive_thresholds: AdaptiveThresholds;
  readonly contributions: FactorContributions;
  readonly notes: readonly string[];
}

export interface EngineStateSnapshot {
  product: string;
  mode: EngineMode;
  window_size: number;
  require_consecutive: number;
  quality: number;
  history_length: number;
  last_ts: number | null;
  warning_breaches: number;
  critical_breaches: number;
  risk_level: RiskLevel;
}
