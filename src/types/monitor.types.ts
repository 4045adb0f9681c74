import { EngineMode, RiskLevel, SpoilageResult } from '@/types/result.types';

export type ResultListener = (result: SpoilageResult) => void;

export interface MonitorStatus {
  product: string;
  mode: EngineMode;
  window_size: number;
  require_consecutive: number;
  processed: number;
  rejected: number;
  risk_level: RiskLevel;
  quality: number;
  history_size: number;
  last_ts: number | null;
}

// CSV replay of a recorded reading stream
export interface ReplayResult {
  success: boolean;
  file: string;
  total_rows: number;
  processed: number;
  rejected: number;
  errors: string[];
  results: SpoilageResult[];
  processing_time_ms: number;
}

export interface ReplaySummary {
  total_rows: number;
  processed: number;
  rejected: number;
  risk_counts: Record<RiskLevel, number>;
  anomaly_counts: { zscore: number; ewma: number };
  peak_instant_pct: number;
  final_cumulative_pct: number;
}

export type FlatResultRow = Record<string, string | number | boolean | null>;
