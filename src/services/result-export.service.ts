import { promises as fsp } from 'fs';
import path from 'path';
import { SpoilageResult } from '@/types/result.types';
import { FlatResultRow } from '@/types/monitor.types';
import { FACTOR_NAMES } from '@/config/constants';
import { logger } from '@/utils/logger';

/**
 * One flat record per result: thresholds, anomaly flags and contributions
 * become their own columns.
 */
export const flattenResult = (result: SpoilageResult): FlatResultRow => {
  const row: FlatResultRow = {
    ts: result.ts,
    product: result.product,
    instant_spoilage_pct: result.instant_spoilage_pct,
    cumulative_spoilage_pct: result.cumulative_spoilage_pct,
    risk_level: result.risk_level,
    anomaly_zscore: result.anomalies.zscore,
    anomaly_ewma: result.anomalies.ewma,
    threshold_z: result.adaptive_thresholds.z,
    threshold_ewma_L: result.adaptive_thresholds.ewma_L,
    threshold_warn: result.adaptive_thresholds.warn,
    threshold_crit: result.adaptive_thresholds.crit
  };
  for (const factor of FACTOR_NAMES) {
    row[`contrib_${factor}`] = result.contributions[factor];
  }
  row.notes = result.notes.join(' | ');
  return row;
};

const escapeCsvValue = (value: string | number | boolean | null): string => {
  if (value === null) return '';
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const resultsToCsv = (results: readonly SpoilageResult[]): string => {
  const rows = results.map(flattenResult);
  const header = rows.length > 0 ? Object.keys(rows[0]) : Object.keys(flattenResult(EMPTY_RESULT));
  const lines = [header.join(',')];
  for (const row of rows) {
    lines.push(header.map(column => escapeCsvValue(row[column] ?? null)).join(','));
  }
  return `${lines.join('\n')}\n`;
};

export const writeResultsCsv = async (results: readonly SpoilageResult[], filePath: string): Promise<string> => {
  const target = path.resolve(filePath);
  await fsp.mkdir(path.dirname(target), { recursive: true });
  await fsp.writeFile(target, resultsToCsv(results), 'utf8');
  logger.info(`Exported ${results.length} results to ${target}`);
  return target;
};

// Only used to derive the header of an empty export
const EMPTY_RESULT: SpoilageResult = {
  ts: null,
  product: '',
  instant_spoilage_pct: 0,
  cumulative_spoilage_pct: 0,
  risk_level: 'ok',
  anomalies: { zscore: false, ewma: false },
  adaptive_thresholds: { z: 0, ewma_L: 0, warn: 0, crit: 0 },
  contributions: { temp: 0, humidity: 0, door: 0, gas: 0, interaction: 0, outside: 0 },
  notes: []
};
