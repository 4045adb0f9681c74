import { SpoilageResult } from '@/types/result.types';

const RISK_MARKERS = { ok: 'OK', warning: 'WARNING', critical: 'CRITICAL' } as const;

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

/** Plain multi-line summary of one result, for console output. */
export function formatResultSummary(result: SpoilageResult): string {
  const ts = result.ts === null ? '?' : String(Math.trunc(result.ts));
  const lines = [
    `[TS=${ts}s] Product: ${result.product}`,
    '-'.repeat(45),
    ` Instant Spoilage : ${result.instant_spoilage_pct.toFixed(2)} %`,
    ` Cumulative Index : ${result.cumulative_spoilage_pct.toFixed(2)} %`,
    ` Risk Level       : ${RISK_MARKERS[result.risk_level]}`,
    ` Anomalies        : zscore=${result.anomalies.zscore ? 'Yes' : 'No'} | ewma=${result.anomalies.ewma ? 'Yes' : 'No'}`,
    ' Contributions:'
  ];
  for (const [factor, share] of Object.entries(result.contributions)) {
    lines.push(`   - ${capitalize(factor).padEnd(11)}: ${(share * 100).toFixed(1)} %`);
  }
  lines.push(
    ' Thresholds:',
    `   - Warning : ${result.adaptive_thresholds.warn.toFixed(2)} %`,
    `   - Critical: ${result.adaptive_thresholds.crit.toFixed(2)} %`,
    ` Notes: ${result.notes.join(' | ')}`,
    '='.repeat(45)
  );
  return lines.join('\n');
}
