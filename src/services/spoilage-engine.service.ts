import { DynamicProfile, FactorName, FactorWeights, ProfileCatalog } from '@/types/profile.types';
import { ReadingInput } from '@/types/reading.types';
import {
  AdaptiveThresholds,
  AnomalyFlags,
  EngineMode,
  EngineStateSnapshot,
  FactorContributions,
  RiskLevel,
  SpoilageResult
} from '@/types/result.types';
import { ENGINE_CONFIG } from '@/config/constants';
import { profileCatalog } from '@/services/profile-catalog.service';
import { adaptiveRate, staticRate } from '@/services/decay-rate.service';
import { parseReading } from '@/services/reading-parser.service';
import { RingBuffer } from '@/utils/ring-buffer.utils';
import { clamp, mean, roundTo, std } from '@/utils/stats.utils';

export interface EngineOptions {
  requireConsecutive?: number;
  catalog?: ProfileCatalog;
}

type FactorValues = Record<FactorName, number>;

interface ZScoreOutcome {
  z: number;
  anomalous: boolean;
}

interface EwmaOutcome {
  deviation: number;
  anomalous: boolean;
}

const weighFactors = (factors: FactorValues, weights: FactorWeights): FactorValues => ({
  temp: factors.temp * weights.temp,
  humidity: factors.humidity * weights.humidity,
  door: factors.door * weights.door,
  gas: factors.gas * weights.gas,
  interaction: factors.interaction * weights.interaction,
  outside: factors.outside * weights.outside
});

const roundContributions = (contributions: FactorValues): FactorContributions => ({
  temp: roundTo(contributions.temp, 3),
  humidity: roundTo(contributions.humidity, 3),
  door: roundTo(contributions.door, 3),
  gas: roundTo(contributions.gas, 3),
  interaction: roundTo(contributions.interaction, 3),
  outside: roundTo(contributions.outside, 3)
});

export const isEngineMode = (value: unknown): value is EngineMode =>
  value === 'adaptive' || value === 'simple';

/**
 * Penalty near 1 when inside and outside temperatures match, near 0 once
 * the gap is well past 10 °C (the thermal barrier is holding).
 */
export const outsidePenalty = (insideTemp: number, outsideTemp: number): number => {
  const gap = Math.abs(insideTemp - outsideTemp);
  return 1.0 / (1.0 + Math.exp((gap - ENGINE_CONFIG.OUTSIDE_GAP_MIDPOINT) / ENGINE_CONFIG.OUTSIDE_GAP_SLOPE));
};

export const logisticSpoilage = (raw: number, midpoint: number, slope: number): number => {
  const scaled = raw * 100.0;
  const instant = 100.0 / (1.0 + Math.exp(-(scaled - midpoint) / Math.max(ENGINE_CONFIG.LOGISTIC_SLOPE_FLOOR, slope)));
  return clamp(instant, 0, 100);
};

export const zScoreAnomaly = (history: readonly number[], threshold: number): ZScoreOutcome => {
  if (history.length < ENGINE_CONFIG.MIN_ZSCORE_SAMPLES) {
    return { z: 0, anomalous: false };
  }
  const sigma = std(history);
  if (sigma <= ENGINE_CONFIG.STD_FLOOR) {
    return { z: 0, anomalous: false };
  }
  const z = (history[history.length - 1] - mean(history)) / sigma;
  return { z, anomalous: Math.abs(z) > threshold };
};

/**
 * Deviation of the latest value from the EWMA of the whole history, checked
 * against the asymptotically corrected control limit.
 */
export const ewmaAnomaly = (history: readonly number[], alpha: number, limit: number): EwmaOutcome => {
  if (history.length < ENGINE_CONFIG.MIN_EWMA_SAMPLES) {
    return { deviation: 0, anomalous: false };
  }
  let ewma = history[0];
  for (let i = 1; i < history.length; i++) {
    ewma = alpha * history[i] + (1 - alpha) * ewma;
  }
  const n = history.length;
  const lambda = Math.sqrt((alpha / (2 - alpha)) * (1 - (1 - alpha) ** (2 * n)));
  const deviation = Math.abs(history[n - 1] - ewma);
  const sigma = std(history);
  const spread = sigma > 0 ? sigma : ENGINE_CONFIG.EWMA_STD_FALLBACK;
  return { deviation, anomalous: deviation > limit * spread * lambda };
};

export const riskThresholds = (history: readonly number[]): { warn: number; crit: number } => {
  if (history.length < ENGINE_CONFIG.MIN_DYNAMIC_RISK_SAMPLES) {
    return { warn: ENGINE_CONFIG.FALLBACK_WARN, crit: ENGINE_CONFIG.FALLBACK_CRIT };
  }
  const mu = mean(history);
  const sigma = std(history);
  return {
    warn: clamp(mu + ENGINE_CONFIG.WARN_SIGMA * sigma, ENGINE_CONFIG.WARN_FLOOR, 100),
    crit: clamp(mu + ENGINE_CONFIG.CRIT_SIGMA * sigma, ENGINE_CONFIG.CRIT_FLOOR, 100)
  };
};

/**
 * Stateful spoilage scorer for one monitored stream.
 *
 * `update` is the only mutating operation and is not reentrant; callers
 * serialize readings per engine.
 */
export class SpoilageEngine {
  readonly windowSize: number;
  readonly mode: EngineMode;
  readonly requireConsecutive: number;

  private product: string;
  private readonly catalog: ProfileCatalog;
  private quality = 1.0;
  private lastTs: number | undefined;
  private warningBreaches = 0;
  private criticalBreaches = 0;
  private riskLevel: RiskLevel = 'ok';

  private readonly instantHistory: RingBuffer<number>;
  private readonly insideHistory: RingBuffer<number>;
  private readonly outsideHistory: RingBuffer<number>;
  private readonly humidityHistory: RingBuffer<number>;
  private readonly doorHistory: RingBuffer<number>;

  constructor(
    product: string = ENGINE_CONFIG.DEFAULT_PRODUCT,
    windowSize?: number,
    mode: EngineMode = 'adaptive',
    options: EngineOptions = {}
  ) {
    this.catalog = options.catalog ?? profileCatalog;
    const base = this.catalog.getBaseProfile(product);

    const window = windowSize ?? ENGINE_CONFIG.DEFAULT_WINDOW_SIZE;
    if (!Number.isInteger(window) || window < 2) {
      throw new RangeError(`windowSize must be an integer >= 2, got ${window}`);
    }
    if (!isEngineMode(mode)) {
      throw new RangeError(`mode must be 'adaptive' or 'simple', got ${String(mode)}`);
    }
    const requireConsecutive = options.requireConsecutive ?? ENGINE_CONFIG.DEFAULT_REQUIRE_CONSECUTIVE;
    if (!Number.isInteger(requireConsecutive) || requireConsecutive < 1) {
      throw new RangeError(`requireConsecutive must be a positive integer, got ${requireConsecutive}`);
    }

    this.product = product;
    this.windowSize = window;
    this.mode = mode;
    this.requireConsecutive = requireConsecutive;
    this.instantHistory = new RingBuffer<number>(window);
    this.insideHistory = new RingBuffer<number>(window);
    this.outsideHistory = new RingBuffer<number>(window);
    this.humidityHistory = new RingBuffer<number>(window);
    this.doorHistory = new RingBuffer<number>(window);
  }

  getState(): EngineStateSnapshot {
    return {
      product: this.product,
      mode: this.mode,
      window_size: this.windowSize,
      require_consecutive: this.requireConsecutive,
      quality: this.quality,
      history_length: this.instantHistory.length,
      last_ts: this.lastTs ?? null,
      warning_breaches: this.warningBreaches,
      critical_breaches: this.criticalBreaches,
      risk_level: this.riskLevel
    };
  }

  /**
   * Score one reading. Throws InvalidReadingError, InvalidInputError or
   * UnknownProductError before any state is touched.
   */
  update(input: ReadingInput): SpoilageResult {
    const reading = parseReading(input, this.product);

    const instantSoFar = this.instantHistory.toArray();
    const variability = instantSoFar.length >= ENGINE_CONFIG.MIN_VARIABILITY_SAMPLES ? std(instantSoFar) : undefined;

    const profile = this.catalog.derive(reading.product, reading.temp_outside_c, reading.door_open, variability);

    // Validation done; from here on the reading is committed
    this.product = reading.product;
    const dtMinutes = this.elapsedMinutes(reading.ts);

    const rate = clamp(this.temperatureRate(reading.temp_inside_c, profile), profile.min_rate, profile.max_rate_dynamic);

    const humidity = reading.humidity_pct / 100.0;
    const factors: FactorValues = {
      temp: rate,
      humidity,
      door: reading.door_open === 1 ? 1.0 : 0.0,
      gas: reading.gas_ppm / ENGINE_CONFIG.GAS_SCALE_PPM,
      interaction: humidity * (reading.temp_inside_c / ENGINE_CONFIG.INTERACTION_TEMP_SCALE),
      outside: outsidePenalty(reading.temp_inside_c, reading.temp_outside_c)
    };
    const contributions = weighFactors(factors, profile.weights);
    const raw = contributions.temp + contributions.humidity + contributions.door
      + contributions.gas + contributions.interaction + contributions.outside;

    const instant = logisticSpoilage(raw, profile.logistic.midpoint, profile.logistic.slope);

    this.quality *= Math.max(0, 1 - (instant / 100.0) * dtMinutes);
    const cumulative = clamp(100.0 * (1.0 - this.quality), 0, 100);

    this.instantHistory.push(instant);
    this.insideHistory.push(reading.temp_inside_c);
    this.outsideHistory.push(reading.temp_outside_c);
    this.humidityHistory.push(reading.humidity_pct);
    this.doorHistory.push(reading.door_open);

    const history = this.instantHistory.toArray();
    const zscore = zScoreAnomaly(history, profile.z_threshold_dynamic);
    const ewma = ewmaAnomaly(history, profile.ewma_alpha, profile.ewma_threshold_dynamic);
    const { warn, crit } = riskThresholds(history);
    this.riskLevel = this.classifyRisk(instant, warn, crit);

    const anomalies: AnomalyFlags = { zscore: zscore.anomalous, ewma: ewma.anomalous };
    const thresholds: AdaptiveThresholds = {
      z: profile.z_threshold_dynamic,
      ewma_L: profile.ewma_threshold_dynamic,
      warn: roundTo(warn, 2),
      crit: roundTo(crit, 2)
    };

    const notes = [
      `ΔT=${Math.abs(reading.temp_inside_c - reading.temp_outside_c).toFixed(1)}°C`,
      `z=${zscore.z.toFixed(2)}`,
      `EW_dev=${ewma.deviation.toFixed(2)}`
    ];
    if (reading.temp_inside_c > profile.max_safe_temp) {
      notes.push(profile.alerts.high_temp);
    }
    if (this.riskLevel === 'critical') {
      notes.push(profile.alerts.rapid_spoilage);
    }

    return {
      ts: reading.ts ?? null,
      product: this.product,
      instant_spoilage_pct: roundTo(instant, 2),
      cumulative_spoilage_pct: roundTo(cumulative, 2),
      risk_level: this.riskLevel,
      anomalies,
      adaptive_thresholds: thresholds,
      contributions: roundContributions(contributions),
      notes
    };
  }

  private elapsedMinutes(ts: number | undefined): number {
    const previous = this.lastTs;
    this.lastTs = ts;
    if (ts === undefined || previous === undefined || ts < previous) {
      return ENGINE_CONFIG.DEFAULT_DT_MINUTES;
    }
    return Math.max(ENGINE_CONFIG.MIN_DT_MINUTES, (ts - previous) / 60.0);
  }

  private temperatureRate(insideTemp: number, profile: DynamicProfile): number {
    if (this.mode === 'adaptive' && this.insideHistory.length >= ENGINE_CONFIG.MIN_ADAPTIVE_SAMPLES) {
      return adaptiveRate(
        insideTemp,
        {
          inside: this.insideHistory.toArray(),
          outside: this.outsideHistory.toArray(),
          humidity: this.humidityHistory.toArray(),
          door: this.doorHistory.toArray()
        },
        {
          baseQ10: profile.q10,
          baseRate: 1.0,
          window: Math.min(ENGINE_CONFIG.ADAPTIVE_RATE_WINDOW, this.insideHistory.length)
        }
      );
    }
    return staticRate(insideTemp, profile.ref_temp, profile.q10_dynamic, 1.0);
  }

  // Consecutive-breach debounce; counters carry over between readings
  private classifyRisk(instant: number, warn: number, crit: number): RiskLevel {
    if (instant > crit) {
      this.criticalBreaches += 1;
      this.warningBreaches = Math.max(this.warningBreaches - 1, 0);
      return this.criticalBreaches >= this.requireConsecutive ? 'critical' : this.riskLevel;
    }
    if (instant > warn) {
      this.warningBreaches += 1;
      this.criticalBreaches = Math.max(this.criticalBreaches - 1, 0);
      return this.warningBreaches >= this.requireConsecutive ? 'warning' : 'ok';
    }
    this.warningBreaches = 0;
    this.criticalBreaches = 0;
    return 'ok';
  }
}
