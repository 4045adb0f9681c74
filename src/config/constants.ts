import { FactorName } from '@/types/profile.types';

export const FACTOR_NAMES: readonly FactorName[] = ['temp', 'humidity', 'door', 'gas', 'interaction', 'outside'];

export const PROFILE_CONFIG = {
  OUTSIDE_TEMP_MIN: -30,
  OUTSIDE_TEMP_MAX: 50,
  SAFE_TEMP_SHIFT: 5.0,             // max °C shift from outside heat
  DOOR_SAFE_TEMP_SHIFT: 0.5,
  SAFE_TEMP_LOWER_BAND: 5.0,        // ref_temp - 5
  SAFE_TEMP_UPPER_BAND: 10.0,       // ref_temp + 10
  RATE_HEADROOM_PER_DEGREE: 0.05,
  RATE_CEILING_FACTOR: 1.5,
  Q10_VARIABILITY_GAIN: 0.01,
  Q10_CAP_FACTOR: 1.5,
  THRESHOLD_VARIABILITY_GAIN: 0.1,
  THRESHOLD_CAP_FACTOR: 2.0,
  TEMP_WEIGHT_GAIN: 0.1,
  DOOR_WEIGHT_FACTOR: 1.2,
  INTERACTION_WEIGHT_FACTOR: 1.1,
  GAS_WEIGHT_GAIN: 0.05,
} as const;

export const DECAY_CONFIG = {
  FALLBACK_REF_TEMP: 25.0,
  DOOR_REF_BIAS: 0.5,
  OUTSIDE_COUPLING_BASE: 0.05,
  OUTSIDE_COUPLING_DISTANCE: 5.0,
  HUMIDITY_MIN_RATE_GAIN: 0.5,
  MAX_RATE_BASE: 5.0,
} as const;

export const ENGINE_CONFIG = {
  DEFAULT_PRODUCT: 'vaccine',
  DEFAULT_WINDOW_SIZE: 30,
  DEFAULT_REQUIRE_CONSECUTIVE: 2,
  DEFAULT_DT_MINUTES: 1.0,
  MIN_DT_MINUTES: 0.1,
  MIN_ADAPTIVE_SAMPLES: 5,
  ADAPTIVE_RATE_WINDOW: 10,
  MIN_VARIABILITY_SAMPLES: 6,       // variability once history length > 5
  MIN_ZSCORE_SAMPLES: 4,            // z-score once history length > 3
  MIN_EWMA_SAMPLES: 2,              // EWMA once history length > 1
  MIN_DYNAMIC_RISK_SAMPLES: 5,
  STD_FLOOR: 1e-8,
  EWMA_STD_FALLBACK: 1.0,
  FALLBACK_WARN: 60.0,
  FALLBACK_CRIT: 80.0,
  WARN_FLOOR: 30.0,
  CRIT_FLOOR: 40.0,
  WARN_SIGMA: 0.5,
  CRIT_SIGMA: 1.0,
  GAS_SCALE_PPM: 1000,
  INTERACTION_TEMP_SCALE: 30,
  OUTSIDE_GAP_MIDPOINT: 10.0,
  OUTSIDE_GAP_SLOPE: 2.0,
  LOGISTIC_SLOPE_FLOOR: 1e-6,
} as const;
