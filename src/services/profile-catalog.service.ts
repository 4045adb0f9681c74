import {
  BaseProfile,
  DynamicProfile,
  FactorWeights,
  ProfileCatalog,
  ProfileTable
} from '@/types/profile.types';
import { FACTOR_NAMES, PROFILE_CONFIG } from '@/config/constants';
import { ConfigurationError, InvalidInputError, UnknownProductError } from '@/utils/errors';
import { clamp } from '@/utils/stats.utils';
import productProfiles from '../../data/product_profiles.json';

const BOOLEAN_FIELDS = ['adaptive_q10', 'adaptive_ewma'] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (source: Record<string, unknown>, key: string, where: string): number => {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${where}.${key} must be a finite number`);
  }
  return value;
};

const readString = (source: Record<string, unknown>, key: string, where: string): string => {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${where}.${key} must be a string`);
  }
  return value;
};

const normalizeWeights = (weights: FactorWeights): FactorWeights => {
  const total = FACTOR_NAMES.reduce((acc, name) => acc + weights[name], 0) || 1.0;
  return {
    temp: weights.temp / total,
    humidity: weights.humidity / total,
    door: weights.door / total,
    gas: weights.gas / total,
    interaction: weights.interaction / total,
    outside: weights.outside / total
  };
};

const parseBaseProfile = (name: string, raw: unknown): BaseProfile => {
  const where = `profiles.${name}`;
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where} must be an object`);
  }

  const numbers = {
    q10: readNumber(raw, 'q10', where),
    ref_temp: readNumber(raw, 'ref_temp', where),
    z_threshold: readNumber(raw, 'z_threshold', where),
    ewma_threshold: readNumber(raw, 'ewma_threshold', where),
    ewma_alpha: readNumber(raw, 'ewma_alpha', where),
    max_safe_temp: readNumber(raw, 'max_safe_temp', where),
    min_rate: readNumber(raw, 'min_rate', where),
    max_rate: readNumber(raw, 'max_rate', where),
    adaptive_window: readNumber(raw, 'adaptive_window', where)
  };

  for (const key of BOOLEAN_FIELDS) {
    if (typeof raw[key] !== 'boolean') {
      throw new ConfigurationError(`${where}.${key} must be a boolean`);
    }
  }

  const { weights, logistic, alerts } = raw;
  if (!isRecord(weights) || !isRecord(logistic) || !isRecord(alerts)) {
    throw new ConfigurationError(`${where} requires weights, logistic and alerts objects`);
  }

  const rawWeights: FactorWeights = {
    temp: readNumber(weights, 'temp', `${where}.weights`),
    humidity: readNumber(weights, 'humidity', `${where}.weights`),
    door: readNumber(weights, 'door', `${where}.weights`),
    gas: readNumber(weights, 'gas', `${where}.weights`),
    interaction: readNumber(weights, 'interaction', `${where}.weights`),
    outside: readNumber(weights, 'outside', `${where}.weights`)
  };
  if (FACTOR_NAMES.some(factor => rawWeights[factor] < 0)) {
    throw new ConfigurationError(`${where}.weights must be non-negative`);
  }

  if (numbers.ewma_alpha <= 0 || numbers.ewma_alpha > 1) {
    throw new ConfigurationError(`${where}.ewma_alpha must be in (0, 1]`);
  }
  if (numbers.min_rate > numbers.max_rate) {
    throw new ConfigurationError(`${where}.min_rate must not exceed max_rate`);
  }

  if (!Number.isInteger(numbers.adaptive_window) || numbers.adaptive_window < 2) {
    throw new ConfigurationError(`${where}.adaptive_window must be an integer >= 2`);
  }

  return {
    ...numbers,
    adaptive_q10: raw.adaptive_q10 === true,
    adaptive_ewma: raw.adaptive_ewma === true,
    weights: normalizeWeights(rawWeights),
    logistic: {
      midpoint: readNumber(logistic, 'midpoint', `${where}.logistic`),
      slope: readNumber(logistic, 'slope', `${where}.logistic`)
    },
    alerts: {
      high_temp: readString(alerts, 'high_temp', `${where}.alerts`),
      rapid_spoilage: readString(alerts, 'rapid_spoilage', `${where}.alerts`)
    }
  };
};

/**
 * Validate a raw profile table. Base weights are normalized to sum to 1.
 */
export const validateProfileTable = (raw: unknown): ProfileTable => {
  if (!isRecord(raw) || Object.keys(raw).length === 0) {
    throw new ConfigurationError('Profile table must be a non-empty object');
  }
  const table: ProfileTable = {};
  for (const [name, entry] of Object.entries(raw)) {
    const profile = parseBaseProfile(name, entry);
    Object.freeze(profile.weights);
    Object.freeze(profile.logistic);
    Object.freeze(profile.alerts);
    table[name] = Object.freeze(profile);
  }
  return table;
};

const toDoorFlag = (doorOpen: number | boolean): 0 | 1 => {
  if (doorOpen === true || doorOpen === 1) return 1;
  if (doorOpen === false || doorOpen === 0) return 0;
  throw new InvalidInputError('door_open must be 0 or 1');
};

/**
 * Adapt a base profile to the current environment.
 *
 * Pure: the same arguments always give the same profile.
 */
export const deriveDynamicProfile = (
  table: ProfileTable,
  product: string,
  outsideTemp: number | undefined,
  doorOpen: number | boolean,
  variability?: number
): DynamicProfile => {
  const base = Object.prototype.hasOwnProperty.call(table, product) ? table[product] : undefined;
  if (!base) {
    throw new UnknownProductError(product);
  }
  const door = toDoorFlag(doorOpen);
  if (outsideTemp !== undefined && !(outsideTemp >= PROFILE_CONFIG.OUTSIDE_TEMP_MIN && outsideTemp <= PROFILE_CONFIG.OUTSIDE_TEMP_MAX)) {
    throw new InvalidInputError(
      `temp_outside out of realistic range (${PROFILE_CONFIG.OUTSIDE_TEMP_MIN}..${PROFILE_CONFIG.OUTSIDE_TEMP_MAX} °C)`
    );
  }
  if (variability !== undefined && !Number.isFinite(variability)) {
    throw new InvalidInputError('variability must be a finite number');
  }

  const outsidePull = outsideTemp !== undefined ? Math.tanh((outsideTemp - base.ref_temp) / 10.0) : 0;

  // Safe temperature drifts with outside heat and door, bounded around ref_temp
  let safeTemp = base.max_safe_temp + PROFILE_CONFIG.SAFE_TEMP_SHIFT * outsidePull;
  safeTemp += PROFILE_CONFIG.DOOR_SAFE_TEMP_SHIFT * door;
  safeTemp = clamp(
    safeTemp,
    base.ref_temp - PROFILE_CONFIG.SAFE_TEMP_LOWER_BAND,
    base.ref_temp + PROFILE_CONFIG.SAFE_TEMP_UPPER_BAND
  );

  const maxRateDynamic = clamp(
    base.max_rate * (1 + PROFILE_CONFIG.RATE_HEADROOM_PER_DEGREE * (safeTemp - base.ref_temp)),
    base.min_rate,
    base.max_rate * PROFILE_CONFIG.RATE_CEILING_FACTOR
  );

  const q10Dynamic = base.adaptive_q10 && variability !== undefined
    ? Math.min(base.q10 * (1 + PROFILE_CONFIG.Q10_VARIABILITY_GAIN * variability), base.q10 * PROFILE_CONFIG.Q10_CAP_FACTOR)
    : base.q10;

  const thresholdGain = variability !== undefined ? 1 + PROFILE_CONFIG.THRESHOLD_VARIABILITY_GAIN * variability : 1;
  const zThreshold = Math.min(base.z_threshold * thresholdGain, base.z_threshold * PROFILE_CONFIG.THRESHOLD_CAP_FACTOR);
  const ewmaThreshold = Math.min(base.ewma_threshold * thresholdGain, base.ewma_threshold * PROFILE_CONFIG.THRESHOLD_CAP_FACTOR);

  const weights: FactorWeights = { ...base.weights };
  if (outsideTemp !== undefined) {
    weights.temp *= 1 + PROFILE_CONFIG.TEMP_WEIGHT_GAIN * outsidePull;
  }
  if (door === 1) {
    weights.door *= PROFILE_CONFIG.DOOR_WEIGHT_FACTOR;
    weights.interaction *= PROFILE_CONFIG.INTERACTION_WEIGHT_FACTOR;
  }
  if (variability !== undefined) {
    weights.gas *= 1 + PROFILE_CONFIG.GAS_WEIGHT_GAIN * variability;
  }

  return {
    ...base,
    product,
    max_safe_temp: safeTemp,
    weights: normalizeWeights(weights),
    logistic: { ...base.logistic },
    alerts: { ...base.alerts },
    max_rate_dynamic: maxRateDynamic,
    q10_dynamic: q10Dynamic,
    z_threshold_dynamic: zThreshold,
    ewma_threshold_dynamic: ewmaThreshold
  };
};

export const createProfileCatalog = (table: ProfileTable): ProfileCatalog => {
  const profiles: ProfileTable = { ...table };

  const getBaseProfile = (product: string): BaseProfile => {
    if (!Object.prototype.hasOwnProperty.call(profiles, product)) {
      throw new UnknownProductError(product);
    }
    return profiles[product];
  };

  return {
    derive: (product, outsideTemp, doorOpen, variability) =>
      deriveDynamicProfile(profiles, product, outsideTemp, doorOpen, variability),
    getBaseProfile,
    hasProduct: (product) => Object.prototype.hasOwnProperty.call(profiles, product),
    listProducts: () => Object.keys(profiles)
  };
};

export const defaultProfileTable: ProfileTable = validateProfileTable(productProfiles);

export const profileCatalog: ProfileCatalog = createProfileCatalog(defaultProfileTable);
