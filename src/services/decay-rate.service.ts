import { DECAY_CONFIG } from '@/config/constants';
import { clamp, mean, std } from '@/utils/stats.utils';

/**
 * Recent raw signals, oldest first. Door values are 0 or 1.
 */
export interface SignalHistory {
  inside: readonly number[];
  outside: readonly number[];
  humidity: readonly number[];
  door: readonly number[];
}

export interface AdaptiveRateOptions {
  baseQ10: number;
  baseRate: number;
  window: number;
}

/**
 * Q10 law: the rate multiplies by `q10` for every 10 °C above `refTemp`.
 * Unbounded; callers clamp.
 */
export const staticRate = (temp: number, refTemp: number, q10: number, baseRate: number): number => {
  return baseRate * q10 ** ((temp - refTemp) / 10.0);
};

const lastN = (values: readonly number[], window: number): readonly number[] =>
  window >= values.length ? values : values.slice(values.length - window);

/**
 * Q10 rate with reference temperature, steepness and bounds re-estimated
 * from the last `window` samples of each history.
 */
export const adaptiveRate = (
  temp: number,
  history: SignalHistory,
  { baseQ10, baseRate, window }: AdaptiveRateOptions
): number => {
  const inside = lastN(history.inside, window);
  const outside = lastN(history.outside, window);
  const humidity = lastN(history.humidity, window);
  const door = lastN(history.door, window);

  if (inside.length === 0) {
    return staticRate(temp, DECAY_CONFIG.FALLBACK_REF_TEMP, baseQ10, baseRate);
  }

  const insideMean = mean(inside);
  const outsideMean = outside.length > 0 ? mean(outside) : temp;
  const doorFreq = door.length > 0 ? mean(door) : 0;

  // Door openings pull the reference toward the outside air
  const refTemp = insideMean + DECAY_CONFIG.DOOR_REF_BIAS * doorFreq * (outsideMean - insideMean);
  const q10 = baseQ10 * (1 + std(inside) / 10.0);

  const gap = Math.abs(temp - outsideMean);
  const modifier = 1 + (DECAY_CONFIG.OUTSIDE_COUPLING_BASE + std(outside) / 100.0)
    * Math.exp(-gap / DECAY_CONFIG.OUTSIDE_COUPLING_DISTANCE);

  const humidityFraction = humidity.length > 0 ? mean(humidity) / 100.0 : 0;
  const minRate = DECAY_CONFIG.HUMIDITY_MIN_RATE_GAIN * humidityFraction;
  const maxRate = DECAY_CONFIG.MAX_RATE_BASE * (1 + doorFreq + humidityFraction);

  return clamp(staticRate(temp, refTemp, q10, baseRate) * modifier, minRate, maxRate);
};
