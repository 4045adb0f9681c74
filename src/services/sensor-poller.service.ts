import axios from 'axios';
import { SensorReading } from '@/types/reading.types';
import { logger } from '@/utils/logger';

export interface SensorFetchOptions {
  timeoutMs: number;
  product: string;
  fallbackTs: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const numberOr = (value: unknown, fallback: number): number => {
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : fallback;
};

/**
 * Map a sensor JSON payload onto a reading. Missing fields default to 0,
 * the product to the monitored one, `ts` to the poll step.
 */
export const mapSensorPayload = (payload: Record<string, unknown>, options: Omit<SensorFetchOptions, 'timeoutMs'>): SensorReading => ({
  ts: numberOr(payload.ts, options.fallbackTs),
  product: typeof payload.product === 'string' && payload.product.trim() !== '' ? payload.product : options.product,
  temp_inside_c: numberOr(payload.temp_inside_c, 0),
  temp_outside_c: numberOr(payload.temp_outside_c, 0),
  humidity_pct: numberOr(payload.humidity_pct, 0),
  door_open: numberOr(payload.door_open, 0) === 1 || payload.door_open === true ? 1 : 0,
  gas_ppm: numberOr(payload.gas_ppm, 0)
});

/**
 * GET one reading from the sensor endpoint. Failures are logged and yield null.
 */
export async function fetchSensorReading(url: string, options: SensorFetchOptions): Promise<SensorReading | null> {
  try {
    const response = await axios.get<unknown>(url, { timeout: options.timeoutMs });
    if (response.status !== 200 || !isRecord(response.data)) {
      logger.warn(`Unexpected sensor response from ${url}`, { status: response.status });
      return null;
    }
    return mapSensorPayload(response.data, options);
  } catch (error) {
    logger.warn(`Sensor fetch failed: ${error instanceof Error ? error.message : 'Unknown error'}`, { url });
    return null;
  }
}
