export type DoorState = 0 | 1;

/**
 * One sensor sample, as delivered by a reading source.
 */
export interface SensorReading {
  ts?: number;                      // seconds, epoch or monotonic
  product?: string;
  temp_inside_c: number;
  temp_outside_c: number;
  humidity_pct: number;
  door_open: DoorState;
  gas_ppm?: number;                 // defaults to 0
}

// Loosely typed record: JSON body, CSV row or sensor payload
export type RawReading = Record<string, unknown>;

export type ReadingInput = SensorReading | RawReading;

export interface ParsedReading {
  ts?: number;
  product: string;
  temp_inside_c: number;
  temp_outside_c: number;
  humidity_pct: number;
  door_open: DoorState;
  gas_ppm: number;
}
