import { SensorReading } from '@/types/reading.types';
import { roundTo } from '@/utils/stats.utils';

interface PhaseShape {
  inside: [number, number];
  outside: [number, number];
  humidity: [number, number];
  gas: [number, number];
  intermittentDoor: boolean;
}

// [centre, half-width] per signal
const PHASES: readonly PhaseShape[] = [
  { inside: [5, 0.3], outside: [28, 1], humidity: [60, 2], gas: [400, 50], intermittentDoor: false },
  { inside: [7, 0.5], outside: [30, 2], humidity: [70, 3], gas: [600, 80], intermittentDoor: true },
  { inside: [8, 0.5], outside: [38, 2], humidity: [65, 3], gas: [700, 100], intermittentDoor: false },
  { inside: [5, 0.3], outside: [29, 1], humidity: [60, 2], gas: [450, 50], intermittentDoor: false }
];

const STEP_SECONDS = 60;

const phaseFor = (step: number): PhaseShape => PHASES[Math.min(Math.floor(step / 10), PHASES.length - 1)];

/**
 * Synthetic cold-room stream: stable, door events, outside heat wave,
 * then back to stable. `random` must return values in [0, 1).
 */
export function generateSampleReadings(
  steps = 40,
  random: () => number = Math.random,
  product = 'vaccine'
): SensorReading[] {
  const jitter = ([centre, halfWidth]: [number, number]): number => centre + (random() * 2 - 1) * halfWidth;
  const readings: SensorReading[] = [];

  for (let step = 0; step < steps; step++) {
    const phase = phaseFor(step);
    const inside = jitter(phase.inside);
    const outside = jitter(phase.outside);
    const humidity = jitter(phase.humidity);
    const doorOpen = phase.intermittentDoor && random() < 0.5 ? 1 : 0;
    const gas = jitter(phase.gas);

    readings.push({
      ts: step * STEP_SECONDS,
      product,
      temp_inside_c: roundTo(inside, 2),
      temp_outside_c: roundTo(outside, 2),
      humidity_pct: roundTo(humidity, 1),
      door_open: doorOpen,
      gas_ppm: roundTo(gas, 1)
    });
  }
  return readings;
}

export const SAMPLE_CSV_COLUMNS = [
  'ts', 'product', 'temp_inside_c', 'temp_outside_c', 'humidity_pct', 'door_open', 'gas_ppm'
] as const;

export const readingsToCsv = (readings: readonly SensorReading[]): string => {
  const lines: string[] = [SAMPLE_CSV_COLUMNS.join(',')];
  for (const reading of readings) {
    lines.push(SAMPLE_CSV_COLUMNS.map(column => String(reading[column] ?? '')).join(','));
  }
  return `${lines.join('\n')}\n`;
};
