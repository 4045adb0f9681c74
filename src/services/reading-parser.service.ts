import { DoorState, ParsedReading, ReadingInput } from '@/types/reading.types';
import { InvalidInputError, InvalidReadingError } from '@/utils/errors';

const REQUIRED_FIELDS = ['temp_inside_c', 'temp_outside_c', 'humidity_pct'] as const;

const toNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

const parseRequired = (input: Record<string, unknown>, field: string): number => {
  const value = input[field];
  if (isBlank(value)) {
    throw new InvalidReadingError(field, `Missing required field: ${field}`);
  }
  const parsed = toNumber(value);
  if (parsed === undefined) {
    throw new InvalidReadingError(field, `Field ${field} must be numeric, got: ${String(value)}`);
  }
  return parsed;
};

const parseOptional = (input: Record<string, unknown>, field: string): number | undefined => {
  const value = input[field];
  if (isBlank(value)) return undefined;
  const parsed = toNumber(value);
  if (parsed === undefined) {
    throw new InvalidReadingError(field, `Field ${field} must be numeric, got: ${String(value)}`);
  }
  return parsed;
};

const parseDoor = (input: Record<string, unknown>): DoorState => {
  const value = input.door_open;
  if (value === true || value === 'true') return 1;
  if (value === false || value === 'false') return 0;

  const numeric = parseRequired(input, 'door_open');
  if (numeric === 1) return 1;
  if (numeric === 0) return 0;
  throw new InvalidInputError('door_open must be 0 or 1');
};

/**
 * Normalize a loosely typed reading. Required numeric fields may arrive as
 * numbers or numeric strings; optional ones default (`gas_ppm` to 0).
 */
export const parseReading = (input: ReadingInput, defaultProduct: string): ParsedReading => {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new InvalidReadingError('reading', 'Reading must be an object');
  }
  const record: Record<string, unknown> = { ...input };

  const [tempInside, tempOutside, humidity] = REQUIRED_FIELDS.map(field => parseRequired(record, field));
  const product = isBlank(record.product) ? defaultProduct : String(record.product).trim();

  return {
    ts: parseOptional(record, 'ts'),
    product,
    temp_inside_c: tempInside,
    temp_outside_c: tempOutside,
    humidity_pct: humidity,
    door_open: parseDoor(record),
    gas_ppm: parseOptional(record, 'gas_ppm') ?? 0
  };
};
