import { parseReading } from '@/services/reading-parser.service';
import { InvalidInputError, InvalidReadingError } from '@/utils/errors';

describe('Reading Parser Service', () => {
  const valid = {
    ts: 60,
    product: 'fruit',
    temp_inside_c: 4.8,
    temp_outside_c: 31.2,
    humidity_pct: 62,
    door_open: 0,
    gas_ppm: 520
  };

  it('should pass a well-formed reading through', () => {
    expect(parseReading(valid, 'vaccine')).toEqual(valid);
  });

  it('should accept numeric strings as delivered by CSV rows', () => {
    const parsed = parseReading({
      ts: '120',
      product: '',
      temp_inside_c: '5.5',
      temp_outside_c: '28',
      humidity_pct: '60.5',
      door_open: '1',
      gas_ppm: '400.5'
    }, 'vaccine');

    expect(parsed).toEqual({
      ts: 120,
      product: 'vaccine',
      temp_inside_c: 5.5,
      temp_outside_c: 28,
      humidity_pct: 60.5,
      door_open: 1,
      gas_ppm: 400.5
    });
  });

  it('should default gas_ppm to 0 and leave ts undefined', () => {
    const parsed = parseReading({ temp_inside_c: 5, temp_outside_c: 20, humidity_pct: 50, door_open: false }, 'seafood');

    expect(parsed.gas_ppm).toBe(0);
    expect(parsed.ts).toBeUndefined();
    expect(parsed.product).toBe('seafood');
    expect(parsed.door_open).toBe(0);
  });

  it('should accept boolean door states', () => {
    expect(parseReading({ ...valid, door_open: true }, 'vaccine').door_open).toBe(1);
    expect(parseReading({ ...valid, door_open: 'false' }, 'vaccine').door_open).toBe(0);
  });

  it('should reject a missing required field', () => {
    const { humidity_pct: _omitted, ...rest } = valid;

    expect(() => parseReading(rest, 'vaccine')).toThrow(InvalidReadingError);
    expect(() => parseReading(rest, 'vaccine')).toThrow('Missing required field: humidity_pct');
  });

  it('should reject non-numeric values', () => {
    expect(() => parseReading({ ...valid, temp_inside_c: 'warm' }, 'vaccine'))
      .toThrow('Field temp_inside_c must be numeric, got: warm');
    expect(() => parseReading({ ...valid, gas_ppm: 'lots' }, 'vaccine')).toThrow(InvalidReadingError);
    expect(() => parseReading({ ...valid, ts: 'yesterday' }, 'vaccine')).toThrow(InvalidReadingError);
  });

  it('should reject door values other than 0 or 1', () => {
    expect(() => parseReading({ ...valid, door_open: 2 }, 'vaccine')).toThrow(InvalidInputError);
  });

  it('should report the offending field', () => {
    try {
      parseReading({ ...valid, temp_outside_c: null }, 'vaccine');
      throw new Error('expected parseReading to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidReadingError);
      if (error instanceof InvalidReadingError) {
        expect(error.field).toBe('temp_outside_c');
        expect(error.statusCode).toBe(400);
      }
    }
  });
});
