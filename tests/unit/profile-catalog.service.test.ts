import {
  createProfileCatalog,
  defaultProfileTable,
  deriveDynamicProfile,
  profileCatalog,
  validateProfileTable
} from '@/services/profile-catalog.service';
import { FactorWeights } from '@/types/profile.types';
import { ConfigurationError, InvalidInputError, UnknownProductError } from '@/utils/errors';

const weightSum = (weights: FactorWeights): number =>
  weights.temp + weights.humidity + weights.door + weights.gas + weights.interaction + weights.outside;

describe('Profile Catalog Service', () => {
  describe('default table', () => {
    it('should list the built-in products', () => {
      expect(profileCatalog.listProducts()).toEqual(['fruit', 'vaccine', 'seafood']);
      expect(profileCatalog.hasProduct('vaccine')).toBe(true);
      expect(profileCatalog.hasProduct('toString')).toBe(false);
    });

    it('should normalize base weights that do not sum to 1', () => {
      const seafood = profileCatalog.getBaseProfile('seafood');

      expect(weightSum(seafood.weights)).toBeCloseTo(1, 9);
      expect(seafood.weights.temp).toBeCloseTo(0.5 / 1.05, 9);
      expect(seafood.weights.outside).toBeCloseTo(0.02 / 1.05, 9);
    });

    it('should freeze base profiles', () => {
      const vaccine = profileCatalog.getBaseProfile('vaccine');
      expect(Object.isFrozen(vaccine)).toBe(true);
      expect(Object.isFrozen(vaccine.weights)).toBe(true);
    });

    it('should throw UnknownProductError for unknown products', () => {
      expect(() => profileCatalog.getBaseProfile('cheese')).toThrow(UnknownProductError);
      expect(() => profileCatalog.derive('cheese', 20, 0)).toThrow("Unknown product 'cheese'");
    });
  });

  describe('derive', () => {
    it('should shift the safe temperature with outside heat', () => {
      const profile = profileCatalog.derive('vaccine', 31.2, 0);

      expect(profile.product).toBe('vaccine');
      expect(profile.max_safe_temp).toBeCloseTo(12.947277, 5);
      expect(profile.max_rate_dynamic).toBeCloseTo(2.794728, 5);
      expect(profile.q10_dynamic).toBe(2);
      expect(profile.z_threshold_dynamic).toBe(2);
      expect(profile.ewma_threshold_dynamic).toBe(1.8);
      expect(profile.weights.temp).toBeCloseTo(0.573225, 5);
      expect(weightSum(profile.weights)).toBeCloseTo(1, 9);
    });

    it('should account for an open door and variability', () => {
      const profile = profileCatalog.derive('vaccine', undefined, 1, 10);

      expect(profile.max_safe_temp).toBe(8.5);
      expect(profile.max_rate_dynamic).toBeCloseTo(2.35, 9);
      expect(profile.q10_dynamic).toBeCloseTo(2.2, 9);
      expect(profile.z_threshold_dynamic).toBe(4);
      expect(profile.ewma_threshold_dynamic).toBe(3.6);
      expect(profile.weights.door).toBeCloseTo(0.3 / 1.08, 9);
      expect(profile.weights.interaction).toBeCloseTo(0.055 / 1.08, 9);
      expect(profile.weights.gas).toBeCloseTo(0.075 / 1.08, 9);
    });

    it('should cap the safe temperature and the dynamic rate', () => {
      const profile = profileCatalog.derive('fruit', 50, 0);

      expect(profile.max_safe_temp).toBe(20);
      expect(profile.max_rate_dynamic).toBe(7.5);
    });

    it('should cap q10 and thresholds under extreme variability', () => {
      const profile = profileCatalog.derive('vaccine', 20, 0, 100);

      expect(profile.q10_dynamic).toBe(3);
      expect(profile.z_threshold_dynamic).toBe(4);
      expect(profile.ewma_threshold_dynamic).toBe(3.6);
    });

    it('should keep every dynamic field within its invariant bounds', () => {
      for (const product of profileCatalog.listProducts()) {
        const base = profileCatalog.getBaseProfile(product);
        for (const outside of [-30, 0, 25, 50]) {
          for (const door of [0, 1]) {
            const profile = profileCatalog.derive(product, outside, door, 40);
            expect(profile.max_safe_temp).toBeGreaterThanOrEqual(base.ref_temp - 5);
            expect(profile.max_safe_temp).toBeLessThanOrEqual(base.ref_temp + 10);
            expect(profile.max_rate_dynamic).toBeGreaterThanOrEqual(base.min_rate);
            expect(profile.max_rate_dynamic).toBeLessThanOrEqual(base.max_rate * 1.5);
            expect(profile.z_threshold_dynamic).toBeLessThanOrEqual(base.z_threshold * 2);
            expect(profile.q10_dynamic).toBeLessThanOrEqual(base.q10 * 1.5);
            expect(weightSum(profile.weights)).toBeCloseTo(1, 9);
          }
        }
      }
    });

    it('should return the same profile for the same arguments', () => {
      expect(profileCatalog.derive('seafood', 18, 1, 3)).toEqual(profileCatalog.derive('seafood', 18, 1, 3));
      expect(profileCatalog.getBaseProfile('seafood')).toEqual(defaultProfileTable.seafood);
    });

    it('should reject unrealistic outside temperatures', () => {
      expect(() => profileCatalog.derive('vaccine', 200, 0)).toThrow(InvalidInputError);
      expect(() => profileCatalog.derive('vaccine', -31, 0)).toThrow(InvalidInputError);
      expect(() => profileCatalog.derive('vaccine', Number.NaN, 0)).toThrow(InvalidInputError);
    });

    it('should reject invalid door flags and variability', () => {
      expect(() => profileCatalog.derive('vaccine', 20, 2)).toThrow(InvalidInputError);
      expect(() => profileCatalog.derive('vaccine', 20, 0, Number.POSITIVE_INFINITY)).toThrow(InvalidInputError);
    });

    it('should accept boolean door flags', () => {
      expect(profileCatalog.derive('vaccine', 20, true)).toEqual(profileCatalog.derive('vaccine', 20, 1));
    });
  });

  describe('validateProfileTable', () => {
    const entry = {
      q10: 2,
      ref_temp: 5,
      z_threshold: 2,
      ewma_threshold: 1.8,
      ewma_alpha: 0.2,
      max_safe_temp: 8,
      min_rate: 0,
      max_rate: 2,
      weights: { temp: 2, humidity: 1, door: 1, gas: 0, interaction: 0, outside: 0 },
      adaptive_q10: false,
      adaptive_window: 10,
      adaptive_ewma: false,
      logistic: { midpoint: 50, slope: 12 },
      alerts: { high_temp: 'too warm', rapid_spoilage: 'too fast' }
    };

    it('should build a catalog from a custom table', () => {
      const catalog = createProfileCatalog(validateProfileTable({ insulin: entry }));
      const base = catalog.getBaseProfile('insulin');

      expect(base.weights).toEqual({ temp: 0.5, humidity: 0.25, door: 0.25, gas: 0, interaction: 0, outside: 0 });
      expect(catalog.listProducts()).toEqual(['insulin']);
    });

    it('should inflate the EWMA threshold even when adaptive EWMA is off', () => {
      const catalog = createProfileCatalog(validateProfileTable({ insulin: entry }));
      const profile = catalog.derive('insulin', 20, 0, 10);

      expect(profile.ewma_threshold_dynamic).toBe(3.6);
      expect(profile.z_threshold_dynamic).toBe(4);
      expect(profile.q10_dynamic).toBe(2);
    });

    it('should reject malformed entries', () => {
      expect(() => validateProfileTable({})).toThrow(ConfigurationError);
      expect(() => validateProfileTable({ bad: { ...entry, q10: 'two' } })).toThrow(ConfigurationError);
      expect(() => validateProfileTable({ bad: { ...entry, ewma_alpha: 0 } })).toThrow(ConfigurationError);
      expect(() => validateProfileTable({ bad: { ...entry, min_rate: 3 } })).toThrow(ConfigurationError);
      expect(() => validateProfileTable({ bad: { ...entry, adaptive_q10: 'yes' } })).toThrow(ConfigurationError);
      expect(() => validateProfileTable({ bad: { ...entry, weights: { ...entry.weights, gas: -1 } } }))
        .toThrow(ConfigurationError);
    });
  });

  it('should inflate both anomaly thresholds by variability', () => {
    const table = validateProfileTable({ vaccine: { ...defaultProfileTable.vaccine, adaptive_ewma: false } });
    const profile = deriveDynamicProfile(table, 'vaccine', 20, 0, 5);

    expect(profile.z_threshold_dynamic).toBe(3);
    expect(profile.ewma_threshold_dynamic).toBeCloseTo(2.7, 10);
  });

  it('should expose deriveDynamicProfile over a raw table', () => {
    expect(deriveDynamicProfile(defaultProfileTable, 'fruit', undefined, 0)).toEqual(profileCatalog.derive('fruit', undefined, 0));
  });
});
