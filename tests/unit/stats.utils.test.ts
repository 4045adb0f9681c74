import { clamp, mean, roundTo, std } from '@/utils/stats.utils';

describe('Stats Utils', () => {
  describe('mean', () => {
    it('should return 0 for an empty list', () => {
      expect(mean([])).toBe(0);
    });

    it('should average values', () => {
      expect(mean([1, 2, 3, 6])).toBe(3);
    });
  });

  describe('std', () => {
    it('should compute the population standard deviation', () => {
      expect(std([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    });

    it('should return 0 for fewer than two values', () => {
      expect(std([])).toBe(0);
      expect(std([42])).toBe(0);
    });

    it('should return 0 for a constant series', () => {
      expect(std([3, 3, 3])).toBe(0);
    });
  });

  describe('clamp', () => {
    it('should bound values on both sides', () => {
      expect(clamp(-1, 0, 10)).toBe(0);
      expect(clamp(11, 0, 10)).toBe(10);
      expect(clamp(5, 0, 10)).toBe(5);
    });
  });

  describe('roundTo', () => {
    it('should round to the given number of decimals', () => {
      expect(roundTo(73.77366, 2)).toBe(73.77);
      expect(roundTo(0.5653, 3)).toBe(0.565);
      expect(roundTo(99.996, 2)).toBe(100);
    });
  });
});
