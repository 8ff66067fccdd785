import { describe, it, expect } from '@jest/globals';
import {
  drawdownSeries,
  expandingMax,
  higherQuantile,
  maxDrawdownSeries,
  tailMean
} from '../core/statistics';
import { RiskMetricsError } from '../types';

describe('statistics', () => {
  describe('higherQuantile', () => {
    it('should round the virtual index up', () => {
      // 0.3 * 3 = 0.9 -> index 1
      expect(higherQuantile([40, 10, 30, 20], 0.3)).toBe(20);
      // 0.7 * 3 = 2.1 -> index 3
      expect(higherQuantile([40, 10, 30, 20], 0.7)).toBe(40);
    });

    it('should return the only observation of a single-point series', () => {
      expect(higherQuantile([0.02], 0.05)).toBe(0.02);
    });

    it('should leave the input order untouched', () => {
      const values = [3, 1, 2];
      higherQuantile(values, 0.5);
      expect(values).toEqual([3, 1, 2]);
    });

    it('should reject an empty series', () => {
      expect(() => higherQuantile([], 0.5)).toThrow(RiskMetricsError);
    });
  });

  describe('drawdowns', () => {
    it('should track the running peak', () => {
      expect(expandingMax([3, 1, 4, 1, 5])).toEqual([3, 3, 4, 4, 5]);
    });

    it('should measure the distance below the running peak', () => {
      expect(drawdownSeries([3, 1, 4, 1, 5])).toEqual([0, 2, 0, 3, 0]);
    });

    it('should keep the worst drawdown seen so far', () => {
      expect(maxDrawdownSeries([3, 1, 4, 1, 5])).toEqual([0, 2, 2, 3, 3]);
    });
  });

  describe('tailMean', () => {
    it('should average a non-empty tail', () => {
      expect(tailMean([1, 2, 3])).toBe(2);
    });

    it('should signal an empty tail with null', () => {
      expect(tailMean([])).toBeNull();
    });
  });
});
