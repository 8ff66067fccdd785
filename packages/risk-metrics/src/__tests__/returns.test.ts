import { describe, it, expect } from '@jest/globals';
import { normalizeReturns } from '../core/returns';
import { RiskMetricsErrorCode } from '../types';

const invalidParameter = expect.objectContaining({ code: RiskMetricsErrorCode.INVALID_PARAMETER });

describe('normalizeReturns', () => {
  it('should wrap a bare series as a single column named "0"', () => {
    expect(normalizeReturns([0.01, -0.02, 0.03])).toEqual({
      columns: ['0'],
      series: [[0.01, -0.02, 0.03]],
      observations: 3
    });
  });

  it('should transpose time-major rows and name columns by position', () => {
    expect(normalizeReturns([[1, 2], [3, 4], [5, 6]])).toEqual({
      columns: ['0', '1'],
      series: [[1, 3, 5], [2, 4, 6]],
      observations: 3
    });
  });

  it('should keep labels from a return table', () => {
    const normalized = normalizeReturns({ columns: ['BTC', 'ETH'], rows: [[0.1, 0.2], [0.3, 0.4]] });
    expect(normalized.columns).toEqual(['BTC', 'ETH']);
    expect(normalized.series).toEqual([[0.1, 0.3], [0.2, 0.4]]);
  });

  it('should copy rather than alias the caller series', () => {
    const input = [1, 2, 3];
    const normalized = normalizeReturns(input);
    expect(normalized.series[0]).not.toBe(input);
  });

  it('should reject an empty series', () => {
    expect(() => normalizeReturns([])).toThrow(invalidParameter);
  });

  it('should reject a table without observations or columns', () => {
    expect(() => normalizeReturns({ columns: ['A'], rows: [] })).toThrow(invalidParameter);
    expect(() => normalizeReturns({ columns: [], rows: [[1]] })).toThrow(invalidParameter);
  });

  it('should reject ragged rows', () => {
    expect(() => normalizeReturns([[1, 2], [3]])).toThrow(invalidParameter);
    expect(() => normalizeReturns({ columns: ['A', 'B'], rows: [[1, 2], [3, 4, 5]] })).toThrow(invalidParameter);
  });

  it('should reject duplicate column names', () => {
    expect(() => normalizeReturns({ columns: ['A', 'A'], rows: [[1, 2]] })).toThrow(invalidParameter);
  });

  it('should reject non-finite values', () => {
    expect(() => normalizeReturns([0.01, NaN])).toThrow(invalidParameter);
    expect(() => normalizeReturns([[0.01], [Infinity]])).toThrow(invalidParameter);
  });
});
