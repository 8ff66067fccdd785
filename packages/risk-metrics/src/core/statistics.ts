import * as ss from 'simple-statistics';
import { RiskMetricsError, RiskMetricsErrorCode, TailMean } from '../types';

export function assertConfidenceLevel(confidenceLevel: number): void {
  if (typeof confidenceLevel !== 'number' || !Number.isFinite(confidenceLevel) || confidenceLevel < 0 || confidenceLevel > 1) {
    throw new RiskMetricsError(
      RiskMetricsErrorCode.INVALID_PARAMETER,
      `Confidence level must be a number in [0, 1], got ${String(confidenceLevel)}`,
      { confidenceLevel }
    );
  }
}

/**
 * Empirical quantile with "higher" interpolation: of the two order statistics
 * bracketing the virtual index `alpha * (n - 1)`, the upper one is returned.
 * An exact integer index selects that order statistic itself.
 */
export function higherQuantile(values: readonly number[], confidenceLevel: number): number {
  assertConfidenceLevel(confidenceLevel);
  if (values.length === 0) {
    throw new RiskMetricsError(RiskMetricsErrorCode.INVALID_PARAMETER, 'Cannot take a quantile of an empty series');
  }

  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.ceil(confidenceLevel * (sorted.length - 1));
  return sorted[index];
}

/** Running maximum from the start of the series up to and including each point. */
export function expandingMax(values: readonly number[]): number[] {
  const result: number[] = [];
  let peak = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    peak = Math.max(peak, value);
    result.push(peak);
  }
  return result;
}

/** Distance below the running peak at each point; never negative. */
export function drawdownSeries(returns: readonly number[]): number[] {
  const peaks = expandingMax(returns);
  return returns.map((value, t) => peaks[t] - value);
}

/** Worst drawdown seen so far at each point. */
export function maxDrawdownSeries(returns: readonly number[]): number[] {
  return expandingMax(drawdownSeries(returns));
}

export function tailMean(tail: readonly number[]): TailMean {
  return tail.length === 0 ? null : ss.mean([...tail]);
}
