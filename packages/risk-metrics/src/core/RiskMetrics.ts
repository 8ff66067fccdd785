import * as math from 'mathjs';
import { DEFAULT_RISK_METRICS_CONFIG, RiskMetricsConfig } from '@riskmetrics/config';
import { Logger } from '@riskmetrics/utils';
import {
  ColumnTailMeans,
  ColumnValues,
  CovarianceMatrix,
  NormalizedReturns,
  ReturnsInput,
  RiskMetricsError,
  RiskMetricsErrorCode,
  TailMean,
  Weights
} from '../types';
import { normalizeReturns } from './returns';
import { assertConfidenceLevel, higherQuantile, maxDrawdownSeries, tailMean } from './statistics';

export type RiskMetricsOptions = Pick<RiskMetricsConfig, 'defaultConfidenceLevel'>;

function toColumnValues<T>(columns: readonly string[], values: readonly T[]): Record<string, T> {
  const result: Record<string, T> = {};
  columns.forEach((column, c) => {
    result[column] = values[c];
  });
  return result;
}

/**
 * Point-estimate risk measures over a fixed historical sample.
 *
 * Every method is a pure function of its arguments: the instance only holds a
 * logger and the confidence level used when a caller omits one.
 * VaR is reported as the quantile itself (a return, usually negative), not as a
 * positive loss. Tail averages return `null` when no observation qualifies.
 */
export class RiskMetrics {
  private readonly logger: Logger;
  private readonly defaultConfidenceLevel: number;

  constructor(logger: Logger, options: RiskMetricsOptions = DEFAULT_RISK_METRICS_CONFIG) {
    assertConfidenceLevel(options.defaultConfidenceLevel);
    this.logger = logger;
    this.defaultConfidenceLevel = options.defaultConfidenceLevel;
  }

  /**
   * Portfolio variance `wᵀ · C · w`.
   *
   * The covariance matrix is not checked for symmetry or positive
   * semi-definiteness, so a malformed matrix can produce a negative value.
   */
  calculateVariance(covariance: CovarianceMatrix, weights: Weights): number {
    return this.run('variance', { assets: weights.length }, () => {
      this.assertConformable(covariance, weights);
      const projected = covariance.map(row => math.dot(row, weights));
      return math.dot(weights, projected);
    });
  }

  /**
   * Historical VaR: the per-column empirical quantile at `confidenceLevel`,
   * using "higher" interpolation.
   */
  calculateValueAtRisk(returns: ReturnsInput, confidenceLevel: number = this.defaultConfidenceLevel): ColumnValues {
    return this.run('value at risk', { confidenceLevel }, () => {
      const normalized = normalizeReturns(returns);
      this.logShape('Calculating VaR', normalized, confidenceLevel);
      return toColumnValues(normalized.columns, this.columnQuantiles(normalized.series, confidenceLevel));
    });
  }

  /**
   * Expected Shortfall (CVaR): mean of every observation strictly below its
   * column's VaR, pooled across columns.
   */
  calculateExpectedShortfall(returns: ReturnsInput, confidenceLevel: number = this.defaultConfidenceLevel): TailMean {
    return this.run('expected shortfall', { confidenceLevel }, () => {
      const normalized = normalizeReturns(returns);
      this.logShape('Calculating expected shortfall', normalized, confidenceLevel);
      return tailMean(this.shortfallTails(normalized.series, confidenceLevel).flat());
    });
  }

  calculateExpectedShortfallByColumn(
    returns: ReturnsInput,
    confidenceLevel: number = this.defaultConfidenceLevel
  ): ColumnTailMeans {
    return this.run('expected shortfall by column', { confidenceLevel }, () => {
      const normalized = normalizeReturns(returns);
      this.logShape('Calculating expected shortfall by column', normalized, confidenceLevel);
      return toColumnValues(normalized.columns, this.shortfallTails(normalized.series, confidenceLevel).map(tailMean));
    });
  }

  /**
   * Conditional Drawdown at Risk: mean of the worst-so-far drawdown values
   * strictly above their own "higher" quantile at `confidenceLevel`, pooled
   * across columns. Monotonically rising returns never draw down and give `null`.
   */
  calculateConditionalDrawdownRisk(returns: ReturnsInput, confidenceLevel: number): TailMean {
    return this.run('conditional drawdown at risk', { confidenceLevel }, () => {
      const normalized = normalizeReturns(returns);
      this.logShape('Calculating CDaR', normalized, confidenceLevel);
      return tailMean(this.drawdownTails(normalized.series, confidenceLevel).flat());
    });
  }

  calculateConditionalDrawdownRiskByColumn(returns: ReturnsInput, confidenceLevel: number): ColumnTailMeans {
    return this.run('conditional drawdown at risk by column', { confidenceLevel }, () => {
      const normalized = normalizeReturns(returns);
      this.logShape('Calculating CDaR by column', normalized, confidenceLevel);
      return toColumnValues(normalized.columns, this.drawdownTails(normalized.series, confidenceLevel).map(tailMean));
    });
  }

  private columnQuantiles(series: NormalizedReturns['series'], confidenceLevel: number): number[] {
    return series.map(column => higherQuantile(column, confidenceLevel));
  }

  // ES and VaR share one quantile step so the tail always matches the VaR cut
  private shortfallTails(series: NormalizedReturns['series'], confidenceLevel: number): number[][] {
    const thresholds = this.columnQuantiles(series, confidenceLevel);
    return series.map((column, c) => column.filter(value => value < thresholds[c]));
  }

  private drawdownTails(series: NormalizedReturns['series'], confidenceLevel: number): number[][] {
    return series.map(column => {
      const maxDrawdown = maxDrawdownSeries(column);
      const threshold = higherQuantile(maxDrawdown, confidenceLevel);
      return maxDrawdown.filter(value => value > threshold);
    });
  }

  private assertConformable(covariance: CovarianceMatrix, weights: Weights): void {
    const dimension = covariance.length;
    if (dimension === 0) {
      throw new RiskMetricsError(RiskMetricsErrorCode.INVALID_PARAMETER, 'Covariance matrix is empty');
    }

    covariance.forEach((row, i) => {
      if (row.length !== dimension) {
        throw new RiskMetricsError(
          RiskMetricsErrorCode.DIMENSION_MISMATCH,
          `Covariance matrix is not square: row ${i} has ${row.length} entries, expected ${dimension}`,
          { row: i, rowLength: row.length, dimension }
        );
      }
    });

    if (weights.length !== dimension) {
      throw new RiskMetricsError(
        RiskMetricsErrorCode.DIMENSION_MISMATCH,
        `Weight vector has ${weights.length} entries but covariance matrix is ${dimension}x${dimension}`,
        { weights: weights.length, dimension }
      );
    }

    const finite = (value: unknown): boolean => typeof value === 'number' && Number.isFinite(value);
    if (!weights.every(finite) || !covariance.every(row => row.every(finite))) {
      throw new RiskMetricsError(
        RiskMetricsErrorCode.INVALID_PARAMETER,
        'Covariance matrix and weights must contain only finite numbers'
      );
    }
  }

  private logShape(message: string, normalized: NormalizedReturns, confidenceLevel: number): void {
    this.logger.debug(message, {
      columns: normalized.columns.length,
      observations: normalized.observations,
      confidenceLevel
    });
  }

  private run<T>(operation: string, meta: Record<string, unknown>, compute: () => T): T {
    try {
      return compute();
    } catch (error) {
      this.logger.error(`Failed to calculate ${operation}`, error, meta);
      throw error;
    }
  }
}
