// Risk Metrics Types
// Return-series shapes, results and errors shared by the calculators

/** Square N×N matrix of asset covariances. */
export type CovarianceMatrix = number[][];

/** One allocation per asset, aligned with the covariance matrix. Not normalized. */
export type Weights = number[];

/** A single return series ordered by time. */
export type ReturnSeries = number[];

/** Time-major rows, one column per asset. */
export type ReturnMatrix = number[][];

export interface ReturnTable {
  columns: string[];
  rows: number[][];
}

/**
 * Any return data the calculators accept. Everything is normalized into
 * {@link NormalizedReturns} before a statistic is computed.
 */
export type ReturnsInput = ReturnSeries | ReturnMatrix | ReturnTable;

export interface NormalizedReturns {
  readonly columns: readonly string[];
  /** Column-major: `series[c][t]` is the return of column `c` at time `t`. */
  readonly series: readonly (readonly number[])[];
  readonly observations: number;
}

export type ColumnValues = Record<string, number>;

/** `null` means no observation fell in the tail. */
export type TailMean = number | null;

export type ColumnTailMeans = Record<string, TailMean>;

export interface RiskReportRequest {
  returns: ReturnsInput;
  confidenceLevel?: number;
  covariance?: CovarianceMatrix;
  weights?: Weights;
}

export interface RiskReport {
  confidenceLevel: number;
  columns: string[];
  observations: number;
  valueAtRisk: ColumnValues;
  expectedShortfall: TailMean;
  conditionalDrawdownRisk: TailMean;
  variance?: number;
  timestamp: number;
}

// Error Types
export enum RiskMetricsErrorCode {
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  INVALID_PARAMETER = 'INVALID_PARAMETER'
}

export class RiskMetricsError extends Error {
  constructor(
    public readonly code: RiskMetricsErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RiskMetricsError';
  }
}
