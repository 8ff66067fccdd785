import { RiskMetricsConfig } from '@riskmetrics/config';
import { Logger } from '@riskmetrics/utils';
import { RiskMetrics } from '../core/RiskMetrics';
import { normalizeReturns } from '../core/returns';
import { RiskMetricsError, RiskMetricsErrorCode, RiskReport, RiskReportRequest } from '../types';

/**
 * Bundles VaR, Expected Shortfall, CDaR and (optionally) variance for one
 * return sample at a single confidence level.
 */
export class RiskReportService {
  private readonly logger: Logger;
  private readonly metrics: RiskMetrics;
  private readonly defaultConfidenceLevel: number;

  constructor(logger: Logger, config: RiskMetricsConfig) {
    this.logger = logger;
    this.defaultConfidenceLevel = config.defaultConfidenceLevel;
    this.metrics = new RiskMetrics(logger.child('metrics'), config);
  }

  generateReport(request: RiskReportRequest): RiskReport {
    const confidenceLevel = request.confidenceLevel ?? this.defaultConfidenceLevel;
    const normalized = normalizeReturns(request.returns);

    this.logger.info('Generating risk report', {
      columns: normalized.columns.length,
      observations: normalized.observations,
      confidenceLevel,
      includesVariance: request.covariance !== undefined
    });

    const report: RiskReport = {
      confidenceLevel,
      columns: [...normalized.columns],
      observations: normalized.observations,
      valueAtRisk: this.metrics.calculateValueAtRisk(request.returns, confidenceLevel),
      expectedShortfall: this.metrics.calculateExpectedShortfall(request.returns, confidenceLevel),
      conditionalDrawdownRisk: this.metrics.calculateConditionalDrawdownRisk(request.returns, confidenceLevel),
      timestamp: Date.now()
    };

    if (request.covariance !== undefined || request.weights !== undefined) {
      if (request.covariance === undefined || request.weights === undefined) {
        throw new RiskMetricsError(
          RiskMetricsErrorCode.INVALID_PARAMETER,
          'Variance needs both a covariance matrix and a weight vector'
        );
      }
      report.variance = this.metrics.calculateVariance(request.covariance, request.weights);
    }

    if (report.expectedShortfall === null || report.conditionalDrawdownRisk === null) {
      this.logger.warn('Risk report has an empty tail', {
        expectedShortfall: report.expectedShortfall,
        conditionalDrawdownRisk: report.conditionalDrawdownRisk
      });
    }

    return report;
  }
}
