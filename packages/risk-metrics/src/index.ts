/**
 * Risk Metrics Module
 * Variance, historical VaR, Expected Shortfall and CDaR over return samples
 */

import { loadRiskMetricsConfig, PartialRiskMetricsConfig } from '@riskmetrics/config';
import { Logger } from '@riskmetrics/utils';
import { RiskMetrics } from './core/RiskMetrics';

export * from './types';
export { RiskMetrics } from './core/RiskMetrics';
export type { RiskMetricsOptions } from './core/RiskMetrics';
export { normalizeReturns } from './core/returns';
export {
  assertConfidenceLevel,
  drawdownSeries,
  expandingMax,
  higherQuantile,
  maxDrawdownSeries,
  tailMean
} from './core/statistics';
export { RiskReportService } from './services/RiskReportService';

/**
 * Build a calculator from environment configuration plus any overrides.
 */
export function createRiskMetrics(overrides: PartialRiskMetricsConfig = {}): RiskMetrics {
  const config = loadRiskMetricsConfig(overrides);
  return new RiskMetrics(new Logger('risk-metrics', { level: config.logLevel }), config);
}

export default RiskMetrics;
