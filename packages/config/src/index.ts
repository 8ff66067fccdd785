import * as dotenv from 'dotenv';
import Joi from 'joi';
import _ from 'lodash';
import type { LogLevel } from '@riskmetrics/utils';

export interface RiskMetricsConfig {
  /** Left-tail probability used when a caller omits the confidence level. */
  defaultConfidenceLevel: number;
  logLevel: LogLevel;
}

export type PartialRiskMetricsConfig = Partial<RiskMetricsConfig>;

export const DEFAULT_RISK_METRICS_CONFIG: Readonly<RiskMetricsConfig> = Object.freeze({
  defaultConfidenceLevel: 0.05,
  logLevel: 'info'
});

// Environment variable -> config path
const ENV_MAPPINGS: Record<string, keyof RiskMetricsConfig> = {
  RISK_METRICS_CONFIDENCE_LEVEL: 'defaultConfidenceLevel',
  RISK_METRICS_LOG_LEVEL: 'logLevel'
};

const NUMERIC_KEYS: ReadonlySet<keyof RiskMetricsConfig> = new Set(['defaultConfidenceLevel']);

const configSchema = Joi.object<RiskMetricsConfig>({
  defaultConfidenceLevel: Joi.number().min(0).max(1).required(),
  logLevel: Joi.string().valid('error', 'warn', 'info', 'debug').required()
});

export class ConfigValidationError extends Error {
  constructor(message: string, public readonly details: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Collect overrides from environment variables. Numeric settings are parsed here so
 * that a malformed value surfaces as a validation failure instead of a string.
 */
export function readEnvironmentOverrides(env: NodeJS.ProcessEnv): PartialRiskMetricsConfig {
  const overrides: Record<string, string | number> = {};

  for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value.trim() === '') {
      continue;
    }
    overrides[configPath] = NUMERIC_KEYS.has(configPath) ? Number(value) : value.trim();
  }

  return overrides;
}

/**
 * Build the runtime configuration: defaults, then environment variables, then
 * explicit overrides. Without an explicit `env`, `.env` is loaded into `process.env` first.
 */
export function loadRiskMetricsConfig(
  overrides: PartialRiskMetricsConfig = {},
  env?: NodeJS.ProcessEnv
): RiskMetricsConfig {
  let source = env;
  if (source === undefined) {
    dotenv.config();
    source = process.env;
  }

  const merged: unknown = _.merge(
    {},
    DEFAULT_RISK_METRICS_CONFIG,
    readEnvironmentOverrides(source),
    _.omitBy(overrides, _.isUndefined)
  );

  const { error, value } = configSchema.validate(merged, { abortEarly: false });
  if (error) {
    throw new ConfigValidationError(
      `Configuration validation failed: ${error.message}`,
      error.details.map(detail => detail.message)
    );
  }

  return value;
}
