// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE CONFIG — Weights and Limits
// ═══════════════════════════════════════════════════════════════════════════════

import { EngineValidationError, type ValidationIssue } from './errors.js';
import type { EngineConfig } from './types.js';

export const W_EXPOSURE = 0.6;
export const W_CONCENTRATION = 0.4;
export const MAX_TARIFF_PERCENT = 25.0;
export const TOP_MOVERS_LIMIT = 5;

/** Tolerance on the weight sum; weights read from the environment are decimal strings. */
const WEIGHT_SUM_EPSILON = 1e-9;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  wExposure: W_EXPOSURE,
  wConcentration: W_CONCENTRATION,
  maxTariffPercent: MAX_TARIFF_PERCENT,
  topMoversLimit: TOP_MOVERS_LIMIT,
});

export function checkEngineConfig(config: EngineConfig): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const field of ['wExposure', 'wConcentration'] as const) {
    const weight = config[field];
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      issues.push({ field, message: `${field} must be in [0, 1], got ${weight}` });
    }
  }

  const sum = config.wExposure + config.wConcentration;
  if (Math.abs(sum - 1) > WEIGHT_SUM_EPSILON) {
    issues.push({ field: 'wExposure', message: `weights must sum to 1.0, got ${sum}` });
  }

  if (!Number.isFinite(config.maxTariffPercent) || config.maxTariffPercent <= 0) {
    issues.push({
      field: 'maxTariffPercent',
      message: `maxTariffPercent must be > 0, got ${config.maxTariffPercent}`,
    });
  }

  if (!Number.isInteger(config.topMoversLimit) || config.topMoversLimit < 1) {
    issues.push({
      field: 'topMoversLimit',
      message: `topMoversLimit must be a positive integer, got ${config.topMoversLimit}`,
    });
  }

  return issues;
}

/**
 * Build a frozen engine config, overriding the defaults.
 * Throws EngineValidationError when the result breaks the weight invariant.
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  const issues = checkEngineConfig(config);

  if (issues.length > 0) {
    throw new EngineValidationError('Invalid engine configuration', issues);
  }

  return Object.freeze(config);
}
