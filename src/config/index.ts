// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config, Engine Weights
// ═══════════════════════════════════════════════════════════════════════════════

import {
  MAX_TARIFF_PERCENT,
  TOP_MOVERS_LIMIT,
  W_CONCENTRATION,
  W_EXPOSURE,
  createEngineConfig,
} from '../engine/config.js';
import type { EngineConfig } from '../engine/types.js';
import {
  validateConfig,
  type AppConfig,
  type AppConfigInput,
  type Environment,
} from './schema.js';

export {
  AppConfigSchema,
  EngineSettingsSchema,
  DEFAULT_DATA_DIR,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
  type AppConfig,
  type AppConfigInput,
  type Environment,
  type LogLevel,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

export function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function envFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envOptional(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT → CONFIG INPUT
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVEL_VALUES = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

function readEnvironment(): Environment {
  const env = envString('NODE_ENV', 'development');
  if (env === 'production' || env === 'staging' || env === 'test') return env;
  return 'development';
}

/**
 * Raw configuration read from process.env. Unset keys are left undefined so
 * the schema defaults apply.
 */
export function readEnvConfig(): AppConfigInput {
  const environment = readEnvironment();
  const productionLike = environment === 'production' || environment === 'staging';
  const defaultLevel = environment === 'test' ? 'warn' : 'info';

  return {
    environment,
    server: {
      port: envNumber('PORT', 5001),
      host: envString('HOST', '0.0.0.0'),
    },
    data: {
      dir: envOptional('DATA_DIR'),
    },
    logging: {
      level: LOG_LEVEL_VALUES.find((level) => level === envOptional('LOG_LEVEL')?.toLowerCase()) ?? defaultLevel,
      json: envBool('LOG_JSON', productionLike),
    },
    engine: {
      wExposure: envFloat('RISK_W_EXPOSURE', W_EXPOSURE),
      wConcentration: envFloat('RISK_W_CONCENTRATION', W_CONCENTRATION),
      maxTariffPercent: envFloat('RISK_MAX_TARIFF_PERCENT', MAX_TARIFF_PERCENT),
      topMoversLimit: envNumber('RISK_TOP_MOVERS', TOP_MOVERS_LIMIT),
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = validateConfig(readEnvConfig());
  return cachedConfig;
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}

export function resetConfig(): void {
  cachedConfig = null;
}

export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

/**
 * Install a config built from defaults plus `overrides`, without reading env.
 */
export function loadTestConfig(overrides: AppConfigInput = {}): AppConfig {
  cachedConfig = validateConfig({
    environment: 'test',
    ...overrides,
    logging: { level: 'error', ...overrides.logging },
  });
  return cachedConfig;
}

/**
 * Frozen engine configuration derived from the application config.
 */
export function getEngineConfig(config: AppConfig = loadConfig()): EngineConfig {
  return createEngineConfig(config.engine);
}
