// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Validated Application Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  MAX_TARIFF_PERCENT,
  TOP_MOVERS_LIMIT,
  W_CONCENTRATION,
  W_EXPOSURE,
  checkEngineConfig,
} from '../engine/config.js';

/**
 * `data/` at the repository root, from both `src/config` and `dist/config`.
 */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../../data', import.meta.url));

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'staging', 'production', 'test']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(5001),
  host: z.string().min(1).default('0.0.0.0'),
});

export const DataConfigSchema = z.object({
  dir: z.string().min(1).default(DEFAULT_DATA_DIR),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  json: z.boolean().default(false),
});

/**
 * Weights must sum to 1.0; checked with the same rules the engine applies.
 */
export const EngineSettingsSchema = z
  .object({
    wExposure: z.number().default(W_EXPOSURE),
    wConcentration: z.number().default(W_CONCENTRATION),
    maxTariffPercent: z.number().default(MAX_TARIFF_PERCENT),
    topMoversLimit: z.number().default(TOP_MOVERS_LIMIT),
  })
  .superRefine((settings, ctx) => {
    for (const issue of checkEngineConfig(settings)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [issue.field],
        message: issue.message,
      });
    }
  });

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  server: ServerConfigSchema.default({}),
  data: DataConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  engine: EngineSettingsSchema.default({}),
});

export type Environment = z.infer<typeof EnvironmentSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export function formatConfigErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

export function safeValidateConfig(input: unknown) {
  return AppConfigSchema.safeParse(input);
}

/**
 * Throws with every issue listed when the configuration is invalid.
 */
export function validateConfig(input: unknown): AppConfig {
  const result = safeValidateConfig(input);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatConfigErrors(result.error)}`);
  }
  return result.data;
}

export function getDefaultConfig(): AppConfig {
  return validateConfig({});
}
