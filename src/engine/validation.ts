// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION — Construction of Sectors and Scenarios
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every value the engine scores goes through one of these constructors.
// They either return a frozen, fully valid object or throw
// EngineValidationError; the `safe*` variants return a Result instead.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { MAX_TARIFF_PERCENT } from './config.js';
import { EngineValidationError, type ValidationIssue } from './errors.js';
import { PARTNERS, type Partner, type ScenarioInput, type SectorSummary } from './types.js';
import { err, ok, type Result } from '../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SHARED SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const PartnerSchema = z.enum(PARTNERS);

/**
 * Number constrained to a closed range, with the offending value in the message.
 */
export function boundedNumber(field: string, min: number, max: number) {
  return z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .superRefine((value, ctx) => {
      if (!Number.isFinite(value) || value < min || value > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${field} must be in [${min}, ${max}], got ${value}`,
        });
      }
    });
}

export function nonNegativeNumber(field: string) {
  return z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .superRefine((value, ctx) => {
      if (!Number.isFinite(value) || value < 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${field} must be >= 0`,
        });
      }
    });
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'input',
    message: issue.message,
  }));
}

/**
 * Parse `input` with `schema`, converting a ZodError into EngineValidationError.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = toIssues(parsed.error);
    throw new EngineValidationError(issues[0]?.message ?? 'Validation failed', issues);
  }
  return parsed.data;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SECTOR SUMMARY
// ─────────────────────────────────────────────────────────────────────────────────

const shareSchema = (partner: Partner) => boundedNumber(`partner_shares.${partner}`, 0, 1).optional();

const SectorSummarySchema = z.object({
  sectorId: z.string().trim().min(1, 'sector_id is required'),
  sectorName: z.string().trim().min(1, 'sector_name is required'),
  totalExports: nonNegativeNumber('total_exports'),
  partnerShares: z
    .object({
      US: shareSchema('US'),
      China: shareSchema('China'),
      EU: shareSchema('EU'),
      Other: shareSchema('Other'),
    })
    .strict(),
  topPartner: PartnerSchema,
  topPartnerShare: boundedNumber('top_partner_share', 0, 1),
});

export type SectorSummaryParams = z.input<typeof SectorSummarySchema>;

export function createSectorSummary(params: SectorSummaryParams): SectorSummary {
  const data = parseOrThrow(SectorSummarySchema, params);
  const partnerShares: Partial<Record<Partner, number>> = {};

  for (const partner of PARTNERS) {
    const share = data.partnerShares[partner];
    if (share !== undefined) {
      partnerShares[partner] = share;
    }
  }

  return Object.freeze({
    sectorId: data.sectorId,
    sectorName: data.sectorName,
    totalExports: data.totalExports,
    partnerShares: Object.freeze(partnerShares),
    topPartner: data.topPartner,
    topPartnerShare: data.topPartnerShare,
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCENARIO INPUT
// ─────────────────────────────────────────────────────────────────────────────────

export interface ScenarioInputParams {
  readonly tariffPercent: number;
  readonly targetPartners?: readonly Partner[];
  readonly sectorFilter?: readonly string[] | null;
}

function scenarioInputSchema(maxTariffPercent: number) {
  return z.object({
    tariffPercent: boundedNumber('tariff_percent', 0, maxTariffPercent),
    targetPartners: z.array(PartnerSchema).default([]),
    sectorFilter: z.array(z.string()).nullable().default(null),
  });
}

/**
 * Build a scenario. Target partners are deduplicated, keeping first-seen order.
 */
export function createScenarioInput(
  params: ScenarioInputParams,
  maxTariffPercent: number = MAX_TARIFF_PERCENT
): ScenarioInput {
  const data = parseOrThrow(scenarioInputSchema(maxTariffPercent), params);
  const targetPartners = [...new Set(data.targetPartners)];

  return Object.freeze({
    tariffPercent: data.tariffPercent,
    targetPartners: Object.freeze(targetPartners),
    sectorFilter: data.sectorFilter === null ? null : Object.freeze([...data.sectorFilter]),
  });
}

export function safeCreateScenarioInput(
  params: ScenarioInputParams,
  maxTariffPercent: number = MAX_TARIFF_PERCENT
): Result<ScenarioInput, EngineValidationError> {
  try {
    return ok(createScenarioInput(params, maxTariffPercent));
  } catch (error) {
    if (error instanceof EngineValidationError) {
      return err(error);
    }
    throw error;
  }
}
