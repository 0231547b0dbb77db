// ═══════════════════════════════════════════════════════════════════════════════
// SCENARIO SCHEMAS — Wire Validation for Scenario and Comparison Requests
// ═══════════════════════════════════════════════════════════════════════════════
//
// Range checks on tariff_percent belong to the engine; these schemas only
// check shape and reject partners a caller may not target.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { SELECTABLE_PARTNERS, type SelectablePartner } from '../../engine/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PARTNERS
// ─────────────────────────────────────────────────────────────────────────────────

export function isSelectablePartner(value: unknown): value is SelectablePartner {
  return typeof value === 'string' && (SELECTABLE_PARTNERS as readonly string[]).includes(value);
}

const PARTNER_OPTIONS = SELECTABLE_PARTNERS.join(', ');

/**
 * `US`, `China` or `EU`. `Other` is never accepted from a caller.
 */
export const WirePartnerSchema = z
  .string({ invalid_type_error: 'Partner must be a string' })
  .refine((value): value is SelectablePartner => isSelectablePartner(value), (value) => ({
    message: `Invalid partner: ${value}. Valid options: ${PARTNER_OPTIONS}`,
  }));

export const TargetPartnersSchema = z
  .array(WirePartnerSchema, { invalid_type_error: 'target_partners must be an array' })
  .default([]);

export const SectorFilterSchema = z
  .array(z.string().trim(), { invalid_type_error: 'sector_filter must be an array' })
  .nullable()
  .optional();

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST BODIES
// ─────────────────────────────────────────────────────────────────────────────────

const BODY_REQUIRED = { required_error: 'Request body is required', invalid_type_error: 'Request body is required' };

export const ScenarioRequestSchema = z.object(
  {
    tariff_percent: z.number({
      required_error: 'tariff_percent is required',
      invalid_type_error: 'tariff_percent must be a number',
    }),
    target_partners: TargetPartnersSchema,
    sector_filter: SectorFilterSchema,
  },
  BODY_REQUIRED
);

function scenarioSpecSchema(field: string) {
  return z.object(
    {
      tariff_percent: z.number({ invalid_type_error: 'tariff_percent must be a number' }).default(0),
      target_partners: TargetPartnersSchema,
    },
    { required_error: `${field} is required`, invalid_type_error: `${field} must be an object` }
  );
}

/**
 * One side of a comparison; a missing tariff means 0.
 */
export const ScenarioSpecSchema = scenarioSpecSchema('scenario');

export const CompareRequestSchema = z.object(
  {
    baseline: scenarioSpecSchema('baseline').default({ tariff_percent: 0, target_partners: [] }),
    scenario: ScenarioSpecSchema,
    sector_filter: SectorFilterSchema,
  },
  BODY_REQUIRED
);

export type ScenarioRequest = z.infer<typeof ScenarioRequestSchema>;
export type ScenarioSpec = z.infer<typeof ScenarioSpecSchema>;
export type CompareRequest = z.infer<typeof CompareRequestSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// QUERY STRINGS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * `a,b,c` (or a repeated key) → trimmed, non-empty tokens. Absent or empty → null.
 */
export const CsvListSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value): string[] | null => {
    if (value === undefined) return null;
    const joined = Array.isArray(value) ? value.join(',') : value;
    if (joined.trim() === '') return null;
    return joined
      .split(',')
      .map((token) => token.trim())
      .filter((token) => token.length > 0);
  });

export const BaselineQuerySchema = z.object({
  sectors: CsvListSchema,
});

/**
 * Unknown partner tokens are dropped; the engine falls back to US when none remain.
 */
export const ActualTariffsQuerySchema = z.object({
  partners: CsvListSchema.transform((tokens): SelectablePartner[] => (tokens ?? []).filter(isSelectablePartner)),
  sectors: CsvListSchema,
});

export const SectorIdParamSchema = z.object({
  sectorId: z.string().trim().min(1, 'sector_id is required'),
});

export type BaselineQuery = z.infer<typeof BaselineQuerySchema>;
export type ActualTariffsQuery = z.infer<typeof ActualTariffsQuerySchema>;
