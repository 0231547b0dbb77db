// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE FILE SCHEMAS — Shape of the JSON Tables Under data/
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { PartnerSchema } from '../engine/validation.js';

const Hs2CodeSchema = z.string().regex(/^\d{1,2}$/, 'HS2 code must be one or two digits');

const RatePercentSchema = z.number().min(0).max(100);

export const Hs2SectorsFileSchema = z.record(Hs2CodeSchema, z.string().min(1));

export const PartnersFileSchema = z.object({
  partners: z.array(
    z.object({
      id: PartnerSchema,
      name: z.string().min(1),
    })
  ),
  note: z.string().default(''),
  countries: z.record(z.string().length(2), z.string().min(1)).default({}),
});

export const TariffRatesFileSchema = z.object({
  description: z.string().default(''),
  note: z.string().default(''),
  default: RatePercentSchema.default(0),
  rates: z
    .object({
      US: z.record(Hs2CodeSchema, RatePercentSchema).default({}),
      China: z.record(Hs2CodeSchema, RatePercentSchema).default({}),
      EU: z.record(Hs2CodeSchema, RatePercentSchema).default({}),
    })
    .strict(),
});

/**
 * Records are checked one by one so every bad row can be reported.
 */
export const SectorExportsFileSchema = z.object({
  year: z.number().int().optional(),
  currency: z.string().optional(),
  records: z.array(z.unknown()),
});

export const ExportRecordSchema = z.object({
  sector_id: Hs2CodeSchema,
  partner: PartnerSchema,
  export_value: z.number(),
});

export type Hs2SectorsFile = z.infer<typeof Hs2SectorsFileSchema>;
export type PartnersFile = z.infer<typeof PartnersFileSchema>;
export type TariffRatesFile = z.infer<typeof TariffRatesFileSchema>;
export type SectorExportsFile = z.infer<typeof SectorExportsFileSchema>;
