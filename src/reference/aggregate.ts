// ═══════════════════════════════════════════════════════════════════════════════
// AGGREGATION — Per-Partner Export Records → Sector Summaries
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import {
  PARTNERS,
  type Partner,
  type SectorSummary,
} from '../engine/types.js';
import { EngineValidationError } from '../engine/errors.js';
import {
  PartnerSchema,
  createSectorSummary,
  nonNegativeNumber,
  parseOrThrow,
} from '../engine/validation.js';
import { err, ok, type Result } from '../types/result.js';
import type { SectorPartnerExport } from './types.js';

const SectorPartnerExportSchema = z.object({
  sectorId: z.string().trim().min(1, 'sector_id is required'),
  sectorName: z.string().trim().min(1, 'sector_name is required'),
  partner: PartnerSchema,
  exportValue: nonNegativeNumber('export_value'),
});

export type SectorPartnerExportParams = z.input<typeof SectorPartnerExportSchema>;

/**
 * Throws EngineValidationError on a negative or non-finite export value.
 */
export function createSectorPartnerExport(params: SectorPartnerExportParams): SectorPartnerExport {
  return Object.freeze(parseOrThrow(SectorPartnerExportSchema, params));
}

export function safeCreateSectorPartnerExport(
  params: SectorPartnerExportParams
): Result<SectorPartnerExport, EngineValidationError> {
  try {
    return ok(createSectorPartnerExport(params));
  } catch (error) {
    if (error instanceof EngineValidationError) {
      return err(error);
    }
    throw error;
  }
}

interface SectorAccumulator {
  sectorName: string;
  values: Record<Partner, number>;
}

/**
 * Fold export records into one summary per sector, ordered by sector id.
 *
 * Shares are `value / total`, every partner is present, and the top partner
 * is the first of US, China, EU, Other with the largest share. A sector with
 * no exports gets zero shares and US as its top partner.
 */
export function buildSectorSummaries(
  exports: Iterable<SectorPartnerExport>
): ReadonlyMap<string, SectorSummary> {
  const bySector = new Map<string, SectorAccumulator>();

  for (const record of exports) {
    let acc = bySector.get(record.sectorId);
    if (!acc) {
      acc = { sectorName: record.sectorName, values: { US: 0, China: 0, EU: 0, Other: 0 } };
      bySector.set(record.sectorId, acc);
    }
    acc.values[record.partner] += record.exportValue;
  }

  const summaries = new Map<string, SectorSummary>();
  const sectorIds = [...bySector.keys()].sort();

  for (const sectorId of sectorIds) {
    const acc = bySector.get(sectorId);
    if (!acc) continue;

    const totalExports = PARTNERS.reduce((sum, partner) => sum + acc.values[partner], 0);
    const partnerShares: Record<Partner, number> = { US: 0, China: 0, EU: 0, Other: 0 };
    let topPartner: Partner = 'US';

    for (const partner of PARTNERS) {
      partnerShares[partner] = totalExports > 0 ? acc.values[partner] / totalExports : 0;
      if (partnerShares[partner] > partnerShares[topPartner]) {
        topPartner = partner;
      }
    }

    summaries.set(
      sectorId,
      createSectorSummary({
        sectorId,
        sectorName: acc.sectorName,
        totalExports,
        partnerShares,
        topPartner,
        topPartnerShare: partnerShares[topPartner],
      })
    );
  }

  return summaries;
}
