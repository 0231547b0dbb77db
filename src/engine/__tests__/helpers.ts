// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE TEST HELPERS — Sector Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

import { PARTNERS, type Partner, type SectorSummary } from '../types.js';
import { createSectorSummary } from '../validation.js';
import { InMemoryReferenceData } from '../../reference/provider.js';
import { TariffRateTable, type TariffRateEntries } from '../../reference/tariff-rates.js';

export function makeSector(
  sectorId: string,
  sectorName: string,
  totalExports: number,
  shares: Record<Partner, number>
): SectorSummary {
  let topPartner: Partner = 'US';
  for (const partner of PARTNERS) {
    if (shares[partner] > shares[topPartner]) topPartner = partner;
  }
  return createSectorSummary({
    sectorId,
    sectorName,
    totalExports,
    partnerShares: shares,
    topPartner,
    topPartnerShare: shares[topPartner],
  });
}

/** US-heavy: the reference case for a 10% tariff on the US */
export const VEHICLES = makeSector('87', 'Vehicles', 50e9, { US: 0.62, China: 0.08, EU: 0.15, Other: 0.15 });

export const STEEL = makeSector('72', 'Iron and steel', 10e9, { US: 0.89, China: 0.02, EU: 0.05, Other: 0.04 });

/** EU is the top partner */
export const PHARMA = makeSector('30', 'Pharmaceutical products', 10e9, { US: 0.2, China: 0.3, EU: 0.4, Other: 0.1 });

export function makeSource(
  sectors: readonly SectorSummary[] = [VEHICLES, STEEL, PHARMA],
  tariffs: TariffRateEntries = {}
): InMemoryReferenceData {
  return new InMemoryReferenceData(sectors, { tariffs: new TariffRateTable(tariffs) });
}
