// ═══════════════════════════════════════════════════════════════════════════════
// IN-MEMORY REFERENCE DATA
// ═══════════════════════════════════════════════════════════════════════════════

import type { Partner, SectorSummary } from '../engine/types.js';
import { TariffRateTable } from './tariff-rates.js';
import type {
  PartnerDirectory,
  PartnerTariffRates,
  ReferenceDataProvider,
  TariffTableInfo,
} from './types.js';

export const DEFAULT_PARTNER_DIRECTORY: PartnerDirectory = Object.freeze({
  partners: Object.freeze([
    Object.freeze({ id: 'US', name: 'United States' }),
    Object.freeze({ id: 'China', name: 'China' }),
    Object.freeze({ id: 'EU', name: 'European Union' }),
    Object.freeze({ id: 'Other', name: 'Other' }),
  ]),
  note: "All other countries are aggregated as 'Other'",
  countries: Object.freeze({}),
});

export interface InMemoryReferenceDataOptions {
  tariffs?: TariffRateTable;
  /** HS2 code → sector name */
  sectorNames?: ReadonlyMap<string, string>;
  partners?: PartnerDirectory;
  tariffInfo?: TariffTableInfo;
}

/**
 * Immutable lookups over sector summaries and tariff rates, built once at
 * load time and shared by every request.
 */
export class InMemoryReferenceData implements ReferenceDataProvider {
  private readonly sectors: ReadonlyMap<string, SectorSummary>;
  private readonly tariffs: TariffRateTable;
  private readonly sectorNames: ReadonlyMap<string, string>;
  private readonly partners: PartnerDirectory;
  private readonly tariffInfo: TariffTableInfo;

  constructor(sectors: Iterable<SectorSummary>, options: InMemoryReferenceDataOptions = {}) {
    const sorted = [...sectors].sort((a, b) => (a.sectorId < b.sectorId ? -1 : a.sectorId > b.sectorId ? 1 : 0));
    this.sectors = new Map(sorted.map((sector) => [sector.sectorId, sector]));
    this.tariffs = options.tariffs ?? new TariffRateTable();
    this.sectorNames = options.sectorNames ?? new Map();
    this.partners = options.partners ?? DEFAULT_PARTNER_DIRECTORY;
    this.tariffInfo = options.tariffInfo ?? { description: '', note: '' };
  }

  getSector(sectorId: string): SectorSummary | undefined {
    return this.sectors.get(sectorId);
  }

  allSectors(): ReadonlyMap<string, SectorSummary> {
    return this.sectors;
  }

  rate(sectorId: string, partner: Partner): number {
    return this.tariffs.rate(sectorId, partner);
  }

  maxRate(sectorId: string): number {
    return this.tariffs.maxRate(sectorId);
  }

  allTariffedSectors(): ReadonlyMap<string, PartnerTariffRates> {
    return this.tariffs.allTariffedSectors();
  }

  /**
   * Name from the loaded sector, then the HS2 map, then `Sector <id>`.
   */
  sectorName(sectorId: string): string {
    return this.sectors.get(sectorId)?.sectorName ?? this.sectorNames.get(sectorId) ?? `Sector ${sectorId}`;
  }

  partnerDirectory(): PartnerDirectory {
    return this.partners;
  }

  tariffTableInfo(): TariffTableInfo {
    return this.tariffInfo;
  }
}
