// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE DATA TYPES
// ═══════════════════════════════════════════════════════════════════════════════

import type { Partner, SectorDataSource, SelectablePartner } from '../engine/types.js';

/**
 * Export value of one sector to one partner, as produced by the trade ETL.
 */
export interface SectorPartnerExport {
  readonly sectorId: string;
  readonly sectorName: string;
  readonly partner: Partner;
  readonly exportValue: number;
}

/**
 * Rates for one sector across the partners a tariff table can list.
 */
export type PartnerTariffRates = Readonly<Record<SelectablePartner, number>>;

export interface PartnerInfo {
  readonly id: Partner;
  readonly name: string;
}

export interface PartnerDirectory {
  readonly partners: readonly PartnerInfo[];
  readonly note: string;
  /** ISO country code → display name */
  readonly countries: Readonly<Record<string, string>>;
}

export interface TariffTableInfo {
  readonly description: string;
  readonly note: string;
}

/**
 * Read-only lookups over the loaded reference tables.
 */
export interface ReferenceDataProvider extends SectorDataSource {
  maxRate(sectorId: string): number;
  allTariffedSectors(): ReadonlyMap<string, PartnerTariffRates>;
  sectorName(sectorId: string): string;
  partnerDirectory(): PartnerDirectory;
  tariffTableInfo(): TariffTableInfo;
}
