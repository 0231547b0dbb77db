// ═══════════════════════════════════════════════════════════════════════════════
// TARIFF RATE TABLE — HS2 Code × Partner → Rate Percent
// ═══════════════════════════════════════════════════════════════════════════════

import {
  SELECTABLE_PARTNERS,
  type Partner,
  type SelectablePartner,
} from '../engine/types.js';
import type { PartnerTariffRates } from './types.js';

export type TariffRateEntries = Readonly<Partial<Record<SelectablePartner, Readonly<Record<string, number>>>>>;

/**
 * Pad a sector id to two characters: `'4'` → `'04'`.
 */
export function normalizeSectorId(sectorId: string): string {
  return sectorId.trim().padStart(2, '0');
}

export class TariffRateTable {
  private readonly rates: ReadonlyMap<SelectablePartner, ReadonlyMap<string, number>>;

  constructor(
    entries: TariffRateEntries = {},
    readonly defaultRate: number = 0
  ) {
    const rates = new Map<SelectablePartner, ReadonlyMap<string, number>>();
    for (const partner of SELECTABLE_PARTNERS) {
      const table = new Map<string, number>();
      for (const [sectorId, rate] of Object.entries(entries[partner] ?? {})) {
        table.set(normalizeSectorId(sectorId), rate);
      }
      rates.set(partner, table);
    }
    this.rates = rates;
  }

  /**
   * Rate `partner` applies to `sectorId`; the default for `Other` and for
   * sectors the table does not list.
   */
  rate(sectorId: string, partner: Partner): number {
    if (partner === 'Other') return this.defaultRate;
    return this.rates.get(partner)?.get(normalizeSectorId(sectorId)) ?? this.defaultRate;
  }

  maxRate(sectorId: string): number {
    return Math.max(...SELECTABLE_PARTNERS.map((partner) => this.rate(sectorId, partner)));
  }

  /**
   * Every sector at least one partner lists, ordered by sector id.
   */
  allTariffedSectors(): ReadonlyMap<string, PartnerTariffRates> {
    const sectorIds = new Set<string>();
    for (const table of this.rates.values()) {
      for (const sectorId of table.keys()) {
        sectorIds.add(sectorId);
      }
    }

    const result = new Map<string, PartnerTariffRates>();
    for (const sectorId of [...sectorIds].sort()) {
      result.set(
        sectorId,
        Object.freeze({
          US: this.rate(sectorId, 'US'),
          China: this.rate(sectorId, 'China'),
          EU: this.rate(sectorId, 'EU'),
        })
      );
    }
    return result;
  }
}
