// ═══════════════════════════════════════════════════════════════════════════════
// IN-MEMORY REFERENCE DATA TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { PHARMA, STEEL, VEHICLES } from '../../engine/__tests__/helpers.js';
import { DEFAULT_PARTNER_DIRECTORY, InMemoryReferenceData } from '../provider.js';
import { TariffRateTable } from '../tariff-rates.js';

describe('InMemoryReferenceData', () => {
  const provider = new InMemoryReferenceData([VEHICLES, PHARMA, STEEL], {
    tariffs: new TariffRateTable({ US: { '87': 25 }, EU: { '72': 5 } }),
    sectorNames: new Map([
      ['01', 'Live animals'],
      ['87', 'Vehicles other than railway'],
    ]),
  });

  it('should order sectors by id', () => {
    expect([...provider.allSectors().keys()]).toEqual(['30', '72', '87']);
  });

  it('should look up sectors by id', () => {
    expect(provider.getSector('87')).toBe(VEHICLES);
    expect(provider.getSector('01')).toBeUndefined();
  });

  it('should delegate rate lookups to the table', () => {
    expect(provider.rate('87', 'US')).toBe(25);
    expect(provider.maxRate('72')).toBe(5);
    expect([...provider.allTariffedSectors().keys()]).toEqual(['72', '87']);
  });

  it('should prefer the loaded sector name, then the HS2 map', () => {
    expect(provider.sectorName('87')).toBe('Vehicles');
    expect(provider.sectorName('01')).toBe('Live animals');
    expect(provider.sectorName('55')).toBe('Sector 55');
  });

  it('should default the partner directory and table info', () => {
    expect(provider.partnerDirectory()).toBe(DEFAULT_PARTNER_DIRECTORY);
    expect(provider.partnerDirectory().partners.map((partner) => partner.id)).toEqual(['US', 'China', 'EU', 'Other']);
    expect(provider.tariffTableInfo()).toEqual({ description: '', note: '' });
  });

  it('should have no tariffs without a table', () => {
    const bare = new InMemoryReferenceData([VEHICLES]);
    expect(bare.rate('87', 'US')).toBe(0);
  });
});
