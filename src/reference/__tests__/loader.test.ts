// ═══════════════════════════════════════════════════════════════════════════════
// LOADER TESTS — Bundled Tables and Broken Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { DEFAULT_DATA_DIR, loadTestConfig } from '../../config/index.js';
import {
  REFERENCE_FILES,
  ReferenceDataLoadError,
  loadReferenceData,
  parseExportRecords,
} from '../loader.js';

beforeAll(() => {
  loadTestConfig({ logging: { level: 'fatal' } });
});

// ─────────────────────────────────────────────────────────────────────────────────
// BUNDLED DATA
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadReferenceData (bundled tables)', () => {
  it('should load every sector with exports', async () => {
    const provider = await loadReferenceData(DEFAULT_DATA_DIR);

    expect(provider.allSectors().size).toBe(30);
    expect([...provider.allSectors().keys()].slice(0, 3)).toEqual(['02', '03', '04']);
  });

  it('should aggregate the vehicles sector', async () => {
    const provider = await loadReferenceData(DEFAULT_DATA_DIR);

    expect(provider.getSector('87')).toEqual({
      sectorId: '87',
      sectorName: 'Vehicles',
      totalExports: 50e9,
      partnerShares: { US: 0.62, China: 0.08, EU: 0.15, Other: 0.15 },
      topPartner: 'US',
      topPartnerShare: 0.62,
    });
  });

  it('should load the tariff table', async () => {
    const provider = await loadReferenceData(DEFAULT_DATA_DIR);

    expect(provider.rate('72', 'US')).toBe(25);
    expect(provider.rate('72', 'EU')).toBe(5);
    expect(provider.rate('10', 'China')).toBe(25);
    expect(provider.rate('30', 'US')).toBe(0);
    expect(provider.allTariffedSectors().size).toBe(18);
    expect(provider.tariffTableInfo().description).toBe('Tariff rates applied to exports by sector and partner');
  });

  it('should name sectors without exports from the HS2 table', async () => {
    const provider = await loadReferenceData(DEFAULT_DATA_DIR);

    expect(provider.getSector('01')).toBeUndefined();
    expect(provider.sectorName('02')).toBe('Meat and edible meat offal');
  });

  it('should load the partner directory', async () => {
    const provider = await loadReferenceData(DEFAULT_DATA_DIR);
    const directory = provider.partnerDirectory();

    expect(directory.partners.map((partner) => partner.id)).toEqual(['US', 'China', 'EU', 'Other']);
    expect(directory.note).toBe("All other countries are aggregated as 'Other'");
    expect(directory.countries['MX']).toBe('Mexico');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// RECORD PARSING
// ─────────────────────────────────────────────────────────────────────────────────

describe('parseExportRecords', () => {
  const names = new Map([['04', 'Dairy produce']]);

  it('should pad ids and attach sector names', () => {
    const result = parseExportRecords(
      [
        { sector_id: '4', partner: 'US', export_value: 10 },
        { sector_id: '55', partner: 'EU', export_value: 5 },
      ],
      names
    );

    expect(result).toEqual({
      ok: true,
      value: [
        { sectorId: '04', sectorName: 'Dairy produce', partner: 'US', exportValue: 10 },
        { sectorId: '55', sectorName: 'Sector 55', partner: 'EU', exportValue: 5 },
      ],
    });
  });

  it('should report every invalid record with its index', () => {
    const result = parseExportRecords(
      [
        { sector_id: '04', partner: 'US', export_value: 10 },
        { sector_id: '04', partner: 'US', export_value: -1 },
        { sector_id: '04', partner: 'US', export_value: 'lots' },
      ],
      names
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toHaveLength(2);
      expect(result.error[0]).toBe('records[1]: export_value must be >= 0');
      expect(result.error[1]?.startsWith('records[2]: export_value: ')).toBe(true);
    }
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// BROKEN FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadReferenceData (broken tables)', () => {
  let dir: string;

  async function writeTables(overrides: Partial<Record<keyof typeof REFERENCE_FILES, string | null>> = {}) {
    const tables: Record<keyof typeof REFERENCE_FILES, string> = {
      sectors: JSON.stringify({ '87': 'Vehicles' }),
      partners: JSON.stringify({ partners: [{ id: 'US', name: 'United States' }] }),
      tariffs: JSON.stringify({ rates: { US: { '87': 25 } } }),
      exports: JSON.stringify({ records: [{ sector_id: '87', partner: 'US', export_value: 100 }] }),
    };

    for (const key of ['sectors', 'partners', 'tariffs', 'exports'] as const) {
      const override = overrides[key];
      if (override === null) continue;
      await writeFile(join(dir, REFERENCE_FILES[key]), override ?? tables[key]);
    }
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reference-data-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a minimal valid set', async () => {
    await writeTables();
    const provider = await loadReferenceData(dir);

    expect(provider.getSector('87')?.topPartnerShare).toBe(1);
    expect(provider.partnerDirectory().note).toBe('');
    expect(provider.maxRate('87')).toBe(25);
  });

  it('should name a missing file', async () => {
    await writeTables({ partners: null });

    await expect(loadReferenceData(dir)).rejects.toBeInstanceOf(ReferenceDataLoadError);
    await expect(loadReferenceData(dir)).rejects.toMatchObject({ file: 'partners.json' });
  });

  it('should reject malformed JSON', async () => {
    await writeTables({ tariffs: '{ "rates": ' });

    const error = await loadReferenceData(dir).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ReferenceDataLoadError);
    if (error instanceof ReferenceDataLoadError) {
      expect(error.file).toBe('tariff-rates.json');
      expect(error.issues[0]?.startsWith('invalid JSON: ')).toBe(true);
    }
  });

  it('should reject an unknown partner in the rate table', async () => {
    await writeTables({ tariffs: JSON.stringify({ rates: { Mexico: { '87': 25 } } }) });
    await expect(loadReferenceData(dir)).rejects.toMatchObject({ file: 'tariff-rates.json' });
  });

  it('should reject a negative export value', async () => {
    await writeTables({
      exports: JSON.stringify({ records: [{ sector_id: '87', partner: 'US', export_value: -5 }] }),
    });

    await expect(loadReferenceData(dir)).rejects.toThrow(
      'Failed to load sector-partner-exports.json: records[0]: export_value must be >= 0'
    );
  });
});
