// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE DATA LOADER — Reads and Validates the data/ Tables
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { z } from 'zod';
import { loggers } from '../logging/index.js';
import { collectAll, err, isErr, mapErr, type Result } from '../types/result.js';
import { buildSectorSummaries, safeCreateSectorPartnerExport } from './aggregate.js';
import { InMemoryReferenceData } from './provider.js';
import {
  ExportRecordSchema,
  Hs2SectorsFileSchema,
  PartnersFileSchema,
  SectorExportsFileSchema,
  TariffRatesFileSchema,
} from './schemas.js';
import { TariffRateTable, normalizeSectorId } from './tariff-rates.js';
import type { SectorPartnerExport } from './types.js';

export const REFERENCE_FILES = {
  sectors: 'hs2-sectors.json',
  partners: 'partners.json',
  tariffs: 'tariff-rates.json',
  exports: 'sector-partner-exports.json',
} as const;

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class ReferenceDataLoadError extends Error {
  constructor(
    readonly file: string,
    readonly issues: readonly string[],
    cause?: unknown
  ) {
    super(`Failed to load ${file}: ${issues.join('; ')}`);
    this.name = 'ReferenceDataLoadError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// FILE READING
// ─────────────────────────────────────────────────────────────────────────────────

async function readJsonFile<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): Promise<z.output<S>> {
  let text: string;
  try {
    text = await readFile(join(dir, file), 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReferenceDataLoadError(file, [message], error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReferenceDataLoadError(file, [`invalid JSON: ${message}`], error);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ReferenceDataLoadError(file, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Validate each export record, collecting every failure with its index.
 */
export function parseExportRecords(
  records: readonly unknown[],
  sectorNames: ReadonlyMap<string, string>
): Result<SectorPartnerExport[], string[]> {
  const results = records.map((raw, index): Result<SectorPartnerExport, string> => {
    const parsed = ExportRecordSchema.safeParse(raw);
    if (!parsed.success) {
      return err(`records[${index}]: ${formatIssues(parsed.error).join(', ')}`);
    }

    const sectorId = normalizeSectorId(parsed.data.sector_id);
    const created = safeCreateSectorPartnerExport({
      sectorId,
      sectorName: sectorNames.get(sectorId) ?? `Sector ${sectorId}`,
      partner: parsed.data.partner,
      exportValue: parsed.data.export_value,
    });
    return mapErr(created, (error) => `records[${index}]: ${error.message}`);
  });

  return collectAll(results);
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read the four reference tables from `dir` and build the provider.
 * Any missing file or invalid record rejects with ReferenceDataLoadError.
 */
export async function loadReferenceData(dir: string): Promise<InMemoryReferenceData> {
  const logger = loggers.data();
  const startTime = Date.now();

  const [sectorsFile, partnersFile, tariffsFile, exportsFile] = await Promise.all([
    readJsonFile(dir, REFERENCE_FILES.sectors, Hs2SectorsFileSchema),
    readJsonFile(dir, REFERENCE_FILES.partners, PartnersFileSchema),
    readJsonFile(dir, REFERENCE_FILES.tariffs, TariffRatesFileSchema),
    readJsonFile(dir, REFERENCE_FILES.exports, SectorExportsFileSchema),
  ]);

  const sectorNames = new Map<string, string>();
  for (const [code, name] of Object.entries(sectorsFile)) {
    sectorNames.set(normalizeSectorId(code), name);
  }

  const records = parseExportRecords(exportsFile.records, sectorNames);
  if (isErr(records)) {
    throw new ReferenceDataLoadError(REFERENCE_FILES.exports, records.error);
  }

  const provider = new InMemoryReferenceData(buildSectorSummaries(records.value).values(), {
    tariffs: new TariffRateTable(tariffsFile.rates, tariffsFile.default),
    sectorNames,
    partners: {
      partners: partnersFile.partners,
      note: partnersFile.note,
      countries: partnersFile.countries,
    },
    tariffInfo: {
      description: tariffsFile.description,
      note: tariffsFile.note,
    },
  });

  logger.time('Reference data loaded', startTime, {
    dir,
    sectors: provider.allSectors().size,
    tariffedSectors: provider.allTariffedSectors().size,
  });

  return provider;
}
