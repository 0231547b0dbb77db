// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE DATA — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  SectorPartnerExport,
  PartnerTariffRates,
  PartnerInfo,
  PartnerDirectory,
  TariffTableInfo,
  ReferenceDataProvider,
} from './types.js';

export {
  createSectorPartnerExport,
  safeCreateSectorPartnerExport,
  buildSectorSummaries,
  type SectorPartnerExportParams,
} from './aggregate.js';

export { TariffRateTable, normalizeSectorId, type TariffRateEntries } from './tariff-rates.js';

export {
  InMemoryReferenceData,
  DEFAULT_PARTNER_DIRECTORY,
  type InMemoryReferenceDataOptions,
} from './provider.js';

export {
  loadReferenceData,
  parseExportRecords,
  ReferenceDataLoadError,
  REFERENCE_FILES,
} from './loader.js';

export { ReferenceDataRegistry, type ReferenceDataLoadFn } from './registry.js';
