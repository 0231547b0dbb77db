// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  PARTNERS,
  SELECTABLE_PARTNERS,
  type Partner,
  type SelectablePartner,
  type EngineConfig,
  type EngineConfigView,
  type PartnerShares,
  type SectorSummary,
  type SectorDataSource,
  type ScenarioInput,
  type ScenarioEcho,
  type HypotheticalScenarioEcho,
  type ActualTariffScenarioEcho,
  type ExplainabilityBreakdown,
  type SectorRiskOutput,
  type ScenarioMetadata,
  type ScenarioResponse,
  type ComparisonRecord,
  type ComparisonResponse,
} from './types.js';

export {
  EngineValidationError,
  ReferenceDataNotReadyError,
  type ValidationIssue,
  type ReferenceDataState,
} from './errors.js';

export {
  W_EXPOSURE,
  W_CONCENTRATION,
  MAX_TARIFF_PERCENT,
  TOP_MOVERS_LIMIT,
  DEFAULT_ENGINE_CONFIG,
  checkEngineConfig,
  createEngineConfig,
} from './config.js';

export {
  PartnerSchema,
  boundedNumber,
  nonNegativeNumber,
  parseOrThrow,
  createSectorSummary,
  createScenarioInput,
  safeCreateScenarioInput,
  type SectorSummaryParams,
  type ScenarioInputParams,
} from './validation.js';

export {
  clamp,
  clamp01,
  roundTo,
  computeExposure,
  computeConcentration,
  computeShock,
  computeRiskScore,
  computeAffectedExportValue,
  computeDependencyPercent,
  buildExplainability,
} from './scoring.js';

export { ScenarioEvaluator, rankByRisk } from './evaluator.js';
export { ScenarioComparator, type ScenarioScorer } from './comparator.js';
export { RiskEngine, DEFAULT_REPLAY_PARTNERS, describeEngineConfig } from './engine.js';

export {
  toSectorRiskJson,
  toScenarioEchoJson,
  toScenarioResponseJson,
  toComparisonRecordJson,
  toComparisonJson,
  toSectorSummaryJson,
  toEngineConfigJson,
  type SectorRiskJson,
  type ScenarioEchoJson,
  type ScenarioResponseJson,
  type ComparisonRecordJson,
  type ComparisonResponseJson,
  type SectorSummaryJson,
  type EngineConfigJson,
} from './serialize.js';
