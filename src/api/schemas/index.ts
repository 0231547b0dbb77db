// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — API Request Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

export {
  isSelectablePartner,
  WirePartnerSchema,
  TargetPartnersSchema,
  SectorFilterSchema,
  ScenarioRequestSchema,
  ScenarioSpecSchema,
  CompareRequestSchema,
  CsvListSchema,
  BaselineQuerySchema,
  ActualTariffsQuerySchema,
  SectorIdParamSchema,
  type ScenarioRequest,
  type ScenarioSpec,
  type CompareRequest,
  type BaselineQuery,
  type ActualTariffsQuery,
} from './scenarios.js';
