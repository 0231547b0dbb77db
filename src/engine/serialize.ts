// ═══════════════════════════════════════════════════════════════════════════════
// SERIALIZATION — Wire Shapes for Engine Outputs
// ═══════════════════════════════════════════════════════════════════════════════
//
// The transport layer passes these objects through unchanged, so the field
// names here are the public contract.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  ComparisonRecord,
  ComparisonResponse,
  EngineConfigView,
  Partner,
  ScenarioEcho,
  ScenarioResponse,
  SectorRiskOutput,
  SectorSummary,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// JSON TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ExplainabilityJson {
  exposure_value: number;
  concentration_value: number;
  shock_value: number;
  exposure_component: number;
  concentration_component: number;
}

export interface SectorRiskJson {
  sector_id: string;
  sector_name: string;
  exposure: number;
  concentration: number;
  shock: number;
  risk_score: number;
  dependency_percent: number;
  affected_export_value: number;
  top_partner: Partner;
  risk_delta: number;
  explainability: ExplainabilityJson;
}

export type ScenarioEchoJson =
  | {
      mode: 'hypothetical';
      tariff_percent: number;
      target_partners: Partner[];
      sector_filter: string[] | null;
    }
  | {
      mode: 'actual_tariffs';
      target_partners: Partner[];
      sector_filter: string[] | null;
      sector_tariffs: Record<string, number>;
    };

export interface ScenarioResponseJson {
  scenario: ScenarioEchoJson;
  sectors: SectorRiskJson[];
  biggest_movers: SectorRiskJson[];
  total_sectors: number;
  metadata: {
    w_exposure: number;
    w_concentration: number;
    max_tariff_percent: number;
  };
}

export interface ComparisonRecordJson {
  sector_id: string;
  sector_name: string;
  baseline_risk: number;
  scenario_risk: number;
  risk_change: number;
  affected_export_value: number;
  top_partner: Partner;
  dependency_percent: number;
}

export interface ComparisonResponseJson {
  baseline_scenario: ScenarioEchoJson;
  shock_scenario: ScenarioEchoJson;
  comparison: ComparisonRecordJson[];
  biggest_gainers: ComparisonRecordJson[];
  total_sectors: number;
}

export interface SectorSummaryJson {
  sector_id: string;
  sector_name: string;
  total_exports: number;
  partner_shares: Partial<Record<Partner, number>>;
  top_partner: Partner;
  top_partner_share: number;
}

export interface EngineConfigJson {
  w_exposure: number;
  w_concentration: number;
  max_tariff_percent: number;
  risk_formula: string;
  shock_formula: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONVERTERS
// ─────────────────────────────────────────────────────────────────────────────────

export function toSectorRiskJson(output: SectorRiskOutput): SectorRiskJson {
  return {
    sector_id: output.sectorId,
    sector_name: output.sectorName,
    exposure: output.exposure,
    concentration: output.concentration,
    shock: output.shock,
    risk_score: output.riskScore,
    dependency_percent: output.dependencyPercent,
    affected_export_value: output.affectedExportValue,
    top_partner: output.topPartner,
    risk_delta: output.riskDelta,
    explainability: {
      exposure_value: output.explainability.exposureValue,
      concentration_value: output.explainability.concentrationValue,
      shock_value: output.explainability.shockValue,
      exposure_component: output.explainability.exposureComponent,
      concentration_component: output.explainability.concentrationComponent,
    },
  };
}

export function toScenarioEchoJson(echo: ScenarioEcho): ScenarioEchoJson {
  const sectorFilter = echo.sectorFilter === null ? null : [...echo.sectorFilter];

  if (echo.mode === 'actual_tariffs') {
    return {
      mode: 'actual_tariffs',
      target_partners: [...echo.targetPartners],
      sector_filter: sectorFilter,
      sector_tariffs: { ...echo.sectorTariffs },
    };
  }

  return {
    mode: 'hypothetical',
    tariff_percent: echo.tariffPercent,
    target_partners: [...echo.targetPartners],
    sector_filter: sectorFilter,
  };
}

export function toScenarioResponseJson(response: ScenarioResponse): ScenarioResponseJson {
  return {
    scenario: toScenarioEchoJson(response.scenario),
    sectors: response.sectors.map(toSectorRiskJson),
    biggest_movers: response.biggestMovers.map(toSectorRiskJson),
    total_sectors: response.totalSectors,
    metadata: {
      w_exposure: response.metadata.wExposure,
      w_concentration: response.metadata.wConcentration,
      max_tariff_percent: response.metadata.maxTariffPercent,
    },
  };
}

export function toComparisonRecordJson(record: ComparisonRecord): ComparisonRecordJson {
  return {
    sector_id: record.sectorId,
    sector_name: record.sectorName,
    baseline_risk: record.baselineRisk,
    scenario_risk: record.scenarioRisk,
    risk_change: record.riskChange,
    affected_export_value: record.affectedExportValue,
    top_partner: record.topPartner,
    dependency_percent: record.dependencyPercent,
  };
}

export function toComparisonJson(response: ComparisonResponse): ComparisonResponseJson {
  return {
    baseline_scenario: toScenarioEchoJson(response.baselineScenario),
    shock_scenario: toScenarioEchoJson(response.shockScenario),
    comparison: response.comparison.map(toComparisonRecordJson),
    biggest_gainers: response.biggestGainers.map(toComparisonRecordJson),
    total_sectors: response.totalSectors,
  };
}

export function toSectorSummaryJson(sector: SectorSummary): SectorSummaryJson {
  return {
    sector_id: sector.sectorId,
    sector_name: sector.sectorName,
    total_exports: sector.totalExports,
    partner_shares: { ...sector.partnerShares },
    top_partner: sector.topPartner,
    top_partner_share: sector.topPartnerShare,
  };
}

export function toEngineConfigJson(view: EngineConfigView): EngineConfigJson {
  return {
    w_exposure: view.wExposure,
    w_concentration: view.wConcentration,
    max_tariff_percent: view.maxTariffPercent,
    risk_formula: view.riskFormula,
    shock_formula: view.shockFormula,
  };
}
