// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE TYPES — Sectors, Scenarios, Risk Outputs
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// PARTNERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Every trading partner the engine knows about. Countries outside the first
 * three are aggregated into `Other` upstream.
 */
export const PARTNERS = ['US', 'China', 'EU', 'Other'] as const;

export type Partner = (typeof PARTNERS)[number];

/**
 * Partners a caller may target with a tariff scenario.
 */
export const SELECTABLE_PARTNERS = ['US', 'China', 'EU'] as const;

export type SelectablePartner = (typeof SELECTABLE_PARTNERS)[number];

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Scoring weights and limits in force for one engine instance.
 * Instances are frozen; build them with `createEngineConfig()`.
 */
export interface EngineConfig {
  readonly wExposure: number;
  readonly wConcentration: number;
  readonly maxTariffPercent: number;
  /** Length of the `biggestMovers` / `biggestGainers` slices */
  readonly topMoversLimit: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REFERENCE DATA
// ─────────────────────────────────────────────────────────────────────────────────

export type PartnerShares = Readonly<Partial<Record<Partner, number>>>;

/**
 * Trade-partner distribution of one HS2 sector.
 */
export interface SectorSummary {
  readonly sectorId: string;
  readonly sectorName: string;
  readonly totalExports: number;
  readonly partnerShares: PartnerShares;
  readonly topPartner: Partner;
  readonly topPartnerShare: number;
}

/**
 * What the engine reads from the reference data layer.
 */
export interface SectorDataSource {
  getSector(sectorId: string): SectorSummary | undefined;
  allSectors(): ReadonlyMap<string, SectorSummary>;
  /** Tariff rate in percent; 0 when the table has no entry */
  rate(sectorId: string, partner: Partner): number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCENARIOS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ScenarioInput {
  readonly tariffPercent: number;
  readonly targetPartners: readonly Partner[];
  /** null means every known sector */
  readonly sectorFilter: readonly string[] | null;
}

export interface HypotheticalScenarioEcho {
  readonly mode: 'hypothetical';
  readonly tariffPercent: number;
  readonly targetPartners: readonly Partner[];
  readonly sectorFilter: readonly string[] | null;
}

export interface ActualTariffScenarioEcho {
  readonly mode: 'actual_tariffs';
  readonly targetPartners: readonly Partner[];
  readonly sectorFilter: readonly string[] | null;
  /** Sector id → the highest rate across the targeted partners */
  readonly sectorTariffs: Readonly<Record<string, number>>;
}

export type ScenarioEcho = HypotheticalScenarioEcho | ActualTariffScenarioEcho;

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ExplainabilityBreakdown {
  readonly exposureValue: number;
  readonly concentrationValue: number;
  readonly shockValue: number;
  readonly exposureComponent: number;
  readonly concentrationComponent: number;
}

export interface SectorRiskOutput {
  readonly sectorId: string;
  readonly sectorName: string;
  readonly exposure: number;
  readonly concentration: number;
  readonly shock: number;
  readonly riskScore: number;
  readonly dependencyPercent: number;
  readonly affectedExportValue: number;
  readonly topPartner: Partner;
  readonly riskDelta: number;
  readonly explainability: ExplainabilityBreakdown;
}

export interface ScenarioMetadata {
  readonly wExposure: number;
  readonly wConcentration: number;
  readonly maxTariffPercent: number;
}

export interface ScenarioResponse {
  readonly scenario: ScenarioEcho;
  readonly sectors: readonly SectorRiskOutput[];
  readonly biggestMovers: readonly SectorRiskOutput[];
  readonly totalSectors: number;
  readonly metadata: ScenarioMetadata;
}

export interface ComparisonRecord {
  readonly sectorId: string;
  readonly sectorName: string;
  readonly baselineRisk: number;
  readonly scenarioRisk: number;
  readonly riskChange: number;
  readonly affectedExportValue: number;
  readonly topPartner: Partner;
  readonly dependencyPercent: number;
}

export interface ComparisonResponse {
  readonly baselineScenario: ScenarioEcho;
  readonly shockScenario: ScenarioEcho;
  readonly comparison: readonly ComparisonRecord[];
  readonly biggestGainers: readonly ComparisonRecord[];
  readonly totalSectors: number;
}

/**
 * Read-only view of the engine's configuration for introspection.
 */
export interface EngineConfigView {
  readonly wExposure: number;
  readonly wConcentration: number;
  readonly maxTariffPercent: number;
  readonly riskFormula: string;
  readonly shockFormula: string;
}
