// ═══════════════════════════════════════════════════════════════════════════════
// SCENARIO EVALUATOR — Scores a Scenario Across the Sector Universe
// ═══════════════════════════════════════════════════════════════════════════════

import {
  buildExplainability,
  computeAffectedExportValue,
  computeConcentration,
  computeDependencyPercent,
  computeExposure,
  computeRiskScore,
  computeShock,
  roundTo,
} from './scoring.js';
import type {
  EngineConfig,
  Partner,
  ScenarioEcho,
  ScenarioInput,
  ScenarioMetadata,
  ScenarioResponse,
  SectorDataSource,
  SectorRiskOutput,
  SectorSummary,
} from './types.js';
import { createScenarioInput } from './validation.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RANKING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Sort by risk score, highest first. Array.prototype.sort is stable, so
 * equal scores keep candidate order.
 */
export function rankByRisk(outputs: readonly SectorRiskOutput[]): SectorRiskOutput[] {
  return [...outputs].sort((a, b) => b.riskScore - a.riskScore);
}

// ─────────────────────────────────────────────────────────────────────────────────
// EVALUATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class ScenarioEvaluator {
  constructor(
    private readonly source: SectorDataSource,
    private readonly config: EngineConfig
  ) {}

  /**
   * Score every candidate sector under one uniform tariff. The scenario is
   * checked against this engine's ceiling first; an out-of-range tariff
   * throws EngineValidationError instead of saturating the shock.
   */
  evaluate(input: ScenarioInput): ScenarioResponse {
    const scenario = createScenarioInput(input, this.config.maxTariffPercent);
    const candidates = this.resolveCandidates(scenario.sectorFilter);
    const outputs = candidates.map((sector) =>
      this.scoreSector(sector, scenario.targetPartners, scenario.tariffPercent)
    );

    return this.buildResponse(
      {
        mode: 'hypothetical',
        tariffPercent: scenario.tariffPercent,
        targetPartners: scenario.targetPartners,
        sectorFilter: scenario.sectorFilter,
      },
      outputs
    );
  }

  /**
   * Replay the rate table: each sector is scored at the highest rate any of
   * the targeted partners applies to it.
   */
  evaluateActualTariffs(
    targetPartners: readonly Partner[],
    sectorFilter: readonly string[] | null
  ): ScenarioResponse {
    const candidates = this.resolveCandidates(sectorFilter);
    const sectorTariffs: Record<string, number> = {};

    const outputs = candidates.map((sector) => {
      const tariffPercent = this.maxRateFor(sector.sectorId, targetPartners);
      sectorTariffs[sector.sectorId] = tariffPercent;
      return this.scoreSector(sector, targetPartners, tariffPercent);
    });

    return this.buildResponse(
      {
        mode: 'actual_tariffs',
        targetPartners,
        sectorFilter,
        sectorTariffs: Object.freeze(sectorTariffs),
      },
      outputs
    );
  }

  /**
   * Score a single sector. `riskDelta` is measured against a zero-tariff
   * baseline with the same target partners.
   */
  scoreSector(
    sector: SectorSummary,
    targetPartners: readonly Partner[],
    tariffPercent: number
  ): SectorRiskOutput {
    const { maxTariffPercent } = this.config;

    const exposure = computeExposure(sector, targetPartners);
    const concentration = computeConcentration(sector);
    const shock = computeShock(tariffPercent, maxTariffPercent);
    const riskScore = computeRiskScore(exposure, concentration, shock, this.config);

    const baselineShock = computeShock(0, maxTariffPercent);
    const baselineRisk = computeRiskScore(exposure, concentration, baselineShock, this.config);

    return Object.freeze({
      sectorId: sector.sectorId,
      sectorName: sector.sectorName,
      exposure,
      concentration,
      shock,
      riskScore,
      dependencyPercent: computeDependencyPercent(sector),
      affectedExportValue: computeAffectedExportValue(sector.totalExports, exposure, shock),
      topPartner: sector.topPartner,
      riskDelta: roundTo(riskScore - baselineRisk, 1),
      explainability: buildExplainability(exposure, concentration, shock, this.config),
    });
  }

  metadata(): ScenarioMetadata {
    return Object.freeze({
      wExposure: this.config.wExposure,
      wConcentration: this.config.wConcentration,
      maxTariffPercent: this.config.maxTariffPercent,
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * null → every known sector. Otherwise the filter's known ids, in filter
   * order; unknown and repeated ids are dropped.
   */
  private resolveCandidates(sectorFilter: readonly string[] | null): SectorSummary[] {
    if (sectorFilter === null) {
      return [...this.source.allSectors().values()];
    }

    const seen = new Set<string>();
    const candidates: SectorSummary[] = [];

    for (const sectorId of sectorFilter) {
      if (seen.has(sectorId)) continue;
      seen.add(sectorId);

      const sector = this.source.getSector(sectorId);
      if (sector) {
        candidates.push(sector);
      }
    }

    return candidates;
  }

  private maxRateFor(sectorId: string, partners: readonly Partner[]): number {
    let max = 0;
    for (const partner of partners) {
      max = Math.max(max, this.source.rate(sectorId, partner));
    }
    return max;
  }

  private buildResponse(scenario: ScenarioEcho, outputs: readonly SectorRiskOutput[]): ScenarioResponse {
    const sectors = rankByRisk(outputs);

    return Object.freeze({
      scenario: Object.freeze(scenario),
      sectors: Object.freeze(sectors),
      biggestMovers: Object.freeze(sectors.slice(0, this.config.topMoversLimit)),
      totalSectors: sectors.length,
      metadata: this.metadata(),
    });
  }
}
