// ═══════════════════════════════════════════════════════════════════════════════
// COMPARATOR — Baseline vs. Shock Scenario Deltas
// ═══════════════════════════════════════════════════════════════════════════════

import type { ScenarioEvaluator } from './evaluator.js';
import { roundTo } from './scoring.js';
import type {
  ComparisonRecord,
  ComparisonResponse,
  EngineConfig,
  ScenarioInput,
} from './types.js';

export type ScenarioScorer = Pick<ScenarioEvaluator, 'evaluate'>;

export class ScenarioComparator {
  constructor(
    private readonly evaluator: ScenarioScorer,
    private readonly config: EngineConfig
  ) {}

  /**
   * Evaluate both scenarios over one candidate set and diff them per sector.
   * The set is `sectorFilter` when given, otherwise the shock scenario's
   * filter; the baseline's own filter is replaced either way.
   */
  compare(
    baseline: ScenarioInput,
    shock: ScenarioInput,
    sectorFilter?: readonly string[] | null
  ): ComparisonResponse {
    const sharedFilter = sectorFilter === undefined ? shock.sectorFilter : sectorFilter;

    const baselineResponse = this.evaluator.evaluate({ ...baseline, sectorFilter: sharedFilter });
    const shockResponse = this.evaluator.evaluate({ ...shock, sectorFilter: sharedFilter });

    const baselineRisk = new Map<string, number>();
    for (const sector of baselineResponse.sectors) {
      baselineRisk.set(sector.sectorId, sector.riskScore);
    }

    const records: ComparisonRecord[] = shockResponse.sectors.map((sector) => {
      // A sector the baseline did not score counts as zero risk
      const before = baselineRisk.get(sector.sectorId) ?? 0;
      return Object.freeze({
        sectorId: sector.sectorId,
        sectorName: sector.sectorName,
        baselineRisk: before,
        scenarioRisk: sector.riskScore,
        riskChange: roundTo(sector.riskScore - before, 1),
        affectedExportValue: sector.affectedExportValue,
        topPartner: sector.topPartner,
        dependencyPercent: sector.dependencyPercent,
      });
    });

    // Stable: ties keep the shock result's order
    records.sort((a, b) => b.riskChange - a.riskChange);

    return Object.freeze({
      baselineScenario: baselineResponse.scenario,
      shockScenario: shockResponse.scenario,
      comparison: Object.freeze(records),
      biggestGainers: Object.freeze(records.slice(0, this.config.topMoversLimit)),
      totalSectors: records.length,
    });
  }
}
