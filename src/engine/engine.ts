// ═══════════════════════════════════════════════════════════════════════════════
// RISK ENGINE — Entry Points for the Calling Boundary
// ═══════════════════════════════════════════════════════════════════════════════

import { ScenarioComparator } from './comparator.js';
import { DEFAULT_ENGINE_CONFIG } from './config.js';
import { ScenarioEvaluator } from './evaluator.js';
import { createScenarioInput } from './validation.js';
import type {
  ComparisonResponse,
  EngineConfig,
  EngineConfigView,
  Partner,
  ScenarioInput,
  ScenarioResponse,
  SectorDataSource,
} from './types.js';
import { loggers } from '../logging/index.js';

const logger = loggers.engine();

/** Partners used by actual-tariff replay when the caller names none */
export const DEFAULT_REPLAY_PARTNERS: readonly Partner[] = Object.freeze(['US']);

export function describeEngineConfig(config: EngineConfig): EngineConfigView {
  return Object.freeze({
    wExposure: config.wExposure,
    wConcentration: config.wConcentration,
    maxTariffPercent: config.maxTariffPercent,
    riskFormula: 'risk = (w_exposure * exposure + w_concentration * concentration) * shock',
    shockFormula: `shock = tariff_percent / ${config.maxTariffPercent}`,
  });
}

/**
 * Deterministic tariff risk engine over one immutable sector universe.
 * Instances hold no mutable state; calls may run concurrently.
 */
export class RiskEngine {
  private readonly evaluator: ScenarioEvaluator;
  private readonly comparator: ScenarioComparator;

  constructor(
    source: SectorDataSource,
    private readonly config: EngineConfig = DEFAULT_ENGINE_CONFIG
  ) {
    this.evaluator = new ScenarioEvaluator(source, config);
    this.comparator = new ScenarioComparator(this.evaluator, config);
  }

  evaluate(scenario: ScenarioInput): ScenarioResponse {
    const response = this.evaluator.evaluate(scenario);
    logger.debug('Scenario evaluated', {
      tariffPercent: scenario.tariffPercent,
      targetPartners: scenario.targetPartners,
      sectors: response.totalSectors,
    });
    return response;
  }

  /**
   * Zero tariff, no target partners.
   */
  evaluateBaseline(sectorFilter: readonly string[] | null = null): ScenarioResponse {
    const scenario = createScenarioInput(
      { tariffPercent: 0, targetPartners: [], sectorFilter },
      this.config.maxTariffPercent
    );
    return this.evaluator.evaluate(scenario);
  }

  evaluateActualTariffs(
    targetPartners: readonly Partner[],
    sectorFilter: readonly string[] | null = null
  ): ScenarioResponse {
    const partners = targetPartners.length > 0 ? [...new Set(targetPartners)] : DEFAULT_REPLAY_PARTNERS;
    const response = this.evaluator.evaluateActualTariffs(partners, sectorFilter);
    logger.debug('Actual tariffs replayed', {
      targetPartners: partners,
      sectors: response.totalSectors,
    });
    return response;
  }

  compare(
    baseline: ScenarioInput,
    shock: ScenarioInput,
    sectorFilter?: readonly string[] | null
  ): ComparisonResponse {
    return this.comparator.compare(baseline, shock, sectorFilter);
  }

  /**
   * Build a scenario validated against this engine's tariff ceiling.
   */
  scenario(
    tariffPercent: number,
    targetPartners: readonly Partner[] = [],
    sectorFilter: readonly string[] | null = null
  ): ScenarioInput {
    return createScenarioInput({ tariffPercent, targetPartners, sectorFilter }, this.config.maxTariffPercent);
  }

  getConfig(): EngineConfigView {
    return describeEngineConfig(this.config);
  }
}
