// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATOR TESTS — Scenario Scoring, Ranking, Tariff Replay
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { createEngineConfig, DEFAULT_ENGINE_CONFIG } from '../config.js';
import { RiskEngine } from '../engine.js';
import { ScenarioEvaluator, rankByRisk } from '../evaluator.js';
import { EngineValidationError } from '../errors.js';
import { PARTNERS, type Partner, type ScenarioInput, type SectorRiskOutput } from '../types.js';
import { createScenarioInput } from '../validation.js';
import { makeSector, makeSource, PHARMA, STEEL, VEHICLES } from './helpers.js';

function ids(outputs: readonly SectorRiskOutput[]): string[] {
  return outputs.map((output) => output.sectorId);
}

/** Every subset of the partner enumeration, the empty set included */
function partnerSubsets(): Partner[][] {
  return Array.from({ length: 2 ** PARTNERS.length }, (_, mask) =>
    PARTNERS.filter((_partner, bit) => (mask & (1 << bit)) !== 0)
  );
}

function find(outputs: readonly SectorRiskOutput[], sectorId: string): SectorRiskOutput {
  const output = outputs.find((candidate) => candidate.sectorId === sectorId);
  if (!output) throw new Error(`Sector ${sectorId} missing from result`);
  return output;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HYPOTHETICAL SCENARIOS
// ─────────────────────────────────────────────────────────────────────────────────

describe('ScenarioEvaluator.evaluate', () => {
  const evaluator = new ScenarioEvaluator(makeSource(), DEFAULT_ENGINE_CONFIG);

  it('should score a US-heavy sector under a 10% US tariff', () => {
    const response = evaluator.evaluate(createScenarioInput({ tariffPercent: 10, targetPartners: ['US'] }));
    const vehicles = find(response.sectors, '87');

    expect(vehicles.exposure).toBe(0.62);
    expect(vehicles.concentration).toBe(0.62);
    expect(vehicles.shock).toBe(0.4);
    expect(vehicles.riskScore).toBe(24.8);
    expect(vehicles.dependencyPercent).toBe(62);
    expect(vehicles.affectedExportValue).toBeCloseTo(12.4e9, 0);
    expect(vehicles.topPartner).toBe('US');
    expect(vehicles.riskDelta).toBe(24.8);
    expect(vehicles.sectorName).toBe('Vehicles');
    expect(vehicles.explainability.exposureComponent).toBeCloseTo(0.372, 10);
    expect(vehicles.explainability.concentrationComponent).toBeCloseTo(0.248, 10);
  });

  it('should rank sectors by risk, highest first', () => {
    const response = evaluator.evaluate(createScenarioInput({ tariffPercent: 10, targetPartners: ['US'] }));

    expect(ids(response.sectors)).toEqual(['72', '87', '30']);
    expect(response.sectors.map((sector) => sector.riskScore)).toEqual([35.6, 24.8, 11.2]);
    expect(response.totalSectors).toBe(3);
  });

  it('should echo the scenario and the weights', () => {
    const response = evaluator.evaluate(createScenarioInput({ tariffPercent: 10, targetPartners: ['US'] }));

    expect(response.scenario).toEqual({
      mode: 'hypothetical',
      tariffPercent: 10,
      targetPartners: ['US'],
      sectorFilter: null,
    });
    expect(response.metadata).toEqual({ wExposure: 0.6, wConcentration: 0.4, maxTariffPercent: 25 });
  });

  it('should skip unknown ids in the sector filter', () => {
    const response = evaluator.evaluate(
      createScenarioInput({ tariffPercent: 10, targetPartners: ['US'], sectorFilter: ['UNKNOWN', '87'] })
    );

    expect(ids(response.sectors)).toEqual(['87']);
    expect(response.totalSectors).toBe(1);
    expect(response.scenario.sectorFilter).toEqual(['UNKNOWN', '87']);
  });

  it('should score a repeated filter id once', () => {
    const response = evaluator.evaluate(
      createScenarioInput({ tariffPercent: 10, targetPartners: ['US'], sectorFilter: ['87', '30', '87'] })
    );
    expect(ids(response.sectors)).toEqual(['87', '30']);
  });

  it('should return nothing for an empty filter', () => {
    const response = evaluator.evaluate(createScenarioInput({ tariffPercent: 10, sectorFilter: [] }));

    expect(response.sectors).toEqual([]);
    expect(response.biggestMovers).toEqual([]);
    expect(response.totalSectors).toBe(0);
  });

  it('should give zero risk and zero affected value at a zero tariff', () => {
    const response = evaluator.evaluate(createScenarioInput({ tariffPercent: 0, targetPartners: ['US'] }));

    for (const sector of response.sectors) {
      expect(sector.riskScore).toBe(0);
      expect(sector.riskDelta).toBe(0);
      expect(sector.affectedExportValue).toBe(0);
    }
    // Ties keep sector id order
    expect(ids(response.sectors)).toEqual(['30', '72', '87']);
  });

  it('should saturate the shock at the ceiling', () => {
    const response = evaluator.evaluate(createScenarioInput({ tariffPercent: 25, targetPartners: ['US'] }));
    const steel = find(response.sectors, '72');

    expect(steel.shock).toBe(1);
    expect(steel.riskScore).toBe(89);
  });

  it('should give identical results for identical scenarios', () => {
    const scenario = createScenarioInput({ tariffPercent: 12, targetPartners: ['US', 'China'] });
    expect(evaluator.evaluate(scenario)).toEqual(evaluator.evaluate(scenario));
  });

  it('should never lower risk when the tariff rises', () => {
    const tariffs = Array.from({ length: 51 }, (_, index) => index / 2);

    for (const partners of partnerSubsets()) {
      let previous = evaluator.evaluate(createScenarioInput({ tariffPercent: 0, targetPartners: partners }));

      for (const tariffPercent of tariffs.slice(1)) {
        const current = evaluator.evaluate(createScenarioInput({ tariffPercent, targetPartners: partners }));
        for (const sector of previous.sectors) {
          const next = find(current.sectors, sector.sectorId);
          expect(next.riskScore).toBeGreaterThanOrEqual(sector.riskScore);
          expect(next.affectedExportValue).toBeGreaterThanOrEqual(sector.affectedExportValue);
        }
        previous = current;
      }
    }
  });

  it('should never lower risk when a partner is added', () => {
    for (const tariffPercent of [0, 2.5, 10, 17.5, 25]) {
      for (const partners of partnerSubsets()) {
        const before = evaluator.evaluate(createScenarioInput({ tariffPercent, targetPartners: partners }));

        for (const added of PARTNERS.filter((partner) => !partners.includes(partner))) {
          const after = evaluator.evaluate(
            createScenarioInput({ tariffPercent, targetPartners: [...partners, added] })
          );
          for (const sector of before.sectors) {
            const next = find(after.sectors, sector.sectorId);
            expect(next.exposure).toBeGreaterThanOrEqual(sector.exposure);
            expect(next.riskScore).toBeGreaterThanOrEqual(sector.riskScore);
          }
        }
      }
    }
  });

  it('should reject a tariff above its own ceiling', () => {
    const narrow = new ScenarioEvaluator(makeSource(), createEngineConfig({ maxTariffPercent: 20 }));
    const scenario = createScenarioInput({ tariffPercent: 25, targetPartners: ['US'] });

    expect(() => narrow.evaluate(scenario)).toThrow(EngineValidationError);
    expect(() => narrow.evaluate(scenario)).toThrow('tariff_percent must be in [0, 20], got 25');
  });

  it('should reject a hand-built scenario outside the range', () => {
    const scenario: ScenarioInput = { tariffPercent: 40, targetPartners: ['US'], sectorFilter: null };
    expect(() => evaluator.evaluate(scenario)).toThrow(EngineValidationError);
  });

  it('should count a repeated partner once', () => {
    const scenario: ScenarioInput = { tariffPercent: 10, targetPartners: ['US', 'US'], sectorFilter: ['87'] };
    const response = evaluator.evaluate(scenario);

    expect(find(response.sectors, '87').exposure).toBe(0.62);
    expect(response.scenario.targetPartners).toEqual(['US']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// BIGGEST MOVERS
// ─────────────────────────────────────────────────────────────────────────────────

describe('biggest movers', () => {
  const sectors = Array.from({ length: 7 }, (_, index) => {
    const us = 0.3 + index * 0.1;
    return makeSector(`0${index + 1}`, `Sector ${index + 1}`, 1000, { US: us, China: 0, EU: 1 - us, Other: 0 });
  });

  it('should keep at most five sectors, in ranked order', () => {
    const response = new ScenarioEvaluator(makeSource(sectors), DEFAULT_ENGINE_CONFIG).evaluate(
      createScenarioInput({ tariffPercent: 10, targetPartners: ['US'] })
    );

    expect(response.totalSectors).toBe(7);
    expect(response.biggestMovers).toHaveLength(5);
    expect(response.biggestMovers).toEqual(response.sectors.slice(0, 5));
    expect(ids(response.biggestMovers)).toEqual(['07', '06', '05', '04', '03']);
  });

  it('should follow the configured limit', () => {
    const config = createEngineConfig({ topMoversLimit: 2 });
    const response = new ScenarioEvaluator(makeSource(sectors), config).evaluate(
      createScenarioInput({ tariffPercent: 10, targetPartners: ['US'] })
    );

    expect(ids(response.biggestMovers)).toEqual(['07', '06']);
  });
});

describe('rankByRisk', () => {
  it('should not reorder the input array', () => {
    const evaluator = new ScenarioEvaluator(makeSource(), DEFAULT_ENGINE_CONFIG);
    const outputs = [PHARMA, STEEL, VEHICLES].map((sector) => evaluator.scoreSector(sector, ['US'], 10));

    expect(ids(rankByRisk(outputs))).toEqual(['72', '87', '30']);
    expect(ids(outputs)).toEqual(['30', '72', '87']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ACTUAL TARIFF REPLAY
// ─────────────────────────────────────────────────────────────────────────────────

describe('RiskEngine.evaluateActualTariffs', () => {
  const engine = new RiskEngine(
    makeSource(undefined, {
      US: { '72': 25, '87': 10 },
      China: { '30': 15 },
      EU: { '72': 5 },
    })
  );

  it('should default to the US when no partner is named', () => {
    const response = engine.evaluateActualTariffs([]);

    expect(response.scenario).toEqual({
      mode: 'actual_tariffs',
      targetPartners: ['US'],
      sectorFilter: null,
      sectorTariffs: { '30': 0, '72': 25, '87': 10 },
    });
    expect(response.sectors.map((sector) => [sector.sectorId, sector.riskScore])).toEqual([
      ['72', 89],
      ['87', 24.8],
      ['30', 0],
    ]);
  });

  it('should apply the highest rate across the targeted partners', () => {
    const response = engine.evaluateActualTariffs(['China', 'US']);

    expect(response.scenario).toMatchObject({ sectorTariffs: { '30': 15, '72': 25, '87': 10 } });
    expect(response.sectors.map((sector) => [sector.sectorId, sector.riskScore])).toEqual([
      ['72', 90.2],
      ['30', 27.6],
      ['87', 26.7],
    ]);
  });

  it('should deduplicate the partners', () => {
    expect(engine.evaluateActualTariffs(['US', 'US']).scenario.targetPartners).toEqual(['US']);
  });

  it('should restrict replay to the sector filter', () => {
    const response = engine.evaluateActualTariffs(['US'], ['87']);

    expect(ids(response.sectors)).toEqual(['87']);
    expect(response.scenario).toMatchObject({ sectorTariffs: { '87': 10 } });
  });
});
