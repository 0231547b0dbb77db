// ═══════════════════════════════════════════════════════════════════════════════
// SERIALIZATION TESTS — Wire Field Names
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { RiskEngine } from '../engine.js';
import {
  toComparisonJson,
  toEngineConfigJson,
  toScenarioEchoJson,
  toScenarioResponseJson,
  toSectorRiskJson,
  toSectorSummaryJson,
} from '../serialize.js';
import { makeSource, PHARMA } from './helpers.js';

const engine = new RiskEngine(makeSource(undefined, { US: { '87': 10 } }));

describe('toSectorRiskJson', () => {
  it('should use snake_case field names', () => {
    const output = engine.evaluate(engine.scenario(10, ['US'], ['87'])).sectors[0];
    if (!output) throw new Error('no output');
    const json = toSectorRiskJson(output);

    expect(json).toMatchObject({
      sector_id: '87',
      sector_name: 'Vehicles',
      exposure: 0.62,
      concentration: 0.62,
      shock: 0.4,
      risk_score: 24.8,
      dependency_percent: 62,
      top_partner: 'US',
      risk_delta: 24.8,
    });
    expect(json.explainability.exposure_value).toBe(0.62);
    expect(json.explainability.shock_value).toBe(0.4);
  });
});

describe('toScenarioResponseJson', () => {
  it('should convert the echo, movers and metadata', () => {
    const json = toScenarioResponseJson(engine.evaluate(engine.scenario(10, ['US'])));

    expect(json.scenario).toEqual({
      mode: 'hypothetical',
      tariff_percent: 10,
      target_partners: ['US'],
      sector_filter: null,
    });
    expect(json.total_sectors).toBe(3);
    expect(json.biggest_movers.map((sector) => sector.sector_id)).toEqual(['72', '87', '30']);
    expect(json.metadata).toEqual({ w_exposure: 0.6, w_concentration: 0.4, max_tariff_percent: 25 });
  });
});

describe('toScenarioEchoJson', () => {
  it('should include the per-sector tariffs of a replay', () => {
    const json = toScenarioEchoJson(engine.evaluateActualTariffs(['US'], ['87', '30']).scenario);

    expect(json).toEqual({
      mode: 'actual_tariffs',
      target_partners: ['US'],
      sector_filter: ['87', '30'],
      sector_tariffs: { '87': 10, '30': 0 },
    });
  });
});

describe('toComparisonJson', () => {
  it('should name both scenarios and the records', () => {
    const json = toComparisonJson(engine.compare(engine.scenario(0), engine.scenario(10, ['US']), ['87']));

    expect(json.baseline_scenario).toMatchObject({ tariff_percent: 0, sector_filter: ['87'] });
    expect(json.shock_scenario).toMatchObject({ tariff_percent: 10, target_partners: ['US'] });
    expect(json.comparison).toHaveLength(1);
    expect(json.comparison[0]).toMatchObject({
      sector_id: '87',
      baseline_risk: 0,
      scenario_risk: 24.8,
      risk_change: 24.8,
      top_partner: 'US',
      dependency_percent: 62,
    });
    expect(json.biggest_gainers).toEqual(json.comparison);
    expect(json.total_sectors).toBe(1);
  });
});

describe('toSectorSummaryJson', () => {
  it('should copy the partner shares', () => {
    expect(toSectorSummaryJson(PHARMA)).toEqual({
      sector_id: '30',
      sector_name: 'Pharmaceutical products',
      total_exports: 10e9,
      partner_shares: { US: 0.2, China: 0.3, EU: 0.4, Other: 0.1 },
      top_partner: 'EU',
      top_partner_share: 0.4,
    });
  });
});

describe('toEngineConfigJson', () => {
  it('should expose the formulas', () => {
    expect(toEngineConfigJson(engine.getConfig())).toEqual({
      w_exposure: 0.6,
      w_concentration: 0.4,
      max_tariff_percent: 25,
      risk_formula: 'risk = (w_exposure * exposure + w_concentration * concentration) * shock',
      shock_formula: 'shock = tariff_percent / 25',
    });
  });
});
