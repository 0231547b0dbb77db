// ═══════════════════════════════════════════════════════════════════════════════
// SCENARIO ROUTES — Baseline, What-If, Comparison and Actual-Tariff Replay
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET  /baseline          Zero-tariff scores (?sectors=a,b)
//   POST /scenario          Uniform tariff against chosen partners
//   POST /compare           Baseline vs. shock, ranked by risk change
//   GET  /actual-tariffs    Replay the rate table (?partners=US,China&sectors=…)
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Response } from 'express';
import { toComparisonJson, toScenarioResponseJson } from '../../engine/index.js';
import { getLogger } from '../../logging/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import type { RequestWithId } from '../middleware/request-logger.js';
import {
  ActualTariffsQuerySchema,
  BaselineQuerySchema,
  CompareRequestSchema,
  ScenarioRequestSchema,
} from '../schemas/index.js';
import type { EngineContext } from '../context.js';

const logger = getLogger({ component: 'scenario-routes' });

export function createScenarioRouter(context: EngineContext): Router {
  const router = Router();

  // ═══════════════════════════════════════════════════════════════════════════════
  // BASELINE
  // GET /baseline
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/baseline',
    asyncHandler(async (req: RequestWithId, res: Response) => {
      const query = BaselineQuerySchema.parse(req.query);
      const response = context.riskEngine().evaluateBaseline(query.sectors);
      res.json(toScenarioResponseJson(response));
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // SCENARIO
  // POST /scenario
  // ═══════════════════════════════════════════════════════════════════════════════

  router.post(
    '/scenario',
    asyncHandler(async (req: RequestWithId, res: Response) => {
      const body = ScenarioRequestSchema.parse(req.body);
      const engine = context.riskEngine();

      const scenario = engine.scenario(body.tariff_percent, body.target_partners, body.sector_filter ?? null);
      const response = engine.evaluate(scenario);

      logger.info('Scenario calculated', {
        tariffPercent: scenario.tariffPercent,
        targetPartners: scenario.targetPartners,
        sectors: response.totalSectors,
        requestId: req.requestId,
      });

      res.json(toScenarioResponseJson(response));
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // COMPARE
  // POST /compare
  // ═══════════════════════════════════════════════════════════════════════════════

  router.post(
    '/compare',
    asyncHandler(async (req: RequestWithId, res: Response) => {
      const body = CompareRequestSchema.parse(req.body);
      const engine = context.riskEngine();
      const sectorFilter = body.sector_filter ?? null;

      const baseline = engine.scenario(body.baseline.tariff_percent, body.baseline.target_partners, sectorFilter);
      const shock = engine.scenario(body.scenario.tariff_percent, body.scenario.target_partners, sectorFilter);
      const response = engine.compare(baseline, shock, sectorFilter);

      logger.info('Scenarios compared', {
        baselineTariff: baseline.tariffPercent,
        shockTariff: shock.tariffPercent,
        sectors: response.totalSectors,
        requestId: req.requestId,
      });

      res.json(toComparisonJson(response));
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // ACTUAL TARIFFS
  // GET /actual-tariffs
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/actual-tariffs',
    asyncHandler(async (req: RequestWithId, res: Response) => {
      const query = ActualTariffsQuerySchema.parse(req.query);
      const response = context.riskEngine().evaluateActualTariffs(query.partners, query.sectors);
      res.json(toScenarioResponseJson(response));
    })
  );

  return router;
}
