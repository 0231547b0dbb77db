// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE ROUTES — Tariff Table, Partners, Engine Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET /tariff-rates    Listed rates per sector, highest first
//   GET /partners        Partners a scenario may target
//   GET /config          Weights, tariff ceiling and formulas
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Response } from 'express';
import { describeEngineConfig, toEngineConfigJson } from '../../engine/index.js';
import type { PartnerTariffRates } from '../../reference/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import type { RequestWithId } from '../middleware/request-logger.js';
import { isSelectablePartner } from '../schemas/index.js';
import type { EngineContext } from '../context.js';

export interface TariffRateRow {
  hs2: string;
  sector_name: string;
  tariff_rates: PartnerTariffRates;
  max_tariff: number;
}

export function createReferenceRouter(context: EngineContext): Router {
  const router = Router();

  // ═══════════════════════════════════════════════════════════════════════════════
  // TARIFF RATES
  // GET /tariff-rates
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/tariff-rates',
    asyncHandler(async (_req: RequestWithId, res: Response) => {
      const provider = context.provider();
      const info = provider.tariffTableInfo();

      const tariffs: TariffRateRow[] = [];
      for (const [hs2, rates] of provider.allTariffedSectors()) {
        tariffs.push({
          hs2,
          sector_name: provider.sectorName(hs2),
          tariff_rates: rates,
          max_tariff: Math.max(rates.US, rates.China, rates.EU),
        });
      }
      tariffs.sort((a, b) => b.max_tariff - a.max_tariff);

      res.json({
        description: info.description,
        note: info.note,
        tariffs,
        total_tariffed_sectors: tariffs.length,
      });
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // PARTNERS
  // GET /partners
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/partners',
    asyncHandler(async (_req: RequestWithId, res: Response) => {
      const directory = context.provider().partnerDirectory();

      res.json({
        partners: directory.partners
          .filter((partner) => isSelectablePartner(partner.id))
          .map((partner) => ({ id: partner.id, name: partner.name })),
        note: directory.note,
      });
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // CONFIG
  // GET /config
  // ═══════════════════════════════════════════════════════════════════════════════

  // Does not need reference data
  router.get(
    '/config',
    asyncHandler(async (_req: RequestWithId, res: Response) => {
      res.json(toEngineConfigJson(describeEngineConfig(context.engineConfig)));
    })
  );

  return router;
}
