// ═══════════════════════════════════════════════════════════════════════════════
// SECTOR ROUTES — Sector Listing and Detail
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET /sectors              All sectors with their top partner
//   GET /sector/:sectorId     One sector including partner shares
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Response } from 'express';
import { toSectorSummaryJson } from '../../engine/index.js';
import { asyncHandler, NotFoundError } from '../middleware/error-handler.js';
import type { RequestWithId } from '../middleware/request-logger.js';
import { SectorIdParamSchema } from '../schemas/index.js';
import type { EngineContext } from '../context.js';

export function createSectorRouter(context: EngineContext): Router {
  const router = Router();

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST SECTORS
  // GET /sectors
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/sectors',
    asyncHandler(async (_req: RequestWithId, res: Response) => {
      const provider = context.provider();

      const sectors = [...provider.allSectors().values()].map((sector) => ({
        sector_id: sector.sectorId,
        sector_name: sector.sectorName,
        total_exports: sector.totalExports,
        top_partner: sector.topPartner,
        top_partner_share: sector.topPartnerShare,
      }));

      res.json({ count: sectors.length, sectors });
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // GET SECTOR
  // GET /sector/:sectorId
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/sector/:sectorId',
    asyncHandler(async (req: RequestWithId, res: Response) => {
      const { sectorId } = SectorIdParamSchema.parse(req.params);
      const sector = context.provider().getSector(sectorId);

      if (!sector) {
        throw new NotFoundError('Sector', sectorId);
      }

      res.json(toSectorSummaryJson(sector));
    })
  );

  return router;
}
