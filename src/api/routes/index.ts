// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   import { createApiRouter } from './api/routes/index.js';
//   app.use('/api', createApiRouter(context));
//
// Health routes are mounted separately, at the root.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import { getLogger } from '../../logging/index.js';
import type { EngineContext } from '../context.js';

import { createReferenceRouter } from './reference.js';
import { createScenarioRouter } from './scenarios.js';
import { createSectorRouter } from './sectors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RE-EXPORTS
// ─────────────────────────────────────────────────────────────────────────────────

export { createHealthRouter } from './health.js';
export { createSectorRouter } from './sectors.js';
export { createScenarioRouter } from './scenarios.js';
export { createReferenceRouter } from './reference.js';

const logger = getLogger({ component: 'api-routes' });

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED ROUTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createApiRouter(context: EngineContext): Router {
  const router = Router();

  router.use(createSectorRouter(context));
  router.use(createScenarioRouter(context));
  router.use(createReferenceRouter(context));

  logger.debug('API router created', { groups: Object.keys(ROUTE_MAP) });

  return router;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTE MAP (for documentation/introspection)
// ─────────────────────────────────────────────────────────────────────────────────

export const ROUTE_MAP = {
  health: {
    'GET /health': 'Liveness and reference data state',
    'GET /ready': 'Readiness; 503 until reference data has loaded',
  },
  sectors: {
    'GET /api/sectors': 'List sectors with their top partner',
    'GET /api/sector/:sectorId': 'Get one sector with partner shares',
  },
  scenarios: {
    'GET /api/baseline': 'Zero-tariff risk scores',
    'POST /api/scenario': 'Score a uniform tariff against chosen partners',
    'POST /api/compare': 'Compare a baseline and a shock scenario',
    'GET /api/actual-tariffs': 'Score sectors at their listed tariff rates',
  },
  reference: {
    'GET /api/tariff-rates': 'Listed tariff rates by sector',
    'GET /api/partners': 'Partners a scenario may target',
    'GET /api/config': 'Engine weights and formulas',
  },
} as const;

export interface RouteInfo {
  method: string;
  path: string;
  description: string;
}

/**
 * Get all routes as a flat list.
 */
export function getAllRoutes(): RouteInfo[] {
  const routes: RouteInfo[] = [];

  for (const endpoints of Object.values(ROUTE_MAP)) {
    for (const [endpoint, description] of Object.entries(endpoints)) {
      const [method = '', path = ''] = endpoint.split(' ');
      routes.push({ method, path, description });
    }
  }

  return routes;
}
