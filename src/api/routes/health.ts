// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health and /ready endpoints
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { ReferenceDataState } from '../../engine/errors.js';
import { getLogger } from '../../logging/index.js';
import type { EngineContext } from '../context.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface HealthCheck {
  status: 'healthy' | 'starting' | 'unhealthy';
  engine_loaded: boolean;
  reference_data: ReferenceDataState;
  uptime: number;
  timestamp: string;
}

export interface ReadinessCheck {
  ready: boolean;
  reference_data: ReferenceDataState;
  timestamp: string;
}

function healthStatus(state: ReferenceDataState): HealthCheck['status'] {
  if (state === 'ready') return 'healthy';
  if (state === 'failed') return 'unhealthy';
  return 'starting';
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(context: EngineContext): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── HEALTH CHECK (liveness) ───
  router.get('/health', (_req: Request, res: Response) => {
    const state = context.registry.state;

    const health: HealthCheck = {
      status: healthStatus(state),
      engine_loaded: state === 'ready',
      reference_data: state,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    };

    res.json(health);
  });

  // ─── READINESS CHECK ───
  // 503 until the reference data has loaded
  router.get('/ready', (_req: Request, res: Response) => {
    const state = context.registry.state;

    const ready: ReadinessCheck = {
      ready: state === 'ready',
      reference_data: state,
      timestamp: new Date().toISOString(),
    };

    if (!ready.ready) {
      logger.warn('Readiness check failed', { state });
    }

    res.status(ready.ready ? 200 : 503).json(ready);
  });

  return router;
}
