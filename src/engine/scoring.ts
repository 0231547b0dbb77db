// ═══════════════════════════════════════════════════════════════════════════════
// SCORING PRIMITIVES — Exposure, Concentration, Shock, Risk
// ═══════════════════════════════════════════════════════════════════════════════
//
// Pure functions over already-validated inputs. Intermediate values are
// clamped here; invalid scenarios are rejected earlier, in validation.ts.
//
//   risk  = round(((wE · exposure + wC · concentration) · shock) · 100, 1)
//   shock = tariff_percent / max_tariff_percent
//
// ═══════════════════════════════════════════════════════════════════════════════

import { DEFAULT_ENGINE_CONFIG } from './config.js';
import type {
  EngineConfig,
  ExplainabilityBreakdown,
  Partner,
  SectorSummary,
} from './types.js';

type Weights = Pick<EngineConfig, 'wExposure' | 'wConcentration'>;

// ─────────────────────────────────────────────────────────────────────────────────
// NUMERIC HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Round to the decimal nearest the exact binary value, so 0.15 (stored just
 * below 0.15) gives 0.1. Scaling by 10 first would give 0.2. Exact halves
 * such as 0.25 round away from zero. Never returns -0.
 */
export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits)) + 0;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PRIMITIVES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Share of the sector's exports going to the targeted partners, in [0, 1].
 */
export function computeExposure(sector: SectorSummary, targetPartners: readonly Partner[]): number {
  let exposure = 0;
  for (const partner of targetPartners) {
    exposure += sector.partnerShares[partner] ?? 0;
  }
  return clamp01(exposure);
}

/**
 * Dependency on the single largest partner, whichever partner is targeted.
 */
export function computeConcentration(sector: SectorSummary): number {
  return clamp01(sector.topPartnerShare);
}

export function computeShock(
  tariffPercent: number,
  maxTariffPercent: number = DEFAULT_ENGINE_CONFIG.maxTariffPercent
): number {
  return clamp01(tariffPercent / maxTariffPercent);
}

export function computeRiskScore(
  exposure: number,
  concentration: number,
  shock: number,
  weights: Weights = DEFAULT_ENGINE_CONFIG
): number {
  const raw = (weights.wExposure * exposure + weights.wConcentration * concentration) * shock;
  return clamp(roundTo(raw * 100, 1), 0, 100);
}

export function computeAffectedExportValue(totalExports: number, exposure: number, shock: number): number {
  if (exposure === 0 || shock === 0) return 0;
  return Math.max(0, totalExports * exposure * shock);
}

/**
 * `top_partner_share × 100`, independent of the targeted partners.
 */
export function computeDependencyPercent(sector: SectorSummary): number {
  return clamp(roundTo(sector.topPartnerShare * 100, 1), 0, 100);
}

export function buildExplainability(
  exposure: number,
  concentration: number,
  shock: number,
  weights: Weights = DEFAULT_ENGINE_CONFIG
): ExplainabilityBreakdown {
  return Object.freeze({
    exposureValue: exposure,
    concentrationValue: concentration,
    shockValue: shock,
    exposureComponent: weights.wExposure * exposure,
    concentrationComponent: weights.wConcentration * concentration,
  });
}
