import type { AssumptionV1, ConfidenceV1 } from '../contracts/PermafrostOutputV1';
import { ASSUMPTION_IDS } from '../contracts/assumptions.ids';
import type { AssumptionId } from '../contracts/assumptions.ids';
import type { PermafrostEngineResultCore } from './schema/EngineResultV1';
import { ASSUMPTION_CATALOG } from './assumptions.catalog';

/** Texture fractions summing outside this band are reported. */
export const TEXTURE_SUM_TOLERANCE = 0.05;

export function textureFractionSum(texture: Readonly<Record<string, number>>): number {
  return Object.values(texture).reduce((sum, f) => sum + f, 0);
}

function fromCatalog(id: AssumptionId, severity: AssumptionV1['severity']): AssumptionV1 {
  const entry = ASSUMPTION_CATALOG[id];
  return {
    id,
    title: entry.title,
    detail: entry.detail,
    affects: entry.affects,
    severity,
    ...(entry.improveBy != null ? { improveBy: entry.improveBy } : {}),
  };
}

/**
 * Builds confidence and assumption metadata for PermafrostOutputV1.meta.
 *
 * Rules:
 *  - Start high
 *  - Each defaulted or suspect site input knocks it down:
 *    - 1–2 items → medium
 *    - 3+ items → low
 *  - Model-form assumptions (snow regression, annual harmonic, standard
 *    constants) are info-only and never counted
 */
export function buildAssumptionsV1(
  core: PermafrostEngineResultCore,
): { confidence: ConfidenceV1; assumptions: AssumptionV1[] } {
  const { normalized } = core;
  const assumptions: AssumptionV1[] = [];
  const reasons: string[] = [];
  let missingCount = 0;

  // ── Vegetation ────────────────────────────────────────────────────────────

  if (normalized.defaulted.vegetation) {
    missingCount++;
    assumptions.push(fromCatalog(ASSUMPTION_IDS.VEGETATION_OMITTED, 'warn'));
    reasons.push('Vegetation canopy not described (heights taken as zero).');
  }

  const hasCanopy = normalized.vegetationWinterHeightM > 0 || normalized.vegetationSummerHeightM > 0;
  if (normalized.defaulted.vegetationDiffusivity && hasCanopy) {
    missingCount++;
    assumptions.push(fromCatalog(ASSUMPTION_IDS.VEGETATION_DIFFUSIVITY_DEFAULTED, 'warn'));
    reasons.push('Canopy diffusivity defaulted.');
  }

  // ── Soil ──────────────────────────────────────────────────────────────────

  if (normalized.defaulted.soilClassTable) {
    missingCount++;
    assumptions.push(fromCatalog(ASSUMPTION_IDS.SOIL_TABLE_DEFAULT, 'info'));
    reasons.push('Soil thermal properties derived from the default texture class table.');
  }

  const textureSum = textureFractionSum(normalized.texture);
  if (Math.abs(textureSum - 1) > TEXTURE_SUM_TOLERANCE) {
    missingCount++;
    assumptions.push(fromCatalog(ASSUMPTION_IDS.SOIL_TEXTURE_UNNORMALISED, 'warn'));
    reasons.push(`Texture fractions sum to ${textureSum.toFixed(2)}, not 1.`);
  }

  // ── Model form (info-only: not counted against confidence) ───────────────

  if (normalized.snowThicknessM > 0) {
    assumptions.push(fromCatalog(ASSUMPTION_IDS.SNOW_CONDUCTIVITY_FROM_DENSITY, 'info'));
  }
  if (normalized.defaulted.constants) {
    assumptions.push(fromCatalog(ASSUMPTION_IDS.CONSTANTS_DEFAULT, 'info'));
  }
  assumptions.push(fromCatalog(ASSUMPTION_IDS.ANNUAL_HARMONIC, 'info'));

  // ── Confidence level ─────────────────────────────────────────────────────

  let level: ConfidenceV1['level'];

  if (missingCount === 0) {
    level = 'high';
  } else if (missingCount >= 3) {
    level = 'low';
  } else {
    level = 'medium';
  }

  return {
    confidence: { level, reasons },
    assumptions,
  };
}
