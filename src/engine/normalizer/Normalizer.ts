import { SiteInputV1Schema } from '../schema/SiteInputV1';
import type { NormalizedSiteInput, PhysicalConstants, SoilClassTable } from '../schema/SiteInputV1';
import {
  DEFAULT_PHYSICAL_CONSTANTS,
  DEFAULT_SOIL_CLASS_TABLE,
  DEFAULT_VEGETATION_FROZEN_DIFFUSIVITY_M2S,
  DEFAULT_VEGETATION_THAWED_DIFFUSIVITY_M2S,
} from '../soil.catalog';
import { InvalidSiteInputError } from '../errors';
import type { SiteInputIssue } from '../errors';
import { createStageLogger } from '../logger';

const log = createStageLogger('normalizer');

function resolveConstants(overrides: Partial<PhysicalConstants> | undefined): PhysicalConstants {
  const d = DEFAULT_PHYSICAL_CONSTANTS;
  return {
    secondsPerYear: overrides?.secondsPerYear ?? d.secondsPerYear,
    waterThawedCapacityTerm: overrides?.waterThawedCapacityTerm ?? d.waterThawedCapacityTerm,
    waterFrozenCapacityTerm: overrides?.waterFrozenCapacityTerm ?? d.waterFrozenCapacityTerm,
    volumetricLatentHeatJm3: overrides?.volumetricLatentHeatJm3 ?? d.volumetricLatentHeatJm3,
    snowSpecificHeatJkgK: overrides?.snowSpecificHeatJkgK ?? d.snowSpecificHeatJkgK,
  };
}

/**
 * Validate a site configuration and resolve every default.
 *
 * Rejects, before any physics runs:
 *  - non-finite numbers anywhere in the record;
 *  - negative thickness, height or water content; non-positive density,
 *    amplitude or diffusivity;
 *  - texture fractions outside [0, 1], or naming a class absent from the
 *    (merged) class table.
 *
 * @throws InvalidSiteInputError listing every offending field.
 */
export function normalizeInput(input: unknown): NormalizedSiteInput {
  const parsed = SiteInputV1Schema.safeParse(input);
  if (!parsed.success) {
    const issues: SiteInputIssue[] = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    log.warn('rejected site input: %o', issues);
    throw new InvalidSiteInputError(issues);
  }

  const site = parsed.data;

  const soilClassTable: SoilClassTable = { ...DEFAULT_SOIL_CLASS_TABLE, ...site.soilClassTable };
  const unknownClasses = Object.keys(site.soil.texture).filter(c => !Object.hasOwn(soilClassTable, c));
  if (unknownClasses.length > 0) {
    const issues = unknownClasses.map(c => ({
      path: `soil.texture.${c}`,
      message: `unknown soil class "${c}"; known classes: ${Object.keys(soilClassTable).join(', ')}`,
    }));
    log.warn('rejected site input: %o', issues);
    throw new InvalidSiteInputError(issues);
  }

  const vegetation = site.vegetation;
  const vegetationDiffusivityDefaulted =
    vegetation != null &&
    (vegetation.frozenDiffusivityM2s == null || vegetation.thawedDiffusivityM2s == null);

  const normalized: NormalizedSiteInput = {
    siteName: site.siteName,
    meanAirTempC: site.climate.meanAirTempC,
    airTempAmplitudeC: site.climate.airTempAmplitudeC,
    snowThicknessM: site.snow.thicknessM,
    snowDensityKgM3: site.snow.densityKgM3,
    vegetationWinterHeightM: vegetation?.winterHeightM ?? 0,
    vegetationSummerHeightM: vegetation?.summerHeightM ?? 0,
    vegetationFrozenDiffusivityM2s:
      vegetation?.frozenDiffusivityM2s ?? DEFAULT_VEGETATION_FROZEN_DIFFUSIVITY_M2S,
    vegetationThawedDiffusivityM2s:
      vegetation?.thawedDiffusivityM2s ?? DEFAULT_VEGETATION_THAWED_DIFFUSIVITY_M2S,
    texture: { ...site.soil.texture },
    volumetricWaterContent: site.soil.volumetricWaterContent,
    soilClassTable,
    constants: resolveConstants(site.constants),
    defaulted: {
      vegetation: vegetation == null,
      vegetationDiffusivity: vegetationDiffusivityDefaulted,
      soilClassTable: site.soilClassTable == null,
      constants: site.constants == null,
    },
  };

  log.info('normalized site %s', normalized.siteName ?? '(unnamed)');
  return normalized;
}
