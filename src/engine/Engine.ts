import type { PermafrostEngineResult, PermafrostEngineResultCore } from './schema/EngineResultV1';
import type { SiteInputV1 } from './schema/SiteInputV1';
import { normalizeInput } from './normalizer/Normalizer';
import { runSoilPropertyModuleV1 } from './modules/SoilPropertyModule';
import { runSeasonModuleV1 } from './modules/SeasonModule';
import { runSnowInsulationModuleV1 } from './modules/SnowInsulationModule';
import { runVegetationInsulationModuleV1 } from './modules/VegetationInsulationModule';
import { runPermafrostRegimeModuleV1 } from './modules/PermafrostRegimeModule';
import { runActiveLayerModuleV1 } from './modules/ActiveLayerModule';
import { buildPermafrostOutputV1 } from './OutputBuilder';
import { createStageLogger } from './logger';

const log = createStageLogger('engine');

/**
 * Runs the full pipeline for one site:
 *
 *   texture → soil properties → season split → snow → vegetation
 *           → regime + TTOP → ALT → output contract
 *
 * Pure and synchronous; every intermediate is local to the call.
 *
 * @throws InvalidSiteInputError before any computation when the input is rejected.
 * @throws PermafrostDomainError when a formula is undefined for this site.
 */
export function runEngine(input: SiteInputV1): PermafrostEngineResult {
  const normalized = normalizeInput(input);
  const { constants } = normalized;

  const soil = runSoilPropertyModuleV1({
    texture: normalized.texture,
    volumetricWaterContent: normalized.volumetricWaterContent,
    soilClassTable: normalized.soilClassTable,
    constants,
  });

  const season = runSeasonModuleV1({
    meanAirTempC: normalized.meanAirTempC,
    airTempAmplitudeC: normalized.airTempAmplitudeC,
    secondsPerYear: constants.secondsPerYear,
  });

  const snow = runSnowInsulationModuleV1({
    meanAirTempC: normalized.meanAirTempC,
    airTempAmplitudeC: normalized.airTempAmplitudeC,
    frozenHeatCapacity: soil.frozenHeatCapacity,
    frozenConductivity: soil.frozenConductivity,
    latentHeat: soil.latentHeat,
    snowThicknessM: normalized.snowThicknessM,
    snowDensityKgM3: normalized.snowDensityKgM3,
    snowSpecificHeatJkgK: constants.snowSpecificHeatJkgK,
    coldSeasonS: season.coldSeasonS,
    annualPeriodS: season.annualPeriodS,
  });

  const vegetation = runVegetationInsulationModuleV1({
    meanAirTempC: normalized.meanAirTempC,
    airTempAmplitudeC: normalized.airTempAmplitudeC,
    snowAmplitudeReductionC: snow.seasonalAmplitudeReductionC,
    snowMeanTempShiftC: snow.meanTempShiftC,
    winterHeightM: normalized.vegetationWinterHeightM,
    summerHeightM: normalized.vegetationSummerHeightM,
    frozenDiffusivityM2s: normalized.vegetationFrozenDiffusivityM2s,
    thawedDiffusivityM2s: normalized.vegetationThawedDiffusivityM2s,
    coldSeasonS: season.coldSeasonS,
    warmSeasonS: season.warmSeasonS,
    annualPeriodS: season.annualPeriodS,
  });

  const ttop = runPermafrostRegimeModuleV1({
    groundSurfaceTempC: vegetation.groundSurfaceTempC,
    groundSurfaceAmplitudeC: vegetation.groundSurfaceAmplitudeC,
    thawedConductivity: soil.thawedConductivity,
    frozenConductivity: soil.frozenConductivity,
    thawedHeatCapacity: soil.thawedHeatCapacity,
    frozenHeatCapacity: soil.frozenHeatCapacity,
  });

  const activeLayer = runActiveLayerModuleV1({
    regime: ttop.regime,
    ttopC: ttop.ttopC,
    groundSurfaceAmplitudeC: vegetation.groundSurfaceAmplitudeC,
    latentHeat: soil.latentHeat,
    annualPeriodS: season.annualPeriodS,
  });

  const core: PermafrostEngineResultCore = {
    normalized,
    soil,
    season,
    snow,
    vegetation,
    ttop,
    activeLayer,
  };

  const output = buildPermafrostOutputV1(core);
  log.info(
    '%s: regime=%s TTOP=%d°C ALT=%dm',
    normalized.siteName ?? '(unnamed)', output.regime, output.ttopC, output.activeLayerThicknessM,
  );
  return { ...core, output };
}
