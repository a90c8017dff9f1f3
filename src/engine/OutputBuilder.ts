import type { PermafrostEngineResultCore } from './schema/EngineResultV1';
import type { PermafrostFlagItem, PermafrostOutputV1 } from '../contracts/PermafrostOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';
import { buildAssumptionsV1, textureFractionSum, TEXTURE_SUM_TOLERANCE } from './AssumptionsBuilder';

/** Snow warming above this is reported as the dominant surface offset (°C). */
export const SNOW_DOMINANT_OFFSET_C = 2;

/** Active layers deeper than this are reported (m). */
export const DEEP_ACTIVE_LAYER_M = 2;

function buildFlags(result: PermafrostEngineResultCore): PermafrostFlagItem[] {
  const { normalized, snow, ttop, activeLayer } = result;
  const flags: PermafrostFlagItem[] = [];

  if (ttop.regime.kind === 'thawed') {
    flags.push({
      id: 'regime-thawed',
      severity: 'warn',
      title: 'Permafrost not sustained',
      detail:
        `The mean annual temperature at depth is ${ttop.ttopC.toFixed(2)}°C. ` +
        `The computed layer thickness is a seasonal freeze depth, not an active layer over permafrost.`,
    });
  }

  const textureSum = textureFractionSum(normalized.texture);
  if (Math.abs(textureSum - 1) > TEXTURE_SUM_TOLERANCE) {
    flags.push({
      id: 'texture-sum-off',
      severity: 'info',
      title: 'Texture fractions do not sum to 1',
      detail: `Sand/silt/clay fractions sum to ${textureSum.toFixed(2)}.`,
    });
  }

  if (snow.meanTempShiftC > SNOW_DOMINANT_OFFSET_C) {
    flags.push({
      id: 'snow-dominant-offset',
      severity: 'info',
      title: 'Snow dominates the surface offset',
      detail: `Snow cover warms the ground surface by ${snow.meanTempShiftC.toFixed(2)}°C relative to the air.`,
    });
  }

  if (activeLayer.activeLayerThicknessM > DEEP_ACTIVE_LAYER_M) {
    flags.push({
      id: 'deep-active-layer',
      severity: 'info',
      title: 'Deep active layer',
      detail: `Layer thickness ${activeLayer.activeLayerThicknessM.toFixed(2)} m exceeds ${DEEP_ACTIVE_LAYER_M} m.`,
    });
  }

  const noCanopy = normalized.vegetationWinterHeightM === 0 && normalized.vegetationSummerHeightM === 0;
  if (normalized.snowThicknessM === 0 && noCanopy) {
    flags.push({
      id: 'no-insulation',
      severity: 'info',
      title: 'No surface insulation',
      detail: 'Neither snow nor vegetation is present; the ground surface follows the air temperature.',
    });
  }

  return flags;
}

export function buildPermafrostOutputV1(result: PermafrostEngineResultCore): PermafrostOutputV1 {
  const { soil, season, snow, vegetation, ttop, activeLayer } = result;
  const { confidence, assumptions } = buildAssumptionsV1(result);

  return {
    regime: ttop.regime.kind,
    ttopC: ttop.ttopC,
    permafrostTopAmplitudeC: activeLayer.permafrostTopAmplitudeC,
    activeLayerThicknessM: activeLayer.activeLayerThicknessM,
    characteristicDepthM: activeLayer.characteristicDepthM,
    diagnostics: {
      groundSurfaceTempC: vegetation.groundSurfaceTempC,
      groundSurfaceAmplitudeC: vegetation.groundSurfaceAmplitudeC,
      thawedHeatCapacity: soil.thawedHeatCapacity,
      frozenHeatCapacity: soil.frozenHeatCapacity,
      thawedConductivity: soil.thawedConductivity,
      frozenConductivity: soil.frozenConductivity,
      effectiveFrozenHeatCapacity: snow.effectiveFrozenHeatCapacity,
      reflectionCoefficient: snow.reflectionCoefficient,
      dampingFactor: snow.dampingFactor,
      coldSeasonS: season.coldSeasonS,
      warmSeasonS: season.warmSeasonS,
      latentHeat: soil.latentHeat,
    },
    flags: buildFlags(result),
    meta: {
      engineVersion: ENGINE_VERSION,
      contractVersion: CONTRACT_VERSION,
      confidence,
      assumptions,
    },
  };
}
