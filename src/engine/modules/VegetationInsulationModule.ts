import type {
  VegetationInsulationInput,
  VegetationInsulationResult,
} from '../schema/EngineResultV1';
import { guardedDivide, guardedSqrt } from '../utils/domain';
import { createStageLogger } from '../logger';

const log = createStageLogger('vegetation');

/**
 * Fraction of a seasonal half-wave absorbed by a canopy of height H and
 * diffusivity D over a season of length t:
 *
 *   1 − exp(−H·√(π / (2·D·t)))
 */
function canopyInsulationFactor(
  heightM: number,
  diffusivityM2s: number,
  seasonS: number,
  quantity: string,
): number {
  const inverseDepth = guardedSqrt(guardedDivide(Math.PI, 2 * diffusivityM2s * seasonS, quantity), quantity);
  return 1 - Math.exp(-heightM * inverseDepth);
}

/**
 * VegetationInsulationModuleV1 – Winter and Summer Canopy Effects
 *
 * Applied on top of the snow-adjusted forcing Tvg = Ta + ΔTsn, Avg = Aa − ΔAsn.
 * The winter canopy damps the cold half-wave (range Avg − Tvg), the summer
 * canopy the warm half-wave (range Avg + Tvg):
 *
 *   ΔA1 = (Avg − Tvg)·(1 − exp(−Hvg1·√(π/(2·Dvf·tao1))))
 *   ΔA2 = (Avg + Tvg)·(1 − exp(−Hvg2·√(π/(2·Dvt·tao2))))
 *
 * Season-weighted, with the 2/π first-harmonic conversion for the mean:
 *
 *   ΔAv = (ΔA1·tao1 + ΔA2·tao2) / tao
 *   ΔTv = (ΔA1·tao1 − ΔA2·tao2) / tao · 2/π
 *
 * The returned Tgs = Tvg + ΔTv and Ags = Avg − ΔAv are the only climate
 * inputs the TTOP solver sees.
 */
export function runVegetationInsulationModuleV1(
  input: VegetationInsulationInput,
): VegetationInsulationResult {
  const {
    coldSeasonS: tao1,
    warmSeasonS: tao2,
    annualPeriodS: tao,
  } = input;

  const snowAdjustedTempC = input.meanAirTempC + input.snowMeanTempShiftC;
  const snowAdjustedAmplitudeC = input.airTempAmplitudeC - input.snowAmplitudeReductionC;

  const winterAmplitudeReductionC =
    (snowAdjustedAmplitudeC - snowAdjustedTempC) *
    canopyInsulationFactor(input.winterHeightM, input.frozenDiffusivityM2s, tao1, 'ΔA1');
  const summerAmplitudeReductionC =
    (snowAdjustedAmplitudeC + snowAdjustedTempC) *
    canopyInsulationFactor(input.summerHeightM, input.thawedDiffusivityM2s, tao2, 'ΔA2');

  const amplitudeReductionC = guardedDivide(
    winterAmplitudeReductionC * tao1 + summerAmplitudeReductionC * tao2,
    tao,
    'ΔAv',
  );
  const meanTempShiftC =
    (guardedDivide(
      winterAmplitudeReductionC * tao1 - summerAmplitudeReductionC * tao2,
      tao,
      'ΔTv',
    ) *
      2) /
    Math.PI;

  const groundSurfaceTempC = snowAdjustedTempC + meanTempShiftC;
  const groundSurfaceAmplitudeC = snowAdjustedAmplitudeC - amplitudeReductionC;

  log.trace(
    'Tvg=%d Avg=%d ΔA1=%d ΔA2=%d ΔAv=%d ΔTv=%d Tgs=%d Ags=%d',
    snowAdjustedTempC, snowAdjustedAmplitudeC, winterAmplitudeReductionC, summerAmplitudeReductionC,
    amplitudeReductionC, meanTempShiftC, groundSurfaceTempC, groundSurfaceAmplitudeC,
  );

  const notes: string[] = [];
  if (input.winterHeightM === 0 && input.summerHeightM === 0) {
    notes.push('No vegetation canopy: surface forcing equals the snow-adjusted forcing.');
  } else {
    notes.push(
      `🌿 Canopy (${input.winterHeightM} m winter / ${input.summerHeightM} m summer) shifts the ` +
      `surface mean by ${meanTempShiftC.toFixed(2)}°C and damps the amplitude by ${amplitudeReductionC.toFixed(2)}°C.`,
    );
  }
  notes.push(
    `Ground-surface forcing: Tgs = ${groundSurfaceTempC.toFixed(2)}°C, Ags = ${groundSurfaceAmplitudeC.toFixed(2)}°C.`,
  );

  return {
    snowAdjustedTempC,
    snowAdjustedAmplitudeC,
    winterAmplitudeReductionC,
    summerAmplitudeReductionC,
    amplitudeReductionC,
    meanTempShiftC,
    groundSurfaceTempC,
    groundSurfaceAmplitudeC,
    notes,
  };
}
