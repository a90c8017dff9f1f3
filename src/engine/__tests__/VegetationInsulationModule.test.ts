import { describe, it, expect } from 'vitest';
import { runVegetationInsulationModuleV1 } from '../modules/VegetationInsulationModule';
import { runSeasonModuleV1 } from '../modules/SeasonModule';
import { SECONDS_PER_YEAR } from '../soil.catalog';
import type { VegetationInsulationInput } from '../schema/EngineResultV1';

const season = runSeasonModuleV1({ meanAirTempC: -8, airTempAmplitudeC: 17, secondsPerYear: SECONDS_PER_YEAR });

const bareInput: VegetationInsulationInput = {
  meanAirTempC: -8,
  airTempAmplitudeC: 17,
  snowAmplitudeReductionC: 3,
  snowMeanTempShiftC: 2,
  winterHeightM: 0,
  summerHeightM: 0,
  frozenDiffusivityM2s: 4.0e-7,
  thawedDiffusivityM2s: 2.0e-7,
  coldSeasonS: season.coldSeasonS,
  warmSeasonS: season.warmSeasonS,
  annualPeriodS: season.annualPeriodS,
};

describe('VegetationInsulationModuleV1 – snow-adjusted forcing', () => {
  it('Tvg = Ta + ΔTsn and Avg = Aa − ΔAsn', () => {
    const result = runVegetationInsulationModuleV1(bareInput);
    expect(result.snowAdjustedTempC).toBe(-6);
    expect(result.snowAdjustedAmplitudeC).toBe(14);
  });

  it('without a canopy the ground surface sees the snow-adjusted forcing unchanged', () => {
    const result = runVegetationInsulationModuleV1(bareInput);
    expect(result.winterAmplitudeReductionC).toBe(0);
    expect(result.summerAmplitudeReductionC).toBe(0);
    expect(result.groundSurfaceTempC).toBe(-6);
    expect(result.groundSurfaceAmplitudeC).toBe(14);
    expect(result.notes[0]).toBe('No vegetation canopy: surface forcing equals the snow-adjusted forcing.');
  });
});

describe('VegetationInsulationModuleV1 – canopy damping', () => {
  it('winter canopy damps the cold half-wave (Avg − Tvg)', () => {
    const result = runVegetationInsulationModuleV1({ ...bareInput, winterHeightM: 0.2 });
    const factor = 1 - Math.exp(-0.2 * Math.sqrt(Math.PI / (2 * 4.0e-7 * season.coldSeasonS)));
    expect(result.winterAmplitudeReductionC).toBeCloseTo((14 - -6) * factor, 10);
    expect(result.summerAmplitudeReductionC).toBe(0);
  });

  it('summer canopy damps the warm half-wave (Avg + Tvg)', () => {
    const result = runVegetationInsulationModuleV1({ ...bareInput, summerHeightM: 0.3 });
    const factor = 1 - Math.exp(-0.3 * Math.sqrt(Math.PI / (2 * 2.0e-7 * season.warmSeasonS)));
    expect(result.summerAmplitudeReductionC).toBeCloseTo((14 + -6) * factor, 10);
    expect(result.winterAmplitudeReductionC).toBe(0);
  });

  it('a winter-only canopy warms the surface; a summer-only canopy cools it', () => {
    const winter = runVegetationInsulationModuleV1({ ...bareInput, winterHeightM: 0.2 });
    const summer = runVegetationInsulationModuleV1({ ...bareInput, summerHeightM: 0.3 });
    expect(winter.meanTempShiftC).toBeGreaterThan(0);
    expect(summer.meanTempShiftC).toBeLessThan(0);
  });

  it('season-weights the two reductions', () => {
    const result = runVegetationInsulationModuleV1({ ...bareInput, winterHeightM: 0.2, summerHeightM: 0.3 });
    const { coldSeasonS: t1, warmSeasonS: t2, annualPeriodS: t } = season;
    const a1 = result.winterAmplitudeReductionC;
    const a2 = result.summerAmplitudeReductionC;
    expect(result.amplitudeReductionC).toBeCloseTo((a1 * t1 + a2 * t2) / t, 12);
    expect(result.meanTempShiftC).toBeCloseTo((((a1 * t1 - a2 * t2) / t) * 2) / Math.PI, 12);
    expect(result.groundSurfaceTempC).toBeCloseTo(-6 + result.meanTempShiftC, 12);
    expect(result.groundSurfaceAmplitudeC).toBeCloseTo(14 - result.amplitudeReductionC, 12);
  });

  it('a taller canopy damps more', () => {
    const low = runVegetationInsulationModuleV1({ ...bareInput, winterHeightM: 0.1, summerHeightM: 0.1 });
    const tall = runVegetationInsulationModuleV1({ ...bareInput, winterHeightM: 0.4, summerHeightM: 0.4 });
    expect(tall.amplitudeReductionC).toBeGreaterThan(low.amplitudeReductionC);
  });
});
