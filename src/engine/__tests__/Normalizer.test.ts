import { describe, it, expect } from 'vitest';
import { normalizeInput } from '../normalizer/Normalizer';
import { InvalidSiteInputError } from '../errors';
import {
  DEFAULT_PHYSICAL_CONSTANTS,
  DEFAULT_VEGETATION_FROZEN_DIFFUSIVITY_M2S,
  DEFAULT_VEGETATION_THAWED_DIFFUSIVITY_M2S,
} from '../soil.catalog';
import type { SiteInputV1 } from '../schema/SiteInputV1';

const baseInput: SiteInputV1 = {
  siteName: 'test-site',
  climate: { meanAirTempC: -10.81, airTempAmplitudeC: 19.04 },
  snow: { thicknessM: 0.28, densityKgM3: 240 },
  soil: {
    texture: { sand: 0.6, silt: 0.3, clay: 0.1 },
    volumetricWaterContent: 0.41,
  },
};

function issuePaths(input: unknown): string[] {
  try {
    normalizeInput(input);
  } catch (err) {
    if (err instanceof InvalidSiteInputError) return err.issues.map(i => i.path);
    throw err;
  }
  return [];
}

// ─── 1. Defaults ──────────────────────────────────────────────────────────────

describe('Normalizer – defaults', () => {
  it('omitted vegetation becomes a zero-height canopy with default diffusivities', () => {
    const result = normalizeInput(baseInput);
    expect(result.vegetationWinterHeightM).toBe(0);
    expect(result.vegetationSummerHeightM).toBe(0);
    expect(result.vegetationFrozenDiffusivityM2s).toBe(DEFAULT_VEGETATION_FROZEN_DIFFUSIVITY_M2S);
    expect(result.vegetationThawedDiffusivityM2s).toBe(DEFAULT_VEGETATION_THAWED_DIFFUSIVITY_M2S);
    expect(result.defaulted.vegetation).toBe(true);
    expect(result.defaulted.vegetationDiffusivity).toBe(false);
  });

  it('vegetation heights without diffusivities mark the diffusivity as defaulted', () => {
    const result = normalizeInput({ ...baseInput, vegetation: { winterHeightM: 0.2 } });
    expect(result.vegetationWinterHeightM).toBe(0.2);
    expect(result.vegetationSummerHeightM).toBe(0);
    expect(result.defaulted.vegetation).toBe(false);
    expect(result.defaulted.vegetationDiffusivity).toBe(true);
  });

  it('uses the default constants and class table when none are given', () => {
    const result = normalizeInput(baseInput);
    expect(result.constants).toEqual(DEFAULT_PHYSICAL_CONSTANTS);
    expect(Object.keys(result.soilClassTable).sort()).toEqual(['clay', 'peat', 'sand', 'silt']);
    expect(result.defaulted.constants).toBe(true);
    expect(result.defaulted.soilClassTable).toBe(true);
  });

  it('flattens climate, snow and soil fields', () => {
    const result = normalizeInput(baseInput);
    expect(result.siteName).toBe('test-site');
    expect(result.meanAirTempC).toBe(-10.81);
    expect(result.airTempAmplitudeC).toBe(19.04);
    expect(result.snowThicknessM).toBe(0.28);
    expect(result.snowDensityKgM3).toBe(240);
    expect(result.texture).toEqual({ sand: 0.6, silt: 0.3, clay: 0.1 });
    expect(result.volumetricWaterContent).toBe(0.41);
  });
});

// ─── 2. Overrides ─────────────────────────────────────────────────────────────

describe('Normalizer – overrides', () => {
  it('merges a partial constants override over the defaults', () => {
    const result = normalizeInput({ ...baseInput, constants: { volumetricLatentHeatJm3: 3.0e8 } });
    expect(result.constants.volumetricLatentHeatJm3).toBe(3.0e8);
    expect(result.constants.secondsPerYear).toBe(DEFAULT_PHYSICAL_CONSTANTS.secondsPerYear);
    expect(result.constants.snowSpecificHeatJkgK).toBe(2090);
    expect(result.defaulted.constants).toBe(false);
  });

  it('adds new classes to the table while keeping the defaults', () => {
    const gravel = {
      bulkDensityKgM3: 1900,
      specificHeatJkgK: 750,
      thawedConductivityWet: 2.6,
      thawedConductivityDry: 0.4,
      frozenConductivityWet: 3.2,
      frozenConductivityDry: 0.4,
    };
    const result = normalizeInput({
      ...baseInput,
      soil: { texture: { sand: 0.5, gravel: 0.5 }, volumetricWaterContent: 0.2 },
      soilClassTable: { gravel },
    });
    expect(result.soilClassTable.gravel).toEqual(gravel);
    expect(result.soilClassTable.sand.bulkDensityKgM3).toBe(1600);
    expect(result.defaulted.soilClassTable).toBe(false);
  });

  it('an override replaces a default class', () => {
    const result = normalizeInput({
      ...baseInput,
      soilClassTable: {
        sand: {
          bulkDensityKgM3: 1700,
          specificHeatJkgK: 800,
          thawedConductivityWet: 2.2,
          thawedConductivityDry: 0.3,
          frozenConductivityWet: 2.9,
          frozenConductivityDry: 0.35,
        },
      },
    });
    expect(result.soilClassTable.sand.bulkDensityKgM3).toBe(1700);
  });
});

// ─── 3. Rejection ─────────────────────────────────────────────────────────────

describe('Normalizer – rejects invalid input', () => {
  it('non-positive snow density', () => {
    expect(issuePaths({ ...baseInput, snow: { thicknessM: 0.28, densityKgM3: 0 } })).toEqual([
      'snow.densityKgM3',
    ]);
  });

  it('negative snow thickness', () => {
    expect(issuePaths({ ...baseInput, snow: { thicknessM: -0.1, densityKgM3: 240 } })).toEqual([
      'snow.thicknessM',
    ]);
  });

  it('non-positive air-temperature amplitude', () => {
    expect(issuePaths({ ...baseInput, climate: { meanAirTempC: -5, airTempAmplitudeC: 0 } })).toEqual([
      'climate.airTempAmplitudeC',
    ]);
  });

  it('NaN and Infinity', () => {
    expect(issuePaths({ ...baseInput, climate: { meanAirTempC: Number.NaN, airTempAmplitudeC: 19 } })).toEqual([
      'climate.meanAirTempC',
    ]);
    expect(
      issuePaths({ ...baseInput, climate: { meanAirTempC: -5, airTempAmplitudeC: Number.POSITIVE_INFINITY } }),
    ).toEqual(['climate.airTempAmplitudeC']);
  });

  it('water content outside [0, 1]', () => {
    expect(
      issuePaths({ ...baseInput, soil: { texture: { sand: 1 }, volumetricWaterContent: 1.2 } }),
    ).toEqual(['soil.volumetricWaterContent']);
  });

  it('a texture fraction outside [0, 1]', () => {
    expect(
      issuePaths({ ...baseInput, soil: { texture: { sand: 1.5 }, volumetricWaterContent: 0.3 } }),
    ).toContain('soil.texture.sand');
  });

  it('an empty texture', () => {
    expect(issuePaths({ ...baseInput, soil: { texture: {}, volumetricWaterContent: 0.3 } })).toEqual([
      'soil.texture',
    ]);
  });

  it('a texture class missing from the class table', () => {
    let caught: unknown;
    try {
      normalizeInput({ ...baseInput, soil: { texture: { sand: 0.5, loam: 0.5 }, volumetricWaterContent: 0.3 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidSiteInputError);
    if (caught instanceof InvalidSiteInputError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].path).toBe('soil.texture.loam');
      expect(caught.issues[0].message).toBe('unknown soil class "loam"; known classes: sand, silt, clay, peat');
    }
  });

  it('a missing section', () => {
    const withoutClimate = { snow: baseInput.snow, soil: baseInput.soil };
    expect(issuePaths(withoutClimate)).toEqual(['climate']);
  });

  it('reports every offending field at once', () => {
    const paths = issuePaths({
      ...baseInput,
      snow: { thicknessM: -1, densityKgM3: -240 },
      soil: { texture: { sand: 1 }, volumetricWaterContent: 2 },
    });
    expect(paths).toEqual(['snow.thicknessM', 'snow.densityKgM3', 'soil.volumetricWaterContent']);
  });

  it('the error message lists path and reason', () => {
    expect(() => normalizeInput({ ...baseInput, snow: { thicknessM: 0.28, densityKgM3: 0 } })).toThrow(
      /^Invalid site input: snow\.densityKgM3: /,
    );
  });
});
