import { describe, it, expect } from 'vitest';
import {
  SITE_PRESETS,
  applySiteOverrides,
  getSitePreset,
  listSitePresets,
  referenceTundraSite,
  warmMarginSite,
} from '../siteRegistry';
import { normalizeInput } from '../../engine/normalizer/Normalizer';

describe('siteRegistry', () => {
  it('lists every preset once', () => {
    const ids = listSitePresets().map(p => p.id);
    expect(ids).toEqual(['reference_tundra', 'bare_ground', 'shrub_tundra', 'warm_margin']);
  });

  it('looks presets up by id', () => {
    expect(getSitePreset('warm_margin')).toBe(warmMarginSite);
  });

  it('throws on an unknown id', () => {
    expect(() => getSitePreset('alpine_scree')).toThrow('Unknown site preset "alpine_scree".');
  });

  it('every preset passes validation', () => {
    for (const preset of SITE_PRESETS) {
      expect(() => normalizeInput(preset.input)).not.toThrow();
    }
  });
});

describe('applySiteOverrides', () => {
  it('merges a section without touching its siblings', () => {
    const site = applySiteOverrides(referenceTundraSite.input, { snow: { thicknessM: 0.5 } });
    expect(site.snow).toEqual({ thicknessM: 0.5, densityKgM3: 240 });
    expect(site.climate).toEqual(referenceTundraSite.input.climate);
  });

  it('does not mutate the preset', () => {
    applySiteOverrides(referenceTundraSite.input, { climate: { meanAirTempC: 0 }, soil: { texture: { clay: 1 } } });
    expect(referenceTundraSite.input.climate.meanAirTempC).toBe(-10.81);
    expect(referenceTundraSite.input.soil.texture).toEqual({ sand: 0.6, silt: 0.3, clay: 0.1 });
  });

  it('replaces the texture wholesale', () => {
    const site = applySiteOverrides(referenceTundraSite.input, { soil: { texture: { clay: 0.7, peat: 0.3 } } });
    expect(site.soil.texture).toEqual({ clay: 0.7, peat: 0.3 });
    expect(site.soil.volumetricWaterContent).toBe(0.41);
  });

  it('leaves vegetation absent when neither side has it', () => {
    const site = applySiteOverrides(warmMarginSite.input, { siteName: 'renamed' });
    expect(site.vegetation).toBeUndefined();
    expect(site.siteName).toBe('renamed');
  });

  it('adds vegetation to a site that had none', () => {
    const site = applySiteOverrides(warmMarginSite.input, { vegetation: { summerHeightM: 0.1 } });
    expect(site.vegetation).toEqual({ summerHeightM: 0.1 });
  });
});
