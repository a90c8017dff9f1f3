/**
 * shrubTundra.ts
 *
 * Shrub tundra with an organic surface horizon.  Exercises the vegetation
 * stage and the peat texture class.
 */

import type { SitePreset } from '../siteRegistry';

export const shrubTundraSite: SitePreset = {
  id: 'shrub_tundra',
  title: 'Shrub tundra',
  description: 'Low shrubs over a peaty silt; deeper, softer snow.',
  input: {
    siteName: 'shrub_tundra',
    climate: { meanAirTempC: -8, airTempAmplitudeC: 17 },
    snow: { thicknessM: 0.35, densityKgM3: 250 },
    vegetation: {
      winterHeightM: 0.2,
      summerHeightM: 0.3,
      frozenDiffusivityM2s: 4.0e-7,
      thawedDiffusivityM2s: 2.0e-7,
    },
    soil: {
      texture: { silt: 0.5, clay: 0.2, peat: 0.3 },
      volumetricWaterContent: 0.5,
    },
  },
};
