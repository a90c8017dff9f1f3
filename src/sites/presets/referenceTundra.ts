/**
 * referenceTundra.ts
 *
 * Coastal-plain tundra site used as the regression fixture: cold, high-amplitude
 * climate, a thin wind-packed snow cover, no canopy, sandy loam soil.
 */

import type { SitePreset } from '../siteRegistry';

export const referenceTundraSite: SitePreset = {
  id: 'reference_tundra',
  title: 'Reference tundra',
  description: 'Cold continental tundra with 28 cm of wind-packed snow over sandy loam.',
  input: {
    siteName: 'reference_tundra',
    climate: { meanAirTempC: -10.81, airTempAmplitudeC: 19.04 },
    snow: { thicknessM: 0.28, densityKgM3: 240 },
    vegetation: { winterHeightM: 0, summerHeightM: 0 },
    soil: {
      texture: { sand: 0.6, silt: 0.3, clay: 0.1 },
      volumetricWaterContent: 0.41,
    },
  },
};
