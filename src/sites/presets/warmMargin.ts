/**
 * warmMargin.ts
 *
 * Discontinuous-permafrost margin: mean air temperature just below freezing
 * under a deep snow pack.
 */

import type { SitePreset } from '../siteRegistry';

export const warmMarginSite: SitePreset = {
  id: 'warm_margin',
  title: 'Warm permafrost margin',
  description: 'Mean air temperature of −1°C under 60 cm of snow.',
  input: {
    siteName: 'warm_margin',
    climate: { meanAirTempC: -1, airTempAmplitudeC: 14 },
    snow: { thicknessM: 0.6, densityKgM3: 280 },
    soil: {
      texture: { sand: 0.4, silt: 0.4, clay: 0.2 },
      volumetricWaterContent: 0.3,
    },
  },
};
