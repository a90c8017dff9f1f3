/**
 * bareGround.ts
 *
 * The reference climate and soil with every insulating layer removed, so the
 * ground surface follows the air temperature.
 */

import type { SitePreset } from '../siteRegistry';

export const bareGroundSite: SitePreset = {
  id: 'bare_ground',
  title: 'Bare ground',
  description: 'Reference climate and soil with no snow and no canopy.',
  input: {
    siteName: 'bare_ground',
    climate: { meanAirTempC: -10.81, airTempAmplitudeC: 19.04 },
    snow: { thicknessM: 0, densityKgM3: 240 },
    vegetation: { winterHeightM: 0, summerHeightM: 0 },
    soil: {
      texture: { sand: 0.6, silt: 0.3, clay: 0.1 },
      volumetricWaterContent: 0.41,
    },
  },
};
