/**
 * siteRegistry.ts
 *
 * Named example sites.  Each preset is a complete SiteInputV1; callers edit a
 * preset through applySiteOverrides rather than mutating it.
 *
 * Physics engine is NOT touched here — this is purely input assembly.
 */

import type { SiteInputV1 } from '../engine/schema/SiteInputV1';
import { referenceTundraSite } from './presets/referenceTundra';
import { bareGroundSite } from './presets/bareGround';
import { shrubTundraSite } from './presets/shrubTundra';
import { warmMarginSite } from './presets/warmMargin';
export { referenceTundraSite } from './presets/referenceTundra';
export { bareGroundSite } from './presets/bareGround';
export { shrubTundraSite } from './presets/shrubTundra';
export { warmMarginSite } from './presets/warmMargin';

export type SitePresetId = 'reference_tundra' | 'bare_ground' | 'shrub_tundra' | 'warm_margin';

export interface SitePreset {
  id: SitePresetId;
  title: string;
  description: string;
  input: SiteInputV1;
}

/**
 * Section-wise partial edits to a site.  Texture replaces the preset texture
 * wholesale so that removed classes do not linger.
 */
export interface SiteOverrides {
  siteName?: string;
  climate?: Partial<SiteInputV1['climate']>;
  snow?: Partial<SiteInputV1['snow']>;
  vegetation?: Partial<NonNullable<SiteInputV1['vegetation']>>;
  soil?: Partial<SiteInputV1['soil']>;
}

export const SITE_PRESETS: readonly SitePreset[] = [
  referenceTundraSite,
  bareGroundSite,
  shrubTundraSite,
  warmMarginSite,
];

export function listSitePresets(): readonly SitePreset[] {
  return SITE_PRESETS;
}

/** @throws Error for an id that names no preset. */
export function getSitePreset(id: string): SitePreset {
  const preset = SITE_PRESETS.find(p => p.id === id);
  if (!preset) {
    throw new Error(`Unknown site preset "${id}".`);
  }
  return preset;
}

/** Returns a new SiteInputV1 with `overrides` merged over `base`. */
export function applySiteOverrides(base: SiteInputV1, overrides: SiteOverrides): SiteInputV1 {
  const vegetation =
    base.vegetation != null || overrides.vegetation != null
      ? { ...base.vegetation, ...overrides.vegetation }
      : undefined;

  return {
    ...base,
    ...(overrides.siteName != null ? { siteName: overrides.siteName } : {}),
    climate: { ...base.climate, ...overrides.climate },
    snow: { ...base.snow, ...overrides.snow },
    ...(vegetation != null ? { vegetation } : {}),
    soil: {
      ...base.soil,
      ...overrides.soil,
      texture: { ...(overrides.soil?.texture ?? base.soil.texture) },
    },
  };
}
