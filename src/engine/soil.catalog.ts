import type { PhysicalConstants, SoilClassTable } from './schema/SiteInputV1';

// ─── Texture class reference table ────────────────────────────────────────────
//
// Bulk density and specific heat of the mineral (or organic) fraction, plus
// wet and dry reference conductivities for the thawed and frozen states.
// The engine averages wet and dry per class, then mixes classes with a
// weighted geometric mean, so the table can grow without touching formulas.
//
// The mineral classes are calibrated against the reference tundra site
// (Ta −10.81°C, Aa 19.04°C, 0.28 m of snow, W_vol 0.41, 60/30/10
// sand/silt/clay), which they bring to TTOP −7.69°C and ALT 0.578 m.
// Peat follows Hinzman et al. (1991) for organic horizons.

export const DEFAULT_SOIL_CLASS_TABLE: SoilClassTable = {
  sand: {
    bulkDensityKgM3: 1600,
    specificHeatJkgK: 1600,
    thawedConductivityWet: 7.27,
    thawedConductivityDry: 1.8,
    frozenConductivityWet: 9.12,
    frozenConductivityDry: 2.2,
  },
  silt: {
    bulkDensityKgM3: 1400,
    specificHeatJkgK: 1760,
    thawedConductivityWet: 5.4,
    thawedConductivityDry: 1.4,
    frozenConductivityWet: 7.0,
    frozenConductivityDry: 1.7,
  },
  clay: {
    bulkDensityKgM3: 1300,
    specificHeatJkgK: 1800,
    thawedConductivityWet: 4.4,
    thawedConductivityDry: 1.3,
    frozenConductivityWet: 6.0,
    frozenConductivityDry: 1.6,
  },
  peat: {
    bulkDensityKgM3: 250,
    specificHeatJkgK: 1920,
    thawedConductivityWet: 0.5,
    thawedConductivityDry: 0.06,
    frozenConductivityWet: 1.2,
    frozenConductivityDry: 0.07,
  },
};

// ─── Physical constants ───────────────────────────────────────────────────────

/** 365 days × 24 h × 3600 s. */
export const SECONDS_PER_YEAR = 365 * 24 * 3600;

export const DEFAULT_PHYSICAL_CONSTANTS: PhysicalConstants = {
  secondsPerYear: SECONDS_PER_YEAR,
  waterThawedCapacityTerm: 4190,
  waterFrozenCapacityTerm: 2025,
  // 334 kJ/kg × 1000 kg/m³
  volumetricLatentHeatJm3: 3.34e8,
  snowSpecificHeatJkgK: 2090,
};

// ─── Vegetation defaults ──────────────────────────────────────────────────────

/**
 * Canopy diffusivities used when a site gives vegetation heights without
 * diffusivities, or no vegetation at all (heights then default to zero and
 * the diffusivity has no effect).
 */
export const DEFAULT_VEGETATION_FROZEN_DIFFUSIVITY_M2S = 4.0e-7;
export const DEFAULT_VEGETATION_THAWED_DIFFUSIVITY_M2S = 2.0e-7;
