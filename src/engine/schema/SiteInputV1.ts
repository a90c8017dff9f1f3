/**
 * SiteInputV1 – Canonical site configuration
 *
 * The contract between callers and the permafrost physics core.  One record
 * describes one site for one annual-mean time step: climate forcing, the snow
 * pack, the vegetation canopy, and the soil column.
 *
 * Units are SI throughout (m, s, kg/m³, W/m/K, J/kg/K) except temperatures,
 * which are °C.
 */

import { z } from 'zod';

const finite = () => z.number().finite();

// ─── Soil class constants ─────────────────────────────────────────────────────

/**
 * Reference constants for one texture class.  Conductivities are given as a
 * wet and a dry reference; the engine uses their arithmetic mean.
 */
export const SoilClassConstantsSchema = z.object({
  bulkDensityKgM3: finite().positive(),
  specificHeatJkgK: finite().positive(),
  thawedConductivityWet: finite().positive(),
  thawedConductivityDry: finite().positive(),
  frozenConductivityWet: finite().positive(),
  frozenConductivityDry: finite().positive(),
});

export type SoilClassConstants = z.infer<typeof SoilClassConstantsSchema>;

export type SoilClassTable = Record<string, SoilClassConstants>;

// ─── Physical constants ───────────────────────────────────────────────────────

export const PhysicalConstantsSchema = z.object({
  /** Annual period [tao] (s). */
  secondsPerYear: finite().positive(),
  /** Water term added to the thawed volumetric heat capacity, per unit W_vol. */
  waterThawedCapacityTerm: finite().nonnegative(),
  /** Ice term added to the frozen volumetric heat capacity, per unit W_vol. */
  waterFrozenCapacityTerm: finite().nonnegative(),
  /** Latent heat of fusion per m³ of water (J/m³); L = this × W_vol. */
  volumetricLatentHeatJm3: finite().positive(),
  /** Specific heat of the snow pack (J/kg/K); Csn = this × rho_sn. */
  snowSpecificHeatJkgK: finite().positive(),
});

export type PhysicalConstants = z.infer<typeof PhysicalConstantsSchema>;

// ─── Site input ───────────────────────────────────────────────────────────────

export const ClimateInputSchema = z.object({
  /** Mean annual air temperature [Ta] (°C). */
  meanAirTempC: finite(),
  /** Annual air-temperature amplitude [Aa] (°C). */
  airTempAmplitudeC: finite().positive(),
});

export const SnowInputSchema = z.object({
  /** Average snow-season thickness [Hsn] (m). */
  thicknessM: finite().nonnegative(),
  /** Snow density [rho_sn] (kg/m³). */
  densityKgM3: finite().positive(),
});

export const VegetationInputSchema = z.object({
  /** Winter vegetation height [Hvg1] (m). */
  winterHeightM: finite().nonnegative().default(0),
  /** Summer vegetation height [Hvg2] (m). */
  summerHeightM: finite().nonnegative().default(0),
  /** Vegetation thermal diffusivity, frozen state [Dvf] (m²/s). */
  frozenDiffusivityM2s: finite().positive().optional(),
  /** Vegetation thermal diffusivity, thawed state [Dvt] (m²/s). */
  thawedDiffusivityM2s: finite().positive().optional(),
});

export const SoilInputSchema = z.object({
  /**
   * Texture fractions keyed by soil class.  The sum is expected to be ≈ 1 but
   * is not enforced.
   */
  texture: z
    .record(z.string().min(1), finite().min(0).max(1))
    .refine(t => Object.keys(t).length > 0, { message: 'at least one texture class is required' }),
  /** Volumetric water content [W_vol] (fraction). */
  volumetricWaterContent: finite().min(0).max(1),
});

export const SiteInputV1Schema = z.object({
  /** Free-form site label, carried through to logs. */
  siteName: z.string().optional(),
  climate: ClimateInputSchema,
  snow: SnowInputSchema,
  vegetation: VegetationInputSchema.optional(),
  soil: SoilInputSchema,
  /** Per-class overrides merged over DEFAULT_SOIL_CLASS_TABLE. */
  soilClassTable: z.record(z.string().min(1), SoilClassConstantsSchema).optional(),
  /** Overrides merged over DEFAULT_PHYSICAL_CONSTANTS. */
  constants: PhysicalConstantsSchema.partial().optional(),
});

/** Site configuration as written by callers (defaults not yet applied). */
export type SiteInputV1 = z.input<typeof SiteInputV1Schema>;

/** Site configuration after schema parsing. */
export type ParsedSiteInputV1 = z.output<typeof SiteInputV1Schema>;

/**
 * Fully resolved site record consumed by the physics modules: every optional
 * field filled, the class table merged, and the constants resolved.
 */
export interface NormalizedSiteInput {
  siteName?: string;
  meanAirTempC: number;
  airTempAmplitudeC: number;
  snowThicknessM: number;
  snowDensityKgM3: number;
  vegetationWinterHeightM: number;
  vegetationSummerHeightM: number;
  vegetationFrozenDiffusivityM2s: number;
  vegetationThawedDiffusivityM2s: number;
  texture: Readonly<Record<string, number>>;
  volumetricWaterContent: number;
  soilClassTable: Readonly<SoilClassTable>;
  constants: Readonly<PhysicalConstants>;
  /** Which optional inputs were filled from defaults. */
  defaulted: {
    vegetation: boolean;
    vegetationDiffusivity: boolean;
    soilClassTable: boolean;
    constants: boolean;
  };
}
