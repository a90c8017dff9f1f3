export const ASSUMPTION_IDS = {
  // Vegetation
  VEGETATION_OMITTED: 'vegetation.omitted',
  VEGETATION_DIFFUSIVITY_DEFAULTED: 'vegetation.diffusivity_defaulted',

  // Soil
  SOIL_TABLE_DEFAULT: 'soil.default_class_table',
  SOIL_TEXTURE_UNNORMALISED: 'soil.texture_unnormalised',

  // Snow
  SNOW_CONDUCTIVITY_FROM_DENSITY: 'snow.conductivity_from_density',

  // General
  CONSTANTS_DEFAULT: 'general.default_constants',
  ANNUAL_HARMONIC: 'general.annual_harmonic',
} as const;

export type AssumptionId = typeof ASSUMPTION_IDS[keyof typeof ASSUMPTION_IDS];
