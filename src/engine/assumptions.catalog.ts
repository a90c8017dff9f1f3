import type { AssumptionId } from '../contracts/assumptions.ids';
import type { AssumptionV1 } from '../contracts/PermafrostOutputV1';

export const ASSUMPTION_CATALOG: Record<AssumptionId, {
  title: string;
  detail: string;
  affects: AssumptionV1['affects'];
  improveBy?: string;
}> = {
  'vegetation.omitted': {
    title: 'No vegetation described',
    detail: 'Winter and summer canopy heights were taken as zero. Shrub or moss cover would damp the surface wave further.',
    affects: ['surface_forcing', 'ttop', 'active_layer'],
    improveBy: 'Add winter and summer vegetation heights for the site.',
  },
  'vegetation.diffusivity_defaulted': {
    title: 'Canopy diffusivity not provided',
    detail: 'Vegetation heights were given without frozen/thawed thermal diffusivities; generic tundra-canopy values were used.',
    affects: ['surface_forcing'],
    improveBy: 'Provide measured or literature diffusivities for the canopy type.',
  },
  'soil.default_class_table': {
    title: 'Default soil class constants',
    detail: 'Bulk density, specific heat and wet/dry conductivities come from the built-in texture class table rather than site measurements.',
    affects: ['ttop', 'active_layer'],
    improveBy: 'Override the class table with laboratory values for the site soils.',
  },
  'soil.texture_unnormalised': {
    title: 'Texture fractions do not sum to 1',
    detail: 'The weighted geometric mixing assumes fractions that sum to one. Composite properties are biased when they do not.',
    affects: ['ttop', 'active_layer'],
    improveBy: 'Re-check the sand/silt/clay fractions.',
  },
  'snow.conductivity_from_density': {
    title: 'Snow conductivity estimated from density',
    detail: 'Snow thermal conductivity follows the Goodrich (1982) quadratic in density, averaged over the snow season.',
    affects: ['surface_forcing'],
  },
  'general.default_constants': {
    title: 'Standard physical constants',
    detail: 'Latent heat, water/ice capacity terms and snow specific heat use standard reference values.',
    affects: ['context'],
  },
  'general.annual_harmonic': {
    title: 'Sinusoidal annual cycle',
    detail: 'Air and surface temperatures are modelled as a single annual harmonic; mean shifts use the 2/π first-harmonic factor.',
    affects: ['context'],
  },
};
