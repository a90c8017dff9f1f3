import type { SoilPropertyInput, SoilPropertyResult } from '../schema/EngineResultV1';
import type { SoilClassConstants } from '../schema/SiteInputV1';
import { InvalidSiteInputError } from '../errors';
import { weightedGeometricMean } from '../utils/domain';
import { createStageLogger } from '../logger';

const log = createStageLogger('soil');

/**
 * SoilPropertyModuleV1 – Soil Column Thermal Properties
 *
 * Composite bulk density, specific heat, and the frozen/thawed conductivities
 * are weighted geometric means over the texture classes:
 *
 *   X = Π X_class ^ fraction_class
 *
 * where each class conductivity is the arithmetic mean of its wet and dry
 * reference values.  Volumetric heat capacities add a water (thawed) or ice
 * (frozen) term proportional to W_vol:
 *
 *   Ct = ρ·c + 4190·W_vol
 *   Cf = ρ·c + 2025·W_vol
 *
 * Latent heat of the soil water is L = L_v·W_vol.
 *
 * Precondition: texture fractions are valid probabilities (sum ≈ 1).  They are
 * range-checked by the normalizer but the sum is not enforced here.
 *
 * @throws InvalidSiteInputError when the texture names a class the table lacks.
 */
export function runSoilPropertyModuleV1(input: SoilPropertyInput): SoilPropertyResult {
  const { texture, volumetricWaterContent: wVol, soilClassTable, constants } = input;

  const unknownClasses = Object.keys(texture).filter(c => !Object.hasOwn(soilClassTable, c));
  if (unknownClasses.length > 0) {
    throw new InvalidSiteInputError(
      unknownClasses.map(c => ({
        path: `soil.texture.${c}`,
        message: `unknown soil class "${c}"; known classes: ${Object.keys(soilClassTable).join(', ')}`,
      })),
    );
  }
  const classOf = (name: string): SoilClassConstants => soilClassTable[name];

  const bulkDensityKgM3 = weightedGeometricMean(texture, c => classOf(c).bulkDensityKgM3);
  const specificHeatJkgK = weightedGeometricMean(texture, c => classOf(c).specificHeatJkgK);

  const thawedConductivity = weightedGeometricMean(texture, c => {
    const k = classOf(c);
    return (k.thawedConductivityWet + k.thawedConductivityDry) / 2;
  });
  const frozenConductivity = weightedGeometricMean(texture, c => {
    const k = classOf(c);
    return (k.frozenConductivityWet + k.frozenConductivityDry) / 2;
  });

  const dryCapacity = bulkDensityKgM3 * specificHeatJkgK;
  const thawedHeatCapacity = dryCapacity + constants.waterThawedCapacityTerm * wVol;
  const frozenHeatCapacity = dryCapacity + constants.waterFrozenCapacityTerm * wVol;
  const latentHeat = constants.volumetricLatentHeatJm3 * wVol;

  log.trace(
    'ρ=%d c=%d Ct=%d Cf=%d Kt=%d Kf=%d L=%d',
    bulkDensityKgM3, specificHeatJkgK, thawedHeatCapacity, frozenHeatCapacity,
    thawedConductivity, frozenConductivity, latentHeat,
  );

  const notes: string[] = [
    `Composite bulk density ${bulkDensityKgM3.toFixed(0)} kg/m³, specific heat ${specificHeatJkgK.toFixed(0)} J/kg/K.`,
    `Conductivity thawed ${thawedConductivity.toFixed(3)} W/m/K, frozen ${frozenConductivity.toFixed(3)} W/m/K.`,
  ];
  if (frozenConductivity < thawedConductivity) {
    notes.push('Frozen conductivity is below thawed conductivity; check the class table.');
  }

  return {
    bulkDensityKgM3,
    specificHeatJkgK,
    thawedHeatCapacity,
    frozenHeatCapacity,
    thawedConductivity,
    frozenConductivity,
    latentHeat,
    notes,
  };
}
