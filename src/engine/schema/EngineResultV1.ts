import type { PermafrostOutputV1 } from '../../contracts/PermafrostOutputV1';
import type { NormalizedSiteInput, PhysicalConstants, SoilClassTable } from './SiteInputV1';

// ─── Soil Property Estimator ──────────────────────────────────────────────────

export interface SoilPropertyInput {
  texture: Readonly<Record<string, number>>;
  volumetricWaterContent: number;
  soilClassTable: Readonly<SoilClassTable>;
  constants: Pick<
    PhysicalConstants,
    'waterThawedCapacityTerm' | 'waterFrozenCapacityTerm' | 'volumetricLatentHeatJm3'
  >;
}

export interface SoilPropertyResult {
  /** Composite bulk density (kg/m³). */
  bulkDensityKgM3: number;
  /** Composite specific heat (J/kg/K). */
  specificHeatJkgK: number;
  /** [Ct] (J/m³/K). */
  thawedHeatCapacity: number;
  /** [Cf] (J/m³/K). */
  frozenHeatCapacity: number;
  /** [Kt] (W/m/K). */
  thawedConductivity: number;
  /** [Kf] (W/m/K). */
  frozenConductivity: number;
  /** [L] (J/m³). */
  latentHeat: number;
  notes: string[];
}

// ─── Season partition ─────────────────────────────────────────────────────────

export interface SeasonInput {
  meanAirTempC: number;
  airTempAmplitudeC: number;
  secondsPerYear: number;
}

export interface SeasonResult {
  /** [tao] (s). */
  annualPeriodS: number;
  /** [tao1] (s). */
  coldSeasonS: number;
  /** [tao2] (s). */
  warmSeasonS: number;
}

// ─── Snow Insulation Estimator ────────────────────────────────────────────────

export interface SnowInsulationInput {
  meanAirTempC: number;
  airTempAmplitudeC: number;
  frozenHeatCapacity: number;
  frozenConductivity: number;
  latentHeat: number;
  snowThicknessM: number;
  snowDensityKgM3: number;
  snowSpecificHeatJkgK: number;
  coldSeasonS: number;
  annualPeriodS: number;
}

export interface SnowInsulationResult {
  /** [Ksn] (W/m/K). */
  snowConductivity: number;
  /** [Csn] (J/m³/K). */
  snowHeatCapacity: number;
  /** Ksn / Csn (m²/s). */
  snowDiffusivity: number;
  alpha: number;
  beta: number;
  /** [Cef] (J/m³/K). */
  effectiveFrozenHeatCapacity: number;
  /** [mu]. */
  reflectionCoefficient: number;
  /** [s]. */
  dampingFactor: number;
  /** [ΔA] (°C). */
  amplitudeReductionC: number;
  /** [ΔAsn] (°C). */
  seasonalAmplitudeReductionC: number;
  /** [ΔTsn] (°C). */
  meanTempShiftC: number;
  notes: string[];
}

// ─── Vegetation Insulation Estimator ──────────────────────────────────────────

export interface VegetationInsulationInput {
  meanAirTempC: number;
  airTempAmplitudeC: number;
  snowAmplitudeReductionC: number;
  snowMeanTempShiftC: number;
  winterHeightM: number;
  summerHeightM: number;
  frozenDiffusivityM2s: number;
  thawedDiffusivityM2s: number;
  coldSeasonS: number;
  warmSeasonS: number;
  annualPeriodS: number;
}

export interface VegetationInsulationResult {
  /** [Tvg] (°C). */
  snowAdjustedTempC: number;
  /** [Avg] (°C). */
  snowAdjustedAmplitudeC: number;
  /** [ΔA1] (°C). */
  winterAmplitudeReductionC: number;
  /** [ΔA2] (°C). */
  summerAmplitudeReductionC: number;
  /** [ΔAv] (°C). */
  amplitudeReductionC: number;
  /** [ΔTv] (°C). */
  meanTempShiftC: number;
  /** [Tgs] (°C). */
  groundSurfaceTempC: number;
  /** [Ags] (°C). */
  groundSurfaceAmplitudeC: number;
  notes: string[];
}

// ─── TTOP solver ──────────────────────────────────────────────────────────────

/**
 * Governing thermal regime.  The variant carries the conductivity and
 * volumetric heat capacity used for the rest of the solve.
 */
export type ThermalRegime =
  | { kind: 'frozen'; conductivity: number; heatCapacity: number }
  | { kind: 'thawed'; conductivity: number; heatCapacity: number };

export interface PermafrostRegimeInput {
  groundSurfaceTempC: number;
  groundSurfaceAmplitudeC: number;
  thawedConductivity: number;
  frozenConductivity: number;
  thawedHeatCapacity: number;
  frozenHeatCapacity: number;
}

export interface PermafrostRegimeResult {
  regime: ThermalRegime;
  /** Numerator of the TTOP equation (°C·W/m/K). */
  ttopNumerator: number;
  /** [Tps] (°C). */
  ttopC: number;
  notes: string[];
}

// ─── ALT solver ───────────────────────────────────────────────────────────────

export interface ActiveLayerInput {
  regime: ThermalRegime;
  ttopC: number;
  groundSurfaceAmplitudeC: number;
  latentHeat: number;
  annualPeriodS: number;
}

export interface ActiveLayerResult {
  /** [Aps] (°C). */
  permafrostTopAmplitudeC: number;
  /** [Zc] (m). */
  characteristicDepthM: number;
  /** [Zal] (m). */
  activeLayerThicknessM: number;
  notes: string[];
}

// ─── Engine ───────────────────────────────────────────────────────────────────

export interface PermafrostEngineResultCore {
  normalized: NormalizedSiteInput;
  soil: SoilPropertyResult;
  season: SeasonResult;
  snow: SnowInsulationResult;
  vegetation: VegetationInsulationResult;
  ttop: PermafrostRegimeResult;
  activeLayer: ActiveLayerResult;
}

export interface PermafrostEngineResult extends PermafrostEngineResultCore {
  output: PermafrostOutputV1;
}
