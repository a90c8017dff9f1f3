import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { AssumptionId } from './assumptions.ids';

export interface AssumptionV1 {
  id: AssumptionId;
  title: string;
  detail: string;
  affects: Array<'ttop' | 'active_layer' | 'surface_forcing' | 'context'>;
  severity: 'info' | 'warn';
  improveBy?: string;
}

export interface ConfidenceV1 {
  level: 'high' | 'medium' | 'low';
  reasons: string[];
}

export interface PermafrostMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
  confidence: ConfidenceV1;
  assumptions: AssumptionV1[];
}

export interface PermafrostFlagItem {
  id: 'regime-thawed' | 'texture-sum-off' | 'snow-dominant-offset' | 'deep-active-layer' | 'no-insulation';
  severity: 'info' | 'warn';
  title: string;
  detail: string;
}

/**
 * Intermediate quantities exposed for diagnostics and regression checks.
 * Symbols in brackets follow Sazonova & Zhang (2003).
 */
export interface PermafrostDiagnosticsV1 {
  /** Ground-surface mean annual temperature after snow and vegetation [Tgs] (°C). */
  groundSurfaceTempC: number;
  /** Ground-surface annual amplitude after snow and vegetation [Ags] (°C). */
  groundSurfaceAmplitudeC: number;
  /** Thawed volumetric heat capacity [Ct] (J/m³/K). */
  thawedHeatCapacity: number;
  /** Frozen volumetric heat capacity [Cf] (J/m³/K). */
  frozenHeatCapacity: number;
  /** Thawed thermal conductivity [Kt] (W/m/K). */
  thawedConductivity: number;
  /** Frozen thermal conductivity [Kf] (W/m/K). */
  frozenConductivity: number;
  /** Effective frozen heat capacity under phase change [Cef] (J/m³/K). */
  effectiveFrozenHeatCapacity: number;
  /** Snow/ground reflection coefficient [mu]. */
  reflectionCoefficient: number;
  /** Snow damping factor [s]. */
  dampingFactor: number;
  /** Cold-season duration [tao1] (s). */
  coldSeasonS: number;
  /** Warm-season duration [tao2] (s). */
  warmSeasonS: number;
  /** Volumetric latent heat [L] (J/m³). */
  latentHeat: number;
}

/** Public result contract of the permafrost engine. */
export interface PermafrostOutputV1 {
  regime: 'frozen' | 'thawed';
  /** Mean annual temperature at the top of permafrost [Tps] (°C). */
  ttopC: number;
  /** Annual amplitude at the top of permafrost [Aps] (°C). */
  permafrostTopAmplitudeC: number;
  /** Active layer thickness [Zal] (m). */
  activeLayerThicknessM: number;
  /** Characteristic penetration depth [Zc] (m). */
  characteristicDepthM: number;
  diagnostics: PermafrostDiagnosticsV1;
  flags: PermafrostFlagItem[];
  meta: PermafrostMetaV1;
}
