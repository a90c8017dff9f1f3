export { runEngine } from './engine/Engine';
export { normalizeInput } from './engine/normalizer/Normalizer';
export { runSoilPropertyModuleV1 } from './engine/modules/SoilPropertyModule';
export { runSeasonModuleV1 } from './engine/modules/SeasonModule';
export {
  runSnowInsulationModuleV1,
  snowConductivityFromDensity,
} from './engine/modules/SnowInsulationModule';
export { runVegetationInsulationModuleV1 } from './engine/modules/VegetationInsulationModule';
export {
  runPermafrostRegimeModuleV1,
  computeTtopNumerator,
  selectThermalRegime,
} from './engine/modules/PermafrostRegimeModule';
export { runActiveLayerModuleV1 } from './engine/modules/ActiveLayerModule';
export { buildPermafrostOutputV1 } from './engine/OutputBuilder';
export {
  DEFAULT_SOIL_CLASS_TABLE,
  DEFAULT_PHYSICAL_CONSTANTS,
  SECONDS_PER_YEAR,
} from './engine/soil.catalog';
export {
  PermafrostEngineError,
  InvalidSiteInputError,
  PermafrostDomainError,
} from './engine/errors';
export type { DomainErrorCode, SiteInputIssue } from './engine/errors';
export { SiteInputV1Schema } from './engine/schema/SiteInputV1';
export type {
  SiteInputV1,
  NormalizedSiteInput,
  SoilClassConstants,
  SoilClassTable,
  PhysicalConstants,
} from './engine/schema/SiteInputV1';
export type {
  ThermalRegime,
  PermafrostEngineResult,
  PermafrostEngineResultCore,
} from './engine/schema/EngineResultV1';
export type { PermafrostOutputV1 } from './contracts/PermafrostOutputV1';
export {
  listSitePresets,
  getSitePreset,
  applySiteOverrides,
} from './sites/siteRegistry';
export type { SitePreset, SitePresetId, SiteOverrides } from './sites/siteRegistry';
