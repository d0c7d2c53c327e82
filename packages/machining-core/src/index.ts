// Public API

// Calculation engine
export { FeedsAndSpeeds, resolveEngineConfig } from './engine.js';
export type { EngineConfig, EngineOptions, CalculationResult, ResolvedEngineConfig } from './engine.js';

// Parameter validation
export { validateMachiningParameters } from './validation.js';
export type { ValidationConfig } from './validation.js';

// RPM status
export { classifyRpm, describeRpmStatus } from './rpm-status.js';
export type { RpmStatus, RpmMessage, RpmClassification } from './rpm-status.js';

// Full report
export { calculateSpeedsAndFeeds, checkMachineLimits } from './report.js';
export type { MachineLimits, CuttingRequest, ReportOptions, SpeedsAndFeedsReport } from './report.js';

// Chip thinning + power
export { chipThinningFactor, chipThinningCompensation, FULL_CHIP_ENGAGEMENT } from './chip-thinning.js';
export type { ChipThinningCompensation } from './chip-thinning.js';
export { cuttingPowerKw, spindleTorqueNm, KW_TO_HP } from './power.js';

// Lookup tables
export { createLookupTable, defaultMaterials, defaultRigidityLevels, defaultCoatings } from './tables.js';
export type { LookupTable, MaterialRecord, RigidityRecord, CoatingRecord } from './tables.js';
export { materialPreset } from './presets.js';
export type { MaterialPreset, PresetOptions } from './presets.js';

// Units
export {
  FT_TO_M, M_TO_FT, IN_TO_MM, MM_TO_IN,
  sfmToSmm, smmToSfm, inToMm, mmToIn, toMetricInputs,
} from './units.js';
export type { UnitSystem, RawCuttingValues, MetricCuttingValues } from './units.js';

// Errors
export {
  MachiningError, InvalidInputError, InvalidGeometryError, InvalidConfigError, isMachiningError,
} from './errors.js';
export type { MachiningErrorCode } from './errors.js';
