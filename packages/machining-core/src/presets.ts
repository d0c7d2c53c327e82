/**
 * Material presets fill kc, surface speed and chip load from the tables
 * when a material is chosen, leaving explicit caller values alone.
 */

import {
  defaultCoatings, defaultMaterials,
  type CoatingRecord, type LookupTable, type MaterialRecord,
} from './tables.js';
import { MM_TO_IN, type UnitSystem } from './units.js';

export interface MaterialPreset {
  material: string;
  name: string;
  kc: number;
  /** SMM for metric, SFM for imperial; coating factor applied. */
  surface_speed: number;
  /** mm for metric, inches for imperial. */
  feed_per_tooth: number;
}

export interface PresetOptions {
  materials?: LookupTable<MaterialRecord>;
  coatings?: LookupTable<CoatingRecord>;
  coating?: string;
}

/** Preset for a material key, or undefined when the key is unknown. */
export function materialPreset(
  materialKey: string,
  units: UnitSystem,
  options: PresetOptions = {},
): MaterialPreset | undefined {
  const material = (options.materials ?? defaultMaterials()).get(materialKey);
  if (!material) return undefined;

  const coating = options.coating !== undefined
    ? (options.coatings ?? defaultCoatings()).get(options.coating)
    : undefined;
  const speedFactor = coating?.speed_factor ?? 1;

  return {
    material: materialKey,
    name: material.name,
    kc: material.kc,
    surface_speed: (units === 'metric' ? material.smm : material.sfm) * speedFactor,
    feed_per_tooth: units === 'metric' ? material.chip_load_mm : material.chip_load_mm * MM_TO_IN,
  };
}
