/** Unit conversion constants. The engine is metric; callers convert at the boundary. */

export type UnitSystem = 'metric' | 'imperial';

export const FT_TO_M = 0.3048;
export const M_TO_FT = 1 / FT_TO_M;
export const IN_TO_MM = 25.4;
export const MM_TO_IN = 1 / IN_TO_MM;

export function sfmToSmm(sfm: number): number {
  return sfm * FT_TO_M;
}

export function smmToSfm(smm: number): number {
  return smm * M_TO_FT;
}

export function inToMm(inches: number): number {
  return inches * IN_TO_MM;
}

export function mmToIn(mm: number): number {
  return mm * MM_TO_IN;
}

// ─── Boundary conversion ────────────────────────────────────────

/**
 * Lengths and speeds as a caller holds them. In imperial units lengths
 * are inches and surface speed is SFM; in metric, millimeters and SMM.
 */
export interface RawCuttingValues {
  diameter: number;
  doc: number;
  woc: number;
  surface_speed: number;
  feed_per_tooth: number;
  tool_stickout?: number;
}

export interface MetricCuttingValues {
  diameter: number;
  doc: number;
  woc: number;
  smm: number;
  mmpt: number;
  tool_stickout: number;
}

export function toMetricInputs(raw: RawCuttingValues, units: UnitSystem): MetricCuttingValues {
  const stickout = raw.tool_stickout ?? 0;
  if (units === 'metric') {
    return {
      diameter: raw.diameter,
      doc: raw.doc,
      woc: raw.woc,
      smm: raw.surface_speed,
      mmpt: raw.feed_per_tooth,
      tool_stickout: stickout,
    };
  }
  return {
    diameter: inToMm(raw.diameter),
    doc: inToMm(raw.doc),
    woc: inToMm(raw.woc),
    smm: sfmToSmm(raw.surface_speed),
    mmpt: inToMm(raw.feed_per_tooth),
    tool_stickout: inToMm(stickout),
  };
}
