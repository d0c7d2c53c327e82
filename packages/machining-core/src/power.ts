/** Cutting power and spindle torque estimates. */

/** mm³/min · N/mm² = N·mm/min; divide by this for kW. */
export const KW_DIVISOR = 60e6;
export const KW_TO_HP = 1.341;

/** Power at the cutting edge, kW. */
export function cuttingPowerKw(mrr: number, kc: number): number {
  return (mrr * kc) / KW_DIVISOR;
}

/** Spindle torque, N·m, for power in kW at the given speed. */
export function spindleTorqueNm(powerKw: number, rpm: number): number {
  const omega = (2 * Math.PI * rpm) / 60;
  return omega > 0 ? (powerKw * 1000) / omega : 0;
}
