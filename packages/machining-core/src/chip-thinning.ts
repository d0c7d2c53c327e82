/**
 * Radial chip thinning.
 *
 * With a flat end mill engaged over a fraction r = woc/D of its diameter,
 * the maximum chip thickness is
 *
 *   h_max = fz · 2·√(r·(1−r))          (r < 0.5)
 *   h_max = fz                          (r ≥ 0.5)
 *
 * so to keep the intended chip load the commanded feed per tooth is
 * divided by the thinning factor. As r → 0 the factor → 0 and the
 * compensation grows without bound, hence the cap.
 */

/** Radial engagement at and above which chips reach full thickness. */
export const FULL_CHIP_ENGAGEMENT = 0.5;

/** Fraction of nominal chip thickness actually cut at engagement r. */
export function chipThinningFactor(engagement: number): number {
  if (engagement >= FULL_CHIP_ENGAGEMENT) return 1;
  if (engagement <= 0) return 0;
  return 2 * Math.sqrt(engagement * (1 - engagement));
}

export interface ChipThinningCompensation {
  /** Multiplier applied to the nominal feed per tooth (≥ 1). */
  multiplier: number;
  /** True when the raw multiplier exceeded the cap. */
  capped: boolean;
}

/** Feed-per-tooth multiplier restoring the nominal chip load, bounded by maxMultiplier. */
export function chipThinningCompensation(
  engagement: number,
  maxMultiplier: number,
): ChipThinningCompensation {
  const factor = chipThinningFactor(engagement);
  if (factor >= 1) return { multiplier: 1, capped: false };
  if (factor <= 0 || 1 / factor > maxMultiplier) {
    return { multiplier: maxMultiplier, capped: true };
  }
  return { multiplier: 1 / factor, capped: false };
}
