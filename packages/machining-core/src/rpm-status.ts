/**
 * RPM Status Classifier.
 *
 * First match wins, in this order:
 *   below min → danger, above max → danger, within 10% of preferred → good,
 *   above 90% of max → warning, below 110% of min → warning, else info.
 *
 * The good/warning bands overlap; the order above decides.
 */

import { thousands } from './format.js';

export type RpmStatus = 'danger' | 'warning' | 'good' | 'info';

export type RpmMessage =
  | 'below minimum'
  | 'above maximum'
  | 'near preferred'
  | 'approaching maximum'
  | 'near minimum'
  | 'within safe range';

export interface RpmClassification {
  status: RpmStatus;
  message: RpmMessage;
}

export const PREFERRED_TOLERANCE = 0.1;
export const MAX_APPROACH = 0.9;
export const MIN_APPROACH = 1.1;

export function classifyRpm(
  rpm: number,
  minRpm: number,
  preferredRpm: number,
  maxRpm: number,
): RpmClassification {
  if (rpm < minRpm) return { status: 'danger', message: 'below minimum' };
  if (rpm > maxRpm) return { status: 'danger', message: 'above maximum' };
  if (Math.abs(rpm - preferredRpm) <= preferredRpm * PREFERRED_TOLERANCE) {
    return { status: 'good', message: 'near preferred' };
  }
  if (rpm > maxRpm * MAX_APPROACH) return { status: 'warning', message: 'approaching maximum' };
  if (rpm < minRpm * MIN_APPROACH) return { status: 'warning', message: 'near minimum' };
  return { status: 'info', message: 'within safe range' };
}

/** Display line, e.g. "below minimum (1,000 RPM)". */
export function describeRpmStatus(
  classification: RpmClassification,
  minRpm: number,
  preferredRpm: number,
  maxRpm: number,
): string {
  switch (classification.message) {
    case 'below minimum':
      return `below minimum (${thousands(minRpm)} RPM)`;
    case 'above maximum':
      return `above maximum (${thousands(maxRpm)} RPM)`;
    case 'near preferred':
      return `near preferred (${thousands(preferredRpm)} RPM)`;
    default:
      return classification.message;
  }
}
