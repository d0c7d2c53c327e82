/**
 * Error taxonomy for the calculation core.
 *
 *   InvalidInputError     a numeric field is zero, negative or non-finite
 *   InvalidGeometryError  a geometric relationship is violated (woc > diameter)
 *   InvalidConfigError    a lookup key is missing from its table
 *
 * Input and geometry errors are thrown. Config errors are collected on the
 * result instead, since they only disable one advisory step.
 */

export type MachiningErrorCode = 'INVALID_INPUT' | 'INVALID_GEOMETRY' | 'INVALID_CONFIG';

export abstract class MachiningError extends Error {
  abstract readonly code: MachiningErrorCode;
}

export class InvalidInputError extends MachiningError {
  readonly code = 'INVALID_INPUT' as const;

  constructor(
    readonly field: string,
    readonly value: number,
    requirement: string,
  ) {
    super(`Invalid ${field}: ${requirement}, got ${value}`);
    this.name = 'InvalidInputError';
  }
}

export class InvalidGeometryError extends MachiningError {
  readonly code = 'INVALID_GEOMETRY' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidGeometryError';
  }
}

export class InvalidConfigError extends MachiningError {
  readonly code = 'INVALID_CONFIG' as const;

  constructor(
    readonly table: string,
    readonly key: string,
    available: readonly string[],
  ) {
    super(`Unknown ${table} "${key}". Available: [${available.join(', ')}]`);
    this.name = 'InvalidConfigError';
  }
}

export function isMachiningError(err: unknown): err is MachiningError {
  return err instanceof MachiningError;
}
