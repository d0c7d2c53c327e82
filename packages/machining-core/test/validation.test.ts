import { describe, it, expect } from 'vitest';
import { validateMachiningParameters } from '../src/validation.js';
import { InvalidInputError } from '../src/errors.js';

describe('validateMachiningParameters', () => {

  it('returns nothing for a sane cut', () => {
    expect(validateMachiningParameters(9549, 1432, 5, 5, 10)).toEqual([]);
  });

  it('is pure: same arguments, equal results', () => {
    const a = validateMachiningParameters(75000, 12000, 35, 0.1, 10);
    const b = validateMachiningParameters(75000, 12000, 35, 0.1, 10);
    expect(b).toEqual(a);
    expect(b).not.toBe(a);
  });

  it('flags near-zero engagement as rubbing', () => {
    expect(validateMachiningParameters(9549, 1432, 5, 0.1, 10)).toEqual([
      'Width of cut 0.1 mm is 1% of diameter: the tool rubs instead of cutting and wears quickly',
    ]);
    expect(validateMachiningParameters(9549, 1432, 5, 0, 10)).toEqual([
      'Width of cut 0 mm is 0% of diameter: the tool rubs instead of cutting and wears quickly',
    ]);
  });

  it('flags a full slot', () => {
    expect(validateMachiningParameters(9549, 1432, 5, 10, 10)).toEqual([
      'Width of cut 10 mm is 100% of diameter (full slot): chip evacuation and heat limit the cut, reduce depth of cut',
    ]);
  });

  it('flags deep cuts for deflection', () => {
    expect(validateMachiningParameters(9549, 1432, 35, 5, 10)).toEqual([
      'Depth of cut 35 mm exceeds 3×D (30 mm): high tool deflection risk',
    ]);
  });

  it('flags implausible feed for the diameter', () => {
    expect(validateMachiningParameters(9549, 12000, 5, 5, 10)).toEqual([
      'Feed rate 12,000 mm/min is implausibly high for a 10 mm tool (limit 10,000 mm/min)',
    ]);
  });

  it('flags spindle speeds beyond typical spindles', () => {
    expect(validateMachiningParameters(75000, 1432, 5, 5, 10)).toEqual([
      'Spindle speed 75,000 RPM exceeds 60,000 RPM, beyond typical spindles',
    ]);
  });

  it('warns rather than throws for out-of-range finite values', () => {
    expect(validateMachiningParameters(-5, 0, -1, -2, 10)).toEqual([
      'Spindle speed -5 RPM is not positive',
      'Feed rate 0 mm/min is not positive',
      'Depth of cut -1 mm is negative',
      'Width of cut -2 mm is negative',
    ]);
  });

  it('skips diameter-relative checks for a non-positive diameter', () => {
    expect(validateMachiningParameters(1000, 500, 1, 0, 0)).toEqual([
      'Tool diameter 0 mm is not positive; diameter checks skipped',
    ]);
  });

  it('rejects non-finite input', () => {
    expect(() => validateMachiningParameters(9549, Number.NaN, 5, 5, 10)).toThrow(InvalidInputError);
    expect(() => validateMachiningParameters(9549, 1432, 5, 5, Number.POSITIVE_INFINITY)).toThrow(/diameter/);
  });

  it('accepts tighter limits through config', () => {
    expect(validateMachiningParameters(9549, 1432, 25, 5, 10, { deflection_doc_ratio: 2 })).toEqual([
      'Depth of cut 25 mm exceeds 2×D (20 mm): high tool deflection risk',
    ]);
  });
});
