import { describe, it, expect } from 'vitest';
import { classifyRpm, describeRpmStatus } from '../src/rpm-status.js';

describe('classifyRpm', () => {
  // min 1000, preferred 10000, max 20000
  const classify = (rpm: number) => classifyRpm(rpm, 1000, 10000, 20000);

  it('follows the documented precedence', () => {
    expect(classify(500)).toEqual({ status: 'danger', message: 'below minimum' });
    expect(classify(25000)).toEqual({ status: 'danger', message: 'above maximum' });
    expect(classify(9500)).toEqual({ status: 'good', message: 'near preferred' });
    expect(classify(19500)).toEqual({ status: 'warning', message: 'approaching maximum' });
    expect(classify(1050)).toEqual({ status: 'warning', message: 'near minimum' });
    expect(classify(5000)).toEqual({ status: 'info', message: 'within safe range' });
  });

  it('treats the limits themselves as inside the range', () => {
    expect(classify(1000)).toEqual({ status: 'warning', message: 'near minimum' });
    expect(classify(20000)).toEqual({ status: 'warning', message: 'approaching maximum' });
  });

  it('includes the 10% preferred band edges', () => {
    expect(classify(9000).status).toBe('good');
    expect(classify(11000).status).toBe('good');
    expect(classify(11001).status).toBe('info');
  });

  it('prefers "near preferred" where it overlaps the approach bands', () => {
    // 18500 is above 90% of max but within 10% of 19000
    expect(classifyRpm(18500, 1000, 19000, 20000)).toEqual({ status: 'good', message: 'near preferred' });
    // 1050 is below 110% of min but within 10% of 1100
    expect(classifyRpm(1050, 1000, 1100, 20000)).toEqual({ status: 'good', message: 'near preferred' });
  });

  it('checks approaching maximum before near minimum', () => {
    // min 1000 → near-min band up to 1100; max 1200 → approach band above 1080
    expect(classifyRpm(1090, 1000, 5000, 1200)).toEqual({ status: 'warning', message: 'approaching maximum' });
  });
});

describe('describeRpmStatus', () => {
  it('adds the relevant limit', () => {
    const describe3 = (rpm: number) =>
      describeRpmStatus(classifyRpm(rpm, 1000, 10000, 20000), 1000, 10000, 20000);

    expect(describe3(500)).toBe('below minimum (1,000 RPM)');
    expect(describe3(25000)).toBe('above maximum (20,000 RPM)');
    expect(describe3(9500)).toBe('near preferred (10,000 RPM)');
    expect(describe3(19500)).toBe('approaching maximum');
    expect(describe3(5000)).toBe('within safe range');
  });
});
