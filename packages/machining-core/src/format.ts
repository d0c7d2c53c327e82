/** Number formatting for warning and status messages. */

/** Round for messages: fmt(3.14159) → "3.14", fmt(2) → "2". */
export function fmt(value: number, decimals = 2): string {
  const scale = 10 ** decimals;
  return String(Math.round(value * scale) / scale);
}

/** Ratio as a percentage: pct(0.125) → "12.5". */
export function pct(ratio: number): string {
  return fmt(ratio * 100, 1);
}

/** Whole number with thousands separators: thousands(12000) → "12,000". */
export function thousands(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}
