/**
 * Rounds to a fixed number of decimals. Every coordinate and feed value
 * goes through here before it is compared or written.
 */
export function roundTo(value: number, precision: number): number {
  const rounded = Number(value.toFixed(precision));
  // -0 would otherwise render as "-0"
  return rounded === 0 ? 0 : rounded;
}

/** `10.500` -> `10.5`, `-0.0004` at 3 decimals -> `0` */
export function formatNumber(value: number, precision: number): string {
  const fixed = roundTo(value, precision).toFixed(precision);
  if (precision === 0) return fixed;
  return fixed.replace(/\.?0+$/, '');
}
