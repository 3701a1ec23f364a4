/**
 * Round to two decimals, ties to even (0.125 → 0.12, 0.375 → 0.38).
 * A double lies exactly halfway between two cents only when it is an odd number of eighths.
 */
export function roundHalfEven(value: number): number {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(value * 100);
    return (lower % 2 === 0 ? lower : lower + 1) / 100;
  }
  return Number(value.toFixed(2));
}
