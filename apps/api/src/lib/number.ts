// Rounds the exact binary value: roundTo(1.005, 2) === 1, not 1.01.
export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}
