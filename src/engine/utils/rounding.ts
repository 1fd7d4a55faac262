/**
 * Round to the nearest integer, sending exact halves to the even neighbour
 * (2.5 → 2, 3.5 → 4, 0.5 → 0).
 *
 * Schedule years use this rule; `Math.round` would push every half upward.
 */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
