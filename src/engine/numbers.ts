// Halves go to the even neighbour: 0.125 -> 0.12, 2.5 -> 2, 3.5 -> 4.
export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (Math.abs(scaled - floor - 0.5) < 1e-9) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
};

export const mean = (values: readonly number[]): number => {
  if (values.length === 0) return 0;
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
};
