/** Returns the center of cell `index` on an axis of `n` equal cells over [0, 1]. Cell 0 = 1/(2n). */
export function cellCenter(index: number, n: number): number {
  return (index + 0.5) / n;
}

/** Returns the index of the cell containing `value` on an axis of `n` cells, clamped to [0, n-1]. */
export function indexAtValue(value: number, n: number): number {
  return Math.min(n - 1, Math.max(0, Math.floor(value * n)));
}

/** Plain left-to-right sum. */
export function sumValues(values: ArrayLike<number>): number {
  let total = 0;
  for (let i = 0; i < values.length; i++) {
    total += values[i];
  }
  return total;
}

/** Index of the largest entry; the first one wins on ties. */
export function argMax(values: ArrayLike<number>): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}
