/**
 * Round `values` to `decimals` places so that the rounded values add up to
 * `total` (itself rounded to the same precision). Largest remainders take the
 * leftover units; ties go to the earlier index.
 */
export function apportion(values: readonly number[], total: number, decimals: number): number[] {
  const scale = 10 ** decimals;
  const targetUnits = Math.round(total * scale);
  const scaled = values.map((v) => v * scale);
  const floors = scaled.map((v) => Math.floor(v + 1e-9));

  let remaining = targetUnits - floors.reduce((sum, v) => sum + v, 0);
  remaining = Math.max(0, Math.min(remaining, values.length));

  const order = scaled
    .map((v, index) => ({ index, remainder: v - floors[index] }))
    .sort((a, b) => b.remainder - a.remainder || a.index - b.index);

  for (let i = 0; i < remaining; i++) {
    floors[order[i].index] += 1;
  }

  return floors.map((units) => units / scale);
}
