import { GROWTH_FACTOR } from "./constants";

/**
 * Grow a number[] to hold at least `min_capacity` elements.
 * Multiplies the current length by GROWTH_FACTOR until sufficient,
 * fills new slots with `fill`, and copies existing data across.
 */
export function grow_number_array(
  arr: number[],
  min_capacity: number,
  fill: number,
): number[] {
  let cap = arr.length > 0 ? arr.length : 1;
  while (cap < min_capacity) cap *= GROWTH_FACTOR;
  const next = new Array(cap).fill(fill);
  for (let i = 0; i < arr.length; i++) next[i] = arr[i];
  return next;
}
