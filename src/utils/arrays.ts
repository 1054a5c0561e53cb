import { GROWTH_FACTOR } from "./constants";

/**
 * Grow an array to hold at least `min_capacity` elements.
 * Doubles from the current length until sufficient, fills new slots
 * with `fill`, and copies existing data into the new buffer.
 */
export function grow_array<T>(arr: T[], min_capacity: number, fill: T): T[] {
  let cap = Math.max(arr.length, 1);
  while (cap < min_capacity) cap *= GROWTH_FACTOR;
  const next: T[] = new Array<T>(cap).fill(fill);
  for (let i = 0; i < arr.length; i++) next[i] = arr[i];
  return next;
}

/**
 * Same growth policy for the Int32Array sparse tables. New slots get `fill`.
 */
export function grow_int32(
  arr: Int32Array,
  min_capacity: number,
  fill: number,
): Int32Array {
  let cap = Math.max(arr.length, 1);
  while (cap < min_capacity) cap *= GROWTH_FACTOR;
  const next = new Int32Array(cap).fill(fill);
  next.set(arr);
  return next;
}
