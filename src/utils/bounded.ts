/** Default capacity of every history FIFO kept by the listening engine */
export const DEFAULT_HISTORY_CAPACITY = 16;

/**
 * Append to a FIFO in place, evicting the oldest entries past capacity.
 */
export function pushBounded<T>(list: T[], item: T, capacity: number = DEFAULT_HISTORY_CAPACITY): void {
  list.push(item);
  if (list.length > capacity) {
    list.splice(0, list.length - capacity);
  }
}

/**
 * The last `count` entries, oldest first.
 */
export function lastN<T>(list: readonly T[], count: number): T[] {
  if (count <= 0) return [];
  return list.slice(-count);
}
