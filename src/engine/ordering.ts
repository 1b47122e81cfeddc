export type SortKey = "arrival" | "burst";

type Keyed = { arrivalTime: number; burstTime: number };

const SORT_KEYS: Record<SortKey, (item: Keyed) => number> = {
  arrival: (item) => item.arrivalTime,
  burst: (item) => item.burstTime,
};

/**
 * Returns a new array ordered ascending by `key`. Items with equal keys keep
 * their input order; `items` itself is left untouched.
 */
export function sortBy<T>(items: readonly T[], key: (item: T) => number): T[] {
  return items
    .map((item, index) => ({ item, index, key: key(item) }))
    .sort((a, b) => a.key - b.key || a.index - b.index)
    .map(({ item }) => item);
}

export function orderProcesses<T extends Keyed>(
  items: readonly T[],
  key: SortKey
): T[] {
  return sortBy(items, SORT_KEYS[key]);
}
