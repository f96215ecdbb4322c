// Insertion-ordered key -> count maps. Map keeps first-seen order for ties,
// which a plain object would not for integer-like keys.
export type CountMap = Map<string, number>;

export function increment(counts: CountMap, key: string, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

export function incrementAll(counts: CountMap, keys: Iterable<string>): void {
  for (const key of keys) {
    increment(counts, key);
  }
}

export function countsFor(
  grouped: Map<string, CountMap>,
  group: string,
): CountMap {
  let counts = grouped.get(group);
  if (!counts) {
    counts = new Map();
    grouped.set(group, counts);
  }
  return counts;
}

/**
 * Sort by count descending and keep the first `limit` entries.
 * Equal counts keep their insertion order.
 */
export function rankCounts(
  counts: CountMap,
  limit: number,
): Array<[string, number]> {
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, limit));
}

/** `current - previous` per key, keeping only keys that went up. */
export function positiveDelta(
  current: CountMap,
  previous: CountMap | undefined,
): CountMap {
  const delta: CountMap = new Map();
  for (const [key, count] of current) {
    const diff = count - (previous?.get(key) ?? 0);
    if (diff > 0) {
      delta.set(key, diff);
    }
  }
  return delta;
}

export function toRecord(counts: CountMap): Record<string, number> {
  return Object.fromEntries(counts);
}
