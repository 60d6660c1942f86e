/**
 * Cache the results of a pure function, keyed on its full argument tuple.
 *
 * Only for functions whose arguments are JSON-serialisable primitives.
 * Results are identical with or without the cache; a thrown error is not cached.
 */
export function memoize<Args extends ReadonlyArray<string | number | boolean>, R>(
  fn: (...args: Args) => R,
  maxEntries = 500,
): ((...args: Args) => R) & { clear: () => void; size: () => number } {
  const cache = new Map<string, { value: R }>();

  const memoized = (...args: Args): R => {
    const key = JSON.stringify(args);
    const hit = cache.get(key);
    if (hit) return hit.value;

    const value = fn(...args);
    // Evict the oldest entry (Map preserves insertion order)
    if (cache.size >= maxEntries) {
      const oldest = cache.keys().next();
      if (!oldest.done) cache.delete(oldest.value);
    }
    cache.set(key, { value });
    return value;
  };

  return Object.assign(memoized, {
    clear: () => cache.clear(),
    size: () => cache.size,
  });
}
