/**
 * In-run deduplication
 * Rows sharing a key collapse to the last occurrence.
 */

/**
 * Keeps the last row for every key. Surviving rows are returned in the
 * order of their first occurrence, rows whose key is null or undefined
 * are dropped.
 */
export function dedupeKeepLast<T, K>(
  rows: readonly T[],
  keyOf: (row: T) => K | null | undefined
): T[] {
  const byKey = new Map<K, T>();
  for (const row of rows) {
    const key = keyOf(row);
    if (key === null || key === undefined) continue;
    byKey.set(key, row);
  }
  return [...byKey.values()];
}
