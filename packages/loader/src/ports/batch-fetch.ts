/**
 * Fetches records for a batch of keys. Keys arrive deduplicated and in the
 * order they were first requested; records may come back in any order and
 * multiplicity.
 */
export type BatchFetchFn<K, R> = (keys: readonly K[]) => Promise<readonly R[]>

/**
 * Aligns fetched records onto the requested keys. Must return exactly one
 * value per key, in key order.
 */
export type Reconciler<K, R, V> = (keys: readonly K[], records: readonly R[]) => readonly V[]
