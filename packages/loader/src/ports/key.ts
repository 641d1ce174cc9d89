export type Scalar = number | string | boolean | bigint | Date

/**
 * A lookup key. Tuples are fixed, readonly arrays of keys and compare
 * element-wise.
 */
export type Key = Scalar | readonly Key[]

/** Values a group view sorts its members by. */
export type Orderable = Key

/** Maps a key to its identity inside a cache. Equal keys must map to equal strings. */
export type CacheKeyFn<K> = (key: K) => string

export type KeyExtractor<R, K extends Key> = (record: R) => K

export type SortExtractor<R> = (record: R) => Orderable
