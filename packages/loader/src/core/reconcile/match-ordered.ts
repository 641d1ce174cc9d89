import { LoaderError } from "../errors/loader-error"

/** For fetches that already return one value per key, in key order. */
export function matchOrdered<K, V>(keys: readonly K[], values: readonly V[], loader = "loader"): V[] {
  if (values.length !== keys.length) {
    throw LoaderError.batchLengthMismatch(loader, keys.length, values.length)
  }

  return [...values]
}
