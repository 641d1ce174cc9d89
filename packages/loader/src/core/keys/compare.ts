import type { Orderable } from "../../ports/key"
import { LoaderError } from "../errors/loader-error"

type Classified =
  | { kind: "number"; value: number | bigint }
  | { kind: "string"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "date"; value: Date }
  | { kind: "tuple"; value: readonly Orderable[] }

function classify(value: Orderable): Classified {
  if (typeof value === "number" || typeof value === "bigint") return { kind: "number", value }
  if (typeof value === "string") return { kind: "string", value }
  if (typeof value === "boolean") return { kind: "boolean", value }
  if (value instanceof Date) return { kind: "date", value }

  return { kind: "tuple", value }
}

function order(a: number | bigint | string, b: number | bigint | string): number {
  if (a < b) return -1
  if (a > b) return 1

  return 0
}

/**
 * Total order over sort keys of one kind. Numbers and bigints compare with
 * each other; tuples compare element by element, a shorter prefix first.
 *
 * @throws LoaderError `incomparable_sort_keys` when kinds differ
 */
export function compareOrderable(a: Orderable, b: Orderable): number {
  const left = classify(a)
  const right = classify(b)

  switch (left.kind) {
    case "number":
      if (right.kind === "number") return order(left.value, right.value)
      break
    case "string":
      if (right.kind === "string") return order(left.value, right.value)
      break
    case "boolean":
      if (right.kind === "boolean") return Number(left.value) - Number(right.value)
      break
    case "date":
      if (right.kind === "date") return order(left.value.getTime(), right.value.getTime())
      break
    case "tuple":
      if (right.kind === "tuple") return compareTuples(left.value, right.value)
      break
  }

  throw LoaderError.incomparableSortKeys(left.kind, right.kind)
}

function compareTuples(a: readonly Orderable[], b: readonly Orderable[]): number {
  const length = Math.min(a.length, b.length)

  for (let i = 0; i < length; i++) {
    const left = a[i]
    const right = b[i]
    if (left === undefined || right === undefined) break

    const result = compareOrderable(left, right)
    if (result !== 0) return result
  }

  return a.length - b.length
}
