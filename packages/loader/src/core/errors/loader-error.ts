import { BaseError } from "@prism/errors"

export type LoaderErrorCode =
  | "invalid_option"
  | "registry_sealed"
  | "duplicate_view"
  | "incomparable_sort_keys"
  | "batch_length_mismatch"

/**
 * Raised for misuse of the loader API and for broken collaborator contracts.
 * Always a programming error, so never operational.
 */
export class LoaderError extends BaseError<LoaderErrorCode> {
  static invalidOption(loader: string, option: string, value: unknown): LoaderError {
    return new LoaderError(`Invalid option "${option}" for loader "${loader}"`, {
      code: "invalid_option",
      context: { loader, option, value },
      isOperational: false,
    })
  }

  static registrySealed(registry: string, view: string): LoaderError {
    return new LoaderError(
      `Cannot register view "${view}": registry "${registry}" has already executed`,
      { code: "registry_sealed", context: { registry, view }, isOperational: false },
    )
  }

  static duplicateView(registry: string, view: string): LoaderError {
    return new LoaderError(`Registry "${registry}" already has a view named "${view}"`, {
      code: "duplicate_view",
      context: { registry, view },
      isOperational: false,
    })
  }

  static incomparableSortKeys(left: string, right: string): LoaderError {
    return new LoaderError(`Cannot order a ${left} against a ${right}`, {
      code: "incomparable_sort_keys",
      context: { left, right },
      isOperational: false,
    })
  }

  static batchLengthMismatch(loader: string, expected: number, received: number): LoaderError {
    return new LoaderError(
      `Loader "${loader}" received ${received} values for ${expected} keys`,
      { code: "batch_length_mismatch", context: { loader, expected, received }, isOperational: false },
    )
  }
}
