import { BaseError } from "@strata/errors"

export type MemoErrorCode = "recursive_computation"

export class MemoError extends BaseError<MemoErrorCode> {
  /**
   * The compute function asked the cache for the key it is computing, which
   * would wait on itself forever.
   */
  static recursive(key: string): MemoError {
    return new MemoError("Compute function requested the key it is computing", {
      code: "recursive_computation",
      context: { key },
      isOperational: false,
    })
  }
}
