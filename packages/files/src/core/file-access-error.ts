import { BaseError } from "@strata/errors"

export type FileAccessErrorCode = "file_not_found" | "file_read_failed" | "file_write_failed"

export class FileAccessError extends BaseError<FileAccessErrorCode> {
  static notFound(path: string, cause: unknown): FileAccessError {
    return new FileAccessError("File not found", {
      code: "file_not_found",
      context: { path },
      cause,
    })
  }

  static readFailed(path: string, cause: unknown): FileAccessError {
    return new FileAccessError("Failed to read file", {
      code: "file_read_failed",
      context: { path },
      cause,
      isRetryable: true,
    })
  }

  static writeFailed(path: string, cause: unknown): FileAccessError {
    return new FileAccessError("Failed to write file", {
      code: "file_write_failed",
      context: { path },
      cause,
      isRetryable: true,
    })
  }
}
