export { FileAccessError, type FileAccessErrorCode } from "./core/file-access-error"
export { readTextFile, writeTextFile } from "./core/text-file"
