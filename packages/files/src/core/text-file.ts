import * as fs from "node:fs/promises"
import { FileAccessError } from "./file-access-error"

/** Write `content` as UTF-8, creating the file or truncating it. */
export async function writeTextFile(path: string, content: string): Promise<void> {
  try {
    await fs.writeFile(path, content, "utf-8")
  } catch (err) {
    throw FileAccessError.writeFailed(path, err)
  }
}

export async function readTextFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, "utf-8")
  } catch (err) {
    if (isNotFoundError(err)) throw FileAccessError.notFound(path, err)

    throw FileAccessError.readFailed(path, err)
  }
}

function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
