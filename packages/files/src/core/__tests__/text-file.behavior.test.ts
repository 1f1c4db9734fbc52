import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import { FileAccessError } from "../file-access-error"
import { readTextFile, writeTextFile } from "../text-file"

describe("text files", () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "strata-files-"))
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true })
  })

  it("reads back what was written", async () => {
    const file = path.join(tempDir, "demo.txt")

    await writeTextFile(file, "Hello, Strata!\nsecond line")

    expect(await readTextFile(file)).toBe("Hello, Strata!\nsecond line")
  })

  it("truncates an existing file", async () => {
    const file = path.join(tempDir, "demo.txt")

    await writeTextFile(file, "a much longer first version")
    await writeTextFile(file, "short")

    expect(await readTextFile(file)).toBe("short")
  })

  it("keeps non-ASCII text intact", async () => {
    const file = path.join(tempDir, "utf8.txt")

    await writeTextFile(file, "naïve café \u{1F600}")

    expect(await fs.readFile(file)).toEqual(Buffer.from("naïve café \u{1F600}", "utf-8"))
    expect(await readTextFile(file)).toBe("naïve café \u{1F600}")
  })

  it("raises file_not_found for a missing file", async () => {
    const file = path.join(tempDir, "missing.txt")

    const read = readTextFile(file)

    await expect(read).rejects.toBeInstanceOf(FileAccessError)
    await expect(read).rejects.toMatchObject({
      code: "file_not_found",
      context: { path: file },
      cause: { code: "ENOENT" },
    })
  })

  it("raises file_read_failed when the path is a directory", async () => {
    await expect(readTextFile(tempDir)).rejects.toMatchObject({
      code: "file_read_failed",
      context: { path: tempDir },
      cause: { code: "EISDIR" },
    })
  })

  it("raises file_write_failed when the directory does not exist", async () => {
    const file = path.join(tempDir, "no", "such", "dir.txt")

    await expect(writeTextFile(file, "x")).rejects.toMatchObject({
      code: "file_write_failed",
      context: { path: file },
      cause: { code: "ENOENT" },
    })
  })
})
