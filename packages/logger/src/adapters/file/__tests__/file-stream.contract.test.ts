import { mkdtempSync, readFileSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { describeOutputStreamContract } from "../../../ports/__tests__/output-stream.contract"
import { FileStream } from "../file-stream"

const dirs: string[] = []

afterAll(() => {
  for (const dir of dirs) rmSync(dir, { recursive: true, force: true })
})

describeOutputStreamContract({
  name: "FileStream",
  make: () => {
    const dir = mkdtempSync(join(tmpdir(), "inkwell-file-contract-"))
    dirs.push(dir)

    const path = join(dir, "app.log")
    const stream = new FileStream({}, { path })

    return {
      stream,
      read: () => {
        stream.flush()

        return readFileSync(path, "utf8").split("\n").filter(Boolean)
      },
    }
  },
})
