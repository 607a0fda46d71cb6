import fs from "node:fs/promises"
import path from "node:path"
import { describeTemplateSourceContract } from "../../../ports/__tests__/source.contract"
import { JsonFileSource } from "../json-file-source"

const document = { verbosity: "quiet", formatter: { logFormat: "%h %m" } }

describeTemplateSourceContract({
  name: "JsonFileSource",
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, "logger.json"), JSON.stringify(document))
  },
  make: (cwd) => new JsonFileSource({ file: "logger.json", required: true, cwd }),
  expectedValue: () => document,
})
