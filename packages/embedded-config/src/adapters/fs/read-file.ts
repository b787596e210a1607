import fs from "node:fs"
import type { ReadFile } from "../../ports/read-file"

export const readFileBytes: ReadFile = (path) => fs.readFileSync(path)
