import type { FormatAdapter } from "./adapter.js"
import { emitToml } from "./toml-emit.js"
import { parseToml } from "./toml-parse.js"

export const tomlAdapter: FormatAdapter = {
  format: "toml",
  parse: parseToml,
  emit: emitToml
}
