import * as Either from "effect/Either"

import type { FormatAdapter } from "./adapter.js"
import type { Side, UnsupportedFormat } from "./errors.js"
import { unsupportedFormat } from "./errors.js"
import type { Format } from "./format.js"
import { parseFormatName } from "./format.js"
import { jsonAdapter } from "./json.js"
import { tomlAdapter } from "./toml.js"
import { yamlAdapter } from "./yaml.js"

// CHANGE: register one adapter per supported format
// WHY: the driver resolves adapters by name and never branches on the format itself
// REF: req-adapter-2
// FORMAT THEOREM: ∀f ∈ Format: adapters[f].format = f
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the table is total over Format
// COMPLEXITY: O(1)

export const adapters: Readonly<Record<Format, FormatAdapter>> = {
  json: jsonAdapter,
  yaml: yamlAdapter,
  toml: tomlAdapter
}

/**
 * Find the adapter for a format name such as `yml`.
 *
 * @param name - Format name as given by the user or inferred from a path.
 * @param side - Which end of the conversion the name belongs to.
 * @returns Adapter or UnsupportedFormat carrying the requested name.
 *
 * @pure true
 * @complexity O(1)
 */
export const lookupAdapter = (name: string, side: Side): Either.Either<FormatAdapter, UnsupportedFormat> => {
  const format = parseFormatName(name)
  return format === undefined ? Either.left(unsupportedFormat(side, name)) : Either.right(adapters[format])
}
