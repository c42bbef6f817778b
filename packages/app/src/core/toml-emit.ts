import * as Either from "effect/Either"

import type { EmitOptions, EmitResult } from "./adapter.js"
import type { UnrepresentableError, ValuePath } from "./errors.js"
import { unrepresentable } from "./errors.js"
import { formatFloat } from "./number.js"
import type { MappingValue, Value } from "./value.js"
import { isMapping, typeName } from "./value.js"

// CHANGE: write a Value mapping as a TOML document with [table] and [[array]] sections
// WHY: TOML needs the full key path in every header, so emission tracks it explicitly
// REF: req-toml-2
// FORMAT THEOREM: ∀m ∈ Mapping without Null: parseToml(emitToml(m)) ≡ reorder(m)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: within a table, plain values precede sub-tables, which precede arrays of tables
// COMPLEXITY: O(n) in tree size

type Emitted<A> = Either.Either<A, UnrepresentableError>

interface EmitState {
  readonly blocks: Array<string>
  readonly unit: string
}

const ok: Emitted<undefined> = Either.right(undefined)

const bareKey = /^[A-Za-z0-9_-]+$/u

const basicString = (value: string): string => {
  let result = "\""
  for (const char of value) {
    const code = char.charCodeAt(0)
    if (char === "\"") {
      result += "\\\""
    } else if (char === "\\") {
      result += "\\\\"
    } else if (char === "\n") {
      result += "\\n"
    } else if (char === "\r") {
      result += "\\r"
    } else if (char === "\t") {
      result += "\\t"
    } else if (char === "\b") {
      result += "\\b"
    } else if (char === "\f") {
      result += "\\f"
    } else if (code < 0x20 || code === 0x7f) {
      result += `\\u${code.toString(16).toUpperCase().padStart(4, "0")}`
    } else {
      result += char
    }
  }
  return `${result}"`
}

const renderKey = (key: string): string => bareKey.test(key) ? key : basicString(key)

const renderHeader = (keys: ReadonlyArray<string>): string => keys.map(renderKey).join(".")

const renderFloat = (value: number): string => {
  if (Number.isNaN(value)) {
    return "nan"
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf"
  }
  return formatFloat(value)
}

const inlineList = (
  values: ReadonlyArray<Emitted<string>>,
  open: string,
  close: string
): Emitted<string> => {
  const parts: Array<string> = []
  for (const value of values) {
    if (Either.isLeft(value)) {
      return value
    }
    parts.push(value.right)
  }
  if (parts.length === 0) {
    return Either.right(open + close)
  }
  return Either.right(open === "{" ? `{ ${parts.join(", ")} }` : `[${parts.join(", ")}]`)
}

const inlineValue = (value: Value, path: ValuePath): Emitted<string> => {
  switch (value._tag) {
    case "Null":
      return Either.left(unrepresentable("toml", "Null", path, "TOML has no null value"))
    case "Bool":
      return Either.right(value.value ? "true" : "false")
    case "Integer":
      return Either.right(value.value.toString())
    case "Float":
      return Either.right(renderFloat(value.value))
    case "String":
      return Either.right(basicString(value.value))
    case "Sequence":
      return inlineList(
        value.items.map((item, index) => inlineValue(item, [...path, index])),
        "[",
        "]"
      )
    case "Mapping":
      return inlineList(
        value.entries.map((entry) =>
          Either.map(inlineValue(entry.value, [...path, entry.key]), (text) => `${renderKey(entry.key)} = ${text}`)
        ),
        "{",
        "}"
      )
  }
}

const tablesOf = (items: ReadonlyArray<Value>): ReadonlyArray<MappingValue> | undefined => {
  const tables: Array<MappingValue> = []
  for (const item of items) {
    if (!isMapping(item)) {
      return undefined
    }
    tables.push(item)
  }
  return tables.length > 0 ? tables : undefined
}

type HeaderKind = "root" | "table" | "array"

interface TableEntry {
  readonly key: string
  readonly table: MappingValue
}

interface ArrayEntry {
  readonly key: string
  readonly tables: ReadonlyArray<MappingValue>
}

const emitTable = (
  state: EmitState,
  table: MappingValue,
  path: ValuePath,
  keys: ReadonlyArray<string>,
  header: HeaderKind
): Emitted<undefined> => {
  const lines: Array<string> = []
  const subTables: Array<TableEntry> = []
  const arrays: Array<ArrayEntry> = []
  const entryIndent = state.unit.repeat(keys.length)
  for (const entry of table.entries) {
    if (isMapping(entry.value)) {
      subTables.push({ key: entry.key, table: entry.value })
      continue
    }
    const tables = entry.value._tag === "Sequence" ? tablesOf(entry.value.items) : undefined
    if (tables !== undefined) {
      arrays.push({ key: entry.key, tables })
      continue
    }
    const rendered = inlineValue(entry.value, [...path, entry.key])
    if (Either.isLeft(rendered)) {
      return Either.left(rendered.left)
    }
    lines.push(`${entryIndent}${renderKey(entry.key)} = ${rendered.right}`)
  }

  const headerIndent = state.unit.repeat(Math.max(0, keys.length - 1))
  if (header === "array") {
    lines.unshift(`${headerIndent}[[${renderHeader(keys)}]]`)
  } else if (header === "table" && (lines.length > 0 || (subTables.length === 0 && arrays.length === 0))) {
    lines.unshift(`${headerIndent}[${renderHeader(keys)}]`)
  }
  if (lines.length > 0) {
    state.blocks.push(lines.join("\n"))
  }

  for (const entry of subTables) {
    const emitted = emitTable(state, entry.table, [...path, entry.key], [...keys, entry.key], "table")
    if (Either.isLeft(emitted)) {
      return emitted
    }
  }
  for (const entry of arrays) {
    for (const [index, element] of entry.tables.entries()) {
      const emitted = emitTable(state, element, [...path, entry.key, index], [...keys, entry.key], "array")
      if (Either.isLeft(emitted)) {
        return emitted
      }
    }
  }
  return ok
}

/**
 * Emit a Mapping as a TOML document.
 *
 * @param value - Root of the tree; must be a Mapping.
 * @param options - `indent` n indents nested tables by n spaces per level.
 * @returns TOML text, "" for an empty mapping, or UnrepresentableError for a
 * non-Mapping root or a Null anywhere in the tree.
 *
 * @pure true
 * @invariant a table holding only sub-tables gets no header of its own
 * @complexity O(n)
 */
export const emitToml = (value: Value, options: EmitOptions): EmitResult => {
  if (!isMapping(value)) {
    return Either.left(
      unrepresentable("toml", typeName(value), [], "a TOML document must be a table at the root")
    )
  }
  const state: EmitState = { blocks: [], unit: " ".repeat(Math.max(0, options.indent)) }
  return Either.map(
    emitTable(state, value, [], [], "root"),
    () => state.blocks.length === 0 ? "" : `${state.blocks.join("\n\n")}\n`
  )
}
